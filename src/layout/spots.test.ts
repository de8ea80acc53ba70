import { describe, expect, it } from "vitest";
import { MultiGraph } from "../graph/multigraph.js";
import type { Point } from "../types.js";
import { fanOffsets, resolveEdgeSpots, spotGeometry } from "./spots.js";

const FAN = { base: 10, perEdge: 5, render: true };

describe("resolveEdgeSpots", () => {
  it("groups parallel edges into a single spot", () => {
    const graph = new MultiGraph<string, number>();
    const a = graph.addVertex("a");
    const b = graph.addVertex("b");
    graph.addVertex("c");
    const e0 = graph.addEdge(a, b, 1);
    const e1 = graph.addEdge(a, b, 2);

    const spots = resolveEdgeSpots(graph);
    expect(spots).toEqual([{ vertices: [a, b], edges: [e0, e1] }]);
  });

  it("keys spots by the unordered endpoint pair", () => {
    const graph = new MultiGraph<string, number>();
    const a = graph.addVertex("a");
    const b = graph.addVertex("b");
    const c = graph.addVertex("c");
    const e0 = graph.addEdge(a, b, 1);
    const e1 = graph.addEdge(b, a, 2);
    const e2 = graph.addEdge(c, b, 3);

    expect(resolveEdgeSpots(graph)).toEqual([
      { vertices: [a, b], edges: [e0, e1] },
      { vertices: [b, c], edges: [e2] },
    ]);
  });

  it("is total, disjoint and idempotent", () => {
    const graph = new MultiGraph<string, number>();
    const v = ["a", "b", "c", "d", "e"].map((name) => graph.addVertex(name));
    const pairs: Array<[number, number]> = [
      [0, 1],
      [1, 0],
      [1, 2],
      [2, 3],
      [3, 2],
      [3, 2],
      [0, 3],
    ];
    for (const [i, j] of pairs) {
      graph.addEdge(v[i], v[j], i * 10 + j);
    }

    const spots = resolveEdgeSpots(graph);
    const sizes = spots.reduce((sum, spot) => sum + spot.edges.length, 0);
    const seen = new Set(spots.flatMap((spot) => spot.edges));
    expect(sizes).toBe(graph.edgeCount());
    expect(seen.size).toBe(graph.edgeCount());
    expect(spots).toHaveLength(4);
    expect(resolveEdgeSpots(graph)).toEqual(spots);
  });

  it("produces no spots for isolated vertices", () => {
    const graph = new MultiGraph<string, number>();
    graph.addVertex("lonely");
    graph.addVertex("alone");
    expect(resolveEdgeSpots(graph)).toEqual([]);
  });
});

describe("fanOffsets", () => {
  it("keeps a single edge on the straight line", () => {
    expect(fanOffsets(1, FAN)).toEqual([0]);
    expect(fanOffsets(0, FAN)).toEqual([]);
  });

  it("spreads parallel edges symmetrically", () => {
    expect(fanOffsets(2, FAN)).toEqual([20, -20]);
    expect(fanOffsets(3, FAN)).toEqual([25, 0, -25]);
    expect(fanOffsets(4, FAN)).toEqual([30, 10, -10, -30]);
  });
});

describe("spotGeometry", () => {
  const positions = new Map<number, Point>([
    [0, { x: 0, y: 0 }],
    [1, { x: 4, y: 0 }],
  ]);
  const positionOf = (vertex: number) => positions.get(vertex);

  it("draws a single edge as a straight segment", () => {
    expect(spotGeometry({ vertices: [0, 1], edges: [7] }, positionOf, FAN)).toEqual([
      {
        kind: "straight",
        edge: 7,
        from: { x: 0, y: 0 },
        to: { x: 4, y: 0 },
        labelAnchor: { x: 2, y: 0 },
      },
    ]);
  });

  it("bends parallel edges to either side of the chord", () => {
    const geometry = spotGeometry({ vertices: [0, 1], edges: [7, 8] }, positionOf, FAN);
    expect(geometry).toHaveLength(2);

    const [first, second] = geometry;
    if (first.kind !== "curve" || second.kind !== "curve") {
      throw new Error("expected curves");
    }
    expect(first.edge).toBe(7);
    expect(first.control.x).toBeCloseTo(2, 10);
    expect(first.control.y).toBeCloseTo(-20, 10);
    expect(first.labelAnchor.y).toBeCloseTo(-10, 10);
    expect(second.edge).toBe(8);
    expect(second.control.x).toBeCloseTo(2, 10);
    expect(second.control.y).toBeCloseTo(20, 10);
    expect(second.labelAnchor.y).toBeCloseTo(10, 10);
  });

  it("copies endpoint positions into the geometry", () => {
    const [straight] = spotGeometry({ vertices: [0, 1], edges: [7] }, positionOf, FAN);
    expect(straight.from).toEqual(positions.get(0));
    expect(straight.from).not.toBe(positions.get(0));
    expect(straight.to).not.toBe(positions.get(1));
  });

  it("skips spots whose vertices have no position", () => {
    expect(spotGeometry({ vertices: [0, 9], edges: [1] }, positionOf, FAN)).toEqual([]);
  });
});
