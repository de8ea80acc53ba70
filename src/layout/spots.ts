import type { EdgeFan, EdgeGeometry, EdgeId, EdgeSpot, GraphProvider, Point, VertexId } from "../types.js";
import { midpoint, reciprocalAngle, shiftAlongAngle } from "./vector.js";

function spotKey(a: VertexId, b: VertexId): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

// Spots come out in the order their first edge is reached while walking vertices.
export function resolveEdgeSpots(graph: GraphProvider): EdgeSpot[] {
  const vertexEdges = new Map<VertexId, EdgeId[]>();
  for (const edge of graph.edges()) {
    const [a, b] = graph.endpoints(edge);
    const aEdges = vertexEdges.get(a) ?? [];
    aEdges.push(edge);
    vertexEdges.set(a, aEdges);
    if (b !== a) {
      const bEdges = vertexEdges.get(b) ?? [];
      bEdges.push(edge);
      vertexEdges.set(b, bEdges);
    }
  }

  const spots = new Map<string, EdgeSpot>();
  const placed = new Set<EdgeId>();
  for (const vertex of graph.vertices()) {
    for (const edge of vertexEdges.get(vertex) ?? []) {
      if (placed.has(edge)) {
        continue;
      }
      placed.add(edge);
      const [a, b] = graph.endpoints(edge);
      const key = spotKey(a, b);
      const spot = spots.get(key);
      if (spot) {
        spot.edges.push(edge);
        continue;
      }
      spots.set(key, {
        vertices: a < b ? [a, b] : [b, a],
        edges: [edge],
      });
    }
  }

  return [...spots.values()];
}

export function fanOffsets(count: number, fan: EdgeFan): number[] {
  if (count <= 1) {
    return count === 1 ? [0] : [];
  }
  const spread = fan.base + count * fan.perEdge;
  const offsets: number[] = [];
  for (let i = 0; i < count; i += 1) {
    offsets.push((spread * (count - 1 - 2 * i)) / (count - 1));
  }
  return offsets;
}

export function spotGeometry(
  spot: EdgeSpot,
  positionOf: (vertex: VertexId) => Point | undefined,
  fan: EdgeFan,
): EdgeGeometry[] {
  const from = positionOf(spot.vertices[0]);
  const to = positionOf(spot.vertices[1]);
  if (!from || !to) {
    return [];
  }

  const middle = midpoint(from, to);
  if (spot.edges.length === 1) {
    return [
      {
        kind: "straight",
        edge: spot.edges[0],
        from: { ...from },
        to: { ...to },
        labelAnchor: middle,
      },
    ];
  }

  const theta = reciprocalAngle(from, to);
  const offsets = fanOffsets(spot.edges.length, fan);
  return spot.edges.map((edge, index): EdgeGeometry => {
    const control = shiftAlongAngle(middle, theta, offsets[index]);
    return {
      kind: "curve",
      edge,
      from: { ...from },
      to: { ...to },
      control,
      labelAnchor: midpoint(middle, control),
    };
  });
}
