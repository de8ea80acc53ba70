import { describe, expect, it, vi } from "vitest";
import { MultiGraph } from "./graph/multigraph.js";
import { ForceLayout } from "./layout/engine.js";
import { seededRandom } from "./layout/random.js";
import { LayoutSession } from "./session.js";
import type { LayoutSessionOptions } from "./session.js";

function pathSession(options: LayoutSessionOptions = {}) {
  const graph = new MultiGraph<string, string>();
  const a = graph.addVertex("a");
  const b = graph.addVertex("b");
  const c = graph.addVertex("c");
  graph.addEdge(a, b, "");
  graph.addEdge(b, c, "");

  const session = new LayoutSession({ random: seededRandom(11), ...options });
  session.setGraph(graph);
  session.engine.setPosition(a, { x: 0, y: 0 });
  session.engine.setPosition(b, { x: 100, y: 0 });
  session.engine.setPosition(c, { x: 100, y: 100 });
  return { session, graph, a, b, c };
}

describe("LayoutSession", () => {
  it("fits the layout into the canvas", () => {
    const { session, a, b, c } = pathSession();
    expect(session.fitToContent()).toBe(true);
    expect(session.viewport.zoom).toBe(4);
    expect(session.viewport.shift).toEqual({ x: 50, y: 50 });

    expect(session.hitCandidates()).toEqual([
      { vertex: a, center: { x: 50, y: 50 }, size: 25 },
      { vertex: b, center: { x: 450, y: 50 }, size: 30 },
      { vertex: c, center: { x: 450, y: 450 }, size: 25 },
    ]);
  });

  it("hit-tests with the drawn size plus the border", () => {
    const { session, a } = pathSession();
    session.fitToContent();
    expect(session.hitTest({ x: 63.5, y: 50 })).toBe(a);
    expect(session.hitTest({ x: 64, y: 50 })).toBeUndefined();
  });

  it("hits a vertex at its own centre at any zoom and shift", () => {
    const { session, a, b, c } = pathSession();
    for (const zoom of [0.5, 1, 3.7]) {
      session.viewport.setZoom(zoom);
      session.viewport.setShift({ x: -13 * zoom, y: 27 });
      for (const vertex of [a, b, c]) {
        const position = session.engine.position(vertex);
        if (!position) {
          throw new Error("vertex has no position");
        }
        expect(session.hitTest(session.viewport.toScreen(position))).toBe(vertex);
      }
    }
  });

  it("does not simulate until started", () => {
    const { session, b } = pathSession({ autoFit: false });
    session.tick();
    expect(session.engine.position(b)).toEqual({ x: 100, y: 0 });
  });

  it("advances stepsPerFrame steps per tick while running", () => {
    const graph = new MultiGraph<string, string>();
    const a = graph.addVertex("a");
    const b = graph.addVertex("b");
    const c = graph.addVertex("c");
    graph.addEdge(a, b, "");
    graph.addEdge(a, c, "");

    const session = new LayoutSession({ random: seededRandom(7), autoFit: false });
    session.setGraph(graph);
    session.start();
    session.tick();

    const reference = new ForceLayout({ random: seededRandom(7) });
    reference.bind(graph);
    reference.advance(20);

    expect(session.isRunning).toBe(true);
    expect([...session.engine.positions()]).toEqual([...reference.positions()]);
  });

  it("holds the dragged vertex still and suspends auto-fit", () => {
    const { session, a, b } = pathSession();
    session.fitToContent();
    const zoom = session.viewport.zoom;
    const shift = session.viewport.shift;

    session.interaction.pointerDown({ x: 50, y: 50 });
    expect(session.interaction.draggedVertex).toBe(a);
    session.start();
    session.tick();

    expect(session.engine.position(a)).toEqual({ x: 0, y: 0 });
    expect(session.engine.position(b)).not.toEqual({ x: 100, y: 0 });
    expect(session.viewport.zoom).toBe(zoom);
    expect(session.viewport.shift).toEqual(shift);
  });

  it("moves the dragged vertex to the pointer in model space", () => {
    const { session, a } = pathSession();
    session.fitToContent();
    session.interaction.pointerDown({ x: 50, y: 50 });
    session.interaction.pointerMove({ x: 250, y: 90 });
    expect(session.engine.position(a)).toEqual({ x: 50, y: 10 });
  });

  it("returns to idle when the graph is cleared", () => {
    const { session } = pathSession();
    session.start();
    session.setGraph(undefined);

    expect(session.isRunning).toBe(false);
    expect(session.graph).toBeUndefined();
    expect(session.hitTest({ x: 50, y: 50 })).toBeUndefined();
    expect(session.edgeGeometry()).toEqual([]);
    expect(() => session.vertexSize(0)).toThrow("No graph is bound to the layout session");
    expect(() => session.tick()).not.toThrow();
  });

  it("validates canvas resizes", () => {
    const session = new LayoutSession();
    expect(() => session.resize(0, 10)).toThrow("canvas.width must be > 0, got 0");
    session.resize(800, 600);
    expect(session.config.canvas).toEqual({ width: 800, height: 600, paddingRatio: 0.2 });
    expect(session.engine.spawnRegion).toEqual({ width: 800, height: 600, paddingRatio: 0.2 });
  });

  it("reports clicks on vertices", () => {
    const onClick = vi.fn();
    const { session, c } = pathSession({ onClick });
    session.fitToContent();
    expect(session.interaction.click({ x: 450, y: 450 })).toBe(c);
    expect(onClick).toHaveBeenCalledWith(c);
  });

  it("produces one geometry entry per edge", () => {
    const { session } = pathSession();
    expect(session.edgeGeometry().map((entry) => entry.kind)).toEqual(["straight", "straight"]);
  });

  it("hands out edge geometry that does not alias vertex positions", () => {
    const { session, a } = pathSession();
    const [first] = session.edgeGeometry();
    first.from.x += 1000;
    expect(session.engine.position(a)).toEqual({ x: 0, y: 0 });
  });

  it("keeps hit-testing on the bound topology after the graph changes", () => {
    const { session, graph, a, c } = pathSession();
    session.fitToContent();
    graph.removeVertex(c);

    session.tick();
    expect(session.hitCandidates().map((candidate) => candidate.size)).toEqual([25, 30, 25]);
    expect(session.hitTest({ x: 50, y: 50 })).toBe(a);
    expect(session.interaction.pointerDown({ x: 450, y: 450 })).toBe(c);
    expect(() => session.vertexSize(42)).toThrow("Vertex 42 is not part of the bound graph");

    session.interaction.pointerUp();
    session.setGraph(graph);
    expect(session.hitCandidates().map((candidate) => candidate.size)).toEqual([20, 20]);
  });
});
