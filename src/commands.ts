import type { LayoutConfigPatch } from "./types.js";
import { loadGraphDocument } from "./graph/document.js";
import { seededRandom } from "./layout/random.js";
import { buildScene } from "./render/scene.js";
import { renderSvg } from "./render/svg.js";
import { LayoutSession } from "./session.js";

export const DEFAULT_RENDER_STEPS = 500;

export interface RenderGraphOptions {
  config?: LayoutConfigPatch;
  steps?: number;
  seed?: number;
}

export function renderGraphToSvg(source: string, options: RenderGraphOptions = {}): string {
  const loaded = loadGraphDocument(source);
  const session = new LayoutSession({
    config: options.config,
    random: options.seed === undefined ? undefined : seededRandom(options.seed),
  });

  session.setGraph(loaded.graph);
  session.engine.advance(options.steps ?? DEFAULT_RENDER_STEPS);
  session.fitToContent();

  return renderSvg(
    buildScene(session, {
      selectedVertices: loaded.selectedVertices,
      selectedEdges: loaded.selectedEdges,
    }),
  );
}

export function inspectGraph(source: string): string {
  const { graph, ids } = loadGraphDocument(source);
  const names = new Map<number, string>();
  for (const [name, vertex] of ids) {
    names.set(vertex, name);
  }

  const session = new LayoutSession();
  session.setGraph(graph);
  const bounds = session.engine.degreeBounds();
  const parallel = session.engine.edgeSpots().filter((spot) => spot.edges.length > 1);

  const lines = [
    `vertices: ${graph.vertexCount()}`,
    `edges: ${graph.edgeCount()}`,
    `degree: ${bounds.min}..${bounds.max}`,
    `edge spots: ${session.engine.edgeSpots().length} (${parallel.length} with parallel edges)`,
  ];
  for (const spot of parallel) {
    const [a, b] = spot.vertices;
    lines.push(`  ${names.get(a) ?? a} -- ${names.get(b) ?? b}: ${spot.edges.length} edges`);
  }
  return `${lines.join("\n")}\n`;
}
