import type { EdgeGeometry, EdgeId, Point, VertexId } from "../types.js";
import type { LayoutSession } from "../session.js";
import type { Viewport } from "../view/viewport.js";

export interface SceneNode {
  vertex: VertexId;
  label: string;
  center: Point;
  size: number;
  border: number;
  hue?: number;
  selected: boolean;
}

export interface SceneEdge {
  label: string;
  geometry: EdgeGeometry;
  selected: boolean;
}

export interface Scene {
  width: number;
  height: number;
  nodes: SceneNode[];
  edges: SceneEdge[];
}

export interface SceneOptions {
  vertexLabel?: (vertex: VertexId) => string;
  edgeLabel?: (edge: EdgeId) => string;
  selectedVertices?: ReadonlySet<VertexId>;
  selectedEdges?: ReadonlySet<EdgeId>;
}

const GOLDEN_ANGLE_DEG = 137.508;

export function vertexHue(vertex: VertexId): number {
  return Number(((vertex * GOLDEN_ANGLE_DEG) % 360).toFixed(3));
}

function geometryToScreen(geometry: EdgeGeometry, viewport: Viewport): EdgeGeometry {
  if (geometry.kind === "straight") {
    return {
      ...geometry,
      from: viewport.toScreen(geometry.from),
      to: viewport.toScreen(geometry.to),
      labelAnchor: viewport.toScreen(geometry.labelAnchor),
    };
  }
  return {
    ...geometry,
    from: viewport.toScreen(geometry.from),
    to: viewport.toScreen(geometry.to),
    control: viewport.toScreen(geometry.control),
    labelAnchor: viewport.toScreen(geometry.labelAnchor),
  };
}

// Nodes keep vertex order, so later vertices paint on top as hit-testing expects.
export function buildScene(session: LayoutSession, options: SceneOptions = {}): Scene {
  const { width, height } = session.config.canvas;
  const graph = session.graph;
  if (!graph) {
    return { width, height, nodes: [], edges: [] };
  }

  // The graph may have changed since bind; removed elements lose their labels.
  const vertexLabel =
    options.vertexLabel ??
    ((vertex: VertexId) => (graph.hasVertex(vertex) ? String(graph.vertexElement(vertex)) : ""));
  const edgeLabel =
    options.edgeLabel ?? ((edge: EdgeId) => (graph.hasEdge(edge) ? String(graph.edgeElement(edge)) : ""));
  const bounds = session.engine.degreeBounds();
  const varied = bounds.min !== bounds.max;

  const modelGeometry = session.config.edges.render ? session.edgeGeometry() : [];
  const edges = modelGeometry.map((geometry) => ({
    label: edgeLabel(geometry.edge),
    geometry: geometryToScreen(geometry, session.viewport),
    selected: options.selectedEdges?.has(geometry.edge) ?? false,
  }));

  const nodes: SceneNode[] = [];
  for (const candidate of session.hitCandidates()) {
    nodes.push({
      vertex: candidate.vertex,
      label: vertexLabel(candidate.vertex),
      center: candidate.center,
      size: candidate.size,
      border: session.config.nodes.border,
      hue: varied ? vertexHue(candidate.vertex) : undefined,
      selected: options.selectedVertices?.has(candidate.vertex) ?? false,
    });
  }

  return { width, height, nodes, edges };
}
