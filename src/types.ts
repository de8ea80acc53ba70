export type VertexId = number;
export type EdgeId = number;

export interface Point {
  x: number;
  y: number;
}

export type Vector = Point;

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
}

export interface GraphProvider<V = unknown, E = unknown> {
  vertexCount(): number;
  edgeCount(): number;
  vertices(): Iterable<VertexId>;
  edges(): Iterable<EdgeId>;
  endpoints(edge: EdgeId): readonly [VertexId, VertexId];
  vertexDegree(vertex: VertexId): number;
  areAdjacent(a: VertexId, b: VertexId): boolean;
  hasVertex(vertex: VertexId): boolean;
  hasEdge(edge: EdgeId): boolean;
  vertexElement(vertex: VertexId): V;
  edgeElement(edge: EdgeId): E;
}

export interface SimulationParams {
  springForce: number;
  springScale: number;
  repulsionScale: number;
  speed: number;
  stepsPerFrame: number;
}

export interface CanvasConfig {
  width: number;
  height: number;
  paddingRatio: number;
}

export interface NodeSizing {
  size: number;
  degreeScale: number;
  border: number;
}

export interface EdgeFan {
  base: number;
  perEdge: number;
  render: boolean;
}

export interface LayoutConfig {
  simulation: SimulationParams;
  canvas: CanvasConfig;
  nodes: NodeSizing;
  edges: EdgeFan;
}

export interface LayoutConfigPatch {
  simulation?: Partial<SimulationParams>;
  canvas?: Partial<CanvasConfig>;
  nodes?: Partial<NodeSizing>;
  edges?: Partial<EdgeFan>;
}

export interface DegreeBounds {
  min: number;
  max: number;
}

export interface EdgeSpot {
  vertices: readonly [VertexId, VertexId];
  edges: EdgeId[];
}

export interface StraightEdgeGeometry {
  kind: "straight";
  edge: EdgeId;
  from: Point;
  to: Point;
  labelAnchor: Point;
}

export interface CurveEdgeGeometry {
  kind: "curve";
  edge: EdgeId;
  from: Point;
  to: Point;
  control: Point;
  labelAnchor: Point;
}

export type EdgeGeometry = StraightEdgeGeometry | CurveEdgeGeometry;

export interface Hitbox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export type RandomSource = () => number;

// Adds repulsion between every pair of distinct vertices into `forces`.
export type RepulsionPass = (
  vertices: readonly VertexId[],
  positions: ReadonlyMap<VertexId, Point>,
  forces: Map<VertexId, Vector>,
  repulsionScale: number,
) => void;
