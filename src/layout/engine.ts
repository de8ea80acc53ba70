import type {
  CanvasConfig,
  DegreeBounds,
  EdgeSpot,
  GraphProvider,
  Point,
  RandomSource,
  RepulsionPass,
  SimulationParams,
  Vector,
  VertexId,
} from "../types.js";
import { validateCanvas, validateSimulationParams } from "./config.js";
import { DEFAULT_CANVAS, DEFAULT_SIMULATION_PARAMS } from "./defaults.js";
import { attractiveForce, pairwiseRepulsion } from "./forces.js";
import { resolveEdgeSpots } from "./spots.js";
import { addVector, scaleVector } from "./vector.js";

export interface ForceLayoutOptions {
  simulation?: Partial<SimulationParams>;
  canvas?: Partial<CanvasConfig>;
  random?: RandomSource;
  repulsion?: RepulsionPass;
}

const SPAWN_GROWTH_EXPONENT = 0.3;

function computeDegreeBounds(degrees: ReadonlyMap<VertexId, number>): DegreeBounds {
  if (degrees.size === 0) {
    return { min: 0, max: 0 };
  }
  let min = Number.POSITIVE_INFINITY;
  let max = 0;
  for (const degree of degrees.values()) {
    min = Math.min(min, degree);
    max = Math.max(max, degree);
  }
  return { min, max };
}

// Parallel edges collapse into one neighbour entry.
function collectNeighbours(graph: GraphProvider, vertices: readonly VertexId[]): Map<VertexId, VertexId[]> {
  const neighbours = new Map<VertexId, Set<VertexId>>();
  for (const vertex of vertices) {
    neighbours.set(vertex, new Set());
  }
  for (const edge of graph.edges()) {
    const [a, b] = graph.endpoints(edge);
    if (a === b) {
      throw new Error(`Self-loop edge ${edge} on vertex ${a} is not supported by the layout engine`);
    }
    neighbours.get(a)?.add(b);
    neighbours.get(b)?.add(a);
  }
  return new Map([...neighbours].map(([vertex, set]): [VertexId, VertexId[]] => [vertex, [...set]]));
}

// Topology (order, adjacency, degrees, spots) is cached at bind time; graph
// changes made afterwards are only picked up by binding again.
export class ForceLayout {
  readonly params: Readonly<SimulationParams>;
  private canvas: CanvasConfig;
  private readonly random: RandomSource;
  private readonly repulsion: RepulsionPass;

  private boundGraph: GraphProvider | undefined;
  private order: VertexId[] = [];
  private readonly positionMap = new Map<VertexId, Point>();
  private readonly forceMap = new Map<VertexId, Vector>();
  private neighbours = new Map<VertexId, VertexId[]>();
  private spots: EdgeSpot[] = [];
  private degreeMap = new Map<VertexId, number>();
  private degrees: DegreeBounds = { min: 0, max: 0 };

  constructor(options: ForceLayoutOptions = {}) {
    this.params = Object.freeze(validateSimulationParams({ ...DEFAULT_SIMULATION_PARAMS, ...options.simulation }));
    this.canvas = validateCanvas({ ...DEFAULT_CANVAS, ...options.canvas });
    this.random = options.random ?? Math.random;
    this.repulsion = options.repulsion ?? pairwiseRepulsion;
  }

  get isBound(): boolean {
    return this.boundGraph !== undefined;
  }

  get graph(): GraphProvider | undefined {
    return this.boundGraph;
  }

  get spawnRegion(): Readonly<CanvasConfig> {
    return this.canvas;
  }

  setSpawnRegion(canvas: Partial<CanvasConfig>): void {
    this.canvas = validateCanvas({ ...this.canvas, ...canvas });
  }

  bind(graph: GraphProvider): void {
    const vertices = [...graph.vertices()];
    const neighbours = collectNeighbours(graph, vertices);

    this.clearState();
    this.boundGraph = graph;
    this.order = vertices;
    this.neighbours = neighbours;
    this.spots = resolveEdgeSpots(graph);
    this.degreeMap = new Map(vertices.map((vertex): [VertexId, number] => [vertex, graph.vertexDegree(vertex)]));
    this.degrees = computeDegreeBounds(this.degreeMap);
    this.spawn();
  }

  unbind(): void {
    this.clearState();
  }

  vertices(): readonly VertexId[] {
    return this.order;
  }

  position(vertex: VertexId): Point | undefined {
    return this.positionMap.get(vertex);
  }

  positions(): ReadonlyMap<VertexId, Point> {
    return this.positionMap;
  }

  force(vertex: VertexId): Vector | undefined {
    return this.forceMap.get(vertex);
  }

  setPosition(vertex: VertexId, point: Point): void {
    if (!this.positionMap.has(vertex)) {
      throw new Error(`Vertex ${vertex} is not part of the bound graph`);
    }
    this.positionMap.set(vertex, { x: point.x, y: point.y });
  }

  edgeSpots(): readonly EdgeSpot[] {
    return this.spots;
  }

  degree(vertex: VertexId): number | undefined {
    return this.degreeMap.get(vertex);
  }

  degreeBounds(): DegreeBounds {
    return { ...this.degrees };
  }

  // `excluded` still exerts and receives forces but is not moved.
  step(excluded?: VertexId): void {
    if (!this.boundGraph) {
      return;
    }

    const vertexCount = this.order.length;
    for (const vertex of this.order) {
      this.forceMap.set(vertex, { x: 0, y: 0 });
    }

    this.repulsion(this.order, this.positionMap, this.forceMap, this.params.repulsionScale);

    for (const vertex of this.order) {
      const from = this.positionMap.get(vertex);
      if (!from) {
        continue;
      }
      let total = this.forceMap.get(vertex) ?? { x: 0, y: 0 };
      for (const neighbour of this.neighbours.get(vertex) ?? []) {
        const to = this.positionMap.get(neighbour);
        if (!to) {
          continue;
        }
        total = addVector(
          total,
          attractiveForce(from, to, vertexCount, this.params.springForce, this.params.springScale),
        );
      }
      this.forceMap.set(vertex, total);
    }

    for (const vertex of this.order) {
      if (vertex === excluded) {
        continue;
      }
      const point = this.positionMap.get(vertex);
      const total = this.forceMap.get(vertex);
      if (!point || !total) {
        continue;
      }
      this.positionMap.set(vertex, addVector(point, scaleVector(total, this.params.speed)));
    }
  }

  advance(steps: number, excluded?: VertexId): void {
    if (!Number.isInteger(steps) || steps < 0) {
      throw new Error(`Step count must be a non-negative integer, got ${steps}`);
    }
    for (let i = 0; i < steps; i += 1) {
      this.step(excluded);
    }
  }

  private spawn(): void {
    const count = this.order.length;
    if (count === 0) {
      return;
    }
    const growth = Math.pow(count, SPAWN_GROWTH_EXPONENT);
    const padX = this.canvas.paddingRatio * this.canvas.width;
    const padY = this.canvas.paddingRatio * this.canvas.height;
    const spanX = (this.canvas.width - 2 * padX) * growth;
    const spanY = (this.canvas.height - 2 * padY) * growth;

    for (const vertex of this.order) {
      this.positionMap.set(vertex, {
        x: padX + this.random() * spanX,
        y: padY + this.random() * spanY,
      });
      this.forceMap.set(vertex, { x: 0, y: 0 });
    }
  }

  private clearState(): void {
    this.boundGraph = undefined;
    this.order = [];
    this.positionMap.clear();
    this.forceMap.clear();
    this.neighbours = new Map();
    this.spots = [];
    this.degreeMap = new Map();
    this.degrees = { min: 0, max: 0 };
  }
}
