import type {
  EdgeGeometry,
  GraphProvider,
  LayoutConfig,
  LayoutConfigPatch,
  Point,
  RandomSource,
  RepulsionPass,
  VertexId,
} from "./types.js";
import { resolveLayoutConfig, validateCanvas } from "./layout/config.js";
import { ForceLayout } from "./layout/engine.js";
import { spotGeometry } from "./layout/spots.js";
import { hitTest as hitTestCandidates, vertexSize as sizeForDegree } from "./view/hit-test.js";
import type { HitCandidate } from "./view/hit-test.js";
import { InteractionController } from "./view/interaction.js";
import { Viewport } from "./view/viewport.js";

export interface LayoutSessionOptions {
  config?: LayoutConfigPatch;
  random?: RandomSource;
  repulsion?: RepulsionPass;
  autoFit?: boolean;
  onClick?: (vertex: VertexId) => void;
}

// The host drives `tick()` from its own animation loop.
export class LayoutSession {
  readonly config: LayoutConfig;
  readonly engine: ForceLayout;
  readonly viewport = new Viewport();
  readonly interaction: InteractionController;
  autoFit: boolean;
  private running = false;

  constructor(options: LayoutSessionOptions = {}) {
    this.config = resolveLayoutConfig(options.config);
    this.engine = new ForceLayout({
      simulation: this.config.simulation,
      canvas: this.config.canvas,
      random: options.random,
      repulsion: options.repulsion,
    });
    this.autoFit = options.autoFit ?? true;
    this.interaction = new InteractionController(
      this.viewport,
      {
        hitTest: (screen) => this.hitTest(screen),
        moveVertex: (vertex, model) => this.engine.setPosition(vertex, model),
      },
      { onClick: options.onClick },
    );
  }

  get graph(): GraphProvider | undefined {
    return this.engine.graph;
  }

  get isRunning(): boolean {
    return this.running;
  }

  setGraph(graph: GraphProvider | undefined): void {
    this.interaction.pointerUp();
    if (!graph) {
      this.stop();
      this.engine.unbind();
      return;
    }
    this.engine.bind(graph);
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  tick(): void {
    if (!this.engine.isBound) {
      return;
    }
    const dragged = this.interaction.draggedVertex;
    if (this.running) {
      this.engine.advance(this.config.simulation.stepsPerFrame, dragged);
    }
    if (this.autoFit && dragged === undefined) {
      this.fitToContent();
    }
  }

  fitToContent(): boolean {
    return this.viewport.fit(this.engine.positions().values(), this.config.canvas, this.config.canvas.paddingRatio);
  }

  resize(width: number, height: number): void {
    const canvas = validateCanvas({ ...this.config.canvas, width, height });
    this.config.canvas = canvas;
    this.engine.setSpawnRegion(canvas);
  }

  vertexSize(vertex: VertexId): number {
    if (!this.engine.isBound) {
      throw new Error("No graph is bound to the layout session");
    }
    const degree = this.engine.degree(vertex);
    if (degree === undefined) {
      throw new Error(`Vertex ${vertex} is not part of the bound graph`);
    }
    return sizeForDegree(degree, this.engine.degreeBounds(), this.config.nodes);
  }

  hitCandidates(): HitCandidate[] {
    const candidates: HitCandidate[] = [];
    for (const vertex of this.engine.vertices()) {
      const position = this.engine.position(vertex);
      if (!position) {
        continue;
      }
      candidates.push({
        vertex,
        center: this.viewport.toScreen(position),
        size: this.vertexSize(vertex),
      });
    }
    return candidates;
  }

  hitTest(screen: Point): VertexId | undefined {
    if (!this.engine.isBound) {
      return undefined;
    }
    return hitTestCandidates(screen, this.hitCandidates(), this.config.nodes.border);
  }

  // Model space, one entry per edge.
  edgeGeometry(): EdgeGeometry[] {
    const geometry: EdgeGeometry[] = [];
    for (const spot of this.engine.edgeSpots()) {
      geometry.push(...spotGeometry(spot, (vertex) => this.engine.position(vertex), this.config.edges));
    }
    return geometry;
  }
}
