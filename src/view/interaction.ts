import type { Point, Vector, VertexId } from "../types.js";
import type { Viewport } from "./viewport.js";

export interface InteractionTarget {
  hitTest(screen: Point): VertexId | undefined;
  moveVertex(vertex: VertexId, model: Point): void;
}

export type PointerState =
  | { kind: "idle" }
  | { kind: "dragging"; vertex: VertexId }
  | { kind: "panning"; press: Point; shiftAtPress: Vector };

export interface InteractionOptions {
  onClick?: (vertex: VertexId) => void;
}

export class InteractionController {
  private state: PointerState = { kind: "idle" };

  constructor(
    private readonly viewport: Viewport,
    private readonly target: InteractionTarget,
    private readonly options: InteractionOptions = {},
  ) {}

  get pointerState(): PointerState {
    return this.state;
  }

  get draggedVertex(): VertexId | undefined {
    return this.state.kind === "dragging" ? this.state.vertex : undefined;
  }

  beginDrag(vertex: VertexId): void {
    this.state = { kind: "dragging", vertex };
  }

  updateDrag(screen: Point): void {
    if (this.state.kind !== "dragging") {
      return;
    }
    this.target.moveVertex(this.state.vertex, this.viewport.toModel(screen));
  }

  endDrag(): void {
    if (this.state.kind === "dragging") {
      this.state = { kind: "idle" };
    }
  }

  pointerDown(screen: Point): VertexId | undefined {
    const vertex = this.target.hitTest(screen);
    if (vertex !== undefined) {
      this.beginDrag(vertex);
      return vertex;
    }
    this.state = {
      kind: "panning",
      press: { x: screen.x, y: screen.y },
      shiftAtPress: this.viewport.shift,
    };
    return undefined;
  }

  pointerMove(screen: Point): void {
    switch (this.state.kind) {
      case "dragging":
        this.updateDrag(screen);
        return;
      case "panning":
        this.viewport.setShift({
          x: this.state.shiftAtPress.x + (screen.x - this.state.press.x),
          y: this.state.shiftAtPress.y + (screen.y - this.state.press.y),
        });
        return;
      case "idle":
        return;
    }
  }

  pointerUp(): void {
    this.state = { kind: "idle" };
  }

  hover(screen: Point): VertexId | undefined {
    return this.target.hitTest(screen);
  }

  click(screen: Point): VertexId | undefined {
    const vertex = this.target.hitTest(screen);
    if (vertex !== undefined) {
      this.options.onClick?.(vertex);
    }
    return vertex;
  }
}
