import type { Point, Vector } from "../types.js";
import { boundingBox } from "../layout/vector.js";

export interface CanvasSize {
  width: number;
  height: number;
}

// screen = model * zoom + shift. Zero zoom is legal; `toModel` then only removes the shift.
export class Viewport {
  private shiftValue: Vector;
  private zoomValue: number;

  constructor(shift: Vector = { x: 0, y: 0 }, zoom = 1) {
    this.shiftValue = { x: shift.x, y: shift.y };
    this.zoomValue = 1;
    this.setZoom(zoom);
  }

  get shift(): Vector {
    return { ...this.shiftValue };
  }

  get zoom(): number {
    return this.zoomValue;
  }

  setShift(shift: Vector): void {
    if (!Number.isFinite(shift.x) || !Number.isFinite(shift.y)) {
      throw new Error(`Viewport shift must be finite, got (${shift.x}, ${shift.y})`);
    }
    this.shiftValue = { x: shift.x, y: shift.y };
  }

  setZoom(zoom: number): void {
    if (!Number.isFinite(zoom) || zoom < 0) {
      throw new Error(`Viewport zoom must be a finite number >= 0, got ${zoom}`);
    }
    this.zoomValue = zoom;
  }

  toScreen(point: Point): Point {
    return {
      x: point.x * this.zoomValue + this.shiftValue.x,
      y: point.y * this.zoomValue + this.shiftValue.y,
    };
  }

  toModel(point: Point): Point {
    if (this.zoomValue === 0) {
      return {
        x: point.x - this.shiftValue.x,
        y: point.y - this.shiftValue.y,
      };
    }
    return {
      x: (point.x - this.shiftValue.x) / this.zoomValue,
      y: (point.y - this.shiftValue.y) / this.zoomValue,
    };
  }

  panBy(dx: number, dy: number): void {
    this.setShift({ x: this.shiftValue.x + dx, y: this.shiftValue.y + dy });
  }

  zoomAt(anchor: Point, factor: number): void {
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new Error(`Zoom factor must be a positive finite number, got ${factor}`);
    }
    const pinned = this.toModel(anchor);
    this.setZoom(this.zoomValue * factor);
    this.setShift({
      x: anchor.x - pinned.x * this.zoomValue,
      y: anchor.y - pinned.y * this.zoomValue,
    });
  }

  /**
   * Fits the bounding box of `points` into the canvas, leaving `paddingRatio`
   * of each dimension free and centring the box. Needs at least two points and
   * a non-degenerate box; returns false and leaves the viewport as is otherwise.
   */
  fit(points: Iterable<Point>, canvas: CanvasSize, paddingRatio: number): boolean {
    const list = [...points];
    if (list.length < 2) {
      return false;
    }
    const box = boundingBox(list);
    if (!box || (box.width === 0 && box.height === 0)) {
      return false;
    }

    const usable = 1 - paddingRatio;
    const zoomX = box.width > 0 ? (usable * canvas.width) / box.width : Number.POSITIVE_INFINITY;
    const zoomY = box.height > 0 ? (usable * canvas.height) / box.height : Number.POSITIVE_INFINITY;
    const zoom = Math.min(zoomX, zoomY);

    this.setZoom(zoom);
    this.setShift({
      x: canvas.width / 2 - (zoom * (box.minX + box.maxX)) / 2,
      y: canvas.height / 2 - (zoom * (box.minY + box.maxY)) / 2,
    });
    return true;
  }
}
