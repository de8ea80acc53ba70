import type { Bounds, Point, Vector } from "../types.js";

export function difference(a: Point, b: Point): Vector {
  return {
    x: b.x - a.x,
    y: b.y - a.y,
  };
}

export function length(v: Vector): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Unit vector in the direction of `v`.
 *
 * Throws for the zero vector: two vertices sharing the exact same position
 * have no direction between them. Random spawning makes this improbable, not
 * impossible, so the error reaches the caller of `step`.
 */
export function normalize(v: Vector): Vector {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    throw new Error(`Cannot normalize vector (${v.x}, ${v.y}): length is ${len}`);
  }
  return {
    x: v.x / len,
    y: v.y / len,
  };
}

export function distance(a: Point, b: Point): number {
  return length(difference(a, b));
}

export function midpoint(a: Point, b: Point): Point {
  return {
    x: (a.x + b.x) / 2,
    y: (a.y + b.y) / 2,
  };
}

/**
 * Arctangent of the slope between two points, in [-π/2, π/2].
 * Not atan2: the result only orients perpendicular offsets,
 * so `angle(a, b) === angle(b, a)`.
 */
export function angle(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.atan(dy / dx);
}

export function reciprocalAngle(a: Point, b: Point): number {
  return angle(a, b) - Math.PI / 2;
}

export function shiftAlongAngle(point: Point, theta: number, magnitude: number): Point {
  return {
    x: point.x + Math.cos(theta) * magnitude,
    y: point.y + Math.sin(theta) * magnitude,
  };
}

export function addVector(a: Vector, b: Vector): Vector {
  return {
    x: a.x + b.x,
    y: a.y + b.y,
  };
}

export function scaleVector(v: Vector, factor: number): Vector {
  return {
    x: v.x * factor,
    y: v.y * factor,
  };
}

export function boundingBox(points: Iterable<Point>): Bounds | undefined {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const point of points) {
    minX = Math.min(minX, point.x);
    minY = Math.min(minY, point.y);
    maxX = Math.max(maxX, point.x);
    maxY = Math.max(maxY, point.y);
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    return undefined;
  }

  return {
    minX,
    minY,
    maxX,
    maxY,
    width: maxX - minX,
    height: maxY - minY,
  };
}
