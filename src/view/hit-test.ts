import type { DegreeBounds, Hitbox, NodeSizing, Point, VertexId } from "../types.js";

export interface HitCandidate {
  vertex: VertexId;
  center: Point;
  size: number;
}

export function vertexSize(degree: number, bounds: DegreeBounds, sizing: NodeSizing): number {
  if (bounds.min !== bounds.max) {
    return sizing.size + degree * sizing.degreeScale;
  }
  return sizing.size;
}

export function vertexHitbox(center: Point, size: number, border = 0): Hitbox {
  const half = (size + border) / 2;
  return {
    minX: center.x - half,
    minY: center.y - half,
    maxX: center.x + half,
    maxY: center.y + half,
  };
}

export function containsPoint(box: Hitbox, point: Point): boolean {
  return point.x >= box.minX && point.x <= box.maxX && point.y >= box.minY && point.y <= box.maxY;
}

// Overlaps resolve to the last matching candidate, the one painted on top.
export function hitTest(pointer: Point, candidates: Iterable<HitCandidate>, border = 0): VertexId | undefined {
  let found: VertexId | undefined;
  for (const candidate of candidates) {
    if (candidate.size + border <= 0) {
      continue;
    }
    if (containsPoint(vertexHitbox(candidate.center, candidate.size, border), pointer)) {
      found = candidate.vertex;
    }
  }
  return found;
}
