import type { Point, RepulsionPass, Vector } from "../types.js";
import { addVector, difference, distance, normalize, scaleVector } from "./vector.js";

// Floor for the distance fed to both force laws; nearly coincident
// vertices would otherwise receive unbounded forces.
export const STABILIZER = 1;

function stabilized(distanceValue: number): number {
  return distanceValue < STABILIZER ? STABILIZER : distanceValue;
}

export function repellingMagnitude(distanceValue: number, scale: number): number {
  const d = stabilized(distanceValue);
  return scale / (d * d);
}

// Negative below `scale`: springs also push apart vertices that are too close.
export function attractiveMagnitude(distanceValue: number, vertexCount: number, force: number, scale: number): number {
  if (!Number.isFinite(vertexCount) || vertexCount <= 0) {
    throw new Error(`Attractive force requires a positive vertex count, got ${vertexCount}`);
  }
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new Error(`Spring scale must be a positive finite number, got ${scale}`);
  }
  return (force * Math.log(stabilized(distanceValue) / scale)) / vertexCount;
}

export function repellingForce(from: Point, to: Point, scale: number): Vector {
  const direction = normalize(difference(from, to));
  return scaleVector(direction, -repellingMagnitude(distance(from, to), scale));
}

export function attractiveForce(from: Point, to: Point, vertexCount: number, force: number, scale: number): Vector {
  const direction = normalize(difference(from, to));
  return scaleVector(direction, attractiveMagnitude(distance(from, to), vertexCount, force, scale));
}

export const pairwiseRepulsion: RepulsionPass = (vertices, positions, forces, repulsionScale) => {
  for (const outer of vertices) {
    const outerPosition = positions.get(outer);
    if (!outerPosition) {
      continue;
    }
    let total = forces.get(outer) ?? { x: 0, y: 0 };
    for (const inner of vertices) {
      if (inner === outer) {
        continue;
      }
      const innerPosition = positions.get(inner);
      if (!innerPosition) {
        continue;
      }
      total = addVector(total, repellingForce(outerPosition, innerPosition, repulsionScale));
    }
    forces.set(outer, total);
  }
};
