export {
  addVector,
  angle,
  boundingBox,
  difference,
  distance,
  length,
  midpoint,
  normalize,
  reciprocalAngle,
  scaleVector,
  shiftAlongAngle,
} from "./layout/vector.js";
export {
  STABILIZER,
  attractiveForce,
  attractiveMagnitude,
  pairwiseRepulsion,
  repellingForce,
  repellingMagnitude,
} from "./layout/forces.js";
export { ForceLayout } from "./layout/engine.js";
export type { ForceLayoutOptions } from "./layout/engine.js";
export { fanOffsets, resolveEdgeSpots, spotGeometry } from "./layout/spots.js";
export { seededRandom } from "./layout/random.js";
export { defaultLayoutConfig } from "./layout/defaults.js";
export { parseLayoutConfigYaml, resolveLayoutConfig } from "./layout/config.js";
export { MultiGraph } from "./graph/multigraph.js";
export { buildGraph, loadGraphDocument, parseGraphDocument } from "./graph/document.js";
export type { GraphDocument, LoadedGraph } from "./graph/document.js";
export { Viewport } from "./view/viewport.js";
export type { CanvasSize } from "./view/viewport.js";
export { containsPoint, hitTest, vertexHitbox, vertexSize } from "./view/hit-test.js";
export type { HitCandidate } from "./view/hit-test.js";
export { InteractionController } from "./view/interaction.js";
export type { InteractionOptions, InteractionTarget, PointerState } from "./view/interaction.js";
export { LayoutSession } from "./session.js";
export type { LayoutSessionOptions } from "./session.js";
export { buildScene, vertexHue } from "./render/scene.js";
export type { Scene, SceneEdge, SceneNode, SceneOptions } from "./render/scene.js";
export { renderSvg } from "./render/svg.js";
export { inspectGraph, renderGraphToSvg } from "./commands.js";
export type * from "./types.js";
