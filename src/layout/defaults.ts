import type { CanvasConfig, EdgeFan, LayoutConfig, NodeSizing, SimulationParams } from "../types.js";

export const DEFAULT_SIMULATION_PARAMS: SimulationParams = {
  springForce: 1,
  springScale: 1,
  repulsionScale: 5000,
  speed: 1,
  stepsPerFrame: 20,
};

export const DEFAULT_CANVAS: CanvasConfig = {
  width: 500,
  height: 500,
  paddingRatio: 0.2,
};

export const DEFAULT_NODE_SIZING: NodeSizing = {
  size: 20,
  degreeScale: 5,
  border: 2,
};

export const DEFAULT_EDGE_FAN: EdgeFan = {
  base: 10,
  perEdge: 5,
  render: true,
};

export function defaultLayoutConfig(): LayoutConfig {
  return {
    simulation: { ...DEFAULT_SIMULATION_PARAMS },
    canvas: { ...DEFAULT_CANVAS },
    nodes: { ...DEFAULT_NODE_SIZING },
    edges: { ...DEFAULT_EDGE_FAN },
  };
}
