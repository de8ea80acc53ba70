import yaml from "js-yaml";
import { z } from "zod";
import type { CanvasConfig, EdgeFan, LayoutConfig, LayoutConfigPatch, NodeSizing, SimulationParams } from "../types.js";
import { defaultLayoutConfig } from "./defaults.js";

const finite = z.number().finite();

const LayoutConfigSchema = z
  .object({
    simulation: z
      .object({
        springForce: finite,
        springScale: finite,
        repulsionScale: finite,
        speed: finite,
        stepsPerFrame: finite,
      })
      .partial()
      .strict()
      .optional(),
    canvas: z
      .object({
        width: finite,
        height: finite,
        paddingRatio: finite,
      })
      .partial()
      .strict()
      .optional(),
    nodes: z
      .object({
        size: finite,
        degreeScale: finite,
        border: finite,
      })
      .partial()
      .strict()
      .optional(),
    edges: z
      .object({
        base: finite,
        perEdge: finite,
        render: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

export function parseLayoutConfigYaml(raw: string): LayoutConfigPatch {
  const loaded = yaml.load(raw);
  if (loaded === undefined || loaded === null) {
    return {};
  }
  const parsed = LayoutConfigSchema.safeParse(loaded);
  if (!parsed.success) {
    throw new Error(`Invalid layout config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number): void {
  requireFinite(name, value);
  if (value < 0) {
    throw new Error(`${name} must be >= 0, got ${value}`);
  }
}

function requirePositive(name: string, value: number): void {
  requireFinite(name, value);
  if (value <= 0) {
    throw new Error(`${name} must be > 0, got ${value}`);
  }
}

export function validateSimulationParams(params: SimulationParams): SimulationParams {
  requireNonNegative("simulation.springForce", params.springForce);
  requirePositive("simulation.springScale", params.springScale);
  requireNonNegative("simulation.repulsionScale", params.repulsionScale);
  requireNonNegative("simulation.speed", params.speed);
  requireNonNegative("simulation.stepsPerFrame", params.stepsPerFrame);
  if (!Number.isInteger(params.stepsPerFrame)) {
    throw new Error(`simulation.stepsPerFrame must be an integer, got ${params.stepsPerFrame}`);
  }
  return params;
}

export function validateCanvas(canvas: CanvasConfig): CanvasConfig {
  requirePositive("canvas.width", canvas.width);
  requirePositive("canvas.height", canvas.height);
  requireNonNegative("canvas.paddingRatio", canvas.paddingRatio);
  if (canvas.paddingRatio >= 0.5) {
    throw new Error(`canvas.paddingRatio must be < 0.5 to leave room inside the padding, got ${canvas.paddingRatio}`);
  }
  return canvas;
}

export function validateNodeSizing(nodes: NodeSizing): NodeSizing {
  requireNonNegative("nodes.size", nodes.size);
  requireNonNegative("nodes.degreeScale", nodes.degreeScale);
  requireNonNegative("nodes.border", nodes.border);
  return nodes;
}

export function validateEdgeFan(edges: EdgeFan): EdgeFan {
  requireNonNegative("edges.base", edges.base);
  requireNonNegative("edges.perEdge", edges.perEdge);
  return edges;
}

export function resolveLayoutConfig(patch: LayoutConfigPatch = {}): LayoutConfig {
  const base = defaultLayoutConfig();
  return {
    simulation: validateSimulationParams({ ...base.simulation, ...patch.simulation }),
    canvas: validateCanvas({ ...base.canvas, ...patch.canvas }),
    nodes: validateNodeSizing({ ...base.nodes, ...patch.nodes }),
    edges: validateEdgeFan({ ...base.edges, ...patch.edges }),
  };
}
