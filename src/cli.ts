#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_RENDER_STEPS, inspectGraph, renderGraphToSvg } from "./commands.js";
import { parseLayoutConfigYaml } from "./layout/config.js";
import type { LayoutConfigPatch } from "./types.js";

const program = new Command();

interface RenderCliOptions {
  output?: string;
  config?: string;
  steps: number;
  seed?: number;
  width?: number;
  height?: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number, got "${value}".`);
  }
  return parsed;
}

function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.svg`);
}

async function readInput(input: string): Promise<string> {
  try {
    return await fs.readFile(input, "utf8");
  } catch (error) {
    throw new Error(`Input not found: ${input}`, { cause: error });
  }
}

async function loadConfig(opts: RenderCliOptions): Promise<LayoutConfigPatch> {
  const patch = opts.config ? parseLayoutConfigYaml(await fs.readFile(opts.config, "utf8")) : {};
  if (opts.width !== undefined || opts.height !== undefined) {
    patch.canvas = {
      ...patch.canvas,
      ...(opts.width !== undefined ? { width: opts.width } : {}),
      ...(opts.height !== undefined ? { height: opts.height } : {}),
    };
  }
  return patch;
}

async function runRender(input: string, opts: RenderCliOptions): Promise<void> {
  if (opts.steps < 0) {
    throw new Error(`--steps must be >= 0, got ${opts.steps}`);
  }
  const source = await readInput(input);
  const config = await loadConfig(opts);
  const outputPath = opts.output ?? defaultOutputPath(input);

  const svg = renderGraphToSvg(source, {
    config,
    steps: opts.steps,
    seed: opts.seed,
  });
  await fs.writeFile(outputPath, svg, "utf8");

  process.stdout.write(`Generated: ${outputPath}\n`);
}

async function runInspect(input: string): Promise<void> {
  const source = await readInput(input);
  process.stdout.write(inspectGraph(source));
}

function normalizeArgvForDefaultRender(argv: string[]): string[] {
  if (argv.length < 3) {
    return argv;
  }

  const first = argv[2];
  if (first.startsWith("-")) {
    return argv;
  }

  const knownCommands = new Set(["render", "inspect", "help"]);
  if (knownCommands.has(first)) {
    return argv;
  }

  return [argv[0], argv[1], "render", ...argv.slice(2)];
}

program
  .name("driftgraph")
  .description("Lay out a graph with a force-directed simulation and render it as SVG")
  .version("0.1.0");

program
  .command("render")
  .argument("<input>", "graph document (.yml, .yaml or .json)")
  .option("-o, --output <path>", "output .svg path")
  .option("-c, --config <path>", "layout config yaml path")
  .option("--steps <n>", "simulation steps before rendering", parseInteger, DEFAULT_RENDER_STEPS)
  .option("--seed <n>", "seed for the initial placement", parseInteger)
  .option("--width <px>", "canvas width", parsePositive)
  .option("--height <px>", "canvas height", parsePositive)
  .action(async (input: string, opts: RenderCliOptions) => runRender(input, opts));

program
  .command("inspect")
  .argument("<input>", "graph document (.yml, .yaml or .json)")
  .description("Print vertex, edge, degree and parallel-edge statistics")
  .action(async (input: string) => runInspect(input));

const argv = normalizeArgvForDefaultRender([...process.argv]);
program.parseAsync(argv).catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exit(1);
});
