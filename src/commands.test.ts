import { describe, expect, it } from "vitest";
import { inspectGraph, renderGraphToSvg } from "./commands.js";

const TRIANGLE_WITH_PARALLEL = [
  "vertices: [a, b, c]",
  "edges:",
  "  - { from: a, to: b }",
  "  - { from: b, to: a }",
  "  - { from: b, to: c }",
  "",
].join("\n");

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("inspectGraph", () => {
  it("summarizes topology and parallel edges", () => {
    expect(inspectGraph(TRIANGLE_WITH_PARALLEL)).toBe(
      "vertices: 3\nedges: 3\ndegree: 1..3\nedge spots: 2 (1 with parallel edges)\n  a -- b: 2 edges\n",
    );
  });

  it("handles an empty document", () => {
    expect(inspectGraph("")).toBe("vertices: 0\nedges: 0\ndegree: 0..0\nedge spots: 0 (0 with parallel edges)\n");
  });
});

describe("renderGraphToSvg", () => {
  it("is deterministic for a fixed seed", () => {
    const first = renderGraphToSvg(TRIANGLE_WITH_PARALLEL, { seed: 42, steps: 50 });
    const second = renderGraphToSvg(TRIANGLE_WITH_PARALLEL, { seed: 42, steps: 50 });
    expect(first).toBe(second);
  });

  it("draws parallel edges as curves and single edges as lines", () => {
    const svg = renderGraphToSvg(TRIANGLE_WITH_PARALLEL, { seed: 1, steps: 50 });
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="500" height="500"')).toBe(true);
    expect(svg.endsWith("</svg>\n")).toBe(true);
    expect(count(svg, "<path ")).toBe(2);
    expect(count(svg, "<line ")).toBe(1);
    expect(count(svg, "<circle ")).toBe(6);
  });

  it("applies the canvas and node configuration", () => {
    const svg = renderGraphToSvg(TRIANGLE_WITH_PARALLEL, {
      seed: 1,
      steps: 0,
      config: { canvas: { width: 800, height: 600 }, nodes: { border: 0 } },
    });
    expect(svg.split("\n")[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="800" height="600" viewBox="0 0 800 600">');
    expect(count(svg, "<circle ")).toBe(3);
  });

  it("highlights selected vertices", () => {
    const plain = renderGraphToSvg("vertices: [a, b]\nedges:\n  - { from: a, to: b }\n", { seed: 5, steps: 10 });
    const selected = renderGraphToSvg("vertices: [a, { id: b, selected: true }]\nedges:\n  - { from: a, to: b }\n", {
      seed: 5,
      steps: 10,
    });
    expect(count(plain, "#DC2626")).toBe(0);
    expect(count(selected, "#DC2626")).toBe(2);
  });

  it("reports document errors", () => {
    expect(() => renderGraphToSvg("vertices: [a]\nedges:\n  - { from: a, to: b }\n")).toThrow(
      'edges[0] references unknown vertex "b"',
    );
  });
});
