import { describe, expect, it, vi } from "vitest";
import type { Point } from "../types.js";
import { InteractionController } from "./interaction.js";
import { Viewport } from "./viewport.js";

function setup(hit: number | undefined = 4) {
  const viewport = new Viewport({ x: 10, y: 10 }, 2);
  const target = {
    hitTest: vi.fn((_screen: Point) => hit),
    moveVertex: vi.fn(),
  };
  const onClick = vi.fn();
  const controller = new InteractionController(viewport, target, { onClick });
  return { viewport, target, onClick, controller };
}

describe("InteractionController", () => {
  it("starts a drag on a vertex and moves it in model space", () => {
    const { controller, target } = setup();
    expect(controller.pointerDown({ x: 20, y: 20 })).toBe(4);
    expect(controller.draggedVertex).toBe(4);

    controller.pointerMove({ x: 30, y: 50 });
    expect(target.moveVertex).toHaveBeenCalledWith(4, { x: 10, y: 20 });

    controller.pointerUp();
    expect(controller.draggedVertex).toBeUndefined();
    expect(controller.pointerState).toEqual({ kind: "idle" });
  });

  it("pans the viewport when the press misses every vertex", () => {
    const { controller, viewport, target } = setup(undefined);
    expect(controller.pointerDown({ x: 100, y: 100 })).toBeUndefined();
    expect(controller.pointerState.kind).toBe("panning");

    controller.pointerMove({ x: 115, y: 95 });
    expect(viewport.shift).toEqual({ x: 25, y: 5 });
    controller.pointerMove({ x: 120, y: 130 });
    expect(viewport.shift).toEqual({ x: 30, y: 40 });
    expect(target.moveVertex).not.toHaveBeenCalled();

    controller.pointerUp();
    controller.pointerMove({ x: 0, y: 0 });
    expect(viewport.shift).toEqual({ x: 30, y: 40 });
  });

  it("accepts explicit drag commands", () => {
    const { controller, target } = setup();
    controller.beginDrag(7);
    controller.updateDrag({ x: 12, y: 14 });
    expect(target.moveVertex).toHaveBeenCalledWith(7, { x: 1, y: 2 });

    controller.endDrag();
    controller.updateDrag({ x: 50, y: 50 });
    expect(target.moveVertex).toHaveBeenCalledTimes(1);
  });

  it("drags one vertex at a time", () => {
    const { controller } = setup();
    controller.beginDrag(1);
    controller.beginDrag(2);
    expect(controller.draggedVertex).toBe(2);
  });

  it("reports hover and click hits", () => {
    const { controller, onClick } = setup();
    expect(controller.hover({ x: 1, y: 1 })).toBe(4);
    expect(controller.click({ x: 1, y: 1 })).toBe(4);
    expect(onClick).toHaveBeenCalledWith(4);
  });

  it("does not report clicks on empty space", () => {
    const { controller, onClick } = setup(undefined);
    expect(controller.click({ x: 1, y: 1 })).toBeUndefined();
    expect(onClick).not.toHaveBeenCalled();
  });
});
