// src/core/ui/elements/barElement.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import type { Color } from "@/core/types/ui";
import {
  type DrawFrame,
  type ElementBase,
  type LoadContext,
  createElementBase,
  loadGeometry,
} from "@/core/ui/elements/element";
import { Rectangle } from "@/core/utils/rectangle";
import { add, length, negate, scale } from "@/core/utils/point";

/**
 * A gauge showing a live value in [0, 1], drawn as a straight bar or as a
 * ring.
 */
export interface BarElement extends ElementBase {
  kind: "bar";
  /** Runtime value name. */
  name: string;
  isRing: boolean;
  /** Stroke width. */
  width: number;
  color?: Color;
}

export function createBarElement(
  node: DataNode,
  globalAlignment: Vec2d,
  ctx: LoadContext,
): BarElement {
  const element: BarElement = {
    ...createElementBase(),
    kind: "bar",
    name: "",
    isRing: false,
    width: 0,
  };
  if (node.size() < 2) return element;

  element.name = node.token(1);
  element.isRing = node.token(0) === "ring";

  loadGeometry(element, node, globalAlignment, (child) =>
    parseBarLine(element, child, ctx),
  );

  element.color ??= ctx.assets.getColor(ctx.options.palette.bar);
  return element;
}

function parseBarLine(
  element: BarElement,
  node: DataNode,
  ctx: LoadContext,
): boolean {
  if (node.token(0) === "color" && node.size() >= 2) {
    element.color = ctx.assets.getColor(node.token(1));
  } else if (node.token(0) === "size" && node.size() >= 2) {
    element.width = node.value(1);
  } else {
    return false;
  }
  return true;
}

/**
 * Splits the fill of a segmented bar into dashes.
 * @remarks
 * With `segments` > 1 the diagonal holds `segments` equal dashes separated
 * by gaps as long as the stroke is wide; otherwise there is one continuous
 * dash. Fractions are of the full diagonal, and the last dash stops at
 * `value`.
 *
 * @returns `[from, to]` fraction pairs, in drawing order.
 */
export function barDashes(
  value: number,
  segments: number,
  strokeWidth: number,
  diagonal: number,
): [number, number][] {
  const segmented = segments > 1;
  const empty = segmented ? strokeWidth / diagonal : 0;
  const filled = segmented ? (1 - empty * (segments - 1)) / segments : 1;

  const dashes: [number, number][] = [];
  // A non-positive dash length would never reach `value`.
  if (!(filled > 0)) return dashes;

  let v = 0;
  while (v < value) {
    const from = v;
    v += filled;
    dashes.push([from, Math.min(v, value)]);
    v += empty;
  }
  return dashes;
}

/**
 * Draws the gauge. Bars run along the rectangle's diagonal from the
 * bottom-right corner toward the top-left.
 */
export function drawBar(
  element: BarElement,
  rect: Rectangle,
  frame: DrawFrame,
): void {
  const { info, renderer } = frame;
  const value = info.barValue(element.name);
  let segments = info.barSegments(element.name);
  if (segments <= 1) segments = 0;

  // Partially loaded elements have no color or width.
  const { color, width } = element;
  if (!color || !width || !value) return;

  if (element.isRing) {
    if (!rect.width || !rect.height) return;
    renderer.drawRing(
      rect.center,
      0.5 * rect.width,
      width,
      value,
      color,
      segments,
    );
    return;
  }

  const start = rect.bottomRight;
  const direction = negate(rect.dimensions);
  const diagonal = length(direction);
  if (!diagonal) return;

  for (const [from, to] of barDashes(value, segments, width, diagonal)) {
    renderer.drawLine(
      add(start, scale(direction, from)),
      add(start, scale(direction, to)),
      width,
      color,
    );
  }
}
