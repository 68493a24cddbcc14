// src/core/ui/elements/imageElement.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import {
  ElementState,
  type Sprite,
  type StateTable,
  type UIInformation,
} from "@/core/types/ui";
import {
  type DrawFrame,
  type ElementBase,
  type LoadContext,
  createElementBase,
  loadGeometry,
} from "@/core/ui/elements/element";
import { Rectangle } from "@/core/utils/rectangle";
import { isZero, point, scale } from "@/core/utils/point";

/**
 * A sprite, either fixed per state (`sprite`) or looked up by key every
 * frame (`image`, `outline`).
 */
export interface ImageElement extends ElementBase {
  kind: "image";
  sprites: StateTable<Sprite>;
  /** Runtime sprite key; empty for static sprites. */
  name: string;
  isOutline: boolean;
  /** Outlines only: use the runtime outline color. */
  isColored: boolean;
}

export function createImageElement(
  node: DataNode,
  globalAlignment: Vec2d,
  ctx: LoadContext,
): ImageElement {
  const element: ImageElement = {
    ...createElementBase(),
    kind: "image",
    sprites: [undefined, undefined, undefined],
    name: "",
    isOutline: false,
    isColored: false,
  };
  if (node.size() < 2) return element;

  element.isOutline = node.token(0) === "outline";
  if (node.token(0) === "sprite") {
    element.sprites[ElementState.Active] = ctx.assets.getSprite(node.token(1));
  } else {
    element.name = node.token(1);
  }

  loadGeometry(element, node, globalAlignment, (child) =>
    parseImageLine(element, child, ctx),
  );

  const active = element.sprites[ElementState.Active];
  if (active) {
    element.sprites[ElementState.Inactive] ??= active;
    element.sprites[ElementState.Hover] ??= active;
  }
  return element;
}

function parseImageLine(
  element: ImageElement,
  node: DataNode,
  ctx: LoadContext,
): boolean {
  const key = node.token(0);
  // Per-state sprites only make sense for static images.
  if (key === "inactive" && node.size() >= 2 && !element.name) {
    element.sprites[ElementState.Inactive] = ctx.assets.getSprite(node.token(1));
  } else if (key === "hover" && node.size() >= 2 && !element.name) {
    element.sprites[ElementState.Hover] = ctx.assets.getSprite(node.token(1));
  } else if (element.isOutline && key === "colored") {
    element.isColored = true;
  } else {
    return false;
  }
  return true;
}

export function resolveImageSprite(
  element: ImageElement,
  info: UIInformation,
  state: ElementState,
): Sprite | undefined {
  return element.name ? info.getSprite(element.name) : element.sprites[state];
}

/**
 * The sprite's size, scaled uniformly to fit the declared bounds. An axis
 * with no declared size does not constrain the scale.
 */
export function imageNativeDimensions(
  element: ImageElement,
  frame: DrawFrame,
  state: ElementState,
): Vec2d {
  const sprite = resolveImageSprite(element, frame.info, state);
  if (!sprite?.width || !sprite.height) return point();

  const size = point(sprite.width, sprite.height);
  const { bounds } = element;
  if (isZero(bounds.dimensions)) return size;

  const { unconstrainedScale } = frame.options;
  const xScale = bounds.width ? bounds.width / sprite.width : unconstrainedScale;
  const yScale = bounds.height
    ? bounds.height / sprite.height
    : unconstrainedScale;
  return scale(size, Math.min(xScale, yScale));
}

export function drawImage(
  element: ImageElement,
  rect: Rectangle,
  frame: DrawFrame,
  state: ElementState,
): void {
  const sprite = resolveImageSprite(element, frame.info, state);
  if (!sprite?.width || !sprite.height) return;

  const { info, renderer } = frame;
  if (element.isOutline) {
    const color = element.isColored
      ? info.getOutlineColor()
      : frame.options.outlineColor;
    renderer.drawOutline(
      sprite,
      rect.center,
      rect.dimensions,
      color,
      info.getSpriteUnit(element.name),
      info.getSpriteFrame(element.name),
    );
  } else {
    renderer.drawSprite(sprite, rect.center, rect.width / sprite.width);
  }
}
