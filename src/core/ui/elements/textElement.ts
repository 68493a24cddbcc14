// src/core/ui/elements/textElement.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import {
  type ClickZoneHost,
  type Color,
  ElementState,
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
import { point } from "@/core/utils/point";

/**
 * A `label` (static text), `string` (text looked up by key) or `button`
 * (static text with a one-character trigger key).
 */
export interface TextElement extends ElementBase {
  kind: "text";
  /** The label itself, or the runtime key for dynamic strings. */
  text: string;
  isDynamic: boolean;
  buttonKey?: string;
  fontSize: number;
  colors: StateTable<Color>;
}

export function createTextElement(
  node: DataNode,
  globalAlignment: Vec2d,
  ctx: LoadContext,
): TextElement {
  const { assets, options } = ctx;
  const element: TextElement = {
    ...createElementBase(),
    kind: "text",
    text: "",
    isDynamic: false,
    fontSize: options.defaultFontSize,
    colors: [undefined, undefined, undefined],
  };
  if (node.size() < 2) return element;

  element.isDynamic = node.token(0) === "string";
  if (node.token(0) === "button") {
    element.buttonKey = node.token(1).charAt(0) || undefined;
    if (node.size() >= 3) element.text = node.token(2);
  } else {
    element.text = node.token(1);
  }

  loadGeometry(element, node, globalAlignment, (child) =>
    parseTextLine(element, child, ctx),
  );

  const { colors } = element;
  const { palette } = options;
  if (!colors[ElementState.Active] && element.buttonKey) {
    colors[ElementState.Active] = assets.getColor(palette.active);
    colors[ElementState.Inactive] ??= assets.getColor(palette.inactive);
    colors[ElementState.Hover] ??= assets.getColor(palette.hover);
  } else {
    colors[ElementState.Active] ??= assets.getColor(
      element.isDynamic ? palette.dynamic : palette.label,
    );
    colors[ElementState.Inactive] ??= colors[ElementState.Active];
    colors[ElementState.Hover] ??= colors[ElementState.Active];
  }
  return element;
}

function parseTextLine(
  element: TextElement,
  node: DataNode,
  ctx: LoadContext,
): boolean {
  if (node.size() < 2) return false;

  switch (node.token(0)) {
    case "size":
      element.fontSize = node.value(1);
      return true;
    case "color":
      element.colors[ElementState.Active] = ctx.assets.getColor(node.token(1));
      return true;
    case "inactive":
      element.colors[ElementState.Inactive] = ctx.assets.getColor(
        node.token(1),
      );
      return true;
    case "hover":
      element.colors[ElementState.Hover] = ctx.assets.getColor(node.token(1));
      return true;
    default:
      return false;
  }
}

export function resolveText(element: TextElement, info: UIInformation): string {
  return element.isDynamic ? info.getString(element.text) : element.text;
}

export function textNativeDimensions(
  element: TextElement,
  frame: DrawFrame,
): Vec2d {
  const font = frame.fonts.getFont(element.fontSize);
  return point(font.width(resolveText(element, frame.info)), font.height());
}

export function drawText(
  element: TextElement,
  rect: Rectangle,
  frame: DrawFrame,
  state: ElementState,
): void {
  // Partially loaded elements have no colors.
  const color = element.colors[state];
  if (!color) return;

  frame.renderer.drawText(
    resolveText(element, frame.info),
    rect.topLeft,
    element.fontSize,
    color,
  );
}

export function placeText(
  element: TextElement,
  box: Rectangle,
  host: ClickZoneHost,
): void {
  if (element.buttonKey) host.addZone(box, element.buttonKey);
}
