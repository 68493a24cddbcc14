// src/core/ui/elements/index.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import { type ClickZoneHost, ElementState } from "@/core/types/ui";
import type { DrawFrame, LoadContext } from "@/core/ui/elements/element";
import {
  type ImageElement,
  createImageElement,
  drawImage,
  imageNativeDimensions,
} from "@/core/ui/elements/imageElement";
import {
  type TextElement,
  createTextElement,
  drawText,
  placeText,
  textNativeDimensions,
} from "@/core/ui/elements/textElement";
import {
  type BarElement,
  createBarElement,
  drawBar,
} from "@/core/ui/elements/barElement";
import { Rectangle } from "@/core/utils/rectangle";

export type InterfaceElement = ImageElement | TextElement | BarElement;

export type ElementKind = InterfaceElement["kind"];

type ElementFactory = (
  node: DataNode,
  globalAlignment: Vec2d,
  ctx: LoadContext,
) => InterfaceElement;

/** Leading tokens that declare an element, and what they build. */
const ELEMENT_FACTORIES: ReadonlyMap<string, ElementFactory> = new Map<
  string,
  ElementFactory
>([
  ["sprite", createImageElement],
  ["image", createImageElement],
  ["outline", createImageElement],
  ["label", createTextElement],
  ["string", createTextElement],
  ["button", createTextElement],
  ["bar", createBarElement],
  ["ring", createBarElement],
]);

/**
 * Builds the element a node declares, or returns undefined if its leading
 * token is not an element type.
 */
export function createElement(
  node: DataNode,
  globalAlignment: Vec2d,
  ctx: LoadContext,
): InterfaceElement | undefined {
  return ELEMENT_FACTORIES.get(node.token(0))?.(node, globalAlignment, ctx);
}

/** Size of the element's content before placement. */
export function nativeDimensions(
  element: InterfaceElement,
  frame: DrawFrame,
  state: ElementState,
): Vec2d {
  switch (element.kind) {
    case "image":
      return imageNativeDimensions(element, frame, state);
    case "text":
      return textNativeDimensions(element, frame);
    case "bar":
      return element.bounds.dimensions;
  }
}

export function drawElement(
  element: InterfaceElement,
  rect: Rectangle,
  frame: DrawFrame,
  state: ElementState,
): void {
  switch (element.kind) {
    case "image":
      drawImage(element, rect, frame, state);
      break;
    case "text":
      drawText(element, rect, frame, state);
      break;
    case "bar":
      drawBar(element, rect, frame);
      break;
  }
}

/** Registers the element's click zone, if it has one. */
export function placeElement(
  element: InterfaceElement,
  box: Rectangle,
  host: ClickZoneHost,
): void {
  if (element.kind === "text") placeText(element, box, host);
}

export type { ImageElement, TextElement, BarElement };
export type {
  ElementBase,
  ElementGeometry,
  NamedPoint,
  DrawFrame,
  LoadContext,
} from "@/core/ui/elements/element";
