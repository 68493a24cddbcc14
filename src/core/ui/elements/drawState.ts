// src/core/ui/elements/drawState.ts
import type { Vec2d } from "wgpu-matrix";
import { type ClickZoneHost, ElementState, type UIInformation } from "@/core/types/ui";
import type { DrawFrame, ElementGeometry } from "@/core/ui/elements/element";
import {
  type InterfaceElement,
  drawElement,
  nativeDimensions,
  placeElement,
} from "@/core/ui/elements";
import { Rectangle } from "@/core/utils/rectangle";
import { add, mul, scale, sub } from "@/core/utils/point";

/**
 * Inactive when the activation condition fails, hover when active and the
 * pointer is inside `box`, active otherwise.
 */
export function resolveElementState(
  activeIf: string,
  box: Rectangle,
  info: UIInformation,
  pointer: Vec2d,
): ElementState {
  if (!info.hasCondition(activeIf)) return ElementState.Inactive;
  return box.contains(pointer) ? ElementState.Hover : ElementState.Active;
}

/**
 * Places content of size `native` inside the element's bounds.
 * @remarks
 * The slack is half the unused space less the padding; the alignment moves
 * the content center that far toward one edge, or not at all when centered.
 *
 * @param anchor Screen-space origin of the interface.
 */
export function resolvePlacement(
  geometry: ElementGeometry,
  anchor: Vec2d,
  native: Vec2d,
): Rectangle {
  const { bounds, alignment, padding } = geometry;
  const slack = sub(scale(sub(bounds.dimensions, native), 0.5), padding);
  const center = add(add(bounds.center, anchor), mul(alignment, slack));
  return new Rectangle(center, native);
}

/**
 * Draws one element for this frame.
 * @remarks
 * An invisible element does nothing at all. A visible one registers its
 * click zone whether or not it is active, so the host can still react to a
 * disabled button.
 *
 * @returns The state the element was drawn in, or undefined if hidden.
 */
export function drawElementAt(
  element: InterfaceElement,
  anchor: Vec2d,
  frame: DrawFrame,
  pointer: Vec2d,
  host?: ClickZoneHost,
): ElementState | undefined {
  if (!frame.info.hasCondition(element.visibleIf)) return undefined;

  const box = element.bounds.translate(anchor);
  const state = resolveElementState(element.activeIf, box, frame.info, pointer);
  if (host) placeElement(element, box, host);

  const native = nativeDimensions(element, frame, state);
  const rect = resolvePlacement(element, anchor, native);
  drawElement(element, rect, frame, state);
  return state;
}
