// src/core/types/ui.ts
import type { Vec2d, Vec4d } from "wgpu-matrix";
import { Rectangle } from "@/core/utils/rectangle";

/** RGBA color, components in [0, 1]. Shared by reference, never mutated. */
export type Color = Vec4d;

/**
 * A drawable image known to the asset registry. Only its pixel size matters
 * to layout; what the renderer does with `name` is up to the host.
 */
export interface Sprite {
  name: string;
  width: number;
  height: number;
}

/**
 * The visual state of an element for one frame.
 * Hover is only reachable from `Active`.
 */
export enum ElementState {
  Inactive = 0,
  Active = 1,
  Hover = 2,
}

/** One slot per `ElementState`. */
export type StateTable<T> = [T | undefined, T | undefined, T | undefined];

/**
 * Named colors and static sprites, resolved once while an interface loads.
 */
export interface AssetResolver {
  getColor(name: string): Color | undefined;
  getSprite(name: string): Sprite | undefined;
}

/**
 * Live values read at draw time. This system never writes to it.
 */
export interface UIInformation {
  /** An empty name is always true. */
  hasCondition(name: string): boolean;
  getString(key: string): string;
  getSprite(key: string): Sprite | undefined;
  getSpriteUnit(key: string): Vec2d;
  getSpriteFrame(key: string): number;
  getOutlineColor(): Color;
  /** Fill fraction in [0, 1]. */
  barValue(name: string): number;
  barSegments(name: string): number;
}

export interface Font {
  width(text: string): number;
  height(): number;
}

export interface FontProvider {
  getFont(size: number): Font;
}

/**
 * Low-level drawing primitives. Layout hands these the final rectangle,
 * color and shape parameters; nothing here reads them back.
 */
export interface UIRenderer {
  drawSprite(sprite: Sprite, center: Vec2d, zoom: number): void;
  drawOutline(
    sprite: Sprite,
    center: Vec2d,
    dimensions: Vec2d,
    color: Color,
    unit: Vec2d,
    frame: number,
  ): void;
  drawLine(from: Vec2d, to: Vec2d, width: number, color: Color): void;
  drawRing(
    center: Vec2d,
    radius: number,
    width: number,
    fraction: number,
    color: Color,
    segments: number,
  ): void;
  drawText(text: string, topLeft: Vec2d, fontSize: number, color: Color): void;
}

export interface ScreenMetrics {
  dimensions(): Vec2d;
}

export interface PointerSource {
  getPointer(): Vec2d;
}

/**
 * Receives the clickable regions of elements during a draw. A missing key
 * means the region has no keyboard shortcut.
 */
export interface ClickZoneHost {
  addZone(rect: Rectangle, key?: string): void;
}
