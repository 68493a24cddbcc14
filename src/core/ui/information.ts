// src/core/ui/information.ts
import { type Vec2d, vec4d } from "wgpu-matrix";
import type { Color, Sprite, UIInformation } from "@/core/types/ui";
import { clonePoint, point } from "@/core/utils/point";

interface SpriteEntry {
  sprite: Sprite;
  unit: Vec2d;
  frame: number;
}

interface BarEntry {
  value: number;
  segments: number;
}

/**
 * Frame-by-frame values a host publishes for its interfaces: condition
 * flags, strings, sprites and gauge values.
 * @remarks
 * A condition name starting with `!` tests the negation of the rest.
 * Unknown names read as false, "", undefined or 0.
 */
export class Information implements UIInformation {
  private conditions = new Set<string>();
  private strings = new Map<string, string>();
  private sprites = new Map<string, SpriteEntry>();
  private bars = new Map<string, BarEntry>();
  private outlineColor: Color = vec4d.fromValues(1, 1, 1, 1);

  public setCondition(name: string, value = true): this {
    if (value) this.conditions.add(name);
    else this.conditions.delete(name);
    return this;
  }

  public setString(key: string, value: string): this {
    this.strings.set(key, value);
    return this;
  }

  public setSprite(
    key: string,
    sprite: Sprite,
    unit: Vec2d = point(0, -1),
    frame = 0,
  ): this {
    this.sprites.set(key, { sprite, unit: clonePoint(unit), frame });
    return this;
  }

  public setBar(name: string, value: number, segments = 1): this {
    this.bars.set(name, { value, segments });
    return this;
  }

  public setOutlineColor(color: Color): this {
    this.outlineColor = color;
    return this;
  }

  public hasCondition(name: string): boolean {
    if (!name) return true;
    if (name.startsWith("!")) return !this.hasCondition(name.slice(1));
    return this.conditions.has(name);
  }

  public getString(key: string): string {
    return this.strings.get(key) ?? "";
  }

  public getSprite(key: string): Sprite | undefined {
    return this.sprites.get(key)?.sprite;
  }

  public getSpriteUnit(key: string): Vec2d {
    const entry = this.sprites.get(key);
    return entry ? clonePoint(entry.unit) : point(0, -1);
  }

  public getSpriteFrame(key: string): number {
    return this.sprites.get(key)?.frame ?? 0;
  }

  public getOutlineColor(): Color {
    return this.outlineColor;
  }

  public barValue(name: string): number {
    return this.bars.get(name)?.value ?? 0;
  }

  public barSegments(name: string): number {
    return this.bars.get(name)?.segments ?? 1;
  }
}
