// src/core/rendering/drawList.ts
import type { Vec2d } from "wgpu-matrix";
import type { Color, Sprite, UIRenderer } from "@/core/types/ui";
import { clonePoint } from "@/core/utils/point";

export type UIDrawCommand =
  | { type: "sprite"; sprite: Sprite; center: Vec2d; zoom: number }
  | {
      type: "outline";
      sprite: Sprite;
      center: Vec2d;
      dimensions: Vec2d;
      color: Color;
      unit: Vec2d;
      frame: number;
    }
  | { type: "line"; from: Vec2d; to: Vec2d; width: number; color: Color }
  | {
      type: "ring";
      center: Vec2d;
      radius: number;
      width: number;
      fraction: number;
      color: Color;
      segments: number;
    }
  | {
      type: "text";
      text: string;
      topLeft: Vec2d;
      fontSize: number;
      color: Color;
    };

export type UIDrawCommandType = UIDrawCommand["type"];

/**
 * A renderer that records draw calls instead of issuing them.
 * @remarks
 * Commands keep the order they were issued in, which is back-to-front. A
 * GPU backend replays them once per frame; `batches` groups consecutive
 * commands of the same type so each run can become one instanced draw.
 */
export class DrawList implements UIRenderer {
  private commands: UIDrawCommand[] = [];

  public get length(): number {
    return this.commands.length;
  }

  public all(): readonly UIDrawCommand[] {
    return this.commands;
  }

  public ofType<T extends UIDrawCommandType>(
    type: T,
  ): Extract<UIDrawCommand, { type: T }>[] {
    return this.commands.filter(
      (command): command is Extract<UIDrawCommand, { type: T }> =>
        command.type === type,
    );
  }

  /** Runs of consecutive commands sharing a type, in order. */
  public batches(): UIDrawCommand[][] {
    const batches: UIDrawCommand[][] = [];
    for (const command of this.commands) {
      const last = batches[batches.length - 1];
      if (last && last[0].type === command.type) last.push(command);
      else batches.push([command]);
    }
    return batches;
  }

  public clear(): void {
    this.commands.length = 0;
  }

  public drawSprite(sprite: Sprite, center: Vec2d, zoom: number): void {
    this.commands.push({
      type: "sprite",
      sprite,
      center: clonePoint(center),
      zoom,
    });
  }

  public drawOutline(
    sprite: Sprite,
    center: Vec2d,
    dimensions: Vec2d,
    color: Color,
    unit: Vec2d,
    frame: number,
  ): void {
    this.commands.push({
      type: "outline",
      sprite,
      center: clonePoint(center),
      dimensions: clonePoint(dimensions),
      color,
      unit: clonePoint(unit),
      frame,
    });
  }

  public drawLine(from: Vec2d, to: Vec2d, width: number, color: Color): void {
    this.commands.push({
      type: "line",
      from: clonePoint(from),
      to: clonePoint(to),
      width,
      color,
    });
  }

  public drawRing(
    center: Vec2d,
    radius: number,
    width: number,
    fraction: number,
    color: Color,
    segments: number,
  ): void {
    this.commands.push({
      type: "ring",
      center: clonePoint(center),
      radius,
      width,
      fraction,
      color,
      segments,
    });
  }

  public drawText(
    text: string,
    topLeft: Vec2d,
    fontSize: number,
    color: Color,
  ): void {
    this.commands.push({
      type: "text",
      text,
      topLeft: clonePoint(topLeft),
      fontSize,
      color,
    });
  }
}
