// src/core/input/pointerState.ts
import type { Vec2d } from "wgpu-matrix";
import type { PointerSource } from "@/core/types/ui";
import { point } from "@/core/utils/point";

/**
 * Last known pointer position in screen coordinates, with the origin at the
 * screen center.
 */
export class PointerState implements PointerSource {
  private mouseX = 0;
  private mouseY = 0;

  /**
   * Updates mouse position from input events
   */
  public updateMousePosition(x: number, y: number): void {
    this.mouseX = x;
    this.mouseY = y;
  }

  public getPointer(): Vec2d {
    return point(this.mouseX, this.mouseY);
  }
}
