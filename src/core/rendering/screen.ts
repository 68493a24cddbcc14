// src/core/rendering/screen.ts
import type { Vec2d } from "wgpu-matrix";
import type { ScreenMetrics } from "@/core/types/ui";
import { point } from "@/core/utils/point";

/**
 * Current drawable size of the screen, updated by the host on resize.
 */
export class ScreenState implements ScreenMetrics {
  private width: number;
  private height: number;

  constructor(width = 0, height = 0) {
    this.width = width;
    this.height = height;
  }

  public resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  public dimensions(): Vec2d {
    return point(this.width, this.height);
  }
}
