// src/core/ui/clickZoneRegistry.ts
import type { Vec2d } from "wgpu-matrix";
import type { ClickZoneHost } from "@/core/types/ui";
import { Rectangle } from "@/core/utils/rectangle";

export interface ClickZone {
  rect: Rectangle;
  key?: string;
}

/**
 * The clickable regions registered during the last draw.
 * @remarks
 * Elements draw back-to-front, so a later zone covers an earlier one; hit
 * tests therefore search from the most recently added zone. Call `clear`
 * before each draw.
 */
export class ClickZoneRegistry implements ClickZoneHost {
  private zones: ClickZone[] = [];

  public addZone(rect: Rectangle, key?: string): void {
    this.zones.push({ rect, key });
  }

  public clear(): void {
    this.zones.length = 0;
  }

  public all(): readonly ClickZone[] {
    return this.zones;
  }

  /** Topmost zone under `p`. */
  public zoneAt(p: Vec2d): ClickZone | undefined {
    for (let i = this.zones.length - 1; i >= 0; i--) {
      if (this.zones[i].rect.contains(p)) return this.zones[i];
    }
    return undefined;
  }

  public keyAt(p: Vec2d): string | undefined {
    return this.zoneAt(p)?.key;
  }
}
