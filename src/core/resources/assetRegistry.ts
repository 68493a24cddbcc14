// src/core/resources/assetRegistry.ts
import { vec4d } from "wgpu-matrix";
import type { AssetResolver, Color, Sprite } from "@/core/types/ui";

/**
 * In-memory store of named palette colors and sprites.
 * @remarks
 * Interfaces keep the references this hands out, so replacing an entry after
 * an interface has loaded does not affect it.
 */
export class AssetRegistry implements AssetResolver {
  private colors = new Map<string, Color>();
  private sprites = new Map<string, Sprite>();

  /**
   * Registers a color under `name`.
   * @param r - Red, 0 to 1.
   * @param g - Green, 0 to 1.
   * @param b - Blue, 0 to 1.
   * @param a - Alpha, 0 to 1.
   */
  public setColor(name: string, r: number, g: number, b: number, a = 1): Color {
    if (this.colors.has(name)) {
      console.warn(`[AssetRegistry] Overwriting color: ${name}`);
    }
    const color = vec4d.fromValues(r, g, b, a);
    this.colors.set(name, color);
    return color;
  }

  public setSprite(name: string, width: number, height: number): Sprite {
    if (this.sprites.has(name)) {
      console.warn(`[AssetRegistry] Overwriting sprite: ${name}`);
    }
    const sprite: Sprite = { name, width, height };
    this.sprites.set(name, sprite);
    return sprite;
  }

  public getColor(name: string): Color | undefined {
    return this.colors.get(name);
  }

  public getSprite(name: string): Sprite | undefined {
    return this.sprites.get(name);
  }
}
