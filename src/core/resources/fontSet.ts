// src/core/resources/fontSet.ts
import type { Font, FontProvider } from "@/core/types/ui";

/**
 * A fixed-pitch font: every character is `advance` wide.
 */
export class MonospaceFont implements Font {
  constructor(
    private readonly advance: number,
    private readonly lineHeight: number,
  ) {}

  public width(text: string): number {
    return Array.from(text).length * this.advance;
  }

  public height(): number {
    return this.lineHeight;
  }
}

/**
 * Fonts keyed by point size. A size with no font of its own gets the
 * registered font of the nearest size (the smaller one on a tie).
 */
export class FontSet implements FontProvider {
  private fonts = new Map<number, Font>();

  constructor(private readonly fallback: Font = new MonospaceFont(7, 14)) {}

  public register(size: number, font: Font): this {
    this.fonts.set(size, font);
    return this;
  }

  public getFont(size: number): Font {
    const exact = this.fonts.get(size);
    if (exact) return exact;

    let best: { size: number; font: Font } | undefined;
    for (const [candidate, font] of this.fonts) {
      const distance = Math.abs(candidate - size);
      const bestDistance = best ? Math.abs(best.size - size) : Infinity;
      if (
        distance < bestDistance ||
        (best && distance === bestDistance && candidate < best.size)
      ) {
        best = { size: candidate, font };
      }
    }
    return best?.font ?? this.fallback;
  }
}
