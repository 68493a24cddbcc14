// test/unit/core/ui/elements/barElement.test.ts
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  barDashes,
  createBarElement,
  drawBar,
} from "@/core/ui/elements/barElement";
import { Rectangle } from "@/core/utils/rectangle";
import { point } from "@/core/utils/point";
import {
  createTestEnv,
  drawFrame,
  loadContext,
  nodeOf,
  spyWarn,
  xy,
  type TestEnv,
} from "../../../../helpers/env";

const CENTERED = point(0, 0);

describe("barDashes", () => {
  it("fills continuously without segments", () => {
    expect(barDashes(0.5, 0, 3, 100)).toEqual([[0, 0.5]]);
  });

  it("treats a single segment as continuous", () => {
    expect(barDashes(0.5, 1, 3, 100)).toEqual([[0, 0.5]]);
  });

  it("separates segments by gaps as wide as the stroke", () => {
    // gap = 25 / 100, dash = (1 - 0.25) / 2
    expect(barDashes(1, 2, 25, 100)).toEqual([
      [0, 0.375],
      [0.625, 1],
    ]);
  });

  it("clips the last dash at the value", () => {
    expect(barDashes(0.7, 2, 25, 100)).toEqual([
      [0, 0.375],
      [0.625, 0.7],
    ]);
    expect(barDashes(0.5, 2, 25, 100)).toEqual([[0, 0.375]]);
  });

  it("draws nothing when the gaps leave no room", () => {
    expect(barDashes(1, 4, 50, 100)).toEqual([]);
  });
});

describe("BarElement", () => {
  let t: TestEnv;

  const bar = (text: string) =>
    createBarElement(nodeOf(text), CENTERED, loadContext(t));

  beforeEach(() => {
    t = createTestEnv();
    spyWarn();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("loading", () => {
    it("reads name, color and stroke width", () => {
      const element = bar("bar shields\n\tcolor red\n\tsize 3");
      expect(element).toMatchObject({ name: "shields", isRing: false, width: 3 });
      expect(element.color).toBe(t.colors.red);
    });

    it("defaults rings to the active color", () => {
      const element = bar("ring hull");
      expect(element).toMatchObject({ name: "hull", isRing: true, width: 0 });
      expect(element.color).toBe(t.colors.active);
    });

    it("stays unset without a name", () => {
      const element = bar("bar");
      expect(element.name).toBe("");
      expect(element.color).toBeUndefined();
    });
  });

  describe("drawing", () => {
    // Diagonal of 100 from (30, 40) back to (-30, -40).
    const rect = new Rectangle(point(0, 0), point(60, 80));

    it("draws a continuous bar from the bottom-right corner", () => {
      t.info.setBar("shields", 0.5);
      drawBar(bar("bar shields\n\tcolor red\n\tsize 3"), rect, drawFrame(t));
      const lines = t.renderer.ofType("line");
      expect(lines).toHaveLength(1);
      expect(xy(lines[0].from)).toEqual([30, 40]);
      expect(xy(lines[0].to)).toEqual([0, 0]);
      expect(lines[0].width).toBe(3);
      expect(lines[0].color).toBe(t.colors.red);
    });

    it("draws one line per segment", () => {
      t.info.setBar("shields", 1, 2);
      drawBar(bar("bar shields\n\tsize 25"), rect, drawFrame(t));
      const lines = t.renderer.ofType("line");
      expect(lines.map((l) => [xy(l.from), xy(l.to)])).toEqual([
        [
          [30, 40],
          [7.5, 10],
        ],
        [
          [-7.5, -10],
          [-30, -40],
        ],
      ]);
    });

    it("draws nothing for a zero value, width or color", () => {
      drawBar(bar("bar shields\n\tsize 3"), rect, drawFrame(t));
      t.info.setBar("shields", 0.5);
      drawBar(bar("bar shields"), rect, drawFrame(t));
      const uncolored = createBarElement(
        nodeOf("bar shields\n\tsize 3"),
        CENTERED,
        loadContext(t, { palette: { bar: "nosuch" } }),
      );
      expect(uncolored.color).toBeUndefined();
      drawBar(uncolored, rect, drawFrame(t));
      expect(t.renderer.length).toBe(0);
    });

    it("draws a ring around the inscribed circle", () => {
      t.info.setBar("hull", 0.5);
      drawBar(
        bar("ring hull\n\tsize 4"),
        new Rectangle(point(10, 20), point(40, 40)),
        drawFrame(t),
      );
      const rings = t.renderer.ofType("ring");
      expect(rings).toHaveLength(1);
      expect(xy(rings[0].center)).toEqual([10, 20]);
      expect(rings[0]).toMatchObject({
        radius: 20,
        width: 4,
        fraction: 0.5,
        segments: 0,
      });
      expect(rings[0].color).toBe(t.colors.active);
    });

    it("draws no ring for a zero value", () => {
      const ring = bar("ring health\n\tsize 4");
      drawBar(ring, rect, drawFrame(t));
      t.info.setBar("health", 0);
      drawBar(ring, rect, drawFrame(t));
      expect(t.renderer.length).toBe(0);
    });

    it("passes segment counts above one to rings", () => {
      t.info.setBar("hull", 0.75, 6);
      drawBar(bar("ring hull\n\tsize 4"), rect, drawFrame(t));
      expect(t.renderer.ofType("ring")[0].segments).toBe(6);
    });

    it("skips rings with an empty rectangle", () => {
      t.info.setBar("hull", 0.5);
      drawBar(bar("ring hull\n\tsize 4"), Rectangle.empty(), drawFrame(t));
      expect(t.renderer.length).toBe(0);
    });
  });
});
