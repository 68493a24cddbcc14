// test/unit/core/ui/elements/drawState.test.ts
import { beforeEach, describe, it, expect } from "vitest";
import { ElementState } from "@/core/types/ui";
import { createElement } from "@/core/ui/elements";
import {
  drawElementAt,
  resolveElementState,
  resolvePlacement,
} from "@/core/ui/elements/drawState";
import { createGeometry } from "@/core/ui/elements/element";
import { ClickZoneRegistry } from "@/core/ui/clickZoneRegistry";
import { Rectangle } from "@/core/utils/rectangle";
import { point } from "@/core/utils/point";
import {
  createTestEnv,
  drawFrame,
  loadContext,
  nodeOf,
  xy,
  type TestEnv,
} from "../../../../helpers/env";

describe("resolveElementState", () => {
  let t: TestEnv;
  const box = new Rectangle(point(0, 0), point(10, 10));

  beforeEach(() => {
    t = createTestEnv();
  });

  it("is active when the pointer is elsewhere", () => {
    expect(resolveElementState("", box, t.info, point(50, 50))).toBe(
      ElementState.Active,
    );
  });

  it("hovers when the pointer is inside the box", () => {
    expect(resolveElementState("", box, t.info, point(-5, -5))).toBe(
      ElementState.Hover,
    );
  });

  it("treats the right and bottom edges as outside", () => {
    expect(resolveElementState("", box, t.info, point(5, 0))).toBe(
      ElementState.Active,
    );
  });

  it("is inactive when the condition fails, even under the pointer", () => {
    expect(resolveElementState("ready", box, t.info, point(0, 0))).toBe(
      ElementState.Inactive,
    );
    t.info.setCondition("ready");
    expect(resolveElementState("ready", box, t.info, point(0, 0))).toBe(
      ElementState.Hover,
    );
  });
});

describe("resolvePlacement", () => {
  const geometry = () => {
    const g = createGeometry();
    g.bounds = new Rectangle(point(0, 0), point(100, 50));
    return g;
  };

  it("centers content by default", () => {
    const g = geometry();
    g.bounds = new Rectangle(point(10, 20), point(100, 50));
    const rect = resolvePlacement(g, point(400, 300), point(35, 14));
    expect(xy(rect.center)).toEqual([410, 320]);
    expect(xy(rect.dimensions)).toEqual([35, 14]);
  });

  it("pushes content toward the aligned corner", () => {
    const g = geometry();
    g.alignment = point(-1, -1);
    expect(xy(resolvePlacement(g, point(), point(35, 14)).center)).toEqual([
      -32.5, -18,
    ]);
    g.alignment = point(1, 0);
    expect(xy(resolvePlacement(g, point(), point(35, 14)).center)).toEqual([
      32.5, 0,
    ]);
  });

  it("keeps padding between the content and the edge", () => {
    const g = geometry();
    g.alignment = point(-1, -1);
    g.padding = point(5, 5);
    expect(xy(resolvePlacement(g, point(), point(35, 14)).center)).toEqual([
      -27.5, -13,
    ]);
  });
});

describe("drawElementAt", () => {
  let t: TestEnv;
  let zones: ClickZoneRegistry;

  const element = (text: string) => {
    const created = createElement(nodeOf(text), point(), loadContext(t));
    if (!created) throw new Error(`not an element: ${text}`);
    return created;
  };

  beforeEach(() => {
    t = createTestEnv();
    zones = new ClickZoneRegistry();
  });

  it("draws aligned text relative to the anchor", () => {
    const label = element("label Hello\n\tdimensions 100 50\n\talign left top");
    const state = drawElementAt(
      label,
      point(400, 300),
      drawFrame(t),
      point(-10000, -10000),
    );
    expect(state).toBe(ElementState.Active);
    const [text] = t.renderer.ofType("text");
    expect(text.text).toBe("Hello");
    expect(xy(text.topLeft)).toEqual([350, 275]);
  });

  it("skips hidden elements entirely", () => {
    const button = element("button a Accept\n\tdimensions 80 20");
    button.visibleIf = "shown";
    expect(
      drawElementAt(button, point(), drawFrame(t), point(), zones),
    ).toBeUndefined();
    expect(t.renderer.length).toBe(0);
    expect(zones.all()).toHaveLength(0);
  });

  it("registers the zone of an inactive button", () => {
    const button = element("button a Accept\n\tcenter 0 100\n\tdimensions 80 20");
    button.activeIf = "ready";
    const state = drawElementAt(
      button,
      point(),
      drawFrame(t),
      point(0, 100),
      zones,
    );
    expect(state).toBe(ElementState.Inactive);
    expect(zones.all()).toHaveLength(1);
    const [zone] = zones.all();
    expect(zone.key).toBe("a");
    expect(xy(zone.rect.center)).toEqual([0, 100]);
    expect(xy(zone.rect.dimensions)).toEqual([80, 20]);
    expect(t.renderer.ofType("text")[0].color).toBe(t.colors.inactive);
  });

  it("hovers a button under the pointer", () => {
    const button = element("button a Accept\n\tcenter 0 100\n\tdimensions 80 20");
    const state = drawElementAt(
      button,
      point(),
      drawFrame(t),
      point(0, 100),
      zones,
    );
    expect(state).toBe(ElementState.Hover);
    const [text] = t.renderer.ofType("text");
    expect(text.color).toBe(t.colors.hover);
    // "Accept" is 6 * 7 = 42 wide and 14 tall, centered on (0, 100).
    expect(xy(text.topLeft)).toEqual([-21, 93]);
  });

  it("does not register zones for labels", () => {
    drawElementAt(
      element("label Hello\n\tdimensions 100 50"),
      point(),
      drawFrame(t),
      point(),
      zones,
    );
    expect(zones.all()).toHaveLength(0);
  });
});
