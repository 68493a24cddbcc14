// test/unit/core/ui/interfaceRegistry.test.ts
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { InterfaceRegistry } from "@/core/ui/interfaceRegistry";
import {
  createTestEnv,
  spyWarn,
  xy,
  type TestEnv,
  type WarnSpy,
} from "../../../helpers/env";

const FIXTURE = fileURLToPath(
  new URL("../../../fixtures/interfaces.txt", import.meta.url),
);

describe("InterfaceRegistry", () => {
  let t: TestEnv;
  let warn: WarnSpy;

  beforeEach(() => {
    t = createTestEnv();
    warn = spyWarn();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads every interface node in a text", () => {
    const registry = new InterfaceRegistry(t.env);
    const loaded = registry.loadText(
      "interface hud\n\tlabel Ready\ninterface menu\n\tlabel Quit",
    );
    expect(loaded).toBe(2);
    expect(registry.names()).toEqual(["hud", "menu"]);
    expect(registry.get("menu").elements).toHaveLength(1);
  });

  it("merges repeated definitions of one interface", () => {
    const registry = new InterfaceRegistry(t.env);
    registry.loadText("interface hud\n\tlabel One");
    registry.loadText("interface hud\n\tlabel Two");
    expect(registry.names()).toEqual(["hud"]);
    expect(registry.get("hud").elements).toHaveLength(2);
  });

  it("creates empty interfaces on demand", () => {
    const registry = new InterfaceRegistry(t.env);
    expect(registry.has("hud")).toBe(false);
    const ui = registry.get("hud");
    expect(registry.has("hud")).toBe(true);
    expect(ui.elements).toHaveLength(0);
    expect(registry.get("hud")).toBe(ui);
  });

  it("passes its options to every interface", () => {
    const registry = new InterfaceRegistry(t.env, { defaultFontSize: 18 });
    registry.loadText("interface hud\n\tlabel Hi");
    registry.get("hud").draw(t.info);
    expect(t.renderer.ofType("text")[0].fontSize).toBe(18);
  });

  it("forgets everything on clear", () => {
    const registry = new InterfaceRegistry(t.env);
    registry.loadText("interface hud");
    registry.clear();
    expect(registry.names()).toEqual([]);
  });

  describe("loadFile", () => {
    it("loads a data file", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const registry = new InterfaceRegistry(t.env);

      await expect(registry.loadFile(FIXTURE)).resolves.toBe(3);

      expect(registry.names()).toEqual(["hud", "menu"]);
      const hud = registry.get("hud");
      expect(hud.elements.map((e) => e.kind)).toEqual(["text", "text"]);
      expect(xy(hud.getSize("radar"))).toEqual([100, 100]);
      expect(xy(registry.get("menu").anchor())).toEqual([0, 300]);
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("Skipping unnamed interface:"),
      );
      expect(log).toHaveBeenCalledWith(
        `[InterfaceRegistry] Loaded 3 interface(s) from ${FIXTURE}`,
      );
    });

    it("rejects when the file cannot be read", async () => {
      const registry = new InterfaceRegistry(t.env);
      await expect(
        registry.loadFile(fileURLToPath(new URL("./missing.txt", import.meta.url))),
      ).rejects.toThrow("[InterfaceRegistry] Cannot read");
    });
  });
});
