// src/core/ui/interfaceRegistry.ts
import { readFile } from "node:fs/promises";
import { DataNode } from "@/core/data/dataNode";
import { parseDataFile } from "@/core/data/dataFile";
import { Interface, type InterfaceEnvironment } from "@/core/ui/interface";
import type { InterfaceOptionsInput } from "@/core/ui/options";

/**
 * Owns every loaded interface, keyed by name.
 * @remarks
 * Data files may define the same interface more than once; each definition
 * is loaded onto the existing interface and appends to it.
 */
export class InterfaceRegistry {
  private interfaces = new Map<string, Interface>();

  constructor(
    private readonly env: InterfaceEnvironment,
    private readonly optsPartial?: InterfaceOptionsInput,
  ) {}

  /**
   * Loads every top-level `interface <name>` node under `root`.
   * @returns The number of interface nodes loaded.
   */
  public loadNode(root: DataNode): number {
    let loaded = 0;
    for (const child of root.children) {
      if (child.token(0) !== "interface") continue;
      if (child.size() < 2) {
        child.printTrace("Skipping unnamed interface:");
        continue;
      }
      this.get(child.token(1)).load(child);
      loaded++;
    }
    return loaded;
  }

  public loadText(text: string, source = "<text>"): number {
    return this.loadNode(parseDataFile(text, source));
  }

  /**
   * Reads and loads a data file.
   * @throws If the file cannot be read.
   */
  public async loadFile(path: string): Promise<number> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      throw new Error(`[InterfaceRegistry] Cannot read "${path}"`, {
        cause: error,
      });
    }
    const loaded = this.loadText(text, path);
    console.log(`[InterfaceRegistry] Loaded ${loaded} interface(s) from ${path}`);
    return loaded;
  }

  public has(name: string): boolean {
    return this.interfaces.has(name);
  }

  /**
   * Gets an interface by name, creating an empty one if none is loaded.
   */
  public get(name: string): Interface {
    let ui = this.interfaces.get(name);
    if (!ui) {
      ui = new Interface(this.env, this.optsPartial);
      this.interfaces.set(name, ui);
    }
    return ui;
  }

  public names(): string[] {
    return Array.from(this.interfaces.keys());
  }

  /** Releases every interface and the elements it owns. */
  public clear(): void {
    this.interfaces.clear();
  }
}
