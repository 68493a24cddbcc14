// src/core/ui/interface.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import type {
  AssetResolver,
  ClickZoneHost,
  FontProvider,
  PointerSource,
  ScreenMetrics,
  UIInformation,
  UIRenderer,
} from "@/core/types/ui";
import { parseAlignment } from "@/core/ui/alignment";
import {
  type DrawFrame,
  type InterfaceElement,
  type LoadContext,
  type NamedPoint,
  createElement,
} from "@/core/ui/elements";
import { loadNamedPoint } from "@/core/ui/elements/element";
import { drawElementAt } from "@/core/ui/elements/drawState";
import {
  type InterfaceOptions,
  type InterfaceOptionsInput,
  resolveOptions,
} from "@/core/ui/options";
import { timeSection } from "@/core/utils/profiler";
import { Rectangle } from "@/core/utils/rectangle";
import { add, clonePoint, mul, point, scale } from "@/core/utils/point";

/**
 * Everything an interface builds from its data: an alignment, named points
 * and elements in draw order (later elements draw on top).
 */
export interface InterfaceDefinition {
  name: string;
  alignment: Vec2d;
  points: Map<string, NamedPoint>;
  elements: InterfaceElement[];
}

/**
 * Conditions that apply to every element declared after them, until the
 * next `visible` or `active` line.
 */
export interface LoadState {
  visibleIf: string;
  activeIf: string;
}

export const createDefinition = (name = ""): InterfaceDefinition => ({
  name,
  alignment: point(),
  points: new Map(),
  elements: [],
});

/**
 * Applies one child line of an interface node to `definition` and returns
 * the carry-over state for the next sibling.
 */
export function loadInterfaceChild(
  definition: InterfaceDefinition,
  state: LoadState,
  child: DataNode,
  ctx: LoadContext,
): LoadState {
  const key = child.token(0);

  if ((key === "point" || key === "box") && child.size() >= 2) {
    const name = child.token(1);
    definition.points.set(
      name,
      loadNamedPoint(child, definition.alignment, definition.points.get(name)),
    );
    return state;
  }

  if (key === "visible" || key === "active") {
    const condition =
      child.size() >= 3 && child.token(1) === "if" ? child.token(2) : "";
    return key === "visible"
      ? { ...state, visibleIf: condition }
      : { ...state, activeIf: condition };
  }

  const element = createElement(child, definition.alignment, ctx);
  if (!element) {
    child.printTrace("Unrecognized interface element:");
    return state;
  }
  element.visibleIf = state.visibleIf;
  element.activeIf = state.activeIf;
  definition.elements.push(element);
  return state;
}

/**
 * Builds the definition an `interface <name> [alignment...]` node describes.
 * @remarks
 * `previous` is not modified; loading onto it returns a copy with the new
 * alignment tokens applied and the new points and elements appended. A node
 * without a name changes nothing.
 */
export function loadInterfaceDefinition(
  node: DataNode,
  ctx: LoadContext,
  previous: InterfaceDefinition = createDefinition(),
): InterfaceDefinition {
  const definition: InterfaceDefinition = {
    name: previous.name,
    alignment: clonePoint(previous.alignment),
    points: new Map(previous.points),
    elements: [...previous.elements],
  };
  if (node.size() < 2) return definition;

  definition.name = node.token(1);
  parseAlignment(node, definition.alignment, 2);

  let state: LoadState = { visibleIf: "", activeIf: "" };
  for (const child of node.children) {
    state = loadInterfaceChild(definition, state, child, ctx);
  }
  return definition;
}

/**
 * Services an interface draws with.
 */
export interface InterfaceEnvironment {
  assets: AssetResolver;
  renderer: UIRenderer;
  fonts: FontProvider;
  screen: ScreenMetrics;
  pointer: PointerSource;
}

/**
 * A loadable panel layout: named points for the host's own drawing, plus
 * elements this class draws every frame.
 */
export class Interface {
  private definition: InterfaceDefinition = createDefinition();
  private readonly options: InterfaceOptions;

  constructor(
    private readonly env: InterfaceEnvironment,
    optsPartial?: InterfaceOptionsInput,
  ) {
    this.options = resolveOptions(optsPartial);
  }

  public get name(): string {
    return this.definition.name;
  }

  public get alignment(): Vec2d {
    return clonePoint(this.definition.alignment);
  }

  public get elements(): readonly InterfaceElement[] {
    return this.definition.elements;
  }

  /**
   * Loads an `interface` node. Loading again appends further points and
   * elements.
   */
  public load(node: DataNode): void {
    this.definition = loadInterfaceDefinition(
      node,
      { assets: this.env.assets, options: this.options },
      this.definition,
    );
  }

  /**
   * Screen-space origin of the interface: the screen center, an edge
   * midpoint or a corner, depending on the interface alignment.
   */
  public anchor(): Vec2d {
    return mul(scale(this.env.screen.dimensions(), 0.5), this.definition.alignment);
  }

  /**
   * Draws every element in order.
   * @param info Live conditions and values for this frame.
   * @param host Receives the click zones of visible buttons.
   */
  public draw(info: UIInformation, host?: ClickZoneHost): void {
    if (this.options.profile) {
      timeSection(`Interface.draw:${this.name}`, () =>
        this.drawElements(info, host),
      );
    } else {
      this.drawElements(info, host);
    }
  }

  private drawElements(info: UIInformation, host?: ClickZoneHost): void {
    const frame: DrawFrame = {
      info,
      renderer: this.env.renderer,
      fonts: this.env.fonts,
      options: this.options,
    };
    const anchor = this.anchor();
    const pointer = this.env.pointer.getPointer();
    for (const element of this.definition.elements) {
      drawElementAt(element, anchor, frame, pointer, host);
    }
  }

  public hasPoint(name: string): boolean {
    return this.definition.points.has(name);
  }

  /** Screen-space center of a named point, or (0, 0) if there is none. */
  public getPoint(name: string): Vec2d {
    const namedPoint = this.definition.points.get(name);
    if (!namedPoint) return point();
    return add(namedPoint.bounds.center, this.anchor());
  }

  public getSize(name: string): Vec2d {
    return this.definition.points.get(name)?.bounds.dimensions ?? point();
  }

  /** Screen-space rectangle of a named point, or an empty one. */
  public getBox(name: string): Rectangle {
    const namedPoint = this.definition.points.get(name);
    if (!namedPoint) return Rectangle.empty();
    return namedPoint.bounds.translate(this.anchor());
  }
}
