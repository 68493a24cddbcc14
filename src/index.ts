// src/index.ts
export { DataNode } from "@/core/data/dataNode";
export { parseDataFile, tokenizeLine } from "@/core/data/dataFile";
export { point, isZero, add, sub, mul, scale } from "@/core/utils/point";
export { Rectangle } from "@/core/utils/rectangle";
export {
  formatTimings,
  getTiming,
  logTimings,
  resetTimings,
  timeSection,
} from "@/core/utils/profiler";
export type { ProfileTiming } from "@/core/utils/profiler";
export { ElementState } from "@/core/types/ui";
export type {
  AssetResolver,
  ClickZoneHost,
  Color,
  Font,
  FontProvider,
  PointerSource,
  ScreenMetrics,
  Sprite,
  StateTable,
  UIInformation,
  UIRenderer,
} from "@/core/types/ui";
export { parseAlignment } from "@/core/ui/alignment";
export {
  DEFAULT_INTERFACE_OPTIONS,
  resolveOptions,
} from "@/core/ui/options";
export type {
  InterfaceOptions,
  InterfaceOptionsInput,
  PaletteNames,
} from "@/core/ui/options";
export {
  createElement,
  drawElement,
  nativeDimensions,
  placeElement,
} from "@/core/ui/elements";
export type {
  BarElement,
  ElementBase,
  ElementGeometry,
  ImageElement,
  InterfaceElement,
  ElementKind,
  NamedPoint,
  TextElement,
} from "@/core/ui/elements";
export { loadGeometry, loadNamedPoint } from "@/core/ui/elements/element";
export { barDashes } from "@/core/ui/elements/barElement";
export {
  drawElementAt,
  resolveElementState,
  resolvePlacement,
} from "@/core/ui/elements/drawState";
export {
  Interface,
  createDefinition,
  loadInterfaceChild,
  loadInterfaceDefinition,
} from "@/core/ui/interface";
export type {
  InterfaceDefinition,
  InterfaceEnvironment,
  LoadState,
} from "@/core/ui/interface";
export { InterfaceRegistry } from "@/core/ui/interfaceRegistry";
export { Information } from "@/core/ui/information";
export { ClickZoneRegistry } from "@/core/ui/clickZoneRegistry";
export type { ClickZone } from "@/core/ui/clickZoneRegistry";
export { AssetRegistry } from "@/core/resources/assetRegistry";
export { FontSet, MonospaceFont } from "@/core/resources/fontSet";
export { DrawList } from "@/core/rendering/drawList";
export type { UIDrawCommand, UIDrawCommandType } from "@/core/rendering/drawList";
export { ScreenState } from "@/core/rendering/screen";
export { PointerState } from "@/core/input/pointerState";
