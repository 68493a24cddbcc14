// src/core/ui/elements/element.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";
import type {
  AssetResolver,
  FontProvider,
  UIInformation,
  UIRenderer,
} from "@/core/types/ui";
import type { InterfaceOptions } from "@/core/ui/options";
import { parseAlignment } from "@/core/ui/alignment";
import { Rectangle } from "@/core/utils/rectangle";
import { isZero, mul, point, scale, sub } from "@/core/utils/point";

/**
 * Placement data shared by every element and by named points.
 * `bounds` is in interface-local coordinates.
 */
export interface ElementGeometry {
  bounds: Rectangle;
  /** Where content sits inside `bounds`; (0, 0) centers it. */
  alignment: Vec2d;
  /** Inset applied when content is pushed toward an edge. */
  padding: Vec2d;
}

/**
 * A named rectangle the host draws into itself. It has geometry but no
 * appearance.
 */
export type NamedPoint = ElementGeometry;

export interface ElementBase extends ElementGeometry {
  /** Condition that must hold for the element to draw; empty = always. */
  visibleIf: string;
  /** Condition for the active state; empty = always active. */
  activeIf: string;
}

/** What element constructors need while an interface loads. */
export interface LoadContext {
  assets: AssetResolver;
  options: InterfaceOptions;
}

/** What element draw routines need for one frame. */
export interface DrawFrame {
  info: UIInformation;
  renderer: UIRenderer;
  fonts: FontProvider;
  options: InterfaceOptions;
}

/**
 * Handles an attribute line the shared grammar does not know.
 * Returns false if the line is not recognized either.
 */
export type LineParser = (child: DataNode) => boolean;

const ignoreLine: LineParser = () => false;

export const createGeometry = (): ElementGeometry => ({
  bounds: Rectangle.empty(),
  alignment: point(),
  padding: point(),
});

export const createElementBase = (): ElementBase => ({
  ...createGeometry(),
  visibleIf: "",
  activeIf: "",
});

/**
 * Sets one axis of `bounds` to `size`. A non-zero `shift` (the global
 * alignment on that axis) keeps the edge it points toward in place instead
 * of the center.
 */
function resizeAxis(
  bounds: Rectangle,
  axis: 0 | 1,
  size: number,
  shift: number,
): Rectangle {
  const center = bounds.center;
  const dimensions = bounds.dimensions;
  center[axis] += 0.5 * shift * (dimensions[axis] - size);
  dimensions[axis] = size;
  return new Rectangle(center, dimensions);
}

/**
 * Applies the geometry attribute lines under `node` to `geometry`.
 * @remarks
 * Lines apply in order and each one rewrites `bounds`, so a later line
 * overrides an earlier one. Resizing keeps the edge the global alignment
 * points toward fixed, until a `center` line switches the element to
 * centered behavior. Lines this grammar does not know go to `parseLine`;
 * if that rejects them too they are traced and skipped.
 *
 * @param geometry Updated in place.
 * @param node The element's own line; its children are the attributes.
 * @param globalAlignment The alignment of the owning interface.
 * @param parseLine Element-specific attribute parser.
 */
export function loadGeometry(
  geometry: ElementGeometry,
  node: DataNode,
  globalAlignment: Vec2d,
  parseLine: LineParser = ignoreLine,
): void {
  let isCentered = isZero(globalAlignment);

  for (const child of node.children) {
    const key = child.token(0);
    const hasDimensions = key === "dimensions" && child.size() >= 3;
    const hasWidth = hasDimensions || (key === "width" && child.size() >= 2);
    const hasHeight = hasDimensions || (key === "height" && child.size() >= 2);

    if (key === "align" && child.size() > 1) {
      parseAlignment(child, geometry.alignment);
    } else if (hasWidth || hasHeight) {
      if (hasWidth) {
        geometry.bounds = resizeAxis(
          geometry.bounds,
          0,
          child.value(1),
          isCentered ? 0 : globalAlignment[0],
        );
      }
      if (hasHeight) {
        geometry.bounds = resizeAxis(
          geometry.bounds,
          1,
          child.value(hasDimensions ? 2 : 1),
          isCentered ? 0 : globalAlignment[1],
        );
      }
    } else if (key === "center" && child.size() >= 3) {
      isCentered = true;
      geometry.bounds = new Rectangle(
        point(child.value(1), child.value(2)),
        geometry.bounds.dimensions,
      );
    } else if (key === "from" && child.size() >= 6 && child.token(3) === "to") {
      geometry.bounds = Rectangle.withCorners(
        point(child.value(1), child.value(2)),
        point(child.value(4), child.value(5)),
      );
    } else if (key === "from" && child.size() >= 3) {
      // Extends away from the point along the element's own alignment.
      const dimensions = geometry.bounds.dimensions;
      const center = sub(
        point(child.value(1), child.value(2)),
        scale(mul(geometry.alignment, dimensions), 0.5),
      );
      geometry.bounds = new Rectangle(center, dimensions);
    } else if (key === "pad" && child.size() >= 3) {
      geometry.padding = point(child.value(1), child.value(2));
    } else if (!parseLine(child)) {
      child.printTrace("Unrecognized interface element attribute:");
    }
  }
}

/**
 * Loads a `point` or `box` node. Passing the previous definition of the same
 * name continues from its geometry.
 */
export function loadNamedPoint(
  node: DataNode,
  globalAlignment: Vec2d,
  previous?: NamedPoint,
): NamedPoint {
  const namedPoint: NamedPoint = previous
    ? {
        bounds: previous.bounds,
        alignment: point(previous.alignment[0], previous.alignment[1]),
        padding: point(previous.padding[0], previous.padding[1]),
      }
    : createGeometry();
  loadGeometry(namedPoint, node, globalAlignment);
  return namedPoint;
}
