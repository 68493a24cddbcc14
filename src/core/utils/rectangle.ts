// src/core/utils/rectangle.ts
import type { Vec2d } from "wgpu-matrix";
import { add, clonePoint, point, scale, sub } from "@/core/utils/point";

/**
 * Axis-aligned rectangle, known both by center and dimensions and by its
 * corners.
 * @remarks
 * Each form reads back exactly as it was given: a rectangle built from
 * corners reports those corners, one built from a center and dimensions
 * reports those. Instances are immutable: queries hand out copies, and
 * `translate` returns a new rectangle.
 */
export class Rectangle {
  private readonly c: Vec2d;
  private readonly d: Vec2d;
  private min: Vec2d;
  private max: Vec2d;

  constructor(center: Vec2d = point(), dimensions: Vec2d = point()) {
    this.c = clonePoint(center);
    this.d = clonePoint(dimensions);
    this.min = sub(this.c, scale(this.d, 0.5));
    this.max = add(this.c, scale(this.d, 0.5));
  }

  /**
   * Builds the rectangle spanning two opposite corners, in any order.
   * The dimensions are always non-negative.
   */
  public static withCorners(a: Vec2d, b: Vec2d): Rectangle {
    const min = point(Math.min(a[0], b[0]), Math.min(a[1], b[1]));
    const max = point(Math.max(a[0], b[0]), Math.max(a[1], b[1]));
    const rect = new Rectangle(scale(add(min, max), 0.5), sub(max, min));
    rect.min = min;
    rect.max = max;
    return rect;
  }

  public static empty(): Rectangle {
    return new Rectangle();
  }

  public get center(): Vec2d {
    return clonePoint(this.c);
  }

  public get dimensions(): Vec2d {
    return clonePoint(this.d);
  }

  public get width(): number {
    return this.d[0];
  }

  public get height(): number {
    return this.d[1];
  }

  public get left(): number {
    return this.min[0];
  }

  public get top(): number {
    return this.min[1];
  }

  public get right(): number {
    return this.max[0];
  }

  public get bottom(): number {
    return this.max[1];
  }

  public get topLeft(): Vec2d {
    return clonePoint(this.min);
  }

  public get bottomRight(): Vec2d {
    return clonePoint(this.max);
  }

  /** Half-open test: the left and top edges are inside, right and bottom are not. */
  public contains(p: Vec2d): boolean {
    return (
      p[0] >= this.left &&
      p[0] < this.right &&
      p[1] >= this.top &&
      p[1] < this.bottom
    );
  }

  public translate(offset: Vec2d): Rectangle {
    const moved = new Rectangle(add(this.c, offset), this.d);
    moved.min = add(this.min, offset);
    moved.max = add(this.max, offset);
    return moved;
  }
}
