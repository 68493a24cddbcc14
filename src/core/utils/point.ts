// src/core/utils/point.ts
import { vec2d, type Vec2d } from "wgpu-matrix";

/**
 * Creates a new 2D point. Points are plain `Vec2d` values; every helper in
 * this module returns a fresh vector and never mutates its arguments.
 */
export const point = (x = 0, y = 0): Vec2d => vec2d.create(x, y);

export const clonePoint = (p: Vec2d): Vec2d => vec2d.clone(p);

/**
 * True when both components are zero. Used to detect "no alignment set"
 * (centered) and "no dimensions set".
 */
export const isZero = (p: Vec2d): boolean => p[0] === 0 && p[1] === 0;

export const add = (a: Vec2d, b: Vec2d): Vec2d => vec2d.add(a, b);

export const sub = (a: Vec2d, b: Vec2d): Vec2d => vec2d.subtract(a, b);

/** Component-wise product, used for all alignment math. */
export const mul = (a: Vec2d, b: Vec2d): Vec2d => vec2d.multiply(a, b);

export const scale = (p: Vec2d, k: number): Vec2d => vec2d.mulScalar(p, k);

export const negate = (p: Vec2d): Vec2d => vec2d.negate(p);

export const length = (p: Vec2d): number => vec2d.length(p);
