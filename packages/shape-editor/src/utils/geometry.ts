/**
 * Geometry Helpers
 *
 * Small vector and rectangle operations shared by traversal, actions and
 * rendering. Inputs are never mutated.
 */

import type { Point2D, Rect, Vec2 } from '../types';

export const ZERO_VEC: Readonly<Vec2> = { x: 0, y: 0 };

export function point(x: number, y: number): Point2D {
    return { x, y };
}

export function add(a: Point2D, b: Vec2): Point2D {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Point2D, b: Point2D): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
    return { x: v.x * factor, y: v.y * factor };
}

export function negate(v: Vec2): Vec2 {
    return { x: -v.x, y: -v.y };
}

export function length(v: Vec2): number {
    return Math.hypot(v.x, v.y);
}

export function distance(a: Point2D, b: Point2D): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Unit vector; a zero-length input yields the zero vector. */
export function normalized(v: Vec2): Vec2 {
    const len = length(v);
    if (!Number.isFinite(len) || len === 0) {
        return { x: 0, y: 0 };
    }
    return { x: v.x / len, y: v.y / len };
}

/** Rotates 90 degrees clockwise in a y-down coordinate system. */
export function rot90(v: Vec2): Vec2 {
    return { x: v.y, y: -v.x };
}

export function pointsEqual(a: Point2D, b: Point2D): boolean {
    return a.x === b.x && a.y === b.y;
}

export function isZeroVec(v: Vec2): boolean {
    return v.x === 0 && v.y === 0;
}

// =============================================================================
// Rectangles
// =============================================================================

export function rectFromTwoPoints(a: Point2D, b: Point2D): Rect {
    return {
        min: { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
        max: { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) },
    };
}

/** Swaps coordinates so that `min <= max` on both axes. */
export function normalizeRect(rect: Rect): Rect {
    return rectFromTwoPoints(rect.min, rect.max);
}

export function rectContains(rect: Rect, p: Point2D): boolean {
    return p.x >= rect.min.x && p.x <= rect.max.x && p.y >= rect.min.y && p.y <= rect.max.y;
}

export function rectWidth(rect: Rect): number {
    return rect.max.x - rect.min.x;
}

export function rectHeight(rect: Rect): number {
    return rect.max.y - rect.min.y;
}
