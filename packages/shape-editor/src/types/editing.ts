/**
 * Editing Types
 *
 * Addresses and control points produced by traversing a shape tree.
 */

import type { Point2D, ShapeKind } from './shapes';

// =============================================================================
// Addressing
// =============================================================================

/**
 * Position of one handle within one traversal pass. Ordered by
 * `shapeIndex`, then `pointIndex`.
 */
export interface ShapePointIndex {
    shapeIndex: number;
    pointIndex: number;
}

// =============================================================================
// Control Points
// =============================================================================

export interface ConnectedPoint {
    index: ShapePointIndex;
    position: Point2D;
}

export interface PathControlPoint {
    type: 'path-point';
    position: Point2D;
    shapeIndex: number;
}

export interface SecondaryControlPoint {
    type: 'control-point';
    position: Point2D;
    shapeIndex: number;
    /** Anchors the handle is tied to, in traversal order. */
    connected: ConnectedPoint[];
}

export type ShapeControlPoint = PathControlPoint | SecondaryControlPoint;

/** Shape kinds whose secondary handles hang off a center point. */
export const CENTER_AND_RADIUS_KINDS: ReadonlySet<ShapeKind> = new Set<ShapeKind>(['circle', 'ellipse']);

/** Largest number of radius handles following a center point. */
export const MAX_RADIUS_POINTS = 2;

export function isCenterAndRadiusKind(kind: ShapeKind): boolean {
    return CENTER_AND_RADIUS_KINDS.has(kind);
}
