/**
 * Constraint Graph
 *
 * Translation links between addresses and axis-aligned position ranges.
 * Constraints are stored as a plain list so they can live in the editor
 * store; `buildConstraintIndex` derives the lookup structures used by the
 * move action.
 */

import { shapePointKey, ShapePointMap, ShapePointSet } from '../shapes/shape-point-index';
import type { Point2D, ShapePointIndex, Vec2 } from '../types';

// =============================================================================
// Types
// =============================================================================

export type Bound =
    | { kind: 'included'; value: number }
    | { kind: 'excluded'; value: number }
    | { kind: 'unbounded' };

export interface PositionRange {
    xMin: Bound;
    xMax: Bound;
    yMin: Bound;
    yMax: Bound;
}

export interface AxisRange {
    min?: Bound;
    max?: Bound;
}

export type Constraint =
    | { type: 'link-bidirectional'; a: ShapePointIndex; b: ShapePointIndex }
    | { type: 'link-from-to'; from: ShapePointIndex; to: ShapePointIndex }
    | { type: 'position-range'; index: ShapePointIndex; range: PositionRange };

export interface ConstraintIndex {
    /** Addresses that receive a translation whenever the key address moves. */
    propagation: ShapePointMap<ShapePointSet>;
    ranges: ShapePointMap<PositionRange>;
}

export const UNBOUNDED: Bound = { kind: 'unbounded' };

// =============================================================================
// Builders
// =============================================================================

export function included(value: number): Bound {
    return { kind: 'included', value };
}

export function excluded(value: number): Bound {
    return { kind: 'excluded', value };
}

/** NaN bound values widen to the extreme float on their side. */
function sanitizeBound(bound: Bound | undefined, side: 'min' | 'max'): Bound {
    if (!bound || bound.kind === 'unbounded' || !Number.isNaN(bound.value)) {
        return bound ?? UNBOUNDED;
    }
    return { kind: bound.kind, value: side === 'min' ? -Number.MAX_VALUE : Number.MAX_VALUE };
}

export function positionRange(x: AxisRange, y: AxisRange): PositionRange {
    return {
        xMin: sanitizeBound(x.min, 'min'),
        xMax: sanitizeBound(x.max, 'max'),
        yMin: sanitizeBound(y.min, 'min'),
        yMax: sanitizeBound(y.max, 'max'),
    };
}

export function linkBidirectional(a: ShapePointIndex, b: ShapePointIndex): Constraint {
    return { type: 'link-bidirectional', a: { ...a }, b: { ...b } };
}

export function linkFromTo(from: ShapePointIndex, to: ShapePointIndex): Constraint {
    return { type: 'link-from-to', from: { ...from }, to: { ...to } };
}

export function pointPositionRange(index: ShapePointIndex, range: PositionRange): Constraint {
    return { type: 'position-range', index: { ...index }, range };
}

export function cloneConstraint(constraint: Constraint): Constraint {
    switch (constraint.type) {
        case 'link-bidirectional':
            return linkBidirectional(constraint.a, constraint.b);
        case 'link-from-to':
            return linkFromTo(constraint.from, constraint.to);
        case 'position-range':
            return pointPositionRange(constraint.index, { ...constraint.range });
    }
}

// =============================================================================
// Identity
// =============================================================================

function boundKey(bound: Bound): string {
    return bound.kind === 'unbounded' ? 'u' : `${bound.kind[0]}${bound.value}`;
}

/** Structural identity; two constraints with equal keys are the same constraint. */
export function constraintKey(constraint: Constraint): string {
    switch (constraint.type) {
        case 'link-bidirectional':
            return `link:${shapePointKey(constraint.a)}<>${shapePointKey(constraint.b)}`;
        case 'link-from-to':
            return `link:${shapePointKey(constraint.from)}>${shapePointKey(constraint.to)}`;
        case 'position-range': {
            const { xMin, xMax, yMin, yMax } = constraint.range;
            return `range:${shapePointKey(constraint.index)}:${[xMin, xMax, yMin, yMax].map(boundKey).join(',')}`;
        }
    }
}

// =============================================================================
// Index
// =============================================================================

export function emptyConstraintIndex(): ConstraintIndex {
    return { propagation: new ShapePointMap(), ranges: new ShapePointMap() };
}

export function buildConstraintIndex(constraints: Iterable<Constraint>): ConstraintIndex {
    const index = emptyConstraintIndex();
    const link = (from: ShapePointIndex, to: ShapePointIndex) => {
        let targets = index.propagation.get(from);
        if (!targets) {
            targets = new ShapePointSet();
            index.propagation.set(from, targets);
        }
        targets.add(to);
    };
    for (const constraint of constraints) {
        switch (constraint.type) {
            case 'link-bidirectional':
                link(constraint.a, constraint.b);
                link(constraint.b, constraint.a);
                break;
            case 'link-from-to':
                link(constraint.from, constraint.to);
                break;
            case 'position-range':
                index.ranges.set(constraint.index, constraint.range);
                break;
        }
    }
    return index;
}

// =============================================================================
// Clamping
// =============================================================================

/**
 * Limits `translation` so that `position + translation` stays inside
 * `range`. Excluded bounds stop one epsilon short of the bound.
 */
export function clampTranslation(range: PositionRange, translation: Vec2, position: Point2D): Vec2 {
    return {
        x: clampAxis(translation.x, position.x, range.xMin, range.xMax),
        y: clampAxis(translation.y, position.y, range.yMin, range.yMax),
    };
}

function clampAxis(translation: number, position: number, min: Bound, max: Bound): number {
    let value = translation;
    if (max.kind === 'included') {
        value = Math.min(value, max.value - position);
    } else if (max.kind === 'excluded') {
        value = Math.min(value, max.value - position - Number.EPSILON);
    }
    if (min.kind === 'included') {
        value = Math.max(value, min.value - position);
    } else if (min.kind === 'excluded') {
        value = Math.max(value, min.value - position + Number.EPSILON);
    }
    return value;
}
