/**
 * Alignment Grid
 *
 * Generates grid line coordinates for the visible content rectangle and
 * indexes them per axis, the same way control points are indexed.
 */

import type { Rect } from '../types';

import type { FloatIndexOptions } from './float-index';
import { OrderedFloatIndex } from './float-index';

// =============================================================================
// Types
// =============================================================================

export type GridLineType = 'zero' | 'primary' | 'secondary' | 'sub';

export interface GridLine {
    value: number;
    types: GridLineType[];
}

export interface GridSnap {
    value: number;
    types: GridLineType[];
}

// =============================================================================
// Constants
// =============================================================================

export const GRID_BASE_STEP = 50;
export const GRID_STEP_BASE = 5;

const LINE_TYPE_ORDER: Record<GridLineType, number> = { zero: 0, primary: 1, secondary: 2, sub: 3 };

const LINE_TYPE_OPTIONS: FloatIndexOptions<GridLineType> = {
    valueKey: (type) => type,
    compareValues: (a, b) => LINE_TYPE_ORDER[a] - LINE_TYPE_ORDER[b],
};

// =============================================================================
// Step
// =============================================================================

/** Rounds half away from zero. */
function roundHalfAway(value: number): number {
    return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Primary grid spacing in content units. One order of the step base
 * smaller for every step-base-fold zoom in.
 */
export function gridStep(scale: number): number {
    const order = roundHalfAway(Math.log(scale) / Math.log(GRID_STEP_BASE));
    return GRID_BASE_STEP * Math.pow(GRID_STEP_BASE, -order);
}

/** Multiples of `step` from `floor(min / step)` up to, excluding, `ceil(max / step)`. */
export function stepBy(min: number, max: number, step: number): number[] {
    if (!(step > 0) || !Number.isFinite(min) || !Number.isFinite(max)) return [];
    const values: number[] = [];
    const last = Math.ceil(max / step);
    for (let i = Math.floor(min / step); i < last; i += 1) {
        values.push(i * step);
    }
    return values;
}

function axisLines(min: number, max: number, step: number): Array<readonly [number, GridLineType]> {
    const half = step / 2;
    const sub = half / 3;
    const lines: Array<readonly [number, GridLineType]> = [];
    for (const x of stepBy(min, max, step)) {
        lines.push([x, x === 0 ? 'zero' : 'primary']);
        lines.push([x + half, 'secondary']);
        lines.push([x + sub, 'sub']);
        lines.push([x + 2 * sub, 'sub']);
        lines.push([x + half + sub, 'sub']);
        lines.push([x + half + 2 * sub, 'sub']);
    }
    return lines;
}

// =============================================================================
// Grid Index
// =============================================================================

export class GridIndex {
    readonly step: number;
    private readonly xIndex: OrderedFloatIndex<GridLineType>;
    private readonly yIndex: OrderedFloatIndex<GridLineType>;

    private constructor(step: number, viewport: Rect) {
        this.step = step;
        this.xIndex = OrderedFloatIndex.build(axisLines(viewport.min.x, viewport.max.x, step), LINE_TYPE_OPTIONS);
        this.yIndex = OrderedFloatIndex.build(axisLines(viewport.min.y, viewport.max.y, step), LINE_TYPE_OPTIONS);
    }

    /** Grid covering `viewport` (content coordinates) at view `scale`. */
    static fromViewport(viewport: Rect, scale: number): GridIndex {
        return new GridIndex(gridStep(scale), viewport);
    }

    /** Vertical lines, keyed by x. */
    verticalLines(): GridLine[] {
        return this.xIndex.entries().map((entry) => ({ value: entry.key, types: entry.values }));
    }

    /** Horizontal lines, keyed by y. */
    horizontalLines(): GridLine[] {
        return this.yIndex.entries().map((entry) => ({ value: entry.key, types: entry.values }));
    }

    snapX(x: number, maxDistance: number): GridSnap | null {
        return toGridSnap(this.xIndex.findClosestInDistanceAndIgnore(x, maxDistance, isSubLine));
    }

    snapY(y: number, maxDistance: number): GridSnap | null {
        return toGridSnap(this.yIndex.findClosestInDistanceAndIgnore(y, maxDistance, isSubLine));
    }
}

function isSubLine(type: GridLineType): boolean {
    return type === 'sub';
}

function toGridSnap(entry: { key: number; values: GridLineType[] } | null): GridSnap | null {
    return entry ? { value: entry.key, types: entry.values } : null;
}
