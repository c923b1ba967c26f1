/**
 * Shape Point Index
 *
 * Helpers around the `(shapeIndex, pointIndex)` address produced by the
 * control-point traversal, plus keyed collections that iterate in address
 * order.
 */

import type { ShapePointIndex } from '../types';

// =============================================================================
// Address Helpers
// =============================================================================

export function shapePointIndex(shapeIndex: number, pointIndex: number): ShapePointIndex {
    return { shapeIndex, pointIndex };
}

export function compareShapePointIndex(a: ShapePointIndex, b: ShapePointIndex): number {
    return a.shapeIndex - b.shapeIndex || a.pointIndex - b.pointIndex;
}

export function isSameShapePointIndex(a: ShapePointIndex, b: ShapePointIndex): boolean {
    return a.shapeIndex === b.shapeIndex && a.pointIndex === b.pointIndex;
}

export function nextPoint(index: ShapePointIndex): ShapePointIndex {
    return { shapeIndex: index.shapeIndex, pointIndex: index.pointIndex + 1 };
}

/** Previous point of the same shape; saturates at 0. */
export function prevPoint(index: ShapePointIndex): ShapePointIndex {
    return { shapeIndex: index.shapeIndex, pointIndex: Math.max(0, index.pointIndex - 1) };
}

export function firstPoint(index: ShapePointIndex): ShapePointIndex {
    return { shapeIndex: index.shapeIndex, pointIndex: 0 };
}

export function nextShape(index: ShapePointIndex): ShapePointIndex {
    return { shapeIndex: index.shapeIndex + 1, pointIndex: 0 };
}

export type ShapePointKey = `${number}:${number}`;

export function shapePointKey(index: ShapePointIndex): ShapePointKey {
    return `${index.shapeIndex}:${index.pointIndex}`;
}

/**
 * Index a point ends up at after points `removed` (pre-removal indexes)
 * left its shape; null when the point itself was removed.
 */
export function pointIndexAfterRemoval(pointIndex: number, removed: readonly number[]): number | null {
    if (removed.includes(pointIndex)) return null;
    return pointIndex - removed.filter((r) => r < pointIndex).length;
}

/**
 * Index a point ends up at after points were inserted into its shape;
 * `inserted` holds their final indexes, ascending, as produced by inserting
 * one after another.
 */
export function pointIndexAfterInsertion(pointIndex: number, inserted: readonly number[]): number {
    let shifted = pointIndex;
    for (const at of inserted) {
        if (at <= shifted) shifted += 1;
    }
    return shifted;
}

export function sortShapePointIndexes(indexes: Iterable<ShapePointIndex>): ShapePointIndex[] {
    return [...indexes].sort(compareShapePointIndex);
}

// =============================================================================
// Keyed Collections
// =============================================================================

/**
 * Map keyed by address. Iteration is in address order regardless of
 * insertion order.
 */
export class ShapePointMap<V> {
    private readonly entriesByKey = new Map<ShapePointKey, [ShapePointIndex, V]>();

    constructor(entries: Iterable<readonly [ShapePointIndex, V]> = []) {
        for (const [index, value] of entries) {
            this.set(index, value);
        }
    }

    get size(): number {
        return this.entriesByKey.size;
    }

    has(index: ShapePointIndex): boolean {
        return this.entriesByKey.has(shapePointKey(index));
    }

    get(index: ShapePointIndex): V | undefined {
        return this.entriesByKey.get(shapePointKey(index))?.[1];
    }

    set(index: ShapePointIndex, value: V): this {
        this.entriesByKey.set(shapePointKey(index), [{ ...index }, value]);
        return this;
    }

    delete(index: ShapePointIndex): boolean {
        return this.entriesByKey.delete(shapePointKey(index));
    }

    /** Removes and returns the value stored for `index`. */
    take(index: ShapePointIndex): V | undefined {
        const key = shapePointKey(index);
        const entry = this.entriesByKey.get(key);
        if (!entry) return undefined;
        this.entriesByKey.delete(key);
        return entry[1];
    }

    entries(): Array<[ShapePointIndex, V]> {
        return [...this.entriesByKey.values()]
            .sort((a, b) => compareShapePointIndex(a[0], b[0]))
            .map(([index, value]) => [{ ...index }, value]);
    }

    keys(): ShapePointIndex[] {
        return this.entries().map(([index]) => index);
    }

    values(): V[] {
        return this.entries().map(([, value]) => value);
    }

    isEmpty(): boolean {
        return this.entriesByKey.size === 0;
    }
}

/** Address set iterating in address order. */
export class ShapePointSet {
    private readonly indexesByKey = new Map<ShapePointKey, ShapePointIndex>();

    constructor(indexes: Iterable<ShapePointIndex> = []) {
        for (const index of indexes) {
            this.add(index);
        }
    }

    get size(): number {
        return this.indexesByKey.size;
    }

    has(index: ShapePointIndex): boolean {
        return this.indexesByKey.has(shapePointKey(index));
    }

    add(index: ShapePointIndex): this {
        this.indexesByKey.set(shapePointKey(index), { ...index });
        return this;
    }

    delete(index: ShapePointIndex): boolean {
        return this.indexesByKey.delete(shapePointKey(index));
    }

    clear(): void {
        this.indexesByKey.clear();
    }

    values(): ShapePointIndex[] {
        return sortShapePointIndexes(this.indexesByKey.values()).map((index) => ({ ...index }));
    }

    isEmpty(): boolean {
        return this.indexesByKey.size === 0;
    }
}
