/**
 * Selection
 *
 * Ordered set of selected addresses. Actions that add or remove points
 * re-key it in the same pass so that it never refers to a stale address.
 */

import {
    isSameShapePointIndex,
    pointIndexAfterInsertion,
    pointIndexAfterRemoval,
    ShapePointSet,
} from '../shapes/shape-point-index';
import type { ShapePointIndex } from '../types';

export class Selection {
    private readonly points: ShapePointSet;

    constructor(indexes: Iterable<ShapePointIndex> = []) {
        this.points = new ShapePointSet(indexes);
    }

    static from(indexes: Iterable<ShapePointIndex>): Selection {
        return new Selection(indexes);
    }

    get size(): number {
        return this.points.size;
    }

    isEmpty(): boolean {
        return this.points.isEmpty();
    }

    has(index: ShapePointIndex): boolean {
        return this.points.has(index);
    }

    select(index: ShapePointIndex): void {
        this.points.add(index);
    }

    deselect(index: ShapePointIndex): void {
        this.points.delete(index);
    }

    clear(): void {
        this.points.clear();
    }

    /** Replaces the content with `indexes`. */
    reset(indexes: Iterable<ShapePointIndex>): void {
        this.points.clear();
        for (const index of indexes) {
            this.points.add(index);
        }
    }

    /** The only selected address, or null when zero or several are selected. */
    single(): ShapePointIndex | null {
        if (this.points.size !== 1) return null;
        return this.points.values()[0] ?? null;
    }

    /** Distinct shape indexes touched by the selection, ascending. */
    shapes(): number[] {
        return [...new Set(this.points.values().map((index) => index.shapeIndex))];
    }

    toArray(): ShapePointIndex[] {
        return this.points.values();
    }

    toSet(): ShapePointSet {
        return new ShapePointSet(this.points.values());
    }

    equals(other: Selection): boolean {
        const mine = this.toArray();
        const theirs = other.toArray();
        return mine.length === theirs.length && mine.every((index, i) => {
            const match = theirs[i];
            return match !== undefined && isSameShapePointIndex(index, match);
        });
    }

    // -------------------------------------------------------------------------
    // Re-keying
    // -------------------------------------------------------------------------

    /**
     * Points `removed` (pre-removal indexes) left shape `shapeIndex`: drop
     * the selected ones and shift later points down.
     */
    removePoints(shapeIndex: number, removed: readonly number[]): void {
        if (removed.length === 0) return;
        this.remap(shapeIndex, (pointIndex) => pointIndexAfterRemoval(pointIndex, removed));
    }

    /**
     * Points were inserted into shape `shapeIndex`; `inserted` holds their
     * final indexes, ascending, as produced by inserting one after another.
     */
    insertPoints(shapeIndex: number, inserted: readonly number[]): void {
        if (inserted.length === 0) return;
        this.remap(shapeIndex, (pointIndex) => pointIndexAfterInsertion(pointIndex, inserted));
    }

    /** Drops every selected point of the given shapes. */
    dropShapes(shapeIndexes: Iterable<number>): void {
        const dropped = new Set(shapeIndexes);
        for (const index of this.points.values()) {
            if (dropped.has(index.shapeIndex)) this.points.delete(index);
        }
    }

    private remap(shapeIndex: number, map: (pointIndex: number) => number | null): void {
        const affected = this.points.values().filter((index) => index.shapeIndex === shapeIndex);
        for (const index of affected) {
            this.points.delete(index);
        }
        for (const index of affected) {
            const pointIndex = map(index.pointIndex);
            if (pointIndex !== null) this.points.add({ shapeIndex, pointIndex });
        }
    }
}
