/**
 * Constraint List
 *
 * Working copy of the editor's constraints while actions run. Structural
 * edits re-key it the same way they re-key the selection; a constraint
 * that refers to a removed point or shape is dropped.
 */

import { pointIndexAfterInsertion, pointIndexAfterRemoval } from '../shapes/shape-point-index';
import type { ShapePointIndex } from '../types';

import type { Constraint, ConstraintIndex } from './constraints';
import { buildConstraintIndex, cloneConstraint, constraintKey } from './constraints';

type AddressMap = (index: ShapePointIndex) => ShapePointIndex | null;

export class ConstraintList {
    private constraints: Constraint[];
    private cachedIndex: ConstraintIndex | null = null;
    private dirty = false;

    constructor(constraints: Iterable<Constraint> = []) {
        this.constraints = [...constraints].map(cloneConstraint);
    }

    get size(): number {
        return this.constraints.length;
    }

    /** True once the list was re-keyed or reset. */
    get changed(): boolean {
        return this.dirty;
    }

    toArray(): Constraint[] {
        return this.constraints.map(cloneConstraint);
    }

    reset(constraints: Iterable<Constraint>): void {
        this.constraints = [...constraints].map(cloneConstraint);
        this.invalidate();
    }

    /** Lookup structures used by moves. */
    index(): ConstraintIndex {
        if (!this.cachedIndex) {
            this.cachedIndex = buildConstraintIndex(this.constraints);
        }
        return this.cachedIndex;
    }

    // -------------------------------------------------------------------------
    // Re-keying
    // -------------------------------------------------------------------------

    removePoints(shapeIndex: number, removed: readonly number[]): void {
        if (removed.length === 0) return;
        this.remap((index) => {
            if (index.shapeIndex !== shapeIndex) return index;
            const pointIndex = pointIndexAfterRemoval(index.pointIndex, removed);
            return pointIndex === null ? null : { shapeIndex, pointIndex };
        });
    }

    insertPoints(shapeIndex: number, inserted: readonly number[]): void {
        if (inserted.length === 0) return;
        this.remap((index) =>
            index.shapeIndex === shapeIndex
                ? { shapeIndex, pointIndex: pointIndexAfterInsertion(index.pointIndex, inserted) }
                : index
        );
    }

    dropShapes(shapeIndexes: Iterable<number>): void {
        const dropped = new Set(shapeIndexes);
        if (dropped.size === 0) return;
        this.remap((index) => (dropped.has(index.shapeIndex) ? null : index));
    }

    private remap(map: AddressMap): void {
        const next: Constraint[] = [];
        let moved = false;
        for (const constraint of this.constraints) {
            const remapped = remapConstraint(constraint, map);
            if (remapped) next.push(remapped);
            if (!remapped || constraintKey(remapped) !== constraintKey(constraint)) moved = true;
        }
        if (!moved) return;
        this.constraints = next;
        this.invalidate();
    }

    private invalidate(): void {
        this.cachedIndex = null;
        this.dirty = true;
    }
}

function remapConstraint(constraint: Constraint, map: AddressMap): Constraint | null {
    switch (constraint.type) {
        case 'link-bidirectional': {
            const a = map(constraint.a);
            const b = map(constraint.b);
            return a && b ? { type: 'link-bidirectional', a: { ...a }, b: { ...b } } : null;
        }
        case 'link-from-to': {
            const from = map(constraint.from);
            const to = map(constraint.to);
            return from && to ? { type: 'link-from-to', from: { ...from }, to: { ...to } } : null;
        }
        case 'position-range': {
            const index = map(constraint.index);
            return index ? { type: 'position-range', index: { ...index }, range: constraint.range } : null;
        }
    }
}
