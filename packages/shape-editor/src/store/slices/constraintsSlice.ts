/**
 * Constraints Slice
 *
 * Constraint list owned by the editor. The propagation index used by moves
 * is derived from it on demand.
 */

import type { Constraint, ConstraintIndex } from '../../constraints';
import { buildConstraintIndex, constraintKey } from '../../constraints';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface ConstraintsSliceState {
    constraints: Constraint[];
}

export interface ConstraintsSliceActions {
    /** Returns false when an identical constraint is already present. */
    addConstraint: (constraint: Constraint) => boolean;
    /** Returns false when no identical constraint was present. */
    removeConstraint: (constraint: Constraint) => boolean;
    /** Replaces the list after an action re-keyed it. */
    setConstraints: (constraints: Constraint[]) => void;
    clearConstraints: () => void;
    constraintIndex: () => ConstraintIndex;
}

export type ConstraintsSlice = ConstraintsSliceState & ConstraintsSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createConstraintsSlice: EditorSliceCreator<ConstraintsSlice> = (set, get) => ({
    // Initial State
    constraints: [],

    // Actions
    addConstraint: (constraint) => {
        const key = constraintKey(constraint);
        if (get().constraints.some((existing) => constraintKey(existing) === key)) {
            return false;
        }
        set((state) => {
            state.constraints.push(constraint);
        });
        return true;
    },

    removeConstraint: (constraint) => {
        const key = constraintKey(constraint);
        const remaining = get().constraints.filter((existing) => constraintKey(existing) !== key);
        if (remaining.length === get().constraints.length) {
            return false;
        }
        set((state) => {
            state.constraints = remaining;
        });
        return true;
    },

    setConstraints: (constraints) =>
        set((state) => {
            state.constraints = constraints;
        }),

    clearConstraints: () =>
        set((state) => {
            state.constraints = [];
        }),

    constraintIndex: () => buildConstraintIndex(get().constraints),
});
