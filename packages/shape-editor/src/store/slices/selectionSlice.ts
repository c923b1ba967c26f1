/**
 * Selection Slice
 *
 * Selected control-point addresses, kept sorted and free of duplicates.
 * Actions work on a `Selection` built from this list and write it back.
 */

import { Selection } from '../../selection';
import type { ShapePointIndex } from '../../types';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface SelectionSliceState {
    selectedPoints: ShapePointIndex[];
}

export interface SelectionSliceActions {
    setSelectedPoints: (indexes: Iterable<ShapePointIndex>) => void;
    selectPoints: (indexes: Iterable<ShapePointIndex>) => void;
    deselectPoint: (index: ShapePointIndex) => void;
    clearSelection: () => void;
}

export type SelectionSlice = SelectionSliceState & SelectionSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createSelectionSlice: EditorSliceCreator<SelectionSlice> = (set) => ({
    // Initial State
    selectedPoints: [],

    // Actions
    setSelectedPoints: (indexes) =>
        set((state) => {
            state.selectedPoints = Selection.from(indexes).toArray();
        }),

    selectPoints: (indexes) =>
        set((state) => {
            const selection = Selection.from(state.selectedPoints);
            for (const index of indexes) {
                selection.select(index);
            }
            state.selectedPoints = selection.toArray();
        }),

    deselectPoint: (index) =>
        set((state) => {
            const selection = Selection.from(state.selectedPoints);
            selection.deselect(index);
            state.selectedPoints = selection.toArray();
        }),

    clearSelection: () =>
        set((state) => {
            state.selectedPoints = [];
        }),
});
