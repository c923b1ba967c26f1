/**
 * History Slice
 *
 * Linear undo stack of inverse actions. Undo pops; there is no redo stack.
 */

import type { ShapeAction } from '../../actions/types';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface HistoryEntry {
    /** Applying it restores the document as it was before the entry was pushed. */
    inverse: ShapeAction;
    label: string;
}

export interface HistorySliceState {
    history: HistoryEntry[];
    maxHistoryEntries: number;
}

export interface HistorySliceActions {
    pushHistory: (inverse: ShapeAction, label: string) => void;
    /** Removes and returns the newest entry. */
    popHistory: () => HistoryEntry | null;
    clearHistory: () => void;
    lastHistoryLabel: () => string | null;
}

export type HistorySlice = HistorySliceState & HistorySliceActions;

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MAX_HISTORY_ENTRIES = 200;

// =============================================================================
// Slice Creator
// =============================================================================

export const createHistorySlice: EditorSliceCreator<HistorySlice> = (set, get) => ({
    // Initial State
    history: [],
    maxHistoryEntries: DEFAULT_MAX_HISTORY_ENTRIES,

    // Actions
    pushHistory: (inverse, label) =>
        set((state) => {
            state.history.push({ inverse, label });
            const overflow = state.history.length - state.maxHistoryEntries;
            if (overflow > 0) {
                state.history.splice(0, overflow);
            }
        }),

    popHistory: () => {
        const { history } = get();
        const entry = history[history.length - 1];
        if (!entry) return null;
        set((state) => {
            state.history.pop();
        });
        return entry;
    },

    clearHistory: () =>
        set((state) => {
            state.history = [];
        }),

    lastHistoryLabel: () => {
        const { history } = get();
        return history[history.length - 1]?.label ?? null;
    },
});
