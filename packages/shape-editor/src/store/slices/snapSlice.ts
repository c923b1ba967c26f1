/**
 * Snap Slice
 *
 * Snap result for the current pointer position plus the manual per-axis
 * snap values set by the host.
 */

import type { SnapInfo, SnapSources } from '../../snap';
import { clearSnap, emptySnapInfo, updateSnapInfo } from '../../snap';
import type { Point2D } from '../../types';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface SnapSliceState {
    snap: SnapInfo;
}

export interface SnapSliceActions {
    /** Pins x and/or y; pass null to release an axis. */
    setManualSnap: (x: number | null, y: number | null) => void;
    updateSnap: (pos: Point2D, maxDistance: number, sources: SnapSources) => void;
    clearSnap: () => void;
}

export type SnapSlice = SnapSliceState & SnapSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createSnapSlice: EditorSliceCreator<SnapSlice> = (set) => ({
    // Initial State
    snap: emptySnapInfo(),

    // Actions
    setManualSnap: (x, y) =>
        set((state) => {
            state.snap.manualSnapX = x;
            state.snap.manualSnapY = y;
        }),

    updateSnap: (pos, maxDistance, sources) =>
        set((state) => {
            updateSnapInfo(state.snap, pos, maxDistance, sources);
        }),

    clearSnap: () =>
        set((state) => {
            clearSnap(state.snap);
        }),
});
