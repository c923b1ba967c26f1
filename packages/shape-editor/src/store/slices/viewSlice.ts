/**
 * View Slice
 *
 * Content-to-canvas transform and the last pointer positions seen over the
 * editor.
 */

import type { ScalingRange, ViewTransform } from '../../interaction/canvas-transform';
import { translateView, zoomAt } from '../../interaction/canvas-transform';
import type { Point2D, Vec2 } from '../../types';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface ViewSliceState {
    view: ViewTransform;
    /** Last pointer position over the editor, ui coordinates. */
    lastPointerPos: Point2D;
    /** Last pointer position over the canvas, canvas-local ui coordinates. */
    lastCanvasPointerPos: Point2D;
}

export interface ViewSliceActions {
    setView: (view: ViewTransform) => void;
    translateView: (delta: Vec2) => void;
    zoomView: (anchor: Point2D, factor: number, range: ScalingRange) => void;
    setLastPointer: (pointerPos: Point2D | null, canvasPointerPos: Point2D | null) => void;
}

export type ViewSlice = ViewSliceState & ViewSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createViewSlice: EditorSliceCreator<ViewSlice> = (set) => ({
    // Initial State
    view: { scale: 1, translation: { x: 0, y: 0 } },
    lastPointerPos: { x: 0, y: 0 },
    lastCanvasPointerPos: { x: 0, y: 0 },

    // Actions
    setView: (view) =>
        set((state) => {
            state.view = { scale: view.scale, translation: { ...view.translation } };
        }),

    translateView: (delta) =>
        set((state) => {
            state.view = translateView(state.view, delta);
        }),

    zoomView: (anchor, factor, range) =>
        set((state) => {
            state.view = zoomAt(state.view, anchor, factor, range);
        }),

    setLastPointer: (pointerPos, canvasPointerPos) =>
        set((state) => {
            if (pointerPos) state.lastPointerPos = { ...pointerPos };
            if (canvasPointerPos) state.lastCanvasPointerPos = { ...canvasPointerPos };
        }),
});
