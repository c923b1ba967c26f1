/**
 * Frame Input Port
 *
 * Per-frame snapshot of pointer and keyboard state supplied by the host.
 * Positions are in ui (screen) coordinates.
 */

import type { Point2D, Rect, Vec2 } from '../types';

import type { KeyboardShortcut, KeyModifiers } from './keyboard';

export interface PointerState {
    /** Pointer position while it is over the editor, null otherwise. */
    hoverPos: Point2D | null;
    primaryPressed: boolean;
    primaryClicked: boolean;
    secondaryPressed: boolean;
    secondaryClicked: boolean;
    /** A press-and-move started this frame. */
    dragStarted: boolean;
    /** A drag ended this frame. */
    dragReleased: boolean;
    /** Which button started the current drag, if any. */
    dragButton: 'primary' | 'secondary' | null;
}

export interface FrameInput {
    /** Whole editor area; rulers take a strip along the top and left. */
    rect: Rect;
    pointer: PointerState;
    modifiers: KeyModifiers;
    scrollDelta: Vec2;
    /** Multiplicative zoom, 1 when not zooming. */
    zoomDelta: number;
    /** Returns true once if `shortcut` was pressed this frame, and consumes it. */
    consumeShortcut: (shortcut: KeyboardShortcut) => boolean;
}
