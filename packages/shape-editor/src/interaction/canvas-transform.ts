/**
 * Canvas Transform
 *
 * Maps between content coordinates (the shape tree) and ui coordinates
 * (the host's screen space):
 *
 *   ui = canvas.min + translation + content * scale
 */

import type { Point2D, Rect, Vec2 } from '../types';
import { add, rectFromTwoPoints, scale as scaleVec, sub } from '../utils/geometry';

// =============================================================================
// Types
// =============================================================================

export interface ViewTransform {
    scale: number;
    /** Offset of the content origin from the canvas corner, in ui units. */
    translation: Vec2;
}

export interface ScalingRange {
    min: number;
    max: number;
}

export const IDENTITY_VIEW: Readonly<ViewTransform> = { scale: 1, translation: { x: 0, y: 0 } };

// =============================================================================
// Mapping
// =============================================================================

export function contentToUi(view: ViewTransform, canvas: Rect, p: Point2D): Point2D {
    return add(add(canvas.min, view.translation), scaleVec(p, view.scale));
}

export function uiToContent(view: ViewTransform, canvas: Rect, p: Point2D): Point2D {
    return scaleVec(sub(sub(p, canvas.min), view.translation), 1 / view.scale);
}

/** Content position under a canvas-local ui position. */
export function canvasToContent(view: ViewTransform, local: Point2D): Point2D {
    return scaleVec(sub(local, view.translation), 1 / view.scale);
}

/** Content-space rectangle currently visible inside `canvas`. */
export function contentViewport(view: ViewTransform, canvas: Rect): Rect {
    return rectFromTwoPoints(uiToContent(view, canvas, canvas.min), uiToContent(view, canvas, canvas.max));
}

/** Content length of `uiLength` ui pixels. */
export function uiToContentLength(view: ViewTransform, uiLength: number): number {
    return uiLength / view.scale;
}

// =============================================================================
// View Changes
// =============================================================================

export function translateView(view: ViewTransform, delta: Vec2): ViewTransform {
    return { scale: view.scale, translation: add(view.translation, delta) };
}

export function clampScale(value: number, range: ScalingRange): number {
    return Math.min(range.max, Math.max(range.min, value));
}

/**
 * Multiplies the scale by `factor` while keeping the content point under
 * `anchor` (canvas-local ui coordinates) in place. The resulting scale is
 * clamped into `range`.
 */
export function zoomAt(view: ViewTransform, anchor: Point2D, factor: number, range: ScalingRange): ViewTransform {
    const nextScale = clampScale(view.scale * factor, range);
    if (nextScale === view.scale) return view;

    // Content point under the anchor before the zoom
    const content = scaleVec(sub(anchor, view.translation), 1 / view.scale);

    // Choose the translation that puts it back under the anchor afterwards
    return {
        scale: nextScale,
        translation: sub(anchor, scaleVec(content, nextScale)),
    };
}
