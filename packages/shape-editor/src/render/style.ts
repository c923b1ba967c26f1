/**
 * Editor Style
 *
 * Cosmetic constants consumed only by the painters. Editing logic reads
 * the control-point radius for hover hit-testing and nothing else.
 */

import type { Color, Point2D, Stroke } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface DashPattern {
    dashLength: number;
    gapLength: number;
}

export interface RulerStyle {
    width: number;
    background: Color;
    stroke: Stroke;
    halfStroke: Stroke;
    subStroke: Stroke;
    textColor: Color;
    divHeight: number;
    halfDivHeight: number;
    subDivHeight: number;
    /** Label offset from the tick, along then across the ruler. */
    textPosition: Point2D;
}

export interface GridStyle {
    zeroLine: Stroke;
    primaryLine: Stroke;
    secondaryLine: Stroke;
    secondaryDash: DashPattern;
}

export interface EditorStyle {
    pathPointStroke: Stroke;
    controlPointStroke: Stroke;
    previewPointStroke: Stroke;
    controlPointRadius: number;
    /** Line from a secondary handle to the points it is tied to. */
    connectorStroke: Stroke;
    canvasBackground: Color;
    borderStroke: Stroke;
    selectionStroke: Stroke;
    selectionDash: DashPattern;
    rulers: RulerStyle;
    grid: GridStyle;
    snapHighlightStroke: Stroke;
    snapHighlightDash: DashPattern;
    snapMarkSize: number;
}

// =============================================================================
// Palette
// =============================================================================

const WHITE: Color = '#ffffffff';
const GRAY: Color = '#a0a0a0ff';
const LIGHT_GRAY: Color = '#dcdcdcff';
const RED: Color = '#ff0000ff';
const GREEN: Color = '#00ff00ff';

// =============================================================================
// Light Style
// =============================================================================

export const LIGHT_STYLE: Readonly<EditorStyle> = {
    pathPointStroke: { width: 2, color: RED },
    controlPointStroke: { width: 2, color: GREEN },
    previewPointStroke: { width: 2, color: GRAY },
    controlPointRadius: 5,
    connectorStroke: { width: 1, color: GRAY },
    canvasBackground: WHITE,
    borderStroke: { width: 3, color: GRAY },
    selectionStroke: { width: 1, color: GRAY },
    selectionDash: { dashLength: 2, gapLength: 2 },
    rulers: {
        width: 16,
        background: WHITE,
        stroke: { width: 1, color: GRAY },
        halfStroke: { width: 1, color: GRAY },
        subStroke: { width: 1, color: GRAY },
        textColor: GRAY,
        divHeight: 3,
        halfDivHeight: 2,
        subDivHeight: 1,
        textPosition: { x: 0, y: 2 },
    },
    grid: {
        zeroLine: { width: 2, color: LIGHT_GRAY },
        primaryLine: { width: 0.5, color: LIGHT_GRAY },
        secondaryLine: { width: 0.5, color: LIGHT_GRAY },
        secondaryDash: { dashLength: 3, gapLength: 3 },
    },
    snapHighlightStroke: { width: 1, color: GRAY },
    snapHighlightDash: { dashLength: 5, gapLength: 5 },
    snapMarkSize: 20,
};
