/**
 * Shape Constructors
 *
 * Named builders used by click-to-create interactions and the "add shape"
 * menu. A constructor takes between two and `pointCount` points so that
 * the shape can be previewed before the last click.
 */

import {
    circleFromTwoPoints,
    cubicBezierFromTwoPoints,
    lineSegmentFromTwoPoints,
    meshFromTwoPoints,
    pathFromTwoPoints,
    quadraticBezierFromTwoPoints,
    rectFromTwoPoints,
} from '../shapes/builders';
import { clonePoint, cloneStroke } from '../shapes/clone';
import type { Point2D, Shape, Stroke } from '../types';
import { DEFAULT_TEXTURE_ID, TRANSPARENT } from '../types';

// =============================================================================
// Types
// =============================================================================

/** Returns null when `points` cannot form the shape yet. */
export type BuildShape = (points: readonly Point2D[], stroke: Stroke) => Shape | null;

export interface ShapeConstructor {
    /** Clicks needed before the shape is committed. */
    pointCount: number;
    build: BuildShape;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_SHAPE_CONSTRUCTORS: Readonly<Record<string, ShapeConstructor>> = {
    'line-segment': {
        pointCount: 2,
        build: ([start, end], stroke) => (start && end ? lineSegmentFromTwoPoints(start, end, stroke) : null),
    },
    path: {
        pointCount: 2,
        build: ([start, end], stroke) => (start && end ? pathFromTwoPoints(start, end, stroke) : null),
    },
    rect: {
        pointCount: 2,
        build: ([start, end], stroke) => (start && end ? rectFromTwoPoints(start, end, stroke) : null),
    },
    // First click is the center
    circle: {
        pointCount: 2,
        build: ([center, edge], stroke) => (center && edge ? circleFromTwoPoints(edge, center, stroke) : null),
    },
    'quadratic-bezier': {
        pointCount: 3,
        build: (points, stroke) => {
            const [start, control, end] = points;
            if (!start || !control) return null;
            if (!end) return quadraticBezierFromTwoPoints(start, null, control, stroke);
            return {
                kind: 'quadratic-bezier',
                points: [clonePoint(start), clonePoint(control), clonePoint(end)],
                closed: false,
                fill: TRANSPARENT,
                stroke: cloneStroke(stroke),
            };
        },
    },
    'cubic-bezier': {
        pointCount: 4,
        build: (points, stroke) => {
            const [start, control1, control2, end] = points;
            if (!start || !control1) return null;
            if (!control2) return cubicBezierFromTwoPoints(start, null, control1, stroke);
            const last = end ?? control2;
            return {
                kind: 'cubic-bezier',
                points: [clonePoint(start), clonePoint(control1), clonePoint(control2), clonePoint(last)],
                closed: false,
                fill: TRANSPARENT,
                stroke: cloneStroke(stroke),
            };
        },
    },
    mesh: {
        pointCount: 3,
        build: (points, stroke) => {
            const [a, b, c] = points;
            if (!a || !b) return null;
            if (!c) return meshFromTwoPoints(a, b, stroke);
            return {
                kind: 'mesh',
                vertices: [a, b, c].map((pos) => ({ pos: clonePoint(pos), uv: { x: 0, y: 0 }, color: stroke.color })),
                indices: [0, 1, 2],
                textureId: DEFAULT_TEXTURE_ID,
            };
        },
    },
};

/** Shapes offered by the "add shape" menu, in menu order. */
export const MENU_SHAPE_KINDS: readonly string[] = [
    'quadratic-bezier',
    'cubic-bezier',
    'path',
    'line-segment',
    'circle',
    'rect',
];
