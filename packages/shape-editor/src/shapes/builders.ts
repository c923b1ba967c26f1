/**
 * Shape Builders
 *
 * Constructors used by shape creation interactions and the add-point
 * command. "From two points" builders accept degenerate input (both points
 * equal) so a shape can be dropped at the pointer and then dragged.
 */

import type {
    CircleShape,
    CubicBezierShape,
    LineSegmentShape,
    MeshShape,
    PathShape,
    Point2D,
    QuadraticBezierShape,
    RectShape,
    Stroke,
} from '../types';
import { DEFAULT_TEXTURE_ID, NO_ROUNDING, TRANSPARENT } from '../types';
import { add, distance, normalized, rot90, scale, sub } from '../utils/geometry';

import { clonePoint, cloneStroke } from './clone';

/**
 * First control point of a curve starting at `start`. When the previous
 * segment's control point is known, the new handle mirrors it so the join
 * stays smooth.
 */
function continuationControlPoint(start: Point2D, previousControl: Point2D | null, length: number): Point2D {
    if (!previousControl) return clonePoint(start);
    return add(start, scale(normalized(sub(start, previousControl)), length / 3));
}

export function cubicBezierFromTwoPoints(
    start: Point2D,
    previousControl: Point2D | null,
    end: Point2D,
    stroke: Stroke
): CubicBezierShape {
    const length = distance(start, end);
    const startControl = continuationControlPoint(start, previousControl, length);
    const endControl = sub(end, scale(normalized(sub(end, startControl)), length / 3));
    return {
        kind: 'cubic-bezier',
        points: [clonePoint(start), startControl, endControl, clonePoint(end)],
        closed: false,
        fill: TRANSPARENT,
        stroke: cloneStroke(stroke),
    };
}

export function quadraticBezierFromTwoPoints(
    start: Point2D,
    previousControl: Point2D | null,
    end: Point2D,
    stroke: Stroke
): QuadraticBezierShape {
    const length = distance(start, end);
    return {
        kind: 'quadratic-bezier',
        points: [clonePoint(start), continuationControlPoint(start, previousControl, length), clonePoint(end)],
        closed: false,
        fill: TRANSPARENT,
        stroke: cloneStroke(stroke),
    };
}

/** Circle centred on `end`, passing through `start`. */
export function circleFromTwoPoints(start: Point2D, end: Point2D, stroke: Stroke): CircleShape {
    return {
        kind: 'circle',
        center: clonePoint(end),
        radius: distance(start, end),
        fill: TRANSPARENT,
        stroke: cloneStroke(stroke),
    };
}

export function lineSegmentFromTwoPoints(start: Point2D, end: Point2D, stroke: Stroke): LineSegmentShape {
    return { kind: 'line-segment', points: [clonePoint(start), clonePoint(end)], stroke: cloneStroke(stroke) };
}

export function pathFromTwoPoints(start: Point2D, end: Point2D, stroke: Stroke): PathShape {
    return {
        kind: 'path',
        points: [clonePoint(start), clonePoint(end)],
        closed: false,
        fill: TRANSPARENT,
        stroke: cloneStroke(stroke),
    };
}

export function rectFromTwoPoints(start: Point2D, end: Point2D, stroke: Stroke): RectShape {
    return {
        kind: 'rect',
        min: { x: Math.min(start.x, end.x), y: Math.min(start.y, end.y) },
        max: { x: Math.max(start.x, end.x), y: Math.max(start.y, end.y) },
        rounding: { ...NO_ROUNDING },
        fill: TRANSPARENT,
        stroke: cloneStroke(stroke),
        fillTextureId: DEFAULT_TEXTURE_ID,
    };
}

/** Single triangle whose third corner is `start` offset by the rotated edge. */
export function meshFromTwoPoints(start: Point2D, end: Point2D, stroke: Stroke): MeshShape {
    const third = add(start, rot90(sub(start, end)));
    const vertex = (pos: Point2D) => ({ pos: clonePoint(pos), uv: { x: 0, y: 0 }, color: stroke.color });
    return {
        kind: 'mesh',
        vertices: [vertex(start), vertex(end), vertex(third)],
        indices: [0, 1, 2],
        textureId: DEFAULT_TEXTURE_ID,
    };
}
