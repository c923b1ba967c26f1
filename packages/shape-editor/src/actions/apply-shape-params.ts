/**
 * Apply Shape Parameters
 *
 * Swaps parameter values into shapes. The inverse lists, per shape, the
 * previous value of every parameter the shape accepted.
 */

import { cloneRounding } from '../shapes/clone';
import type { IndexedShapeParams, ShapeParams } from '../shapes/params';
import { copyParams, notNan, shapeParamsFromCommon } from '../shapes/params';
import type { ShapeSlotShape } from '../shapes/visitor';
import { CONTINUE, stop, visitShapes } from '../shapes/visitor';
import type { ShapeDocument, Stroke } from '../types';

import type { ApplyShapeParamsAction } from './types';

export function applyShapeParams(shapes: Iterable<IndexedShapeParams>): ApplyShapeParamsAction {
    return {
        type: 'apply-shape-params',
        shapes: [...shapes]
            .map(({ shapeIndex, params }) => ({ shapeIndex, params: copyParams(params) }))
            .sort((a, b) => a.shapeIndex - b.shapeIndex),
    };
}

/** Same parameters for every listed shape. */
export function applyShapeParamsFromCommon(params: ShapeParams, shapeIndexes: Iterable<number>): ApplyShapeParamsAction {
    return { type: 'apply-shape-params', shapes: shapeParamsFromCommon(params, shapeIndexes) };
}

// =============================================================================
// Swapping
// =============================================================================

function swapStroke(stroke: Stroke, params: ShapeParams, previous: ShapeParams): void {
    const color = params['stroke-color'];
    if (color !== undefined) {
        previous['stroke-color'] = stroke.color;
        stroke.color = color;
    }
    const width = params['stroke-width'];
    if (width !== undefined) {
        previous['stroke-width'] = notNan(stroke.width);
        stroke.width = notNan(width);
    }
}

function swapFill(shape: { fill: string }, params: ShapeParams, previous: ShapeParams): void {
    const fill = params['fill-color'];
    if (fill !== undefined) {
        previous['fill-color'] = shape.fill;
        shape.fill = fill;
    }
}

function swapClosed(shape: { closed: boolean }, params: ShapeParams, previous: ShapeParams): void {
    const closed = params['closed-shape'];
    if (closed !== undefined) {
        previous['closed-shape'] = shape.closed;
        shape.closed = closed;
    }
}

/** Writes the accepted parameters into `shape`; returns their previous values. */
export function swapShapeParams(shape: ShapeSlotShape, params: ShapeParams): ShapeParams {
    const previous: ShapeParams = {};
    switch (shape.kind) {
        case 'line-segment':
            swapStroke(shape.stroke, params, previous);
            break;
        case 'path':
        case 'quadratic-bezier':
        case 'cubic-bezier':
            swapStroke(shape.stroke, params, previous);
            swapClosed(shape, params, previous);
            swapFill(shape, params, previous);
            break;
        case 'circle': {
            swapStroke(shape.stroke, params, previous);
            swapFill(shape, params, previous);
            const radius = params.radius;
            if (radius !== undefined) {
                previous.radius = notNan(shape.radius);
                shape.radius = notNan(radius);
            }
            break;
        }
        case 'ellipse':
            swapStroke(shape.stroke, params, previous);
            swapFill(shape, params, previous);
            break;
        case 'rect': {
            swapStroke(shape.stroke, params, previous);
            swapFill(shape, params, previous);
            const rounding = params.rounding;
            if (rounding !== undefined) {
                previous.rounding = shape.rounding;
                shape.rounding = cloneRounding(rounding);
            }
            const texture = params.texture;
            if (texture !== undefined) {
                previous.texture = shape.fillTextureId;
                shape.fillTextureId = texture;
            }
            break;
        }
        case 'mesh': {
            const texture = params.texture;
            if (texture !== undefined) {
                previous.texture = shape.textureId;
                shape.textureId = texture;
            }
            break;
        }
        case 'text':
        case 'callback':
        case 'empty':
            break;
    }
    return previous;
}

export function applyApplyShapeParams(action: ApplyShapeParamsAction, document: ShapeDocument): ApplyShapeParamsAction {
    const pending = new Map<number, ShapeParams>();
    for (const { shapeIndex, params } of action.shapes) {
        pending.set(shapeIndex, { ...pending.get(shapeIndex), ...params });
    }
    const changed: IndexedShapeParams[] = [];
    if (pending.size === 0) return { type: 'apply-shape-params', shapes: changed };

    visitShapes(document, ({ shapeIndex, shape }) => {
        const params = pending.get(shapeIndex);
        if (params) {
            pending.delete(shapeIndex);
            const previous = swapShapeParams(shape, params);
            if (Object.keys(previous).length > 0) changed.push({ shapeIndex, params: previous });
        }
        return pending.size === 0 ? stop(true) : CONTINUE;
    });
    return { type: 'apply-shape-params', shapes: changed };
}
