/**
 * Shape Parameters
 *
 * Named, editable style parameters of a shape. Each kind accepts a fixed
 * subset; parameters a kind does not accept are ignored when applied.
 */

import type { Color, Rounding, ShapeDocument, ShapeKind, Stroke, TextureId } from '../types';

import { cloneRounding } from './clone';
import type { ShapeSlotShape } from './visitor';
import { CONTINUE, stop, visitShapes } from './visitor';

// =============================================================================
// Types
// =============================================================================

export interface ShapeParamValues {
    'stroke-color': Color;
    'stroke-width': number;
    rounding: Rounding;
    'fill-color': Color;
    'closed-shape': boolean;
    radius: number;
    texture: TextureId;
}

export type ParamType = keyof ShapeParamValues;

export type ShapeParams = Partial<ShapeParamValues>;

/** Per parameter: the shared value, or null when the shapes disagree. */
export type CommonShapeParams = { [K in ParamType]?: ShapeParamValues[K] | null };

export interface IndexedShapeParams {
    shapeIndex: number;
    params: ShapeParams;
}

/** Declaration order; also the order parameters are listed in. */
export const PARAM_TYPES: readonly ParamType[] = [
    'stroke-color',
    'stroke-width',
    'rounding',
    'fill-color',
    'closed-shape',
    'radius',
    'texture',
];

const STROKE_PARAMS: readonly ParamType[] = ['stroke-color', 'stroke-width'];
const CURVE_PARAMS: readonly ParamType[] = [...STROKE_PARAMS, 'closed-shape', 'fill-color'];

export const ACCEPTED_PARAMS: Readonly<Record<ShapeKind, readonly ParamType[]>> = {
    'line-segment': STROKE_PARAMS,
    path: CURVE_PARAMS,
    'quadratic-bezier': CURVE_PARAMS,
    'cubic-bezier': CURVE_PARAMS,
    circle: [...STROKE_PARAMS, 'fill-color', 'radius'],
    ellipse: [...STROKE_PARAMS, 'fill-color'],
    rect: [...STROKE_PARAMS, 'fill-color', 'rounding', 'texture'],
    mesh: ['texture'],
    text: [],
    callback: [],
};

/** NaN floats are stored as zero. */
export function notNan(value: number): number {
    return Number.isNaN(value) ? 0 : value;
}

// =============================================================================
// Extraction
// =============================================================================

function strokeParams(stroke: Stroke): ShapeParams {
    return { 'stroke-color': stroke.color, 'stroke-width': notNan(stroke.width) };
}

/** Parameters of one shape; null for slots that carry none (`empty`). */
export function shapeParams(shape: ShapeSlotShape): ShapeParams | null {
    switch (shape.kind) {
        case 'empty':
            return null;
        case 'line-segment':
            return strokeParams(shape.stroke);
        case 'path':
        case 'quadratic-bezier':
        case 'cubic-bezier':
            return { ...strokeParams(shape.stroke), 'closed-shape': shape.closed, 'fill-color': shape.fill };
        case 'circle':
            return { ...strokeParams(shape.stroke), 'fill-color': shape.fill, radius: notNan(shape.radius) };
        case 'ellipse':
            return { ...strokeParams(shape.stroke), 'fill-color': shape.fill };
        case 'rect':
            return {
                ...strokeParams(shape.stroke),
                'fill-color': shape.fill,
                rounding: cloneRounding(shape.rounding),
                texture: shape.fillTextureId,
            };
        case 'mesh':
            return { texture: shape.textureId };
        case 'text':
        case 'callback':
            return {};
    }
}

/** Parameters of the requested shapes, ascending by shape index. */
export function extractShapesParams(document: ShapeDocument, shapeIndexes: Iterable<number>): IndexedShapeParams[] {
    const pending = new Set(shapeIndexes);
    const result: IndexedShapeParams[] = [];
    if (pending.size === 0) return result;
    visitShapes(document, (slot) => {
        if (pending.delete(slot.shapeIndex)) {
            const params = shapeParams(slot.shape);
            if (params) result.push({ shapeIndex: slot.shapeIndex, params });
        }
        return pending.size === 0 ? stop(true) : CONTINUE;
    });
    return result;
}

// =============================================================================
// Common Values
// =============================================================================

type ParamValue = ShapeParamValues[ParamType];

function sameValue(a: ParamValue, b: ParamValue): boolean {
    if (typeof a === 'object' && typeof b === 'object') {
        return a.nw === b.nw && a.ne === b.ne && a.sw === b.sw && a.se === b.se;
    }
    return a === b;
}

/** Shared value of the defined entries; null on disagreement, undefined when none is defined. */
function commonValue<T extends ParamValue>(values: Array<T | undefined>): T | null | undefined {
    let found: T | undefined;
    for (const value of values) {
        if (value === undefined) continue;
        if (found === undefined) {
            found = value;
        } else if (!sameValue(found, value)) {
            return null;
        }
    }
    return found;
}

/**
 * Every parameter any of the shapes carries, with its value when all
 * shapes carrying it agree and null otherwise.
 */
export function commonParams(shapes: readonly IndexedShapeParams[]): CommonShapeParams {
    const all = shapes.map((shape) => shape.params);
    const rounding = commonValue(all.map((params) => params.rounding));
    const common: CommonShapeParams = {
        'stroke-color': commonValue(all.map((params) => params['stroke-color'])),
        'stroke-width': commonValue(all.map((params) => params['stroke-width'])),
        rounding: rounding ? cloneRounding(rounding) : rounding,
        'fill-color': commonValue(all.map((params) => params['fill-color'])),
        'closed-shape': commonValue(all.map((params) => params['closed-shape'])),
        radius: commonValue(all.map((params) => params.radius)),
        texture: commonValue(all.map((params) => params.texture)),
    };
    for (const type of PARAM_TYPES) {
        if (common[type] === undefined) delete common[type];
    }
    return common;
}

/** Same parameters for every listed shape, as input for the apply action. */
export function shapeParamsFromCommon(params: ShapeParams, shapeIndexes: Iterable<number>): IndexedShapeParams[] {
    return [...new Set(shapeIndexes)]
        .sort((a, b) => a - b)
        .map((shapeIndex) => ({ shapeIndex, params: copyParams(params) }));
}

export function copyParams(params: ShapeParams): ShapeParams {
    const copy: ShapeParams = { ...params };
    if (params.rounding) copy.rounding = cloneRounding(params.rounding);
    return copy;
}
