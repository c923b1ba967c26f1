import { describe, expect, it } from 'vitest';

import { DEFAULT_SHAPE_CONSTRUCTORS } from '../src/interaction/shape-constructors';
import {
    commonParams,
    cubicBezierFromTwoPoints,
    extractShapesParams,
    meshFromTwoPoints,
    quadraticBezierFromTwoPoints,
    shapeParams,
    shapeParamsFromCommon,
} from '../src/shapes';
import type { ShapeDocument } from '../src/types';

import { buildCircle, buildPath, buildRect, expectPointClose, TEST_STROKE, toPoint } from './test-utils';

describe('shape parameters', () => {
    it('lists the parameters each kind carries', () => {
        expect(shapeParams(buildCircle(toPoint(0, 0), Number.NaN))).toEqual({
            'stroke-color': '#000000ff',
            'stroke-width': 1,
            'fill-color': '#00000000',
            radius: 0,
        });
        expect(shapeParams({ kind: 'empty' })).toBeNull();
        expect(shapeParams({ kind: 'text', pos: toPoint(0, 0), text: 'label', color: '#000000ff', angle: 0 })).toEqual({});
    });

    it('extracts parameters of the requested shapes in shape order', () => {
        const document: ShapeDocument = {
            root: {
                kind: 'group',
                shapes: [buildPath([toPoint(0, 0), toPoint(1, 1)]), { kind: 'empty' }, buildRect(toPoint(0, 0), toPoint(5, 5))],
            },
        };
        const extracted = extractShapesParams(document, [2, 1, 0]);
        expect(extracted.map((entry) => entry.shapeIndex)).toEqual([0, 2]);
        expect(extracted[1]?.params.texture).toBe(0);
    });

    it('keeps agreeing values and nulls the rest', () => {
        const wide = buildPath([toPoint(0, 0), toPoint(1, 1)]);
        wide.stroke.width = 4;
        const document: ShapeDocument = {
            root: { kind: 'group', shapes: [buildPath([toPoint(0, 0), toPoint(1, 1)]), wide, buildCircle(toPoint(0, 0), 3)] },
        };
        const common = commonParams(extractShapesParams(document, [0, 1, 2]));
        expect(common).toEqual({
            'stroke-color': '#000000ff',
            'stroke-width': null,
            'fill-color': '#00000000',
            'closed-shape': false,
            radius: 3,
        });
        expect('rounding' in common).toBe(false);
    });

    it('compares rounding by value', () => {
        const a = buildRect(toPoint(0, 0), toPoint(1, 1));
        const b = buildRect(toPoint(2, 2), toPoint(3, 3));
        const common = commonParams([
            { shapeIndex: 0, params: shapeParams(a) ?? {} },
            { shapeIndex: 1, params: shapeParams(b) ?? {} },
        ]);
        expect(common.rounding).toEqual({ nw: 0, ne: 0, sw: 0, se: 0 });
    });

    it('spreads one parameter set over distinct shapes', () => {
        expect(shapeParamsFromCommon({ 'stroke-width': 2 }, [3, 1, 3])).toEqual([
            { shapeIndex: 1, params: { 'stroke-width': 2 } },
            { shapeIndex: 3, params: { 'stroke-width': 2 } },
        ]);
    });
});

describe('shape builders', () => {
    it('places the cubic end handle a third of the chord before the end', () => {
        const cubic = cubicBezierFromTwoPoints(toPoint(0, 0), null, toPoint(30, 0), TEST_STROKE);
        expect(cubic.points).toEqual([toPoint(0, 0), toPoint(0, 0), toPoint(20, 0), toPoint(30, 0)]);
    });

    it('mirrors the previous control point when continuing a curve', () => {
        const quad = quadraticBezierFromTwoPoints(toPoint(10, 0), toPoint(0, 0), toPoint(40, 0), TEST_STROKE);
        expectPointClose(quad.points[1], toPoint(20, 0));
    });

    it('builds a triangle mesh from two points', () => {
        const mesh = meshFromTwoPoints(toPoint(0, 0), toPoint(10, 0), TEST_STROKE);
        expect(mesh.vertices.map((vertex) => vertex.pos)).toEqual([toPoint(0, 0), toPoint(10, 0), toPoint(0, 10)]);
        expect(mesh.indices).toEqual([0, 1, 2]);
    });

    it('takes the circle center from the first click', () => {
        const circle = DEFAULT_SHAPE_CONSTRUCTORS.circle?.build([toPoint(0, 0), toPoint(3, 4)], TEST_STROKE);
        expect(circle).toMatchObject({ kind: 'circle', center: toPoint(0, 0), radius: 5 });
    });

    it('previews a cubic from three clicks with the last one as end point', () => {
        const cubic = DEFAULT_SHAPE_CONSTRUCTORS['cubic-bezier']?.build(
            [toPoint(0, 0), toPoint(10, 10), toPoint(20, 10)],
            TEST_STROKE
        );
        expect(cubic).toMatchObject({
            kind: 'cubic-bezier',
            points: [toPoint(0, 0), toPoint(10, 10), toPoint(20, 10), toPoint(20, 10)],
        });
    });

    it('needs at least two points', () => {
        expect(DEFAULT_SHAPE_CONSTRUCTORS.rect?.build([toPoint(0, 0)], TEST_STROKE)).toBeNull();
    });
});
