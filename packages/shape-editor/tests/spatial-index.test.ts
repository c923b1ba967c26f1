import { describe, expect, it } from 'vitest';

import { ShapePointSet } from '../src/shapes';
import { GridIndex, gridStep, OrderedFloatIndex, ShapeControlPoints, stepBy } from '../src/spatial';
import type { FloatIndexOptions } from '../src/spatial';

import { buildCircle, buildPath, buildQuadratic, idx, toPoint } from './test-utils';

const STRING_OPTIONS: FloatIndexOptions<string> = {
    valueKey: (value) => value,
    compareValues: (a, b) => a.localeCompare(b),
};

describe('ordered float index', () => {
    it('groups values per key and keeps keys sorted', () => {
        const index = OrderedFloatIndex.build(
            [
                [3, 'c'],
                [1, 'a'],
                [3, 'b'],
            ],
            STRING_OPTIONS
        );
        index.insert(2, 'd');
        expect(index.entries()).toEqual([
            { key: 1, values: ['a'] },
            { key: 2, values: ['d'] },
            { key: 3, values: ['b', 'c'] },
        ]);
        expect(index.range(2, 3).map((entry) => entry.key)).toEqual([2, 3]);
    });

    it('stores NaN keys last without breaking the order', () => {
        const index = OrderedFloatIndex.build(
            [
                [Number.NaN, 'nan'],
                [5, 'five'],
                [-1, 'minus'],
            ],
            STRING_OPTIONS
        );
        expect(index.entries().map((entry) => entry.key)).toEqual([-1, 5, Number.MAX_VALUE]);
        expect(index.get(Number.NaN)).toEqual(['nan']);
    });

    it('prefers the lower key when two candidates are equally close', () => {
        const index = OrderedFloatIndex.build(
            [
                [8, 'low'],
                [12, 'high'],
            ],
            STRING_OPTIONS
        );
        expect(index.findClosestInDistanceAndIgnore(10, 5)).toEqual({ key: 8, values: ['low'] });
        expect(index.findClosestInDistanceAndIgnore(11, 5)).toEqual({ key: 12, values: ['high'] });
        expect(index.findClosestInDistanceAndIgnore(10, 1)).toBeNull();
    });

    it('skips keys whose values are all ignored', () => {
        const index = OrderedFloatIndex.build(
            [
                [8, 'far'],
                [9, 'skip'],
                [13, 'other'],
            ],
            STRING_OPTIONS
        );
        const found = index.findClosestInDistanceAndIgnore(10, 5, (value) => value === 'skip');
        expect(found).toEqual({ key: 8, values: ['far'] });
    });

    it('treats a zero distance as an exact match', () => {
        const index = OrderedFloatIndex.build([[4, 'exact']], STRING_OPTIONS);
        expect(index.findClosestInDistanceAndIgnore(4, 0)).toEqual({ key: 4, values: ['exact'] });
        expect(index.findClosestInDistanceAndIgnore(4.5, 0)).toBeNull();
        expect(index.findClosestInDistanceAndIgnore(4, 0, () => true)).toBeNull();
    });
});

describe('control-point index', () => {
    const root = {
        kind: 'group' as const,
        shapes: [buildPath([toPoint(0, 0), toPoint(3, 4), toPoint(10, 0)]), buildQuadratic(toPoint(20, 0), toPoint(25, 5), toPoint(30, 0))],
    };

    it('finds handles within a Euclidean radius, bounds included', () => {
        const points = ShapeControlPoints.collect(root);
        expect(points.size).toBe(6);
        expect(points.pointsInRadius(toPoint(0, 0), 5).keys()).toEqual([idx(0, 0), idx(0, 1)]);
        expect(points.pointsInRadius(toPoint(7, 7), 1).isEmpty()).toBe(true);
    });

    it('leaves out handles inside the square around the radius but outside the circle', () => {
        const points = ShapeControlPoints.collect(buildPath([toPoint(4, 4), toPoint(3, 4)]));
        expect(points.pointsInRadius(toPoint(0, 0), 5).keys()).toEqual([idx(0, 1)]);
    });

    it('finds handles inside a rectangle', () => {
        const points = ShapeControlPoints.collect(root);
        const found = points.findPointsInRect({ min: toPoint(3, 0), max: toPoint(25, 4) }).map((point) => point.index);
        expect(found).toEqual([idx(0, 1), idx(0, 2), idx(1, 0)]);
    });

    it('reports the control point tied to a Bezier end point', () => {
        const points = ShapeControlPoints.collect(root);
        expect(points.connectedBezierControlPoint(idx(1, 2))).toEqual(toPoint(25, 5));
        expect(points.connectedBezierControlPoint(idx(0, 2))).toBeNull();
        expect(points.shapeKind(idx(1, 1))).toBe('quadratic-bezier');
    });

    it('snaps per axis while ignoring the given addresses', () => {
        const points = ShapeControlPoints.collect(root);
        expect(points.snapX(toPoint(9, 50), 2, new ShapePointSet())).toEqual({ value: 10, indexes: [idx(0, 2)] });
        expect(points.snapX(toPoint(9, 50), 2, new ShapePointSet([idx(0, 2)]))).toBeNull();
        expect(points.snapY(toPoint(50, 1), 2, new ShapePointSet())).toEqual({
            value: 0,
            indexes: [idx(0, 0), idx(0, 2), idx(1, 0), idx(1, 2)],
        });
    });

    it('picks the closest selected handle', () => {
        const points = ShapeControlPoints.collect(buildCircle(toPoint(0, 0), 10));
        expect(points.closestOf(toPoint(9, 1), [idx(0, 0), idx(0, 1)])).toEqual({ index: idx(0, 1), position: toPoint(10, 0) });
        expect(points.closestOf(toPoint(9, 1), [])).toBeNull();
    });
});

describe('alignment grid', () => {
    it('shrinks the step by the step base for every five-fold zoom', () => {
        expect(gridStep(1)).toBe(50);
        expect(gridStep(2)).toBe(50);
        expect(gridStep(5)).toBeCloseTo(10);
        expect(gridStep(0.2)).toBeCloseTo(250);
    });

    it('steps from the floor of the minimum up to the ceiling of the maximum, exclusive', () => {
        expect(stepBy(-60, 60, 50)).toEqual([-100, -50, 0, 50]);
        expect(stepBy(0, 10, 0)).toEqual([]);
    });

    it('marks zero, primary and secondary lines', () => {
        const grid = GridIndex.fromViewport({ min: toPoint(0, 0), max: toPoint(100, 100) }, 1);
        const lines = grid.verticalLines();
        expect(lines.find((line) => line.value === 0)?.types).toEqual(['zero']);
        expect(lines.find((line) => line.value === 25)?.types).toEqual(['secondary']);
        expect(lines.find((line) => line.value === 50)?.types).toEqual(['primary']);
        expect(lines.filter((line) => line.types.includes('sub'))).toHaveLength(8);
    });

    it('never snaps to sub lines', () => {
        const grid = GridIndex.fromViewport({ min: toPoint(0, 0), max: toPoint(100, 100) }, 1);
        expect(grid.snapX(23, 5)).toEqual({ value: 25, types: ['secondary'] });
        expect(grid.snapY(9, 5)).toBeNull();
    });
});
