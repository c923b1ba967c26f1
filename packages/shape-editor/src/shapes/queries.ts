/**
 * Shape Queries
 *
 * Read-only traversals answering the questions the editor asks every frame.
 */

import type { Point2D, Shape, ShapeDocument, ShapeKind, ShapePointIndex } from '../types';

import { ShapePointMap, ShapePointSet } from './shape-point-index';
import type { ShapeSlotShape } from './visitor';
import { CONTINUE, stop, visitControlPoints, visitShapes } from './visitor';

/** Number of addressable shape slots, i.e. leaves including `empty` and `callback`. */
export function countShapes(root: Shape): number {
    if (root.kind === 'group') {
        return root.shapes.reduce((total, child) => total + countShapes(child), 0);
    }
    return 1;
}

export function lastShapePointIndex(root: Shape): ShapePointIndex | null {
    let last: ShapePointIndex | null = null;
    visitControlPoints<never>(root, {
        pathPoint: (index) => {
            last = index;
            return CONTINUE;
        },
        controlPoint: (index) => {
            last = index;
            return CONTINUE;
        },
    });
    return last;
}

export interface PointsPositions {
    positions: ShapePointMap<Point2D>;
    notFound: ShapePointIndex[];
}

/** Positions of the requested handles; stops once all are found. */
export function getPointsPositions(root: Shape, indexes: Iterable<ShapePointIndex>): PointsPositions {
    const pending = new ShapePointSet(indexes);
    const positions = new ShapePointMap<Point2D>();
    if (!pending.isEmpty()) {
        const handle = (index: ShapePointIndex, point: Point2D) => {
            if (pending.delete(index)) {
                positions.set(index, { x: point.x, y: point.y });
                if (pending.isEmpty()) return stop(true);
            }
            return CONTINUE;
        };
        visitControlPoints(root, { pathPoint: handle, controlPoint: handle });
    }
    return { positions, notFound: pending.values() };
}

export function shapeKindByPointIndex(root: Shape, index: ShapePointIndex): ShapeKind | null {
    const found = visitControlPoints<ShapeKind>(root, {
        pathPoint: (visited, _point, kind) => (visited.shapeIndex === index.shapeIndex ? stop(kind) : CONTINUE),
        controlPoint: (visited, _point, _connected, kind) =>
            visited.shapeIndex === index.shapeIndex ? stop(kind) : CONTINUE,
    });
    return found ?? null;
}

/** Live shape stored at `shapeIndex`, or null when the index is out of range. */
export function findShape(document: ShapeDocument, shapeIndex: number): ShapeSlotShape | null {
    const found = visitShapes<ShapeSlotShape>(document, (slot) =>
        slot.shapeIndex === shapeIndex ? stop(slot.shape) : CONTINUE
    );
    return found ?? null;
}
