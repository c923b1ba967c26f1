/**
 * Add Shape Points
 *
 * Inserts points into paths and vertices into meshes, ascending by point
 * index. Points of the wrong type for their shape are skipped.
 */

import { clonePoint, cloneVertex } from '../shapes/clone';
import { CONTINUE, stop, visitShapes } from '../shapes/visitor';
import type { Point2D, ShapeDocument, ShapePointIndex } from '../types';

import { removeShapePoints } from './remove-shape-points';
import type { ActionContext, AddShapePointsAction, IndexedShapePoint, RemoveShapePointsAction, ShapePoints } from './types';

export function addShapePoints(shapes: Iterable<ShapePoints>): AddShapePointsAction {
    return {
        type: 'add-shape-points',
        shapes: [...shapes].map(({ shapeIndex, points }) => ({
            shapeIndex,
            points: points.map(({ pointIndex, point }) => ({
                pointIndex,
                point:
                    point.type === 'pos'
                        ? { type: 'pos', pos: clonePoint(point.pos) }
                        : { type: 'vertex', vertex: cloneVertex(point.vertex), index: point.index },
            })),
        })),
    };
}

/** One path point at `index`. */
export function addPathPoint(index: ShapePointIndex, pos: Point2D): AddShapePointsAction {
    return addShapePoints([{ shapeIndex: index.shapeIndex, points: [{ pointIndex: index.pointIndex, point: { type: 'pos', pos } }] }]);
}

export function applyAddShapePoints(
    action: AddShapePointsAction,
    document: ShapeDocument,
    context: ActionContext
): RemoveShapePointsAction {
    const pending = new Map<number, IndexedShapePoint[]>();
    for (const { shapeIndex, points } of action.shapes) {
        pending.set(shapeIndex, [...(pending.get(shapeIndex) ?? []), ...points]);
    }
    const added: ShapePointIndex[] = [];
    if (pending.size === 0) return removeShapePoints(added);

    visitShapes(document, ({ shapeIndex, shape }) => {
        const points = pending.get(shapeIndex);
        if (points) {
            pending.delete(shapeIndex);
            const inserted: number[] = [];
            for (const { pointIndex, point } of [...points].sort((a, b) => a.pointIndex - b.pointIndex)) {
                if (shape.kind === 'path' && point.type === 'pos' && pointIndex <= shape.points.length) {
                    shape.points.splice(pointIndex, 0, clonePoint(point.pos));
                    inserted.push(pointIndex);
                } else if (shape.kind === 'mesh' && point.type === 'vertex' && pointIndex <= shape.vertices.length) {
                    shape.vertices.splice(pointIndex, 0, cloneVertex(point.vertex));
                    if (point.index !== null) shape.indices.splice(pointIndex, 0, point.index);
                    inserted.push(pointIndex);
                }
            }
            context.selection.insertPoints(shapeIndex, inserted);
            context.constraints.insertPoints(shapeIndex, inserted);
            added.push(...inserted.map((pointIndex) => ({ shapeIndex, pointIndex })));
        }
        return pending.size === 0 ? stop(true) : CONTINUE;
    });
    return removeShapePoints(added);
}
