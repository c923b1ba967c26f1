/**
 * Remove Shape Points
 *
 * Deletes points from paths and meshes. A path keeps at least two points
 * and a mesh at least three vertices; a removal that would go below the
 * floor, or that touches any other kind, empties the whole shape instead.
 */

import { sortShapePointIndexes } from '../shapes/shape-point-index';
import { CONTINUE, stop, visitShapes } from '../shapes/visitor';
import type { ShapeDocument, ShapePointIndex } from '../types';

import { swapShapes } from './replace-shapes';
import type {
    ActionContext,
    AddShapePointsAction,
    IndexedShapePoint,
    RemoveShapePointsAction,
    ShapeAction,
    ShapePoints,
} from './types';

export const MIN_PATH_POINTS = 2;
export const MIN_MESH_VERTICES = 3;

export function removeShapePoints(indexes: Iterable<ShapePointIndex>): RemoveShapePointsAction {
    return { type: 'remove-shape-points', indexes: sortShapePointIndexes(indexes).map((index) => ({ ...index })) };
}

function groupByShape(indexes: readonly ShapePointIndex[]): Map<number, number[]> {
    const grouped = new Map<number, number[]>();
    for (const { shapeIndex, pointIndex } of indexes) {
        const points = grouped.get(shapeIndex) ?? [];
        if (!points.includes(pointIndex)) points.push(pointIndex);
        grouped.set(shapeIndex, points);
    }
    for (const points of grouped.values()) {
        points.sort((a, b) => a - b);
    }
    return grouped;
}

export function applyRemoveShapePoints(
    action: RemoveShapePointsAction,
    document: ShapeDocument,
    context: ActionContext
): ShapeAction {
    const previousSelection = context.selection.toArray();
    const previousConstraints = context.constraints.toArray();
    const grouped = groupByShape(action.indexes);
    const shapesToRemove: number[] = [];
    const removedPoints: ShapePoints[] = [];

    if (grouped.size > 0) {
        visitShapes(document, ({ shapeIndex, shape }) => {
            const points = grouped.get(shapeIndex);
            if (points) {
                grouped.delete(shapeIndex);
                const removed: IndexedShapePoint[] = [];
                if (shape.kind === 'path') {
                    const valid = points.filter((i) => i < shape.points.length);
                    if (valid.length > shape.points.length - MIN_PATH_POINTS) {
                        shapesToRemove.push(shapeIndex);
                    } else {
                        for (const pointIndex of [...valid].reverse()) {
                            const [pos] = shape.points.splice(pointIndex, 1);
                            if (pos) removed.unshift({ pointIndex, point: { type: 'pos', pos } });
                        }
                    }
                } else if (shape.kind === 'mesh') {
                    const valid = points.filter((i) => i < shape.vertices.length);
                    if (valid.length > shape.vertices.length - MIN_MESH_VERTICES) {
                        shapesToRemove.push(shapeIndex);
                    } else {
                        for (const pointIndex of [...valid].reverse()) {
                            const [vertex] = shape.vertices.splice(pointIndex, 1);
                            const index =
                                pointIndex < shape.indices.length ? shape.indices.splice(pointIndex, 1)[0] ?? null : null;
                            if (vertex) removed.unshift({ pointIndex, point: { type: 'vertex', vertex, index } });
                        }
                    }
                } else if (shape.kind !== 'empty') {
                    shapesToRemove.push(shapeIndex);
                }
                if (removed.length > 0) {
                    removedPoints.push({ shapeIndex, points: removed });
                    const removedIndexes = removed.map(({ pointIndex }) => pointIndex);
                    context.selection.removePoints(shapeIndex, removedIndexes);
                    context.constraints.removePoints(shapeIndex, removedIndexes);
                }
            }
            return grouped.size === 0 ? stop(true) : CONTINUE;
        });
    }

    const addBack: AddShapePointsAction = { type: 'add-shape-points', shapes: removedPoints };
    let revert: ShapeAction = addBack;
    if (shapesToRemove.length > 0) {
        const replaced = swapShapes(
            document,
            shapesToRemove.map((shapeIndex) => ({ shapeIndex, shape: { kind: 'empty' } }))
        );
        context.selection.dropShapes(shapesToRemove);
        context.constraints.dropShapes(shapesToRemove);
        revert = {
            type: 'combined',
            label: 'Add Shapes and Points',
            actions: [{ type: 'replace-shapes', shapes: replaced }, addBack],
        };
    }
    return {
        type: 'restore-selection',
        action: revert,
        selection: previousSelection,
        constraints: previousConstraints,
    };
}
