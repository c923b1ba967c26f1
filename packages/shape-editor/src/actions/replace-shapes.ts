/**
 * Replace Shapes
 *
 * Swaps whole shapes by shape index. The inverse carries the displaced
 * shapes back to the same indexes.
 */

import { cloneShape } from '../shapes/clone';
import { CONTINUE, stop, visitShapes } from '../shapes/visitor';
import type { Shape, ShapeDocument } from '../types';

import type { ActionContext, IndexedShape, ReplaceShapesAction } from './types';

export function replaceShapes(shapes: Iterable<IndexedShape>): ReplaceShapesAction {
    return {
        type: 'replace-shapes',
        shapes: [...shapes]
            .map(({ shapeIndex, shape }) => ({ shapeIndex, shape: cloneShape(shape) }))
            .sort((a, b) => a.shapeIndex - b.shapeIndex),
    };
}

/** Replaces every listed shape with `empty`. */
export function replaceByEmpty(shapeIndexes: Iterable<number>): ReplaceShapesAction {
    return replaceShapes([...new Set(shapeIndexes)].map((shapeIndex) => ({ shapeIndex, shape: { kind: 'empty' } })));
}

/**
 * Puts copies of the given shapes into their slots and returns what they
 * displaced, ascending by index. Indexes past the last shape are skipped.
 */
export function swapShapes(document: ShapeDocument, shapes: readonly IndexedShape[]): IndexedShape[] {
    const pending = new Map<number, Shape>();
    for (const { shapeIndex, shape } of shapes) {
        pending.set(shapeIndex, shape);
    }
    const replaced: IndexedShape[] = [];
    if (pending.size === 0) return replaced;
    visitShapes(document, (slot) => {
        const next = pending.get(slot.shapeIndex);
        if (next) {
            pending.delete(slot.shapeIndex);
            replaced.push({ shapeIndex: slot.shapeIndex, shape: slot.replace(cloneShape(next)) });
        }
        return pending.size === 0 ? stop(true) : CONTINUE;
    });
    return replaced;
}

export function applyReplaceShapes(
    action: ReplaceShapesAction,
    document: ShapeDocument,
    context: ActionContext
): ReplaceShapesAction {
    const replaced = swapShapes(document, action.shapes);
    const shapeIndexes = replaced.map(({ shapeIndex }) => shapeIndex);
    context.selection.dropShapes(shapeIndexes);
    context.constraints.dropShapes(shapeIndexes);
    return { type: 'replace-shapes', shapes: replaced };
}
