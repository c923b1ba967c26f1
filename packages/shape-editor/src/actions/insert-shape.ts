/**
 * Insert Shape
 *
 * Appends a shape to the tree or overwrites one slot. Appending to a
 * non-group root first wraps the root in a group; the inverse undoes the
 * wrap as well, so undo restores the exact previous root.
 */

import { cloneShape } from '../shapes/clone';
import { countShapes } from '../shapes/queries';
import type { Shape, ShapeDocument } from '../types';

import { swapShapes } from './replace-shapes';
import type {
    ActionContext,
    AppendUnwrap,
    InsertShapeAction,
    NoopAction,
    RemoveAppendedShapeAction,
    ShapeAction,
} from './types';

export function insertShape(shape: Shape, replace?: number): InsertShapeAction {
    const action: InsertShapeAction = { type: 'insert-shape', shape: cloneShape(shape) };
    if (replace !== undefined) action.replace = replace;
    return action;
}

export function applyInsertShape(
    action: InsertShapeAction,
    document: ShapeDocument,
    context: ActionContext
): InsertShapeAction | RemoveAppendedShapeAction | NoopAction {
    if (action.replace !== undefined) {
        const replace = action.replace;
        const [displaced] = swapShapes(document, [{ shapeIndex: replace, shape: action.shape }]);
        if (!displaced) return { type: 'noop' };
        context.selection.dropShapes([replace]);
        context.constraints.dropShapes([replace]);
        return { type: 'insert-shape', shape: displaced.shape, replace };
    }

    const shape = cloneShape(action.shape);
    const root = document.root;
    let unwrap: AppendUnwrap;
    if (root.kind === 'group') {
        root.shapes.push(shape);
        unwrap = 'none';
    } else if (root.kind === 'empty') {
        document.root = { kind: 'group', shapes: [shape] };
        unwrap = 'empty';
    } else {
        document.root = { kind: 'group', shapes: [root, shape] };
        unwrap = 'single';
    }
    return { type: 'remove-appended-shape', unwrap };
}

/**
 * Removes the last top-level shape and restores the root an append
 * wrapped. A root that is not a group is left alone.
 */
export function applyRemoveAppendedShape(
    action: RemoveAppendedShapeAction,
    document: ShapeDocument,
    context: ActionContext
): ShapeAction {
    const root = document.root;
    if (root.kind !== 'group') return { type: 'noop' };
    const removed = root.shapes.pop();
    if (!removed) return { type: 'noop' };

    const firstRemoved = countShapes(root);
    const dropped: number[] = [];
    for (let i = 0; i < countShapes(removed); i += 1) {
        dropped.push(firstRemoved + i);
    }
    context.selection.dropShapes(dropped);
    context.constraints.dropShapes(dropped);

    if (action.unwrap === 'empty' && root.shapes.length === 0) {
        document.root = { kind: 'empty' };
    } else if (action.unwrap === 'single' && root.shapes.length === 1) {
        const [only] = root.shapes;
        if (only) document.root = only;
    }
    return { type: 'insert-shape', shape: removed };
}
