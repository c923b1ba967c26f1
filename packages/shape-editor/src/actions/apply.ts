/**
 * Action Engine
 *
 * `applyShapeAction` mutates the document and returns the action that
 * restores it. Selection changes caused by structural edits are made in
 * the same call.
 */

import type { ShapeDocument } from '../types';

import { applyAddShapePoints } from './add-shape-points';
import { applyApplyShapeParams } from './apply-shape-params';
import { applyInsertShape, applyRemoveAppendedShape } from './insert-shape';
import { applyMoveShapePoints } from './move-shape-points';
import { applyRemoveShapePoints } from './remove-shape-points';
import { applyReplaceShapes } from './replace-shapes';
import type { ActionContext, CombinedAction, NoopAction, ShapeAction } from './types';

export const NOOP: NoopAction = { type: 'noop' };

export function combined(label: string, actions: ShapeAction[]): CombinedAction {
    return { type: 'combined', label, actions: [...actions] };
}

/** Short human label shown in undo menus. */
export function actionLabel(action: ShapeAction): string {
    switch (action.type) {
        case 'noop':
            return 'None';
        case 'move-shape-points':
            return 'Move';
        case 'insert-shape':
            return 'Insert Shape';
        case 'remove-appended-shape':
            return 'Remove Shape';
        case 'replace-shapes':
            return 'Replace Shapes';
        case 'remove-shape-points':
            return 'Remove points';
        case 'add-shape-points':
            return 'Add points';
        case 'apply-shape-params':
            return 'Update Parameters';
        case 'combined':
            return action.label;
        case 'restore-selection':
            return actionLabel(action.action);
    }
}

export function applyShapeAction(action: ShapeAction, document: ShapeDocument, context: ActionContext): ShapeAction {
    switch (action.type) {
        case 'noop':
            return NOOP;
        case 'move-shape-points':
            return applyMoveShapePoints(action, document, context);
        case 'insert-shape':
            return applyInsertShape(action, document, context);
        case 'remove-appended-shape':
            return applyRemoveAppendedShape(action, document, context);
        case 'replace-shapes':
            return applyReplaceShapes(action, document, context);
        case 'remove-shape-points':
            return applyRemoveShapePoints(action, document, context);
        case 'add-shape-points':
            return applyAddShapePoints(action, document, context);
        case 'apply-shape-params':
            return applyApplyShapeParams(action, document);
        case 'combined': {
            const inverses = action.actions.map((inner) => applyShapeAction(inner, document, context));
            return combined(`Undo ${action.label}`, inverses.reverse());
        }
        case 'restore-selection': {
            const previous = context.selection.toArray();
            const previousConstraints = context.constraints.toArray();
            const inverse = applyShapeAction(action.action, document, context);
            context.selection.reset(action.selection);
            if (!action.constraints) {
                return { type: 'restore-selection', action: inverse, selection: previous };
            }
            context.constraints.reset(action.constraints);
            return { type: 'restore-selection', action: inverse, selection: previous, constraints: previousConstraints };
        }
    }
}
