/**
 * Action Types
 *
 * Closed set of reversible commands over a shape tree. Actions are plain
 * data: they can be stored in the editor history as-is, and applying one
 * never mutates the action itself.
 */

import type { Constraint, ConstraintList } from '../constraints';
import type { Selection } from '../selection';
import type { IndexedShapeParams } from '../shapes/params';
import type { MeshVertex, Point2D, Shape, ShapePointIndex, Vec2 } from '../types';

// =============================================================================
// Payloads
// =============================================================================

export interface PointTranslation {
    index: ShapePointIndex;
    translation: Vec2;
}

/** A point as stored in a path, or a mesh vertex with its paired index entry. */
export type ShapePoint =
    | { type: 'pos'; pos: Point2D }
    | { type: 'vertex'; vertex: MeshVertex; index: number | null };

export interface IndexedShapePoint {
    pointIndex: number;
    point: ShapePoint;
}

export interface ShapePoints {
    shapeIndex: number;
    points: IndexedShapePoint[];
}

export interface IndexedShape {
    shapeIndex: number;
    shape: Shape;
}

/** How the root looked before an append wrapped it in a group. */
export type AppendUnwrap = 'none' | 'empty' | 'single';

// =============================================================================
// Actions
// =============================================================================

export interface NoopAction {
    type: 'noop';
}

export interface MoveShapePointsAction {
    type: 'move-shape-points';
    translations: PointTranslation[];
}

export interface InsertShapeAction {
    type: 'insert-shape';
    shape: Shape;
    /** Shape index to overwrite; appends when absent. */
    replace?: number;
}

export interface RemoveAppendedShapeAction {
    type: 'remove-appended-shape';
    unwrap: AppendUnwrap;
}

export interface ReplaceShapesAction {
    type: 'replace-shapes';
    shapes: IndexedShape[];
}

export interface RemoveShapePointsAction {
    type: 'remove-shape-points';
    indexes: ShapePointIndex[];
}

export interface AddShapePointsAction {
    type: 'add-shape-points';
    shapes: ShapePoints[];
}

export interface ApplyShapeParamsAction {
    type: 'apply-shape-params';
    shapes: IndexedShapeParams[];
}

export interface CombinedAction {
    type: 'combined';
    label: string;
    actions: ShapeAction[];
}

/**
 * Applies `action`, then puts back the selection captured alongside it, and
 * the constraint list when one was captured too.
 */
export interface RestoreSelectionAction {
    type: 'restore-selection';
    action: ShapeAction;
    selection: ShapePointIndex[];
    constraints?: Constraint[];
}

export type ShapeAction =
    | NoopAction
    | MoveShapePointsAction
    | InsertShapeAction
    | RemoveAppendedShapeAction
    | ReplaceShapesAction
    | RemoveShapePointsAction
    | AddShapePointsAction
    | ApplyShapeParamsAction
    | CombinedAction
    | RestoreSelectionAction;

export type ShapeActionType = ShapeAction['type'];

/** Editor state an action may read or re-key while it runs. */
export interface ActionContext {
    constraints: ConstraintList;
    selection: Selection;
}
