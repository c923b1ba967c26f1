/**
 * Shape Visitor
 *
 * Depth-first pre-order traversal over a shape tree. Groups are flattened
 * and never consume an address; every other shape (including `empty` and
 * `callback`) consumes one shape index.
 *
 * Two flavours exist:
 * - per-shape: one call per leaf slot, with the ability to replace it
 * - per-control-point: one call per handle, in the fixed per-kind order
 *
 * Both stop as soon as a visit returns `stop(value)`.
 */

import type {
    ConnectedPoint,
    EmptyShape,
    LeafShape,
    Point2D,
    Shape,
    ShapeDocument,
    ShapeKind,
    ShapePointIndex,
} from '../types';
import { distance } from '../utils/geometry';

import { firstPoint, nextPoint, prevPoint } from './shape-point-index';

// =============================================================================
// Visit Control
// =============================================================================

export type VisitStep<R> = { done: false } | { done: true; value: R };

export const CONTINUE: VisitStep<never> = { done: false };

export function stop<R>(value: R): VisitStep<R> {
    return { done: true, value };
}

// =============================================================================
// Per-Shape Traversal
// =============================================================================

export type ShapeSlotShape = LeafShape | EmptyShape;

export interface ShapeSlot {
    shapeIndex: number;
    shape: ShapeSlotShape;
    /** Puts `next` in this slot and returns the shape it displaced. */
    replace: (next: Shape) => Shape;
}

export type ShapeVisit<R> = (slot: ShapeSlot) => VisitStep<R>;

export function visitShapes<R>(document: ShapeDocument, visit: ShapeVisit<R>): R | undefined {
    const state = { shapeIndex: 0 };
    const step = visitShapeSlot(
        document.root,
        (next) => {
            const previous = document.root;
            document.root = next;
            return previous;
        },
        state,
        visit
    );
    return step.done ? step.value : undefined;
}

function visitShapeSlot<R>(
    shape: Shape,
    replace: (next: Shape) => Shape,
    state: { shapeIndex: number },
    visit: ShapeVisit<R>
): VisitStep<R> {
    if (shape.kind === 'group') {
        const children = shape.shapes;
        for (let i = 0; i < children.length; i += 1) {
            const child = children[i];
            if (!child) continue;
            const step = visitShapeSlot(
                child,
                (next) => {
                    const previous = children[i] ?? child;
                    children[i] = next;
                    return previous;
                },
                state,
                visit
            );
            if (step.done) return step;
        }
        return CONTINUE;
    }
    const shapeIndex = state.shapeIndex;
    state.shapeIndex += 1;
    return visit({ shapeIndex, shape, replace });
}

// =============================================================================
// Per-Control-Point Traversal
// =============================================================================

export interface ControlPointVisitor<R> {
    /**
     * Primary handle. `point` is the live point of the tree; mutating it
     * mutates the shape.
     */
    pathPoint?: (index: ShapePointIndex, point: Point2D, kind: ShapeKind) => VisitStep<R>;
    /**
     * Secondary handle. Radius handles are synthesised from the shape and
     * written back after the visit.
     */
    controlPoint?: (
        index: ShapePointIndex,
        point: Point2D,
        connected: ConnectedPoint[],
        kind: ShapeKind
    ) => VisitStep<R>;
}

export function visitControlPoints<R>(root: Shape, visitor: ControlPointVisitor<R>): R | undefined {
    const cursor: ShapePointIndex = { shapeIndex: 0, pointIndex: 0 };
    const step = visitControlPointsIn(root, cursor, visitor);
    return step.done ? step.value : undefined;
}

function visitControlPointsIn<R>(
    shape: Shape,
    cursor: ShapePointIndex,
    visitor: ControlPointVisitor<R>
): VisitStep<R> {
    if (shape.kind === 'group') {
        for (const child of shape.shapes) {
            const step = visitControlPointsIn(child, cursor, visitor);
            if (step.done) return step;
        }
        return CONTINUE;
    }
    const step = visitLeafControlPoints(shape, cursor, visitor);
    cursor.shapeIndex += 1;
    cursor.pointIndex = 0;
    return step;
}

function visitLeafControlPoints<R>(
    shape: ShapeSlotShape,
    cursor: ShapePointIndex,
    visitor: ControlPointVisitor<R>
): VisitStep<R> {
    const pathPoint = (point: Point2D, kind: ShapeKind): VisitStep<R> => {
        const index = { ...cursor };
        cursor.pointIndex += 1;
        return visitor.pathPoint ? visitor.pathPoint(index, point, kind) : CONTINUE;
    };
    const controlPoint = (
        point: Point2D,
        connected: ConnectedPoint[],
        kind: ShapeKind
    ): VisitStep<R> => {
        const index = { ...cursor };
        cursor.pointIndex += 1;
        return visitor.controlPoint ? visitor.controlPoint(index, point, connected, kind) : CONTINUE;
    };
    const connect = (index: ShapePointIndex, position: Point2D): ConnectedPoint => ({
        index,
        position: { ...position },
    });

    switch (shape.kind) {
        case 'empty':
        case 'callback':
            return CONTINUE;
        case 'line-segment':
        case 'path': {
            const kind = shape.kind;
            return firstDone(shape.points, (p) => pathPoint(p, kind));
        }
        case 'text':
            return pathPoint(shape.pos, 'text');
        case 'mesh':
            return firstDone(shape.vertices, (vertex) => pathPoint(vertex.pos, 'mesh'));
        case 'circle': {
            const centerStep = pathPoint(shape.center, 'circle');
            if (centerStep.done) return centerStep;
            const handle = { x: shape.center.x + shape.radius, y: shape.center.y };
            const step = controlPoint(handle, [connect(firstPoint(cursor), shape.center)], 'circle');
            // Written back even when untouched, which also clears a negative radius
            shape.radius = distance(handle, shape.center);
            return step;
        }
        case 'ellipse': {
            const centerStep = pathPoint(shape.center, 'ellipse');
            if (centerStep.done) return centerStep;
            const xHandle = { x: shape.center.x + shape.radius.x, y: shape.center.y };
            const xStep = controlPoint(xHandle, [connect(firstPoint(cursor), shape.center)], 'ellipse');
            shape.radius.x = distance(xHandle, shape.center);
            if (xStep.done) return xStep;
            const yHandle = { x: shape.center.x, y: shape.center.y + shape.radius.y };
            const yStep = controlPoint(yHandle, [connect(firstPoint(cursor), shape.center)], 'ellipse');
            shape.radius.y = distance(yHandle, shape.center);
            return yStep;
        }
        case 'rect': {
            let step = pathPoint(shape.min, 'rect');
            if (!step.done) {
                step = pathPoint(shape.max, 'rect');
            }
            normalizeRectShape(shape.min, shape.max);
            return step;
        }
        case 'quadratic-bezier': {
            const [p0, p1, p2] = shape.points;
            const first = pathPoint(p0, 'quadratic-bezier');
            if (first.done) return first;
            const control = controlPoint(
                p1,
                [connect(prevPoint(cursor), p0), connect(nextPoint(cursor), p2)],
                'quadratic-bezier'
            );
            if (control.done) return control;
            return pathPoint(p2, 'quadratic-bezier');
        }
        case 'cubic-bezier': {
            const [p0, p1, p2, p3] = shape.points;
            const first = pathPoint(p0, 'cubic-bezier');
            if (first.done) return first;
            const control1 = controlPoint(
                p1,
                [connect(prevPoint(cursor), p0), connect(nextPoint(cursor), p2)],
                'cubic-bezier'
            );
            if (control1.done) return control1;
            const control2 = controlPoint(
                p2,
                [connect(prevPoint(cursor), p1), connect(nextPoint(cursor), p3)],
                'cubic-bezier'
            );
            if (control2.done) return control2;
            return pathPoint(p3, 'cubic-bezier');
        }
    }
}

function firstDone<T, R>(items: T[], visit: (item: T) => VisitStep<R>): VisitStep<R> {
    for (const item of items) {
        const step = visit(item);
        if (step.done) return step;
    }
    return CONTINUE;
}

function normalizeRectShape(min: Point2D, max: Point2D): void {
    if (min.x > max.x) {
        const x = min.x;
        min.x = max.x;
        max.x = x;
    }
    if (min.y > max.y) {
        const y = min.y;
        min.y = max.y;
        max.y = y;
    }
}
