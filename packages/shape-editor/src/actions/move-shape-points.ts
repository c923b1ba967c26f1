/**
 * Move Shape Points
 *
 * Translates handles by address. Linked addresses receive the translation
 * of the address they are linked from, and position ranges scale the whole
 * batch down so that the drag keeps its direction.
 */

import type { ConstraintIndex } from '../constraints';
import { clampTranslation } from '../constraints';
import { getPointsPositions } from '../shapes/queries';
import { firstPoint, nextPoint, ShapePointMap } from '../shapes/shape-point-index';
import { CONTINUE, stop, visitControlPoints, visitShapes } from '../shapes/visitor';
import type { Point2D, RectShape, Shape, ShapeDocument, ShapePointIndex, Vec2 } from '../types';
import { isCenterAndRadiusKind, MAX_RADIUS_POINTS } from '../types';
import { distance, isZeroVec, negate, sub } from '../utils/geometry';

import type { ActionContext, MoveShapePointsAction, PointTranslation } from './types';

// =============================================================================
// Constructors
// =============================================================================

export function moveShapePoints(translations: Iterable<PointTranslation>): MoveShapePointsAction {
    return {
        type: 'move-shape-points',
        translations: [...translations].map(({ index, translation }) => ({
            index: { ...index },
            translation: { ...translation },
        })),
    };
}

/** Same translation for every address. */
export function moveShapePointsBy(indexes: Iterable<ShapePointIndex>, translation: Vec2): MoveShapePointsAction {
    return moveShapePoints([...indexes].map((index) => ({ index, translation })));
}

// =============================================================================
// Constraints
// =============================================================================

/**
 * Adds translations implied by links (each linked address once, explicit
 * requests are never overwritten) and scales the batch by the tightest
 * position-range factor.
 */
export function resolveConstrainedTranslations(
    requested: ShapePointMap<Vec2>,
    constraints: ConstraintIndex,
    root: Shape
): ShapePointMap<Vec2> {
    const resolved = new ShapePointMap<Vec2>(requested.entries());

    for (const [from, translation] of requested.entries()) {
        const queue = constraints.propagation.get(from)?.values() ?? [];
        for (let next = queue.shift(); next; next = queue.shift()) {
            if (resolved.has(next)) continue;
            resolved.set(next, { ...translation });
            queue.push(...(constraints.propagation.get(next)?.values() ?? []));
        }
    }

    const ranged = resolved.keys().filter((index) => constraints.ranges.has(index));
    if (ranged.length === 0) return resolved;

    const { positions } = getPointsPositions(root, ranged);
    let factor = 1;
    for (const [index, position] of positions.entries()) {
        const range = constraints.ranges.get(index);
        const translation = resolved.get(index);
        if (!range || !translation) continue;
        const clamped = clampTranslation(range, translation, position);
        if (translation.x !== 0) factor = Math.min(factor, clamped.x / translation.x);
        if (translation.y !== 0) factor = Math.min(factor, clamped.y / translation.y);
    }
    factor = Math.max(0, factor);
    if (factor === 1) return resolved;

    return new ShapePointMap(
        resolved.entries().map(([index, t]) => [index, { x: t.x * factor, y: t.y * factor }] as const)
    );
}

// =============================================================================
// Apply
// =============================================================================

/** Radius handle position after the shape re-derives it from the dragged handle. */
function settledRadiusHandle(index: ShapePointIndex, handle: Point2D, center: Point2D): Point2D {
    const radius = distance(handle, center);
    return index.pointIndex === 1 ? { x: center.x + radius, y: center.y } : { x: center.x, y: center.y + radius };
}

export function applyMoveShapePoints(
    action: MoveShapePointsAction,
    document: ShapeDocument,
    context: ActionContext
): MoveShapePointsAction {
    const requested = new ShapePointMap<Vec2>();
    for (const { index, translation } of action.translations) {
        requested.set(index, { ...translation });
    }
    const resolved = resolveConstrainedTranslations(requested, context.constraints.index(), document.root);
    const pending = new ShapePointMap<Vec2>(resolved.entries());
    const inverse = new ShapePointMap<Vec2>();
    if (pending.isEmpty()) return moveShapePoints([]);

    const touchedShapes = new Set(resolved.keys().map((index) => index.shapeIndex));
    const rectsBefore = new Map<number, { shape: RectShape; min: Point2D; max: Point2D }>();
    visitShapes(document, (slot) => {
        if (slot.shape.kind === 'rect' && touchedShapes.has(slot.shapeIndex)) {
            const shape = slot.shape;
            rectsBefore.set(slot.shapeIndex, { shape, min: { ...shape.min }, max: { ...shape.max } });
        }
        return CONTINUE;
    });

    visitControlPoints(document.root, {
        pathPoint: (index, point, kind) => {
            const translation = pending.take(index);
            if (translation) {
                point.x += translation.x;
                point.y += translation.y;
                inverse.set(index, negate(translation));
                if (isCenterAndRadiusKind(kind)) {
                    let handle = index;
                    for (let i = 0; i < MAX_RADIUS_POINTS; i += 1) {
                        handle = nextPoint(handle);
                        pending.delete(handle);
                    }
                }
            }
            return pending.isEmpty() ? stop(true) : CONTINUE;
        },
        controlPoint: (index, point, connected, kind) => {
            const translation = pending.take(index);
            if (!translation) {
                return pending.isEmpty() ? stop(true) : CONTINUE;
            }
            const radiusHandle = isCenterAndRadiusKind(kind);
            if (radiusHandle && resolved.has(firstPoint(index))) {
                return pending.isEmpty() ? stop(true) : CONTINUE;
            }
            const before = { x: point.x, y: point.y };
            point.x += translation.x;
            point.y += translation.y;
            const center = connected[0]?.position;
            if (radiusHandle && center && !isZeroVec(translation)) {
                inverse.set(index, sub(before, settledRadiusHandle(index, point, center)));
            } else {
                inverse.set(index, negate(translation));
            }
            return pending.isEmpty() ? stop(true) : CONTINUE;
        },
    });

    // Normalisation may have swapped the corners, so both are sent back to where they were
    for (const [shapeIndex, before] of rectsBefore) {
        inverse.set({ shapeIndex, pointIndex: 0 }, sub(before.min, before.shape.min));
        inverse.set({ shapeIndex, pointIndex: 1 }, sub(before.max, before.shape.max));
    }

    return moveShapePoints(inverse.entries().map(([index, translation]) => ({ index, translation })));
}
