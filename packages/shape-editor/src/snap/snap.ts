/**
 * Snap Resolver
 *
 * Resolves a drag position against existing control points and the
 * alignment grid, one axis at a time. The nearer candidate wins; on an
 * exact tie the control point wins and both are reported as targets.
 */

import { ShapePointSet } from '../shapes/shape-point-index';
import type { ShapeControlPoints, SnapComponent } from '../spatial/control-points';
import type { GridIndex, GridSnap } from '../spatial/grid';
import type { Point2D, ShapePointIndex } from '../types';

// =============================================================================
// Types
// =============================================================================

export type SnapTarget =
    | { type: 'control-point'; position: Point2D }
    /** Vertical grid line at `value` on the x axis. */
    | { type: 'grid-x'; value: number }
    /** Horizontal grid line at `value` on the y axis. */
    | { type: 'grid-y'; value: number };

export interface SnapInfo {
    targets: SnapTarget[];
    /** Forces exact matching on x; used as x when nothing snaps. */
    manualSnapX: number | null;
    manualSnapY: number | null;
    snapPoint: Point2D | null;
}

export interface SnapSources {
    controlPoints: ShapeControlPoints;
    grid: GridIndex;
    /** Addresses that never serve as snap candidates, normally the selection. */
    ignore: Iterable<ShapePointIndex>;
}

export function emptySnapInfo(): SnapInfo {
    return { targets: [], manualSnapX: null, manualSnapY: null, snapPoint: null };
}

/** Drops targets, manual values and the snap point. */
export function clearSnap(snap: SnapInfo): void {
    snap.targets = [];
    snap.manualSnapX = null;
    snap.manualSnapY = null;
    snap.snapPoint = null;
}

// =============================================================================
// Resolution
// =============================================================================

type GridTargetType = 'grid-x' | 'grid-y';

function resolveComponent(
    targets: SnapTarget[],
    position: number,
    controlPoints: ShapeControlPoints,
    pointSnap: SnapComponent | null,
    gridSnap: GridSnap | null,
    gridTarget: GridTargetType
): number | null {
    const addPointTargets = (snap: SnapComponent) => {
        for (const index of snap.indexes) {
            const pos = controlPoints.positionByIndex(index);
            if (pos) targets.push({ type: 'control-point', position: { ...pos } });
        }
    };

    if (pointSnap && !gridSnap) {
        addPointTargets(pointSnap);
        return pointSnap.value;
    }
    if (gridSnap && !pointSnap) {
        targets.push({ type: gridTarget, value: gridSnap.value });
        return gridSnap.value;
    }
    if (!pointSnap || !gridSnap) return null;

    const pointDistance = Math.abs(pointSnap.value - position);
    const gridDistance = Math.abs(gridSnap.value - position);
    if (pointDistance < gridDistance) {
        addPointTargets(pointSnap);
        return pointSnap.value;
    }
    if (pointDistance === gridDistance) {
        addPointTargets(pointSnap);
        targets.push({ type: gridTarget, value: gridSnap.value });
        return pointSnap.value;
    }
    targets.push({ type: gridTarget, value: gridSnap.value });
    return gridSnap.value;
}

/**
 * Recomputes `snap` for `pos` in place. `maxDistance` is in content units.
 * A manual value on an axis restricts that axis to exact matches.
 */
export function updateSnapInfo(snap: SnapInfo, pos: Point2D, maxDistance: number, sources: SnapSources): void {
    const ignore = new ShapePointSet(sources.ignore);
    const maxDistanceX = snap.manualSnapX !== null ? 0 : maxDistance;
    const maxDistanceY = snap.manualSnapY !== null ? 0 : maxDistance;
    const targets: SnapTarget[] = [];

    const snapX = resolveComponent(
        targets,
        pos.x,
        sources.controlPoints,
        sources.controlPoints.snapX(pos, maxDistanceX, ignore),
        sources.grid.snapX(pos.x, maxDistanceX),
        'grid-x'
    );
    const snapY = resolveComponent(
        targets,
        pos.y,
        sources.controlPoints,
        sources.controlPoints.snapY(pos, maxDistanceY, ignore),
        sources.grid.snapY(pos.y, maxDistanceY),
        'grid-y'
    );

    snap.targets = targets;
    if (snapX !== null || snapY !== null || snap.manualSnapX !== null || snap.manualSnapY !== null) {
        snap.snapPoint = {
            x: snapX ?? snap.manualSnapX ?? pos.x,
            y: snapY ?? snap.manualSnapY ?? pos.y,
        };
    } else {
        snap.snapPoint = null;
    }
}
