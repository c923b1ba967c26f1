/**
 * Control-Point Index
 *
 * Flat view of every handle of a shape tree, rebuilt from a single
 * traversal each frame. Positions are indexed per axis so radius and
 * rectangle queries intersect two ordered range scans instead of walking
 * every point.
 */

import {
    compareShapePointIndex,
    shapePointKey,
    ShapePointMap,
    ShapePointSet,
} from '../shapes/shape-point-index';
import { CONTINUE, visitControlPoints } from '../shapes/visitor';
import type { Point2D, Rect, Shape, ShapeControlPoint, ShapeKind, ShapePointIndex } from '../types';
import { distance } from '../utils/geometry';

import type { FloatIndexEntry, FloatIndexOptions } from './float-index';
import { OrderedFloatIndex } from './float-index';

// =============================================================================
// Types
// =============================================================================

export interface IndexedPoint {
    index: ShapePointIndex;
    position: Point2D;
}

/** Snap candidate on one axis: the coordinate and every address sitting on it. */
export interface SnapComponent {
    value: number;
    indexes: ShapePointIndex[];
}

const POINT_INDEX_OPTIONS: FloatIndexOptions<ShapePointIndex> = {
    valueKey: shapePointKey,
    compareValues: compareShapePointIndex,
};

// =============================================================================
// Control Points
// =============================================================================

export class ShapeControlPoints {
    readonly points: ShapePointMap<ShapeControlPoint>;
    readonly shapeKinds: ReadonlyMap<number, ShapeKind>;
    private readonly xIndex: OrderedFloatIndex<ShapePointIndex>;
    private readonly yIndex: OrderedFloatIndex<ShapePointIndex>;

    private constructor(points: ShapePointMap<ShapeControlPoint>, shapeKinds: Map<number, ShapeKind>) {
        this.points = points;
        this.shapeKinds = shapeKinds;
        const entries = points.entries();
        this.xIndex = OrderedFloatIndex.build(
            entries.map(([index, point]) => [point.position.x, index] as const),
            POINT_INDEX_OPTIONS
        );
        this.yIndex = OrderedFloatIndex.build(
            entries.map(([index, point]) => [point.position.y, index] as const),
            POINT_INDEX_OPTIONS
        );
    }

    static empty(): ShapeControlPoints {
        return new ShapeControlPoints(new ShapePointMap(), new Map());
    }

    /**
     * Indexes every handle of `root`. The traversal may normalise rects and
     * radii in place, exactly as any other control-point pass does.
     */
    static collect(root: Shape): ShapeControlPoints {
        const points = new ShapePointMap<ShapeControlPoint>();
        const shapeKinds = new Map<number, ShapeKind>();
        visitControlPoints<never>(root, {
            pathPoint: (index, point, kind) => {
                points.set(index, { type: 'path-point', position: { ...point }, shapeIndex: index.shapeIndex });
                shapeKinds.set(index.shapeIndex, kind);
                return CONTINUE;
            },
            controlPoint: (index, point, connected, kind) => {
                points.set(index, {
                    type: 'control-point',
                    position: { ...point },
                    shapeIndex: index.shapeIndex,
                    connected,
                });
                shapeKinds.set(index.shapeIndex, kind);
                return CONTINUE;
            },
        });
        return new ShapeControlPoints(points, shapeKinds);
    }

    get size(): number {
        return this.points.size;
    }

    byIndex(index: ShapePointIndex): ShapeControlPoint | null {
        return this.points.get(index) ?? null;
    }

    positionByIndex(index: ShapePointIndex): Point2D | null {
        return this.points.get(index)?.position ?? null;
    }

    shapeKind(index: ShapePointIndex): ShapeKind | null {
        return this.shapeKinds.get(index.shapeIndex) ?? null;
    }

    /** Every handle within Euclidean distance `radius` of `pos`, in address order. */
    pointsInRadius(pos: Point2D, radius: number): ShapePointMap<ShapeControlPoint> {
        const candidates = intersectAxes(
            this.xIndex.findInDistance(pos.x, radius),
            this.yIndex.findInDistance(pos.y, radius)
        );
        const result = new ShapePointMap<ShapeControlPoint>();
        for (const candidate of candidates) {
            if (distance(candidate.position, pos) > radius) continue;
            const point = this.points.get(candidate.index);
            if (point) result.set(candidate.index, point);
        }
        return result;
    }

    /** Handles inside `rect`, bounds inclusive. `rect` must be normalised. */
    findPointsInRect(rect: Rect): IndexedPoint[] {
        return intersectAxes(
            this.xIndex.range(rect.min.x, rect.max.x),
            this.yIndex.range(rect.min.y, rect.max.y)
        );
    }

    /** Secondary handle tied to the given path point, if any. */
    connectedBezierControlPoint(index: ShapePointIndex): Point2D | null {
        for (const point of this.points.values()) {
            if (point.type !== 'control-point') continue;
            const tied = point.connected.some(
                (connected) =>
                    connected.index.shapeIndex === index.shapeIndex &&
                    connected.index.pointIndex === index.pointIndex
            );
            if (tied) return { ...point.position };
        }
        return null;
    }

    snapX(pos: Point2D, maxDistance: number, ignore: ShapePointSet): SnapComponent | null {
        return toSnapComponent(
            this.xIndex.findClosestInDistanceAndIgnore(pos.x, maxDistance, (index) => ignore.has(index))
        );
    }

    snapY(pos: Point2D, maxDistance: number, ignore: ShapePointSet): SnapComponent | null {
        return toSnapComponent(
            this.yIndex.findClosestInDistanceAndIgnore(pos.y, maxDistance, (index) => ignore.has(index))
        );
    }

    /** Closest handle to `pos` among `indexes`. */
    closestOf(pos: Point2D, indexes: Iterable<ShapePointIndex>): IndexedPoint | null {
        let closest: IndexedPoint | null = null;
        let closestDistance = Number.POSITIVE_INFINITY;
        for (const index of indexes) {
            const point = this.points.get(index);
            if (!point) continue;
            const d = distance(point.position, pos);
            if (d < closestDistance) {
                closestDistance = d;
                closest = { index: { ...index }, position: { ...point.position } };
            }
        }
        return closest;
    }
}

// =============================================================================
// Helpers
// =============================================================================

function intersectAxes(
    xEntries: FloatIndexEntry<ShapePointIndex>[],
    yEntries: FloatIndexEntry<ShapePointIndex>[]
): IndexedPoint[] {
    const yByIndex = new Map<string, number>();
    for (const entry of yEntries) {
        for (const index of entry.values) {
            yByIndex.set(shapePointKey(index), entry.key);
        }
    }
    const result: IndexedPoint[] = [];
    for (const entry of xEntries) {
        for (const index of entry.values) {
            const y = yByIndex.get(shapePointKey(index));
            if (y !== undefined) {
                result.push({ index, position: { x: entry.key, y } });
            }
        }
    }
    return result;
}

function toSnapComponent(entry: FloatIndexEntry<ShapePointIndex> | null): SnapComponent | null {
    return entry ? { value: entry.key, indexes: entry.values } : null;
}
