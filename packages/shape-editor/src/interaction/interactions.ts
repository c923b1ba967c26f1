/**
 * Interactions
 *
 * Short-lived input handlers kept across frames. Each frame an interaction
 * reads the frame snapshot, acts on the editor through `InteractionHost`
 * and returns the interaction to keep for the next frame, or null when it
 * has finished. Interactions are plain data and are never mutated in place.
 */

import { insertShape } from '../actions/insert-shape';
import { moveShapePoints, moveShapePointsBy } from '../actions/move-shape-points';
import { removeShapePoints } from '../actions/remove-shape-points';
import type { PointTranslation, ShapeAction } from '../actions/types';
import { shapePointKey } from '../shapes/shape-point-index';
import type { Point2D, Rect, Shape, ShapePointIndex, Stroke, Vec2 } from '../types';
import { add, isZeroVec, normalizeRect, pointsEqual, sub } from '../utils/geometry';

import type { ShapeConstructor } from './shape-constructors';

// =============================================================================
// Types
// =============================================================================

export interface MoveSelectedPointsInteraction {
    type: 'move-selected-points';
    /** Content position the drag started from. */
    startPos: Point2D;
    /** Content position reached so far. */
    endPos: Point2D;
    /** Accumulated inverse of every frame's move. */
    undo: PointTranslation[];
}

export interface RubberBandInteraction {
    type: 'rubber-band';
    /** Ui rectangle; `max` follows the pointer and may lie before `min`. */
    rect: Rect;
}

export interface PanInteraction {
    type: 'pan';
    lastPos: Point2D;
}

export interface ScrollInteraction {
    type: 'scroll';
    delta: Vec2;
}

export interface ZoomInteraction {
    type: 'zoom';
    factor: number;
    /** Canvas-local ui position kept in place. */
    anchor: Point2D;
}

export interface AddPointsThenShapeInteraction {
    type: 'add-points-then-shape';
    /** Name of a registered shape constructor. */
    constructorName: string;
    points: Point2D[];
}

export interface AddPointThenExtendInteraction {
    type: 'add-point-then-extend';
    position: Point2D;
}

export interface DeleteSelectedPointsInteraction {
    type: 'delete-selected-points';
}

export interface UndoInteraction {
    type: 'undo';
}

export type Interaction =
    | MoveSelectedPointsInteraction
    | RubberBandInteraction
    | PanInteraction
    | ScrollInteraction
    | ZoomInteraction
    | AddPointsThenShapeInteraction
    | AddPointThenExtendInteraction
    | DeleteSelectedPointsInteraction
    | UndoInteraction;

export type InteractionType = Interaction['type'];

/** Pointer facts an interaction reads during one frame. */
export interface InteractionFrame {
    /** Last known pointer position, ui coordinates. */
    mousePos: Point2D;
    contentMousePos: Point2D;
    snapPoint: Point2D | null;
    primaryPressed: boolean;
    primaryClicked: boolean;
    dragReleased: boolean;
    keepSelection: boolean;
}

/** Editor operations available to interactions. */
export interface InteractionHost {
    selectedPoints: () => ShapePointIndex[];
    clearSelection: () => void;
    selectPoints: (indexes: Iterable<ShapePointIndex>) => void;
    /** Addresses inside a ui rectangle. */
    pointsInUiRect: (rect: Rect) => ShapePointIndex[];
    /** Applies `action` and returns its inverse; recorded in history when `record` is set. */
    applyAction: (action: ShapeAction, record: boolean) => ShapeAction;
    pushHistory: (inverse: ShapeAction, label: string) => void;
    undo: () => boolean;
    addPoint: (position: Point2D) => void;
    translateView: (delta: Vec2) => void;
    zoomView: (anchor: Point2D, factor: number) => void;
    shapeConstructor: (name: string) => ShapeConstructor | null;
    /** Stroke given to shapes created by interactions. */
    creationStroke: () => Stroke;
    paintSelectionRect: (rect: Rect) => void;
    paintShapePreview: (shape: Shape | null, points: readonly Point2D[]) => void;
}

// =============================================================================
// Factories
// =============================================================================

export function moveSelectedPoints(position: Point2D): MoveSelectedPointsInteraction {
    return { type: 'move-selected-points', startPos: { ...position }, endPos: { ...position }, undo: [] };
}

export function rubberBand(position: Point2D): RubberBandInteraction {
    return { type: 'rubber-band', rect: { min: { ...position }, max: { ...position } } };
}

export function pan(position: Point2D): PanInteraction {
    return { type: 'pan', lastPos: { ...position } };
}

export function addPointsThenShape(constructorName: string): AddPointsThenShapeInteraction {
    return { type: 'add-points-then-shape', constructorName, points: [] };
}

/** Interactions that follow a held pointer button. */
export function isDragInteraction(interaction: Interaction): boolean {
    return interaction.type === 'move-selected-points' || interaction.type === 'rubber-band' || interaction.type === 'pan';
}

// =============================================================================
// Update
// =============================================================================

function dragEnded(frame: InteractionFrame): boolean {
    return frame.dragReleased || frame.primaryPressed;
}

/** Sums two translation lists per address. */
function mergeTranslations(a: readonly PointTranslation[], b: readonly PointTranslation[]): PointTranslation[] {
    const merged = new Map<string, PointTranslation>();
    for (const entry of [...a, ...b]) {
        const key = shapePointKey(entry.index);
        const existing = merged.get(key);
        merged.set(key, {
            index: { ...entry.index },
            translation: existing ? add(existing.translation, entry.translation) : { ...entry.translation },
        });
    }
    return [...merged.values()];
}

function updateMoveSelectedPoints(
    interaction: MoveSelectedPointsInteraction,
    host: InteractionHost,
    frame: InteractionFrame
): MoveSelectedPointsInteraction | null {
    let next = interaction;
    if (!pointsEqual(interaction.endPos, frame.contentMousePos)) {
        const target = frame.snapPoint ?? frame.contentMousePos;
        const inverse = host.applyAction(moveShapePointsBy(host.selectedPoints(), sub(target, interaction.endPos)), false);
        next = {
            ...interaction,
            endPos: { ...target },
            undo: inverse.type === 'move-shape-points' ? mergeTranslations(interaction.undo, inverse.translations) : interaction.undo,
        };
    }

    if (!dragEnded(frame)) return next;

    const undo = next.undo.filter((entry) => !isZeroVec(entry.translation));
    if (!pointsEqual(next.endPos, next.startPos) && host.selectedPoints().length > 0 && undo.length > 0) {
        host.pushHistory(moveShapePoints(undo), 'Move');
    }
    return null;
}

function updateRubberBand(
    interaction: RubberBandInteraction,
    host: InteractionHost,
    frame: InteractionFrame
): RubberBandInteraction | null {
    if (!frame.keepSelection) {
        host.clearSelection();
    }
    host.selectPoints(host.pointsInUiRect(normalizeRect(interaction.rect)));
    host.paintSelectionRect(interaction.rect);

    if (dragEnded(frame)) return null;
    return { ...interaction, rect: { min: interaction.rect.min, max: { ...frame.mousePos } } };
}

function updatePan(interaction: PanInteraction, host: InteractionHost, frame: InteractionFrame): PanInteraction | null {
    const delta = sub(frame.mousePos, interaction.lastPos);
    if (!isZeroVec(delta)) {
        host.translateView(delta);
    }
    if (dragEnded(frame)) return null;
    return { ...interaction, lastPos: { ...frame.mousePos } };
}

function updateAddPointsThenShape(
    interaction: AddPointsThenShapeInteraction,
    host: InteractionHost,
    frame: InteractionFrame
): AddPointsThenShapeInteraction | null {
    const shapeConstructor = host.shapeConstructor(interaction.constructorName);
    if (!shapeConstructor) return null;

    const points = frame.primaryClicked
        ? [...interaction.points, { ...(frame.snapPoint ?? frame.contentMousePos) }]
        : interaction.points;

    if (points.length >= shapeConstructor.pointCount) {
        const shape = shapeConstructor.build(points, host.creationStroke());
        if (shape) {
            host.applyAction(insertShape(shape), true);
        }
        return null;
    }

    const previewPoints = [...points, frame.snapPoint ?? frame.contentMousePos];
    host.paintShapePreview(shapeConstructor.build(previewPoints, host.creationStroke()), points);
    return points === interaction.points ? interaction : { ...interaction, points };
}

export function updateInteraction(
    interaction: Interaction,
    host: InteractionHost,
    frame: InteractionFrame
): Interaction | null {
    switch (interaction.type) {
        case 'move-selected-points':
            return updateMoveSelectedPoints(interaction, host, frame);
        case 'rubber-band':
            return updateRubberBand(interaction, host, frame);
        case 'pan':
            return updatePan(interaction, host, frame);
        case 'scroll':
            host.translateView(interaction.delta);
            return null;
        case 'zoom':
            host.zoomView(interaction.anchor, interaction.factor);
            return null;
        case 'add-points-then-shape':
            return updateAddPointsThenShape(interaction, host, frame);
        case 'add-point-then-extend':
            host.addPoint(interaction.position);
            return null;
        case 'delete-selected-points':
            host.applyAction(removeShapePoints(host.selectedPoints()), true);
            return null;
        case 'undo':
            host.undo();
            return null;
    }
}
