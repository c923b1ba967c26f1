/**
 * Shape Editor
 *
 * Frame driver tying the action engine, interactions, snapping and
 * painting together. The host owns the document and calls `update` once
 * per frame with an input snapshot and a render sink; state that must
 * survive between frames lives in the editor store.
 */

import { addPathPoint } from '../actions/add-shape-points';
import { actionLabel, applyShapeAction } from '../actions/apply';
import { applyShapeParams, applyShapeParamsFromCommon } from '../actions/apply-shape-params';
import { insertShape } from '../actions/insert-shape';
import type { ShapeAction } from '../actions/types';
import type { Constraint } from '../constraints';
import { ConstraintList } from '../constraints';
import type { ViewTransform } from '../interaction/canvas-transform';
import {
    canvasToContent,
    contentToUi,
    contentViewport,
    uiToContent,
    uiToContentLength,
} from '../interaction/canvas-transform';
import type { FrameInput } from '../interaction/input';
import type { Interaction, InteractionFrame, InteractionHost } from '../interaction/interactions';
import {
    addPointsThenShape,
    moveSelectedPoints,
    pan,
    rubberBand,
    updateInteraction,
} from '../interaction/interactions';
import type { KeyboardAction } from '../interaction/keyboard';
import { addsPoint, KEYBOARD_ACTIONS, keepsSelection, togglesSnap } from '../interaction/keyboard';
import type { ShapeConstructor } from '../interaction/shape-constructors';
import { DEFAULT_SHAPE_CONSTRUCTORS } from '../interaction/shape-constructors';
import {
    backgroundShape,
    borderShape,
    controlPointShape,
    gridShape,
    previewPointsShape,
    rulersShape,
    selectionRectShape,
    snapHighlightShape,
} from '../render/paint';
import type { RenderSink } from '../render/render-sink';
import type { EditorStyle } from '../render/style';
import { LIGHT_STYLE } from '../render/style';
import { transformShape } from '../render/transform-shape';
import { Selection } from '../selection';
import { cubicBezierFromTwoPoints, quadraticBezierFromTwoPoints } from '../shapes/builders';
import type { CommonShapeParams, IndexedShapeParams, ShapeParams } from '../shapes/params';
import { commonParams, extractShapesParams } from '../shapes/params';
import { lastShapePointIndex } from '../shapes/queries';
import { isSameShapePointIndex, nextPoint, ShapePointMap } from '../shapes/shape-point-index';
import { ShapeControlPoints } from '../spatial/control-points';
import { GridIndex } from '../spatial/grid';
import type { EditorMemory } from '../store/editorMemory';
import type { EditorStore } from '../store/editorStore';
import { createEditorStore } from '../store/editorStore';
import type { Point2D, Rect, Shape, ShapeControlPoint, ShapeDocument, ShapePointIndex } from '../types';
import { isZeroVec, rectContains, rectFromTwoPoints, sub } from '../utils/geometry';

import { createEditorEvents } from './events';
import type { EditorEvents } from './events';
import type { EditorOptions, EditorOptionsInput } from './options';
import { resolveEditorOptions } from './options';

// =============================================================================
// Types
// =============================================================================

export interface ShapeEditorConfig {
    options?: EditorOptionsInput;
    style?: EditorStyle;
    /** Existing state to continue from; a fresh store is created otherwise. */
    store?: EditorStore;
    shapeConstructors?: Record<string, ShapeConstructor>;
}

/** Everything computed once per frame and shared by the frame steps. */
interface FrameContext {
    document: ShapeDocument;
    input: FrameInput;
    sink: RenderSink;
    canvas: Rect;
    /** Pointer over the canvas itself, ui coordinates. */
    canvasHoverPos: Point2D | null;
    interaction: InteractionFrame;
    /** Overlays painted by interactions, flushed above the control points. */
    overlays: Shape[];
}

// =============================================================================
// Shape Editor
// =============================================================================

export class ShapeEditor {
    readonly options: EditorOptions;
    readonly style: EditorStyle;
    readonly store: EditorStore;
    readonly events: EditorEvents;
    private readonly shapeConstructors: Map<string, ShapeConstructor>;
    private controlPoints: ShapeControlPoints = ShapeControlPoints.empty();
    private controlPointsRoot: Shape | null = null;
    private controlPointsDirty = true;
    private selectionTrackingDepth = 0;

    constructor(config: ShapeEditorConfig = {}) {
        this.options = resolveEditorOptions(config.options);
        this.style = config.style ?? LIGHT_STYLE;
        this.store =
            config.store ??
            createEditorStore({ maxHistoryEntries: this.options.maxHistoryEntries, devtools: this.options.devtools });
        this.events = createEditorEvents();
        this.shapeConstructors = new Map(Object.entries({ ...DEFAULT_SHAPE_CONSTRUCTORS, ...config.shapeConstructors }));
    }

    /** Editor continuing the state kept in `memory` under `id`. */
    static fromMemory(memory: EditorMemory, id: string, config: Omit<ShapeEditorConfig, 'store'> = {}): ShapeEditor {
        const options = resolveEditorOptions(config.options);
        const store = memory.loadOrCreate(id, {
            maxHistoryEntries: options.maxHistoryEntries,
            devtools: options.devtools,
        });
        return new ShapeEditor({ ...config, store });
    }

    // =========================================================================
    // State
    // =========================================================================

    get selection(): ShapePointIndex[] {
        return this.store.getState().selectedPoints.map((index) => ({ ...index }));
    }

    get historySize(): number {
        return this.store.getState().history.length;
    }

    get view(): ViewTransform {
        const { view } = this.store.getState();
        return { scale: view.scale, translation: { ...view.translation } };
    }

    setView(view: ViewTransform): void {
        if (!Number.isFinite(view.scale) || view.scale <= 0) {
            throw new Error(`Invalid view scale: ${view.scale}`);
        }
        this.store.getState().setView(view);
    }

    setSelection(indexes: Iterable<ShapePointIndex>): void {
        this.trackSelection(() => this.store.getState().setSelectedPoints(indexes));
    }

    clearSelection(): void {
        this.trackSelection(() => this.store.getState().clearSelection());
    }

    lastActionLabel(): string | null {
        return this.store.getState().lastHistoryLabel();
    }

    /** Text of the context-menu undo entry, null when there is nothing to undo. */
    undoMenuLabel(): string | null {
        const label = this.lastActionLabel();
        return label === null ? null : `Undo '${label}'`;
    }

    addConstraint(constraint: Constraint): boolean {
        return this.store.getState().addConstraint(constraint);
    }

    removeConstraint(constraint: Constraint): boolean {
        return this.store.getState().removeConstraint(constraint);
    }

    setManualSnap(x: number | null, y: number | null): void {
        this.store.getState().setManualSnap(x, y);
    }

    registerShapeConstructor(name: string, shapeConstructor: ShapeConstructor): void {
        if (!Number.isInteger(shapeConstructor.pointCount) || shapeConstructor.pointCount < 1) {
            throw new Error(`Shape constructor "${name}" needs a positive point count`);
        }
        this.shapeConstructors.set(name, shapeConstructor);
    }

    shapeConstructorNames(): string[] {
        return [...this.shapeConstructors.keys()];
    }

    // =========================================================================
    // Actions
    // =========================================================================

    /** Applies `action`, records its inverse and returns it. */
    applyAction(document: ShapeDocument, action: ShapeAction): ShapeAction {
        return this.trackSelection(() => this.runAction(document, action, true));
    }

    /** Reverts the newest history entry. Returns false when history is empty. */
    undo(document: ShapeDocument): boolean {
        return this.trackSelection(() => {
            const entry = this.store.getState().popHistory();
            if (!entry) return false;
            this.runAction(document, entry.inverse, false);
            this.events.emit('undone', { label: entry.label });
            return true;
        });
    }

    selectionShapesParams(document: ShapeDocument): IndexedShapeParams[] {
        return extractShapesParams(document, Selection.from(this.store.getState().selectedPoints).shapes());
    }

    selectionCommonParams(document: ShapeDocument): CommonShapeParams {
        return commonParams(this.selectionShapesParams(document));
    }

    applyShapesParams(document: ShapeDocument, shapes: Iterable<IndexedShapeParams>): ShapeAction {
        return this.applyAction(document, applyShapeParams(shapes));
    }

    /** Applies `params` to every shape touched by the selection. */
    applyCommonShapesParams(document: ShapeDocument, params: ShapeParams): ShapeAction {
        const shapeIndexes = Selection.from(this.store.getState().selectedPoints).shapes();
        return this.applyAction(document, applyShapeParamsFromCommon(params, shapeIndexes));
    }

    /**
     * Extends the shape of the single selected path point towards
     * `position`: paths get a point after it, Bezier curves a
     * tangent-continuous curve starting at it. Returns false when the
     * selection does not allow it.
     */
    addPoint(document: ShapeDocument, position: Point2D): boolean {
        this.controlPointsDirty = true;
        return this.trackSelection(() => this.handleAddPoint(document, position));
    }

    /**
     * Drops a degenerate shape of `kind` at the last pointer position,
     * selects its last point and starts dragging it.
     */
    insertShapeAtPointer(document: ShapeDocument, kind: string): boolean {
        const shapeConstructor = this.shapeConstructors.get(kind);
        if (!shapeConstructor) return false;

        const state = this.store.getState();
        const position = canvasToContent(state.view, state.lastCanvasPointerPos);
        const shape = shapeConstructor.build([position, position], this.options.stroke);
        if (!shape) return false;

        return this.trackSelection(() => {
            this.runAction(document, insertShape(shape), true);
            const last = lastShapePointIndex(document.root);
            if (!last) return false;
            this.store.getState().setSelectedPoints([last]);
            this.store.getState().setDrag(moveSelectedPoints(position));
            return true;
        });
    }

    /** Starts collecting clicks for a registered shape constructor. */
    beginShapeCreation(kind: string): boolean {
        if (!this.shapeConstructors.has(kind)) return false;
        this.store.getState().addInteraction(addPointsThenShape(kind));
        return true;
    }

    // =========================================================================
    // Frame
    // =========================================================================

    update(document: ShapeDocument, input: FrameInput, sink: RenderSink): void {
        this.trackSelection(() => this.runFrame(document, input, sink));
    }

    private runFrame(document: ShapeDocument, input: FrameInput, sink: RenderSink): void {
        // The host may have edited the document since the last frame
        this.controlPointsDirty = true;
        const store = this.store;
        const { options, style } = this;
        const { pointer, modifiers } = input;
        const canvas: Rect = {
            min: { x: input.rect.min.x + style.rulers.width, y: input.rect.min.y + style.rulers.width },
            max: { ...input.rect.max },
        };
        const canvasHoverPos = pointer.hoverPos && rectContains(canvas, pointer.hoverPos) ? pointer.hoverPos : null;
        const mousePos = pointer.hoverPos ?? store.getState().lastPointerPos;
        const startView = store.getState().view;

        const ctx: FrameContext = {
            document,
            input,
            sink,
            canvas,
            canvasHoverPos,
            interaction: {
                mousePos,
                contentMousePos: uiToContent(startView, canvas, mousePos),
                snapPoint: store.getState().snap.snapPoint,
                primaryPressed: pointer.primaryPressed,
                primaryClicked: pointer.primaryClicked,
                dragReleased: pointer.dragReleased,
                keepSelection: keepsSelection(modifiers),
            },
            overlays: [],
        };
        const host = this.createHost(ctx);

        sink.add(backgroundShape(canvas, style.canvasBackground));

        // Keyboard commands, or ctrl-click to add a point
        const keyboardAction = KEYBOARD_ACTIONS.find((action) => input.consumeShortcut(options.keyboardShortcuts[action]));
        if (keyboardAction) {
            updateInteraction(keyboardInteraction(keyboardAction, ctx.interaction.contentMousePos), host, ctx.interaction);
        } else if (addsPoint(modifiers) && pointer.primaryClicked) {
            const position = ctx.interaction.snapPoint ?? ctx.interaction.contentMousePos;
            updateInteraction({ type: 'add-point-then-extend', position }, host, ctx.interaction);
        }

        this.updateSnap(ctx, startView);

        // Drag in progress, ending on release
        const drag = store.getState().drag;
        if (drag) {
            store.getState().setDrag(updateInteraction(drag, host, ctx.interaction));
        }

        if (!isZeroVec(input.scrollDelta)) {
            store.getState().addInteraction({
                type: 'scroll',
                delta: { x: input.scrollDelta.x * options.scrollFactor.x, y: input.scrollDelta.y * options.scrollFactor.y },
            });
        }
        if (canvasHoverPos && input.zoomDelta !== 1) {
            store.getState().addInteraction({
                type: 'zoom',
                factor: Math.pow(input.zoomDelta, options.zoomFactor),
                anchor: sub(canvasHoverPos, canvas.min),
            });
        }
        const remaining: Interaction[] = [];
        for (const interaction of store.getState().interactions) {
            const next = updateInteraction(interaction, host, ctx.interaction);
            if (next) remaining.push(next);
        }
        store.getState().setInteractions(remaining);

        const view = store.getState().view;
        const toUi = (p: Point2D) => contentToUi(view, canvas, p);
        const controlPoints = this.collectControlPoints(document);
        const hovered = canvasHoverPos
            ? controlPoints.pointsInRadius(uiToContent(view, canvas, canvasHoverPos), uiToContentLength(view, style.controlPointRadius))
            : new ShapePointMap<ShapeControlPoint>();

        const grid = GridIndex.fromViewport(contentViewport(view, canvas), view.scale);
        sink.add(gridShape(grid, view, canvas, style));
        sink.add(transformShape(document.root, toUi, view.scale));

        this.handlePrimaryPressed(ctx, hovered);

        const selection = Selection.from(store.getState().selectedPoints);
        for (const [index, point] of controlPoints.points.entries()) {
            sink.add(controlPointShape(point, toUi, { hovered: hovered.has(index), selected: selection.has(index) }, style));
        }
        for (const overlay of ctx.overlays) {
            sink.add(overlay);
        }
        const highlight = snapHighlightShape(store.getState().snap, view, canvas, style);
        if (highlight) sink.add(highlight);
        sink.add(borderShape(canvas, style.borderStroke));

        this.handleDragStarted(ctx);

        store.getState().setLastPointer(pointer.hoverPos, canvasHoverPos ? sub(canvasHoverPos, canvas.min) : null);

        sink.add(rulersShape(grid, view, input.rect, style));
    }

    private updateSnap(ctx: FrameContext, view: ViewTransform): void {
        const state = this.store.getState();
        if (this.options.snapEnabledByDefault !== togglesSnap(ctx.input.modifiers)) {
            state.updateSnap(ctx.interaction.contentMousePos, uiToContentLength(view, this.options.snapDistance), {
                controlPoints: this.collectControlPoints(ctx.document),
                grid: GridIndex.fromViewport(contentViewport(view, ctx.canvas), view.scale),
                ignore: state.selectedPoints,
            });
        } else {
            state.clearSnap();
        }
        ctx.interaction.snapPoint = this.store.getState().snap.snapPoint;
    }

    /**
     * Press over handles: selects the hovered handle after the single
     * selected one, cycling through overlapping handles on repeated presses.
     */
    private handlePrimaryPressed(ctx: FrameContext, hovered: ShapePointMap<ShapeControlPoint>): void {
        const state = this.store.getState();
        const { pointer, modifiers } = ctx.input;
        if (!ctx.canvasHoverPos || !pointer.primaryPressed || state.drag !== null) return;

        const hoveredIndexes = hovered.keys();
        const selection = Selection.from(state.selectedPoints);
        const single = selection.single();
        let nextSelected: ShapePointIndex | null = null;
        if (single) {
            const position = hoveredIndexes.findIndex((index) => isSameShapePointIndex(index, single));
            nextSelected = position >= 0 ? hoveredIndexes[position + 1] ?? null : null;
        }

        const keep =
            keepsSelection(modifiers) ||
            addsPoint(modifiers) ||
            (pointer.dragStarted && hoveredIndexes.some((index) => selection.has(index)));
        if (!keep) {
            state.clearSelection();
        }
        const toSelect = nextSelected ?? hoveredIndexes[0];
        if (toSelect) {
            this.store.getState().selectPoints([toSelect]);
        }
    }

    private handleDragStarted(ctx: FrameContext): void {
        const state = this.store.getState();
        const { pointer, modifiers } = ctx.input;
        if (!pointer.dragStarted || state.drag !== null) return;

        if (pointer.dragButton === 'primary') {
            if (!keepsSelection(modifiers)) {
                const closest = this.collectControlPoints(ctx.document).closestOf(
                    ctx.interaction.contentMousePos,
                    state.selectedPoints
                );
                if (closest) {
                    state.setDrag(moveSelectedPoints(closest.position));
                    return;
                }
            }
            state.setDrag(rubberBand(ctx.interaction.mousePos));
        } else if (pointer.dragButton === 'secondary') {
            state.setDrag(pan(ctx.interaction.mousePos));
        }
    }

    private handleAddPoint(document: ShapeDocument, position: Point2D): boolean {
        const state = this.store.getState();
        const single = Selection.from(state.selectedPoints).single();
        if (!single) return false;

        const controlPoints = this.collectControlPoints(document);
        const point = controlPoints.byIndex(single);
        if (!point || point.type !== 'path-point') return false;

        const kind = controlPoints.shapeKind(single);
        switch (kind) {
            case 'path': {
                const added = nextPoint(single);
                this.runAction(document, addPathPoint(added, position), true);
                this.store.getState().setSelectedPoints([added]);
                return true;
            }
            case 'quadratic-bezier':
            case 'cubic-bezier': {
                const previousControl = controlPoints.connectedBezierControlPoint(single);
                const build = kind === 'quadratic-bezier' ? quadraticBezierFromTwoPoints : cubicBezierFromTwoPoints;
                this.runAction(
                    document,
                    insertShape(build(point.position, previousControl, position, this.options.stroke)),
                    true
                );
                const last = lastShapePointIndex(document.root);
                if (last) this.store.getState().setSelectedPoints([last]);
                return true;
            }
            default:
                return false;
        }
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private runAction(document: ShapeDocument, action: ShapeAction, record: boolean): ShapeAction {
        const state = this.store.getState();
        const selection = Selection.from(state.selectedPoints);
        const label = actionLabel(action);
        const constraints = new ConstraintList(state.constraints);
        const inverse = applyShapeAction(action, document, { constraints, selection });
        this.controlPointsDirty = true;
        this.store.getState().setSelectedPoints(selection.toArray());
        if (constraints.changed) this.store.getState().setConstraints(constraints.toArray());
        if (record) {
            this.store.getState().pushHistory(inverse, label);
            this.events.emit('actionApplied', { label, inverse });
        }
        return inverse;
    }

    /** Control points of `document`, recollected after edits or a root swap. */
    private collectControlPoints(document: ShapeDocument): ShapeControlPoints {
        if (this.controlPointsDirty || this.controlPointsRoot !== document.root) {
            this.controlPoints = ShapeControlPoints.collect(document.root);
            this.controlPointsRoot = document.root;
            this.controlPointsDirty = false;
        }
        return this.controlPoints;
    }

    private createHost(ctx: FrameContext): InteractionHost {
        const store = this.store;
        return {
            selectedPoints: () => store.getState().selectedPoints.map((index) => ({ ...index })),
            clearSelection: () => store.getState().clearSelection(),
            selectPoints: (indexes) => store.getState().selectPoints(indexes),
            pointsInUiRect: (rect) => {
                const view = store.getState().view;
                const contentRect = rectFromTwoPoints(
                    uiToContent(view, ctx.canvas, rect.min),
                    uiToContent(view, ctx.canvas, rect.max)
                );
                return this.collectControlPoints(ctx.document)
                    .findPointsInRect(contentRect)
                    .map((point) => point.index);
            },
            applyAction: (action, record) => this.runAction(ctx.document, action, record),
            pushHistory: (inverse, label) => {
                store.getState().pushHistory(inverse, label);
                this.events.emit('actionApplied', { label, inverse });
            },
            undo: () => this.undo(ctx.document),
            addPoint: (position) => {
                this.handleAddPoint(ctx.document, position);
            },
            translateView: (delta) => store.getState().translateView(delta),
            zoomView: (anchor, factor) => store.getState().zoomView(anchor, factor, this.options.scalingRange),
            shapeConstructor: (name) => this.shapeConstructors.get(name) ?? null,
            creationStroke: () => ({ ...this.options.stroke }),
            paintSelectionRect: (rect) => {
                ctx.overlays.push(selectionRectShape(rect, this.style));
            },
            paintShapePreview: (shape, points) => {
                const view = store.getState().view;
                const toUi = (p: Point2D) => contentToUi(view, ctx.canvas, p);
                if (shape) ctx.overlays.push(transformShape(shape, toUi, view.scale));
                ctx.overlays.push(previewPointsShape(points.map(toUi), this.style));
            },
        };
    }

    /** Runs `fn` and emits `selectionChanged` once if the selection differs afterwards. */
    private trackSelection<T>(fn: () => T): T {
        const before = this.store.getState().selectedPoints;
        this.selectionTrackingDepth += 1;
        try {
            return fn();
        } finally {
            this.selectionTrackingDepth -= 1;
            const after = this.store.getState().selectedPoints;
            if (this.selectionTrackingDepth === 0 && !Selection.from(before).equals(Selection.from(after))) {
                this.events.emit('selectionChanged', { selection: after.map((index) => ({ ...index })) });
            }
        }
    }
}

function keyboardInteraction(action: KeyboardAction, contentMousePos: Point2D): Interaction {
    switch (action) {
        case 'add-point':
            return { type: 'add-point-then-extend', position: { ...contentMousePos } };
        case 'delete-point':
            return { type: 'delete-selected-points' };
        case 'undo':
            return { type: 'undo' };
    }
}
