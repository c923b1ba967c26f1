import { describe, expect, it } from 'vitest';

import { applyShapeParamsFromCommon, moveShapePointsBy, removeShapePoints } from '../src/actions';
import { linkFromTo } from '../src/constraints';
import { ShapeEditor } from '../src/editor';
import type { ShapeEditorConfig } from '../src/editor';
import { ShapeListSink } from '../src/render';
import { EditorMemory } from '../src/store';
import type { Shape, ShapeDocument, ShapePointIndex } from '../src/types';

import type { FrameInputOverrides } from './test-utils';
import {
    buildCircle,
    buildPath,
    buildQuadratic,
    childAt,
    expectPointClose,
    frameInput,
    idx,
    pathPoints,
    toPoint,
    ui,
} from './test-utils';

function createEditor(config: ShapeEditorConfig = {}): ShapeEditor {
    return new ShapeEditor({ ...config, options: { snapEnabledByDefault: false, ...config.options } });
}

function frame(editor: ShapeEditor, document: ShapeDocument, overrides: FrameInputOverrides = {}): ShapeListSink {
    const sink = new ShapeListSink();
    editor.update(document, frameInput(overrides), sink);
    return sink;
}

function documentOf(...shapes: Shape[]): ShapeDocument {
    return { root: { kind: 'group', shapes } };
}

describe('selecting with the pointer', () => {
    it('selects the handle under a press', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(200, 100)]));
        const changes: ShapePointIndex[][] = [];
        editor.events.on('selectionChanged', (event) => changes.push(event.selection));

        frame(editor, document, { pointer: { hoverPos: ui(102, 101), primaryPressed: true } });
        expect(editor.selection).toEqual([idx(0, 0)]);
        expect(changes).toEqual([[idx(0, 0)]]);

        frame(editor, document, { pointer: { hoverPos: ui(300, 250), primaryPressed: true } });
        expect(editor.selection).toEqual([]);
    });

    it('cycles through overlapping handles on repeated presses', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(100, 100)]));
        const press = { pointer: { hoverPos: ui(100, 100), primaryPressed: true } };

        frame(editor, document, press);
        expect(editor.selection).toEqual([idx(0, 0)]);
        frame(editor, document, press);
        expect(editor.selection).toEqual([idx(0, 1)]);
        frame(editor, document, press);
        expect(editor.selection).toEqual([idx(0, 0)]);
    });

    it('adds to the selection while shift is held', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(200, 100)]));
        frame(editor, document, { pointer: { hoverPos: ui(100, 100), primaryPressed: true } });
        frame(editor, document, { pointer: { hoverPos: ui(200, 100), primaryPressed: true }, modifiers: { shift: true } });
        expect(editor.selection).toEqual([idx(0, 0), idx(0, 1)]);
    });

    it('selects every handle inside a rubber band', () => {
        const editor = createEditor();
        const document = documentOf(
            buildPath([toPoint(100, 100), toPoint(200, 100)]),
            buildPath([toPoint(300, 250), toPoint(350, 250)])
        );

        frame(editor, document, { pointer: { hoverPos: ui(50, 50), dragStarted: true, dragButton: 'primary' } });
        expect(editor.store.getState().drag?.type).toBe('rubber-band');

        frame(editor, document, { pointer: { hoverPos: ui(250, 150) } });
        expect(editor.selection).toEqual([]);

        frame(editor, document, { pointer: { hoverPos: ui(250, 150), dragReleased: true } });
        expect(editor.selection).toEqual([idx(0, 0), idx(0, 1)]);
        expect(editor.store.getState().drag).toBeNull();
    });
});

describe('dragging points', () => {
    it('moves the selection and records one history entry on release', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(200, 100)]));

        frame(editor, document, { pointer: { hoverPos: ui(100, 100), primaryPressed: true } });
        frame(editor, document, { pointer: { hoverPos: ui(104, 100), dragStarted: true, dragButton: 'primary' } });
        expect(editor.store.getState().drag?.type).toBe('move-selected-points');

        frame(editor, document, { pointer: { hoverPos: ui(120, 110) } });
        expect(pathPoints(childAt(document.root, 0))[0]).toEqual(toPoint(120, 110));
        expect(editor.historySize).toBe(0);

        frame(editor, document, { pointer: { hoverPos: ui(130, 90) } });
        frame(editor, document, { pointer: { hoverPos: ui(130, 90), dragReleased: true } });
        expect(pathPoints(childAt(document.root, 0))[0]).toEqual(toPoint(130, 90));
        expect(editor.historySize).toBe(1);
        expect(editor.undoMenuLabel()).toBe("Undo 'Move'");

        expect(editor.undo(document)).toBe(true);
        expect(pathPoints(childAt(document.root, 0))[0]).toEqual(toPoint(100, 100));
        expect(editor.undo(document)).toBe(false);
    });

    it('moves linked points along and undoes them together', () => {
        const editor = createEditor();
        const document = documentOf(
            buildPath([toPoint(100, 100), toPoint(200, 100)]),
            buildPath([toPoint(100, 200), toPoint(200, 200)])
        );
        editor.addConstraint({ type: 'link-from-to', from: idx(0, 0), to: idx(1, 0) });

        frame(editor, document, { pointer: { hoverPos: ui(100, 100), primaryPressed: true } });
        frame(editor, document, { pointer: { hoverPos: ui(100, 100), dragStarted: true, dragButton: 'primary' } });
        frame(editor, document, { pointer: { hoverPos: ui(110, 100) } });
        frame(editor, document, { pointer: { hoverPos: ui(110, 100), dragReleased: true } });
        expect(pathPoints(childAt(document.root, 1))[0]).toEqual(toPoint(110, 200));

        editor.undo(document);
        expect(pathPoints(childAt(document.root, 0))[0]).toEqual(toPoint(100, 100));
        expect(pathPoints(childAt(document.root, 1))[0]).toEqual(toPoint(100, 200));
    });

    it('keeps links on the same points across removals and undo', () => {
        const editor = createEditor();
        const document = documentOf(
            buildPath([toPoint(100, 100), toPoint(150, 100), toPoint(200, 100)]),
            buildPath([toPoint(100, 200), toPoint(200, 200)])
        );
        editor.addConstraint(linkFromTo(idx(0, 2), idx(1, 0)));

        editor.applyAction(document, removeShapePoints([idx(0, 1)]));
        expect(editor.store.getState().constraints).toEqual([linkFromTo(idx(0, 1), idx(1, 0))]);

        editor.applyAction(document, moveShapePointsBy([idx(0, 1)], toPoint(0, 10)));
        expect(pathPoints(childAt(document.root, 1))[0]).toEqual(toPoint(100, 210));

        editor.undo(document);
        editor.undo(document);
        expect(pathPoints(childAt(document.root, 0))).toEqual([toPoint(100, 100), toPoint(150, 100), toPoint(200, 100)]);
        expect(editor.store.getState().constraints).toEqual([linkFromTo(idx(0, 2), idx(1, 0))]);
    });

    it('snaps the dragged point', () => {
        const editor = new ShapeEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(212, 137)]));

        frame(editor, document, { pointer: { hoverPos: ui(212, 137), primaryPressed: true } });
        frame(editor, document, { pointer: { hoverPos: ui(212, 137), dragStarted: true, dragButton: 'primary' } });
        frame(editor, document, { pointer: { hoverPos: ui(103, 148) } });
        frame(editor, document, { pointer: { hoverPos: ui(103, 148), dragReleased: true } });
        expect(pathPoints(childAt(document.root, 0))[1]).toEqual(toPoint(100, 150));
    });

    it('does not snap while alt is held', () => {
        const editor = new ShapeEditor();
        const document = documentOf(buildPath([toPoint(100, 100), toPoint(212, 137)]));
        frame(editor, document, { pointer: { hoverPos: ui(103, 148) }, modifiers: { alt: true } });
        expect(editor.store.getState().snap.snapPoint).toBeNull();

        frame(editor, document, { pointer: { hoverPos: ui(103, 148) } });
        expect(editor.store.getState().snap.snapPoint).toEqual(toPoint(100, 150));
    });
});

describe('view navigation', () => {
    it('pans with a secondary drag', () => {
        const editor = createEditor();
        const document = documentOf();
        frame(editor, document, { pointer: { hoverPos: toPoint(100, 100), dragStarted: true, dragButton: 'secondary' } });
        frame(editor, document, { pointer: { hoverPos: toPoint(130, 90) } });
        expect(editor.view.translation).toEqual(toPoint(30, -10));

        frame(editor, document, { pointer: { hoverPos: toPoint(130, 90), dragReleased: true } });
        expect(editor.store.getState().drag).toBeNull();
    });

    it('scrolls by the scaled scroll delta', () => {
        const editor = createEditor();
        frame(editor, documentOf(), { scrollDelta: toPoint(10, -20) });
        expectPointClose(editor.view.translation, toPoint(1, -2));
    });

    it('zooms around the pointer and clamps to the scaling range', () => {
        const editor = createEditor({ options: { zoomFactor: 1 } });
        frame(editor, documentOf(), { pointer: { hoverPos: ui(200, 100) }, zoomDelta: 2 });
        expect(editor.view).toEqual({ scale: 2, translation: toPoint(-200, -100) });

        frame(editor, documentOf(), { pointer: { hoverPos: ui(200, 100) }, zoomDelta: 100 });
        expect(editor.view.scale).toBe(10);
    });

    it('ignores zoom while the pointer is over the rulers', () => {
        const editor = createEditor({ options: { zoomFactor: 1 } });
        frame(editor, documentOf(), { pointer: { hoverPos: toPoint(5, 5) }, zoomDelta: 2 });
        expect(editor.view.scale).toBe(1);
    });
});

describe('keyboard commands', () => {
    it('deletes the selected points and undoes the deletion', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(0, 0), toPoint(50, 0), toPoint(100, 0)]));
        editor.setSelection([idx(0, 1)]);

        frame(editor, document, { shortcuts: [{ key: 'Delete', modifiers: {} }] });
        expect(pathPoints(childAt(document.root, 0))).toEqual([toPoint(0, 0), toPoint(100, 0)]);
        expect(editor.selection).toEqual([]);
        expect(editor.lastActionLabel()).toBe('Remove points');

        const undone: string[] = [];
        editor.events.on('undone', (event) => undone.push(event.label));
        frame(editor, document, { shortcuts: [{ key: 'Z', modifiers: { ctrl: true } }] });
        expect(pathPoints(childAt(document.root, 0))).toEqual([toPoint(0, 0), toPoint(50, 0), toPoint(100, 0)]);
        expect(editor.selection).toEqual([idx(0, 1)]);
        expect(undone).toEqual(['Remove points']);
    });

    it('removes a shape that would fall below its point floor', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(0, 0), toPoint(50, 0)]));
        editor.setSelection([idx(0, 0)]);
        frame(editor, document, { shortcuts: [{ key: 'Delete', modifiers: {} }] });
        expect(childAt(document.root, 0)).toEqual({ kind: 'empty' });
    });
});

describe('adding points', () => {
    it('extends a path after the selected point on ctrl-click', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(0, 0), toPoint(100, 0)]));
        editor.setSelection([idx(0, 1)]);

        frame(editor, document, { pointer: { hoverPos: ui(200, 100), primaryClicked: true }, modifiers: { ctrl: true } });
        expect(pathPoints(childAt(document.root, 0))).toEqual([toPoint(0, 0), toPoint(100, 0), toPoint(200, 100)]);
        expect(editor.selection).toEqual([idx(0, 2)]);
        expect(editor.lastActionLabel()).toBe('Add points');
    });

    it('continues a Bezier curve with a tangent-continuous segment', () => {
        const editor = createEditor();
        const quad = buildQuadratic(toPoint(0, 0), toPoint(50, -50), toPoint(100, 0));
        const document: ShapeDocument = { root: quad };
        editor.setSelection([idx(0, 2)]);

        expect(editor.addPoint(document, toPoint(200, 50))).toBe(true);
        const added = childAt(document.root, 1);
        const offset = Math.hypot(100, 50) / 3 / Math.SQRT2;
        expect(added.kind).toBe('quadratic-bezier');
        if (added.kind === 'quadratic-bezier') {
            expect(added.points[0]).toEqual(toPoint(100, 0));
            expectPointClose(added.points[1], toPoint(100 + offset, offset));
            expect(added.points[2]).toEqual(toPoint(200, 50));
        }
        expect(editor.selection).toEqual([idx(1, 2)]);

        editor.undo(document);
        expect(document.root).toBe(quad);
    });

    it('refuses without a single selected path point', () => {
        const editor = createEditor();
        const document = documentOf(buildCircle(toPoint(0, 0), 5));
        expect(editor.addPoint(document, toPoint(1, 1))).toBe(false);

        editor.setSelection([idx(0, 1)]);
        expect(editor.addPoint(document, toPoint(1, 1))).toBe(false);

        editor.setSelection([idx(0, 0)]);
        expect(editor.addPoint(document, toPoint(1, 1))).toBe(false);
        expect(editor.historySize).toBe(0);
    });
});

describe('creating shapes', () => {
    it('collects clicks, previews, then inserts the shape', () => {
        const editor = createEditor();
        const document: ShapeDocument = { root: { kind: 'empty' } };
        expect(editor.beginShapeCreation('line-segment')).toBe(true);

        const sink = frame(editor, document, { pointer: { hoverPos: ui(100, 100), primaryClicked: true } });
        const preview = sink.shapes.filter((shape) => shape.kind === 'line-segment');
        expect(preview).toHaveLength(1);
        expect(preview[0]).toMatchObject({ points: [ui(100, 100), ui(100, 100)] });

        frame(editor, document, { pointer: { hoverPos: ui(200, 150), primaryClicked: true } });
        expect(document.root).toEqual({
            kind: 'group',
            shapes: [{ kind: 'line-segment', points: [toPoint(100, 100), toPoint(200, 150)], stroke: { width: 1, color: '#000000ff' } }],
        });
        expect(editor.lastActionLabel()).toBe('Insert Shape');
        expect(editor.store.getState().interactions).toEqual([]);
    });

    it('rejects unknown constructors', () => {
        const editor = createEditor();
        expect(editor.beginShapeCreation('star')).toBe(false);
        expect(() => editor.registerShapeConstructor('star', { pointCount: 0, build: () => null })).toThrow(
            'Shape constructor "star" needs a positive point count'
        );
    });

    it('drops a shape at the pointer and drags its last point; two undos restore an empty root', () => {
        const editor = createEditor();
        const document: ShapeDocument = { root: { kind: 'empty' } };

        frame(editor, document, { pointer: { hoverPos: ui(100, 50) } });
        expect(editor.insertShapeAtPointer(document, 'rect')).toBe(true);
        expect(editor.selection).toEqual([idx(0, 1)]);

        frame(editor, document, { pointer: { hoverPos: ui(140, 80) } });
        frame(editor, document, { pointer: { hoverPos: ui(140, 80), dragReleased: true } });
        expect(childAt(document.root, 0)).toMatchObject({ min: toPoint(100, 50), max: toPoint(140, 80) });
        expect(editor.store.getState().history.map((entry) => entry.label)).toEqual(['Insert Shape', 'Move']);

        editor.undo(document);
        editor.undo(document);
        expect(document.root).toEqual({ kind: 'empty' });
    });
});

describe('shape parameters through the editor', () => {
    it('reads and writes parameters of the selected shapes', () => {
        const editor = createEditor();
        const document = documentOf(buildPath([toPoint(0, 0), toPoint(1, 1)]), buildCircle(toPoint(5, 5), 2));
        editor.setSelection([idx(0, 1), idx(1, 0)]);
        expect(editor.selectionCommonParams(document)).toMatchObject({ 'stroke-width': 1, radius: 2 });

        editor.applyCommonShapesParams(document, { 'stroke-width': 4 });
        expect(editor.selectionCommonParams(document)).toMatchObject({ 'stroke-width': 4 });
        expect(editor.lastActionLabel()).toBe('Update Parameters');

        editor.undo(document);
        expect(editor.selectionCommonParams(document)).toMatchObject({ 'stroke-width': 1 });
    });

    it('notifies listeners of recorded actions', () => {
        const editor = createEditor();
        const document = documentOf(buildCircle(toPoint(5, 5), 2));
        const labels: string[] = [];
        editor.events.on('actionApplied', (event) => labels.push(event.label));
        editor.applyAction(document, applyShapeParamsFromCommon({ radius: 3 }, [0]));
        expect(labels).toEqual(['Update Parameters']);
    });
});

describe('editor state across frames', () => {
    it('continues from the state kept in memory', () => {
        const memory = new EditorMemory();
        const document = documentOf(buildPath([toPoint(0, 0), toPoint(50, 0), toPoint(100, 0)]));
        const first = ShapeEditor.fromMemory(memory, 'main', { options: { snapEnabledByDefault: false } });
        first.setSelection([idx(0, 1)]);
        frame(first, document, { shortcuts: [{ key: 'Delete', modifiers: {} }] });

        const second = ShapeEditor.fromMemory(memory, 'main');
        expect(second.historySize).toBe(1);
        second.undo(document);
        expect(pathPoints(childAt(document.root, 0))).toHaveLength(3);
    });

    it('rejects a non-positive view scale', () => {
        expect(() => createEditor().setView({ scale: 0, translation: toPoint(0, 0) })).toThrow('Invalid view scale: 0');
    });
});
