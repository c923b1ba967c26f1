import { describe, expect, it } from 'vitest';

import { moveShapePointsBy, NOOP } from '../src/actions';
import { linkFromTo } from '../src/constraints';
import { createEditorStore, EditorMemory } from '../src/store';

import { idx, toPoint } from './test-utils';

describe('history slice', () => {
    it('pops entries newest first', () => {
        const store = createEditorStore();
        store.getState().pushHistory(NOOP, 'First');
        store.getState().pushHistory(moveShapePointsBy([idx(0, 0)], toPoint(1, 1)), 'Move');

        expect(store.getState().lastHistoryLabel()).toBe('Move');
        expect(store.getState().popHistory()?.label).toBe('Move');
        expect(store.getState().popHistory()?.label).toBe('First');
        expect(store.getState().popHistory()).toBeNull();
        expect(store.getState().lastHistoryLabel()).toBeNull();
    });

    it('drops the oldest entries past the configured size', () => {
        const store = createEditorStore({ maxHistoryEntries: 2 });
        store.getState().pushHistory(NOOP, 'One');
        store.getState().pushHistory(NOOP, 'Two');
        store.getState().pushHistory(NOOP, 'Three');
        expect(store.getState().history.map((entry) => entry.label)).toEqual(['Two', 'Three']);

        store.getState().clearHistory();
        expect(store.getState().history).toEqual([]);
    });

    it('keeps at least one entry', () => {
        expect(createEditorStore({ maxHistoryEntries: 0 }).getState().maxHistoryEntries).toBe(1);
    });
});

describe('selection slice', () => {
    it('stores a sorted, duplicate-free selection', () => {
        const store = createEditorStore();
        store.getState().setSelectedPoints([idx(2, 0), idx(0, 1), idx(2, 0)]);
        store.getState().selectPoints([idx(1, 0), idx(0, 1)]);
        expect(store.getState().selectedPoints).toEqual([idx(0, 1), idx(1, 0), idx(2, 0)]);

        store.getState().deselectPoint(idx(1, 0));
        expect(store.getState().selectedPoints).toEqual([idx(0, 1), idx(2, 0)]);

        store.getState().clearSelection();
        expect(store.getState().selectedPoints).toEqual([]);
    });
});

describe('constraints slice', () => {
    it('adds each constraint once and removes it by value', () => {
        const store = createEditorStore();
        expect(store.getState().addConstraint(linkFromTo(idx(0, 0), idx(1, 0)))).toBe(true);
        expect(store.getState().addConstraint(linkFromTo(idx(0, 0), idx(1, 0)))).toBe(false);
        expect(store.getState().constraintIndex().propagation.get(idx(0, 0))?.values()).toEqual([idx(1, 0)]);

        expect(store.getState().removeConstraint(linkFromTo(idx(0, 0), idx(1, 0)))).toBe(true);
        expect(store.getState().removeConstraint(linkFromTo(idx(0, 0), idx(1, 0)))).toBe(false);
        expect(store.getState().constraints).toEqual([]);
    });
});

describe('view slice', () => {
    it('pans and zooms around an anchor within the scaling range', () => {
        const store = createEditorStore();
        store.getState().translateView(toPoint(10, -5));
        expect(store.getState().view).toEqual({ scale: 1, translation: toPoint(10, -5) });

        store.getState().zoomView(toPoint(10, -5), 100, { min: 0.5, max: 4 });
        expect(store.getState().view).toEqual({ scale: 4, translation: toPoint(10, -5) });
    });

    it('keeps the last known pointer when it leaves the editor', () => {
        const store = createEditorStore();
        store.getState().setLastPointer(toPoint(30, 40), toPoint(14, 24));
        store.getState().setLastPointer(null, null);
        expect(store.getState().lastPointerPos).toEqual(toPoint(30, 40));
        expect(store.getState().lastCanvasPointerPos).toEqual(toPoint(14, 24));
    });
});

describe('snap slice', () => {
    it('pins and releases manual snap values', () => {
        const store = createEditorStore();
        store.getState().setManualSnap(5, null);
        expect(store.getState().snap.manualSnapX).toBe(5);

        store.getState().clearSnap();
        expect(store.getState().snap).toEqual({ targets: [], manualSnapX: null, manualSnapY: null, snapPoint: null });
    });
});

describe('editor memory', () => {
    it('hands out one store per editor id', () => {
        const memory = new EditorMemory();
        const first = memory.loadOrCreate('left');
        first.getState().pushHistory(NOOP, 'Kept');

        expect(memory.loadOrCreate('left')).toBe(first);
        expect(memory.load('left')?.getState().lastHistoryLabel()).toBe('Kept');
        expect(memory.load('right')).toBeNull();
        expect(memory.size).toBe(1);

        expect(memory.delete('left')).toBe(true);
        expect(memory.has('left')).toBe(false);
    });
});
