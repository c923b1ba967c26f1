import { afterEach, describe, expect, it, vi } from 'vitest';

import { createEditorEvents, DEFAULT_EDITOR_OPTIONS, resolveEditorOptions } from '../src/editor';
import { DEFAULT_KEYBOARD_SHORTCUTS, formatShortcut } from '../src/interaction';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('editor options', () => {
    it('merges overrides over the defaults', () => {
        const options = resolveEditorOptions({
            snapDistance: 8,
            keyboardShortcuts: { undo: { key: 'U', modifiers: {} } },
        });
        expect(options.snapDistance).toBe(8);
        expect(options.zoomFactor).toBe(DEFAULT_EDITOR_OPTIONS.zoomFactor);
        expect(options.keyboardShortcuts.undo).toEqual({ key: 'U', modifiers: {} });
        expect(options.keyboardShortcuts['delete-point']).toEqual(DEFAULT_KEYBOARD_SHORTCUTS['delete-point']);
    });

    it('rejects values the editor cannot work with', () => {
        expect(() => resolveEditorOptions({ zoomFactor: 0 })).toThrow(
            'Invalid editor option "zoomFactor": expected a positive number, got 0'
        );
        expect(() => resolveEditorOptions({ scalingRange: { min: 5, max: 1 } })).toThrow(
            'Invalid editor option "scalingRange": min 5 exceeds max 1'
        );
        expect(() => resolveEditorOptions({ scrollFactor: { x: Number.NaN, y: 1 } })).toThrow(
            'Invalid editor option "scrollFactor.x": expected a finite number, got NaN'
        );
        expect(() => resolveEditorOptions({ snapDistance: -1 })).toThrow(
            'Invalid editor option "snapDistance": expected a non-negative number, got -1'
        );
    });

    it('raises a history size below one with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        expect(resolveEditorOptions({ maxHistoryEntries: 0 }).maxHistoryEntries).toBe(1);
        expect(warn).toHaveBeenCalledWith('Editor option "maxHistoryEntries" raised from 0 to 1');
    });
});

describe('editor events', () => {
    it('keeps notifying after a listener throws', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const events = createEditorEvents();
        const received: string[] = [];
        events.on('undone', () => {
            throw new Error('listener failure');
        });
        events.on('undone', (event) => received.push(event.label));

        events.emit('undone', { label: 'Move' });
        expect(received).toEqual(['Move']);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0]?.[0]).toBe('Editor "undone" listener failed:');
    });

    it('stops notifying unsubscribed listeners', () => {
        const events = createEditorEvents();
        const listener = vi.fn();
        const off = events.on('selectionChanged', listener);
        off();
        events.emit('selectionChanged', { selection: [] });
        expect(listener).not.toHaveBeenCalled();
    });
});

describe('keyboard shortcuts', () => {
    it('formats shortcuts for menus', () => {
        expect(formatShortcut(DEFAULT_KEYBOARD_SHORTCUTS.undo)).toBe('Ctrl+Z');
        expect(formatShortcut(DEFAULT_KEYBOARD_SHORTCUTS['delete-point'])).toBe('Delete');
    });
});
