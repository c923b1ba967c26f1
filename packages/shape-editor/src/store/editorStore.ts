/**
 * Editor Store
 *
 * Zustand vanilla store holding one editor's state between frames.
 */

import { devtools } from 'zustand/middleware';
import { immer } from 'zustand/middleware/immer';
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

import {
    createConstraintsSlice,
    createHistorySlice,
    createInteractionSlice,
    createSelectionSlice,
    createSnapSlice,
    createViewSlice,
    DEFAULT_MAX_HISTORY_ENTRIES,
} from './slices';
import type { EditorState, EditorStoreOptions } from './types';

export type EditorStore = StoreApi<EditorState>;

export const DEFAULT_EDITOR_STORE_OPTIONS: Readonly<EditorStoreOptions> = {
    maxHistoryEntries: DEFAULT_MAX_HISTORY_ENTRIES,
    devtools: false,
};

export function createEditorStore(options: Partial<EditorStoreOptions> = {}): EditorStore {
    const resolved = { ...DEFAULT_EDITOR_STORE_OPTIONS, ...options };
    return createStore<EditorState>()(
        devtools(
            immer((...a) => ({
                ...createViewSlice(...a),
                ...createSelectionSlice(...a),
                ...createHistorySlice(...a),
                ...createConstraintsSlice(...a),
                ...createSnapSlice(...a),
                ...createInteractionSlice(...a),
                maxHistoryEntries: Math.max(1, Math.floor(resolved.maxHistoryEntries)),
            })),
            { enabled: resolved.devtools, name: resolved.name ?? 'shape-editor' }
        )
    );
}
