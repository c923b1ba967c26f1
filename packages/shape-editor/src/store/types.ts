/**
 * Store Types
 *
 * Editor state persisted across frames, split into slices. Everything kept
 * here is plain data; derived indexes are rebuilt from the document each
 * frame and never stored.
 */

import type { StateCreator } from 'zustand';

import type { ConstraintsSlice } from './slices/constraintsSlice';
import type { HistorySlice } from './slices/historySlice';
import type { InteractionSlice } from './slices/interactionSlice';
import type { SelectionSlice } from './slices/selectionSlice';
import type { SnapSlice } from './slices/snapSlice';
import type { ViewSlice } from './slices/viewSlice';

// =============================================================================
// State Types
// =============================================================================

export type EditorState = ViewSlice & SelectionSlice & HistorySlice & ConstraintsSlice & SnapSlice & InteractionSlice;

export type EditorMiddlewares = [['zustand/devtools', never], ['zustand/immer', never]];

/** Slice creator with access to the whole editor state. */
export type EditorSliceCreator<S> = StateCreator<EditorState, EditorMiddlewares, [], S>;

export interface EditorStoreOptions {
    maxHistoryEntries: number;
    devtools: boolean;
    /** Label shown by the devtools extension. */
    name?: string;
}
