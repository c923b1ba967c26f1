/**
 * Store Slices
 *
 * Slices composed into the editor store.
 */

export { createViewSlice } from './viewSlice';
export type { ViewSlice, ViewSliceState, ViewSliceActions } from './viewSlice';

export { createSelectionSlice } from './selectionSlice';
export type { SelectionSlice, SelectionSliceState, SelectionSliceActions } from './selectionSlice';

export { createHistorySlice, DEFAULT_MAX_HISTORY_ENTRIES } from './historySlice';
export type { HistoryEntry, HistorySlice, HistorySliceState, HistorySliceActions } from './historySlice';

export { createConstraintsSlice } from './constraintsSlice';
export type { ConstraintsSlice, ConstraintsSliceState, ConstraintsSliceActions } from './constraintsSlice';

export { createSnapSlice } from './snapSlice';
export type { SnapSlice, SnapSliceState, SnapSliceActions } from './snapSlice';

export { createInteractionSlice } from './interactionSlice';
export type { InteractionSlice, InteractionSliceState, InteractionSliceActions } from './interactionSlice';
