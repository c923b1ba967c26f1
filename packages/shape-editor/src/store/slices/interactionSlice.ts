/**
 * Interaction Slice
 *
 * The active pointer drag, at most one, and every other running
 * interaction in start order.
 */

import type { Interaction } from '../../interaction/interactions';
import type { EditorSliceCreator } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface InteractionSliceState {
    drag: Interaction | null;
    interactions: Interaction[];
}

export interface InteractionSliceActions {
    setDrag: (drag: Interaction | null) => void;
    addInteraction: (interaction: Interaction) => void;
    setInteractions: (interactions: Interaction[]) => void;
}

export type InteractionSlice = InteractionSliceState & InteractionSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createInteractionSlice: EditorSliceCreator<InteractionSlice> = (set) => ({
    // Initial State
    drag: null,
    interactions: [],

    // Actions
    setDrag: (drag) =>
        set((state) => {
            state.drag = drag;
        }),

    addInteraction: (interaction) =>
        set((state) => {
            state.interactions.push(interaction);
        }),

    setInteractions: (interactions) =>
        set((state) => {
            state.interactions = interactions;
        }),
});
