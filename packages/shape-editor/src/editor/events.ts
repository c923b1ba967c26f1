/**
 * Editor Events
 *
 * Typed notifications emitted after the document or the selection changes.
 * A listener that throws is logged and does not stop the others.
 */

import type { ShapeAction } from '../actions/types';
import type { ShapePointIndex } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface EditorEventMap {
    /** An action was applied and recorded in history. */
    actionApplied: { label: string; inverse: ShapeAction };
    undone: { label: string };
    selectionChanged: { selection: ShapePointIndex[] };
}

export type EditorEventType = keyof EditorEventMap;

export type EditorListener<K extends EditorEventType> = (event: EditorEventMap[K]) => void;

export interface EditorEvents {
    on: <K extends EditorEventType>(type: K, listener: EditorListener<K>) => () => void;
    emit: <K extends EditorEventType>(type: K, event: EditorEventMap[K]) => void;
    clear: () => void;
}

type ListenerSets = { [K in EditorEventType]: Set<EditorListener<K>> };

// =============================================================================
// Hub
// =============================================================================

export function createEditorEvents(): EditorEvents {
    const listeners: ListenerSets = {
        actionApplied: new Set(),
        undone: new Set(),
        selectionChanged: new Set(),
    };

    return {
        on: (type, listener) => {
            listeners[type].add(listener);
            return () => {
                listeners[type].delete(listener);
            };
        },
        emit: (type, event) => {
            listeners[type].forEach((listener) => {
                try {
                    listener(event);
                } catch (error) {
                    console.error(`Editor "${type}" listener failed:`, error);
                }
            });
        },
        clear: () => {
            listeners.actionApplied.clear();
            listeners.undone.clear();
            listeners.selectionChanged.clear();
        },
    };
}
