/**
 * Editor Memory
 *
 * Registry of editor stores keyed by editor id. The host owns the registry
 * and passes it to every editor that should keep state across frames.
 */

import { createEditorStore } from './editorStore';
import type { EditorStore } from './editorStore';
import type { EditorStoreOptions } from './types';

export class EditorMemory {
    private readonly stores = new Map<string, EditorStore>();

    get size(): number {
        return this.stores.size;
    }

    has(id: string): boolean {
        return this.stores.has(id);
    }

    load(id: string): EditorStore | null {
        return this.stores.get(id) ?? null;
    }

    store(id: string, store: EditorStore): void {
        this.stores.set(id, store);
    }

    /** Store for `id`, created with `options` on first use. */
    loadOrCreate(id: string, options: Partial<EditorStoreOptions> = {}): EditorStore {
        const existing = this.stores.get(id);
        if (existing) return existing;
        const created = createEditorStore({ name: id, ...options });
        this.stores.set(id, created);
        return created;
    }

    delete(id: string): boolean {
        return this.stores.delete(id);
    }

    clear(): void {
        this.stores.clear();
    }
}
