/**
 * Editor state store.
 */

export * from './slices';
export * from './types';
export * from './editorStore';
export * from './editorMemory';
