/**
 * Keyboard Bindings
 *
 * Configurable shortcuts for the editor's keyboard commands and the
 * modifier roles read while handling pointer input.
 */

// =============================================================================
// Types
// =============================================================================

export type KeyboardAction = 'add-point' | 'delete-point' | 'undo';

export interface KeyModifiers {
    shift: boolean;
    ctrl: boolean;
    alt: boolean;
    /** Cmd on macOS, Ctrl elsewhere. */
    command: boolean;
}

export interface KeyboardShortcut {
    key: string;
    modifiers: Partial<KeyModifiers>;
}

export type KeyboardShortcuts = Record<KeyboardAction, KeyboardShortcut>;

// =============================================================================
// Constants
// =============================================================================

export const NO_MODIFIERS: Readonly<KeyModifiers> = { shift: false, ctrl: false, alt: false, command: false };

export const DEFAULT_KEYBOARD_SHORTCUTS: Readonly<KeyboardShortcuts> = {
    'add-point': { key: 'I', modifiers: { ctrl: true } },
    'delete-point': { key: 'Delete', modifiers: {} },
    undo: { key: 'Z', modifiers: { ctrl: true } },
};

/** Order in which shortcuts are offered to the input each frame. */
export const KEYBOARD_ACTIONS: readonly KeyboardAction[] = ['add-point', 'delete-point', 'undo'];

// =============================================================================
// Modifier Roles
// =============================================================================

/** Keeps the current selection when pressing or rubber-banding. */
export function keepsSelection(modifiers: KeyModifiers): boolean {
    return modifiers.shift;
}

/** Turns a primary click into "add point". */
export function addsPoint(modifiers: KeyModifiers): boolean {
    return modifiers.ctrl || modifiers.command;
}

/** Inverts the snap-enabled default for the frame. */
export function togglesSnap(modifiers: KeyModifiers): boolean {
    return modifiers.alt;
}

export function formatShortcut(shortcut: KeyboardShortcut): string {
    const parts: string[] = [];
    if (shortcut.modifiers.ctrl) parts.push('Ctrl');
    if (shortcut.modifiers.command) parts.push('Cmd');
    if (shortcut.modifiers.alt) parts.push('Alt');
    if (shortcut.modifiers.shift) parts.push('Shift');
    parts.push(shortcut.key);
    return parts.join('+');
}
