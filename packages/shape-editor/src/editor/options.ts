/**
 * Editor Options
 *
 * Behavioural settings of a shape editor. Cosmetic settings live in the
 * render style instead.
 */

import type { ScalingRange } from '../interaction/canvas-transform';
import type { KeyboardShortcuts } from '../interaction/keyboard';
import { DEFAULT_KEYBOARD_SHORTCUTS } from '../interaction/keyboard';
import { DEFAULT_MAX_HISTORY_ENTRIES } from '../store/slices/historySlice';
import type { Stroke, Vec2 } from '../types';
import { BLACK } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface EditorOptions {
    /** Multiplies the host scroll delta. */
    scrollFactor: Vec2;
    /** The host zoom delta is raised to this power. */
    zoomFactor: number;
    scalingRange: ScalingRange;
    /** Stroke of shapes created through the editor. */
    stroke: Stroke;
    /** Snap radius in ui pixels. */
    snapDistance: number;
    /** Alt inverts this for the frame. */
    snapEnabledByDefault: boolean;
    keyboardShortcuts: KeyboardShortcuts;
    maxHistoryEntries: number;
    devtools: boolean;
}

export type EditorOptionsInput = Partial<Omit<EditorOptions, 'keyboardShortcuts'>> & {
    keyboardShortcuts?: Partial<KeyboardShortcuts>;
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_EDITOR_OPTIONS: Readonly<EditorOptions> = {
    scrollFactor: { x: 0.1, y: 0.1 },
    zoomFactor: 0.2,
    scalingRange: { min: 0.01, max: 10 },
    stroke: { width: 1, color: BLACK },
    snapDistance: 5,
    snapEnabledByDefault: true,
    keyboardShortcuts: DEFAULT_KEYBOARD_SHORTCUTS,
    maxHistoryEntries: DEFAULT_MAX_HISTORY_ENTRIES,
    devtools: false,
};

// =============================================================================
// Validation
// =============================================================================

function requireFinite(name: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new Error(`Invalid editor option "${name}": expected a finite number, got ${value}`);
    }
}

function requirePositive(name: string, value: number): void {
    requireFinite(name, value);
    if (value <= 0) {
        throw new Error(`Invalid editor option "${name}": expected a positive number, got ${value}`);
    }
}

/**
 * Merges `input` over the defaults and validates the result. History size
 * below 1 is raised to 1 with a warning; other invalid values throw.
 */
export function resolveEditorOptions(input: EditorOptionsInput = {}): EditorOptions {
    const options: EditorOptions = {
        ...DEFAULT_EDITOR_OPTIONS,
        ...input,
        keyboardShortcuts: { ...DEFAULT_EDITOR_OPTIONS.keyboardShortcuts, ...input.keyboardShortcuts },
    };

    requireFinite('scrollFactor.x', options.scrollFactor.x);
    requireFinite('scrollFactor.y', options.scrollFactor.y);
    requirePositive('zoomFactor', options.zoomFactor);
    requirePositive('scalingRange.min', options.scalingRange.min);
    requirePositive('scalingRange.max', options.scalingRange.max);
    if (options.scalingRange.min > options.scalingRange.max) {
        throw new Error(
            `Invalid editor option "scalingRange": min ${options.scalingRange.min} exceeds max ${options.scalingRange.max}`
        );
    }
    requireFinite('stroke.width', options.stroke.width);
    if (options.stroke.width < 0) {
        throw new Error(`Invalid editor option "stroke.width": expected a non-negative number, got ${options.stroke.width}`);
    }
    requireFinite('snapDistance', options.snapDistance);
    if (options.snapDistance < 0) {
        throw new Error(`Invalid editor option "snapDistance": expected a non-negative number, got ${options.snapDistance}`);
    }
    if (Number.isNaN(options.maxHistoryEntries)) {
        throw new Error('Invalid editor option "maxHistoryEntries": expected a number, got NaN');
    }
    if (options.maxHistoryEntries < 1) {
        console.warn(`Editor option "maxHistoryEntries" raised from ${options.maxHistoryEntries} to 1`);
        options.maxHistoryEntries = 1;
    }

    return options;
}
