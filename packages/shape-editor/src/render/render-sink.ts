/**
 * Render Sink
 *
 * Receives everything the editor paints in a frame, in ui coordinates and
 * back-to-front order.
 */

import type { Shape } from '../types';

export interface RenderSink {
    add: (shape: Shape) => void;
}

/** Sink that keeps every painted shape, for hosts that draw after the frame. */
export class ShapeListSink implements RenderSink {
    readonly shapes: Shape[] = [];

    add(shape: Shape): void {
        this.shapes.push(shape);
    }

    clear(): void {
        this.shapes.length = 0;
    }
}
