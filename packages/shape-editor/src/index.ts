/**
 * @shapeforge/shape-editor
 *
 * In-place editor core for trees of primitive shapes: addressable control
 * points, reversible actions with undo, snapping, constraints and a
 * frame-driven interaction layer painting through a render sink.
 */

// Data model
export * from './types';

// Traversal, queries and shape construction
export * from './shapes';

// Spatial indexes
export * from './spatial';

// Editing engine
export * from './actions';
export * from './constraints';
export * from './selection';
export * from './snap';

// Frame driver
export * from './interaction';
export * from './store';
export * from './editor';
export * from './render';

// Geometry helpers
export {
    add,
    distance,
    normalizeRect,
    normalized,
    point,
    pointsEqual,
    rectContains,
    sub,
    ZERO_VEC,
} from './utils/geometry';
