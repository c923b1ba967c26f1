/**
 * Shape Tree Types
 *
 * Recursive primitive-shape model edited in place by the action engine.
 * Every leaf shape is a plain object so that trees can be compared, cloned
 * and handed to the render sink without conversion.
 */

// =============================================================================
// Primitives
// =============================================================================

export interface Point2D {
    x: number;
    y: number;
}

export type Vec2 = Point2D;

export interface Rect {
    min: Point2D;
    max: Point2D;
}

/** `#rrggbbaa` hex color. */
export type Color = string;

export type TextureId = number;

export interface Stroke {
    width: number;
    color: Color;
}

export interface Rounding {
    nw: number;
    ne: number;
    sw: number;
    se: number;
}

export interface MeshVertex {
    pos: Point2D;
    uv: Point2D;
    color: Color;
}

// =============================================================================
// Shapes
// =============================================================================

export interface GroupShape {
    kind: 'group';
    shapes: Shape[];
}

export interface EmptyShape {
    kind: 'empty';
}

export interface LineSegmentShape {
    kind: 'line-segment';
    points: [Point2D, Point2D];
    stroke: Stroke;
}

export interface PathShape {
    kind: 'path';
    points: Point2D[];
    closed: boolean;
    fill: Color;
    stroke: Stroke;
}

export interface CircleShape {
    kind: 'circle';
    center: Point2D;
    radius: number;
    fill: Color;
    stroke: Stroke;
}

export interface EllipseShape {
    kind: 'ellipse';
    center: Point2D;
    radius: Vec2;
    fill: Color;
    stroke: Stroke;
}

export interface RectShape {
    kind: 'rect';
    min: Point2D;
    max: Point2D;
    rounding: Rounding;
    fill: Color;
    stroke: Stroke;
    fillTextureId: TextureId;
}

export interface TextShape {
    kind: 'text';
    pos: Point2D;
    text: string;
    color: Color;
    angle: number;
}

export interface MeshShape {
    kind: 'mesh';
    vertices: MeshVertex[];
    indices: number[];
    textureId: TextureId;
}

export interface QuadraticBezierShape {
    kind: 'quadratic-bezier';
    points: [Point2D, Point2D, Point2D];
    closed: boolean;
    fill: Color;
    stroke: Stroke;
}

export interface CubicBezierShape {
    kind: 'cubic-bezier';
    points: [Point2D, Point2D, Point2D, Point2D];
    closed: boolean;
    fill: Color;
    stroke: Stroke;
}

/** Host-painted shape; consumes a shape index but exposes no points. */
export interface CallbackShape {
    kind: 'callback';
    id: string;
}

export type LeafShape =
    | LineSegmentShape
    | PathShape
    | CircleShape
    | EllipseShape
    | RectShape
    | TextShape
    | MeshShape
    | QuadraticBezierShape
    | CubicBezierShape
    | CallbackShape;

export type Shape = GroupShape | EmptyShape | LeafShape;

export type ShapeKind = LeafShape['kind'];

/**
 * Mutable holder for the root of an edited tree. Appending to a non-group
 * root swaps the root itself, so actions receive the holder.
 */
export interface ShapeDocument {
    root: Shape;
}

// =============================================================================
// Constants
// =============================================================================

export const TRANSPARENT: Color = '#00000000';
export const BLACK: Color = '#000000ff';
export const DEFAULT_TEXTURE_ID: TextureId = 0;
export const NO_ROUNDING: Readonly<Rounding> = { nw: 0, ne: 0, sw: 0, se: 0 };
