/**
 * Painters
 *
 * Build the editor overlays (handles, grid, rulers, snap guides, rubber
 * band, creation preview) as ui-space shapes for the render sink.
 */

import type { ViewTransform } from '../interaction/canvas-transform';
import { contentToUi } from '../interaction/canvas-transform';
import type { SnapInfo } from '../snap';
import type { GridIndex, GridLine, GridLineType } from '../spatial/grid';
import type {
    CircleShape,
    Color,
    GroupShape,
    LineSegmentShape,
    Point2D,
    Rect,
    Shape,
    ShapeControlPoint,
    Stroke,
    TextShape,
} from '../types';
import { DEFAULT_TEXTURE_ID, NO_ROUNDING, TRANSPARENT } from '../types';
import { distance } from '../utils/geometry';

import type { DashPattern, EditorStyle } from './style';

// =============================================================================
// Primitives
// =============================================================================

function group(shapes: Shape[]): GroupShape {
    return { kind: 'group', shapes };
}

function lineSegment(a: Point2D, b: Point2D, stroke: Stroke): LineSegmentShape {
    return { kind: 'line-segment', points: [{ ...a }, { ...b }], stroke: { ...stroke } };
}

function circle(center: Point2D, radius: number, fill: Color, stroke: Stroke): CircleShape {
    return { kind: 'circle', center: { ...center }, radius, fill, stroke: { ...stroke } };
}

const NO_STROKE: Stroke = { width: 0, color: TRANSPARENT };

/** Scales the alpha channel of a `#rrggbbaa` color. */
export function withAlphaFactor(color: Color, factor: number): Color {
    const match = /^#([0-9a-f]{6})([0-9a-f]{2})$/i.exec(color);
    if (!match?.[1] || !match[2]) return color;
    const alpha = Math.round(parseInt(match[2], 16) * factor);
    return `#${match[1]}${Math.min(255, Math.max(0, alpha)).toString(16).padStart(2, '0')}`;
}

/**
 * Dashes along `from -> to`, starting with a dash. The last dash is cut at
 * `to`.
 */
export function dashedLine(from: Point2D, to: Point2D, stroke: Stroke, dash: DashPattern): LineSegmentShape[] {
    const total = distance(from, to);
    const period = dash.dashLength + dash.gapLength;
    if (total === 0 || !(dash.dashLength > 0) || !(period > 0)) return [];

    const at = (t: number): Point2D => ({
        x: from.x + ((to.x - from.x) * t) / total,
        y: from.y + ((to.y - from.y) * t) / total,
    });
    const segments: LineSegmentShape[] = [];
    for (let start = 0; start < total; start += period) {
        segments.push(lineSegment(at(start), at(Math.min(start + dash.dashLength, total)), stroke));
    }
    return segments;
}

// =============================================================================
// Canvas
// =============================================================================

export function backgroundShape(canvas: Rect, color: Color): Shape {
    return {
        kind: 'rect',
        min: { ...canvas.min },
        max: { ...canvas.max },
        rounding: { ...NO_ROUNDING },
        fill: color,
        stroke: { ...NO_STROKE },
        fillTextureId: DEFAULT_TEXTURE_ID,
    };
}

export function borderShape(canvas: Rect, stroke: Stroke): Shape {
    return {
        kind: 'rect',
        min: { ...canvas.min },
        max: { ...canvas.max },
        rounding: { ...NO_ROUNDING },
        fill: TRANSPARENT,
        stroke: { ...stroke },
        fillTextureId: DEFAULT_TEXTURE_ID,
    };
}

/** Dashed outline of the rubber band; `rect` need not be normalised. */
export function selectionRectShape(rect: Rect, style: EditorStyle): GroupShape {
    const { min, max } = rect;
    const topRight = { x: max.x, y: min.y };
    const bottomLeft = { x: min.x, y: max.y };
    return group([
        ...dashedLine(min, topRight, style.selectionStroke, style.selectionDash),
        ...dashedLine(min, bottomLeft, style.selectionStroke, style.selectionDash),
        ...dashedLine(bottomLeft, max, style.selectionStroke, style.selectionDash),
        ...dashedLine(topRight, max, style.selectionStroke, style.selectionDash),
    ]);
}

// =============================================================================
// Control Points
// =============================================================================

export interface HandleState {
    hovered: boolean;
    selected: boolean;
}

/**
 * Handle for one control point. `toUi` maps content positions, including
 * the positions of connected points.
 */
export function controlPointShape(
    point: ShapeControlPoint,
    toUi: (p: Point2D) => Point2D,
    state: HandleState,
    style: EditorStyle
): GroupShape {
    const stroke = point.type === 'path-point' ? style.pathPointStroke : style.controlPointStroke;
    const radius = style.controlPointRadius;
    const pos = toUi(point.position);
    const shapes: Shape[] = [];

    if (point.type === 'control-point') {
        for (const connected of point.connected) {
            shapes.push(lineSegment(pos, toUi(connected.position), style.connectorStroke));
        }
    }
    shapes.push(circle(pos, radius, TRANSPARENT, stroke));
    if (state.hovered) {
        shapes.push(circle(pos, radius, withAlphaFactor(stroke.color, 0.5), NO_STROKE));
    }
    if (state.selected) {
        shapes.push(circle(pos, radius + 2, TRANSPARENT, stroke));
    }
    return group(shapes);
}

/** Marks for points collected so far by a creation interaction, ui positions. */
export function previewPointsShape(points: readonly Point2D[], style: EditorStyle): GroupShape {
    return group(points.map((p) => circle(p, style.controlPointRadius, TRANSPARENT, style.previewPointStroke)));
}

// =============================================================================
// Grid
// =============================================================================

function gridLineShapes(from: Point2D, to: Point2D, line: GridLine, style: EditorStyle): Shape[] {
    const shapes: Shape[] = [];
    for (const type of line.types) {
        switch (type) {
            case 'zero':
                shapes.push(lineSegment(from, to, style.grid.zeroLine));
                break;
            case 'primary':
                shapes.push(lineSegment(from, to, style.grid.primaryLine));
                break;
            case 'secondary':
                shapes.push(...dashedLine(from, to, style.grid.secondaryLine, style.grid.secondaryDash));
                break;
            case 'sub':
                break;
        }
    }
    return shapes;
}

/** Zero and primary lines solid, secondary lines dashed; sub lines are not painted. */
export function gridShape(grid: GridIndex, view: ViewTransform, canvas: Rect, style: EditorStyle): GroupShape {
    const shapes: Shape[] = [];
    for (const line of grid.verticalLines()) {
        const x = contentToUi(view, canvas, { x: line.value, y: 0 }).x;
        shapes.push(...gridLineShapes({ x, y: canvas.min.y }, { x, y: canvas.max.y }, line, style));
    }
    for (const line of grid.horizontalLines()) {
        const y = contentToUi(view, canvas, { x: 0, y: line.value }).y;
        shapes.push(...gridLineShapes({ x: canvas.min.x, y }, { x: canvas.max.x, y }, line, style));
    }
    return group(shapes);
}

// =============================================================================
// Rulers
// =============================================================================

/**
 * Ruler label for a grid value. Decimals follow the grid step so float
 * noise from step multiplication never shows.
 */
export function formatRulerLabel(value: number, step: number): string {
    const decimals = step >= 1 ? 0 : Math.min(20, Math.ceil(-Math.log10(step)) + 1);
    const rounded = Number(value.toFixed(decimals));
    return Object.is(rounded, -0) || rounded === 0 ? '0' : rounded.toString();
}

function rulerLabel(pos: Point2D, text: string, angle: number, style: EditorStyle): TextShape {
    return { kind: 'text', pos, text, color: style.rulers.textColor, angle };
}

/**
 * Top and left rulers along the canvas. `outer` is the whole editor area;
 * the canvas starts `style.rulers.width` below and right of its corner.
 */
export function rulersShape(grid: GridIndex, view: ViewTransform, outer: Rect, style: EditorStyle): GroupShape {
    const rulers = style.rulers;
    const canvasMin = { x: outer.min.x + rulers.width, y: outer.min.y + rulers.width };
    const toUi = (p: Point2D) => contentToUi(view, { min: canvasMin, max: outer.max }, p);

    const top: Rect = { min: { x: canvasMin.x, y: outer.min.y }, max: { x: outer.max.x, y: canvasMin.y } };
    const topShapes: Shape[] = [backgroundShape(top, rulers.background)];
    for (const line of grid.verticalLines()) {
        const x = toUi({ x: line.value, y: 0 }).x;
        if (x < top.min.x || x > top.max.x) continue;
        for (const type of line.types) {
            const [height, stroke] = tickOf(type, style);
            topShapes.push(lineSegment({ x, y: top.max.y - height }, { x, y: top.max.y }, stroke));
            if (type === 'zero' || type === 'primary') {
                const pos = { x: x + rulers.textPosition.x, y: top.min.y + rulers.textPosition.y };
                topShapes.push(rulerLabel(pos, formatRulerLabel(line.value, grid.step), 0, style));
            }
        }
    }

    const left: Rect = { min: { x: outer.min.x, y: canvasMin.y }, max: { x: canvasMin.x, y: outer.max.y } };
    const leftShapes: Shape[] = [backgroundShape(left, rulers.background)];
    for (const line of grid.horizontalLines()) {
        const y = toUi({ x: 0, y: line.value }).y;
        if (y < left.min.y || y > left.max.y) continue;
        for (const type of line.types) {
            const [height, stroke] = tickOf(type, style);
            leftShapes.push(lineSegment({ x: left.max.x - height, y }, { x: left.max.x, y }, stroke));
            if (type === 'zero' || type === 'primary') {
                const pos = { x: left.min.x + rulers.textPosition.y, y: y + rulers.textPosition.x };
                leftShapes.push(rulerLabel(pos, formatRulerLabel(line.value, grid.step), -Math.PI / 2, style));
            }
        }
    }

    return group([group(topShapes), group(leftShapes)]);
}

function tickOf(type: GridLineType, style: EditorStyle): [number, Stroke] {
    switch (type) {
        case 'zero':
        case 'primary':
            return [style.rulers.divHeight, style.rulers.stroke];
        case 'secondary':
            return [style.rulers.halfDivHeight, style.rulers.halfStroke];
        case 'sub':
            return [style.rulers.subDivHeight, style.rulers.subStroke];
    }
}

// =============================================================================
// Snap Highlight
// =============================================================================

/** Dashed guides to every snap target; null when nothing snapped. */
export function snapHighlightShape(
    snap: SnapInfo,
    view: ViewTransform,
    canvas: Rect,
    style: EditorStyle
): GroupShape | null {
    if (!snap.snapPoint) return null;

    const stroke = style.snapHighlightStroke;
    const dash = style.snapHighlightDash;
    const snapPoint = contentToUi(view, canvas, snap.snapPoint);
    const half = style.snapMarkSize / 2;
    const shapes: Shape[] = [];

    for (const target of snap.targets) {
        switch (target.type) {
            case 'control-point': {
                const pos = contentToUi(view, canvas, target.position);
                shapes.push(...dashedLine(snapPoint, pos, stroke, dash));
                shapes.push(
                    ...dashedLine({ x: pos.x - half, y: pos.y - half }, { x: pos.x + half, y: pos.y + half }, stroke, dash)
                );
                shapes.push(
                    ...dashedLine({ x: pos.x + half, y: pos.y - half }, { x: pos.x - half, y: pos.y + half }, stroke, dash)
                );
                break;
            }
            case 'grid-x': {
                const x = contentToUi(view, canvas, { x: target.value, y: 0 }).x;
                shapes.push(...dashedLine({ x, y: canvas.min.y }, { x, y: canvas.max.y }, stroke, dash));
                break;
            }
            case 'grid-y': {
                const y = contentToUi(view, canvas, { x: 0, y: target.value }).y;
                shapes.push(...dashedLine({ x: canvas.min.x, y }, { x: canvas.max.x, y }, stroke, dash));
                break;
            }
        }
    }
    return group(shapes);
}
