import type { ActionContext } from '../src/actions/types';
import { ConstraintList } from '../src/constraints';
import type { Constraint } from '../src/constraints';
import type { FrameInput, PointerState } from '../src/interaction/input';
import type { KeyboardShortcut, KeyModifiers } from '../src/interaction/keyboard';
import { NO_MODIFIERS } from '../src/interaction/keyboard';
import { Selection } from '../src/selection';
import type {
    CircleShape,
    CubicBezierShape,
    EllipseShape,
    LineSegmentShape,
    MeshShape,
    PathShape,
    Point2D,
    QuadraticBezierShape,
    Rect,
    RectShape,
    Shape,
    ShapePointIndex,
    Stroke,
    TextShape,
} from '../src/types';
import { DEFAULT_TEXTURE_ID, NO_ROUNDING, TRANSPARENT } from '../src/types';

export function expectPointClose(actual: Point2D | null | undefined, expected: Point2D, tolerance = 1e-4): void {
    expect(actual).toBeDefined();
    expect(actual).not.toBeNull();
    if (!actual) return;
    expect(Math.abs(actual.x - expected.x)).toBeLessThanOrEqual(tolerance);
    expect(Math.abs(actual.y - expected.y)).toBeLessThanOrEqual(tolerance);
}

export function toPoint(x: number, y: number): Point2D {
    return { x, y };
}

export function idx(shapeIndex: number, pointIndex: number): ShapePointIndex {
    return { shapeIndex, pointIndex };
}

// =============================================================================
// Shapes
// =============================================================================

export const TEST_STROKE: Stroke = { width: 1, color: '#000000ff' };

export function buildPath(points: Point2D[]): PathShape {
    return { kind: 'path', points: points.map((p) => ({ ...p })), closed: false, fill: TRANSPARENT, stroke: { ...TEST_STROKE } };
}

export function buildLine(a: Point2D, b: Point2D): LineSegmentShape {
    return { kind: 'line-segment', points: [{ ...a }, { ...b }], stroke: { ...TEST_STROKE } };
}

export function buildCircle(center: Point2D, radius: number): CircleShape {
    return { kind: 'circle', center: { ...center }, radius, fill: TRANSPARENT, stroke: { ...TEST_STROKE } };
}

export function buildEllipse(center: Point2D, radius: Point2D): EllipseShape {
    return { kind: 'ellipse', center: { ...center }, radius: { ...radius }, fill: TRANSPARENT, stroke: { ...TEST_STROKE } };
}

export function buildCubic(p0: Point2D, p1: Point2D, p2: Point2D, p3: Point2D): CubicBezierShape {
    return {
        kind: 'cubic-bezier',
        points: [{ ...p0 }, { ...p1 }, { ...p2 }, { ...p3 }],
        closed: false,
        fill: TRANSPARENT,
        stroke: { ...TEST_STROKE },
    };
}

export function buildText(pos: Point2D, text: string): TextShape {
    return { kind: 'text', pos: { ...pos }, text, color: '#000000ff', angle: 0 };
}

export function buildQuadratic(p0: Point2D, p1: Point2D, p2: Point2D): QuadraticBezierShape {
    return {
        kind: 'quadratic-bezier',
        points: [{ ...p0 }, { ...p1 }, { ...p2 }],
        closed: false,
        fill: TRANSPARENT,
        stroke: { ...TEST_STROKE },
    };
}

export function buildRect(min: Point2D, max: Point2D): RectShape {
    return {
        kind: 'rect',
        min: { ...min },
        max: { ...max },
        rounding: { ...NO_ROUNDING },
        fill: TRANSPARENT,
        stroke: { ...TEST_STROKE },
        fillTextureId: DEFAULT_TEXTURE_ID,
    };
}

export function buildMesh(positions: Point2D[], indices: number[]): MeshShape {
    return {
        kind: 'mesh',
        vertices: positions.map((pos) => ({ pos: { ...pos }, uv: { x: 0, y: 0 }, color: '#ffffffff' })),
        indices: [...indices],
        textureId: DEFAULT_TEXTURE_ID,
    };
}

/** Child `i` of a group root; fails the test when the root is not a group. */
export function childAt(root: Shape, i: number): Shape {
    if (root.kind !== 'group') {
        throw new Error(`Expected a group root, got "${root.kind}"`);
    }
    const child = root.shapes[i];
    if (!child) {
        throw new Error(`No child at ${i}`);
    }
    return child;
}

export function pathPoints(shape: Shape): Point2D[] {
    if (shape.kind !== 'path') {
        throw new Error(`Expected a path, got "${shape.kind}"`);
    }
    return shape.points;
}

/** Every text shape in `shape`, depth first. */
export function textsOf(shape: Shape): TextShape[] {
    if (shape.kind === 'group') return shape.shapes.flatMap(textsOf);
    return shape.kind === 'text' ? [shape] : [];
}

// =============================================================================
// Action Context
// =============================================================================

export function actionContext(
    selection: ShapePointIndex[] = [],
    constraints: Constraint[] = []
): ActionContext {
    return { constraints: new ConstraintList(constraints), selection: new Selection(selection) };
}

// =============================================================================
// Frame Input
// =============================================================================

/** Editor area used by editor tests; the canvas starts at (16, 16) under the default rulers. */
export const EDITOR_RECT: Rect = { min: { x: 0, y: 0 }, max: { x: 416, y: 316 } };

export const IDLE_POINTER: Readonly<PointerState> = {
    hoverPos: null,
    primaryPressed: false,
    primaryClicked: false,
    secondaryPressed: false,
    secondaryClicked: false,
    dragStarted: false,
    dragReleased: false,
    dragButton: null,
};

export interface FrameInputOverrides {
    rect?: Rect;
    pointer?: Partial<PointerState>;
    modifiers?: Partial<KeyModifiers>;
    scrollDelta?: Point2D;
    zoomDelta?: number;
    /** Shortcuts pressed this frame; each can be consumed once. */
    shortcuts?: KeyboardShortcut[];
}

function sameModifiers(a: Partial<KeyModifiers>, b: Partial<KeyModifiers>): boolean {
    return (
        (a.shift ?? false) === (b.shift ?? false) &&
        (a.ctrl ?? false) === (b.ctrl ?? false) &&
        (a.alt ?? false) === (b.alt ?? false) &&
        (a.command ?? false) === (b.command ?? false)
    );
}

export function frameInput(overrides: FrameInputOverrides = {}): FrameInput {
    const pending = [...(overrides.shortcuts ?? [])];
    return {
        rect: overrides.rect ?? EDITOR_RECT,
        pointer: { ...IDLE_POINTER, ...overrides.pointer },
        modifiers: { ...NO_MODIFIERS, ...overrides.modifiers },
        scrollDelta: overrides.scrollDelta ?? { x: 0, y: 0 },
        zoomDelta: overrides.zoomDelta ?? 1,
        consumeShortcut: (shortcut) => {
            const at = pending.findIndex(
                (pressed) => pressed.key === shortcut.key && sameModifiers(pressed.modifiers, shortcut.modifiers)
            );
            if (at < 0) return false;
            pending.splice(at, 1);
            return true;
        },
    };
}

/** Ui position of a content point under the identity view and `EDITOR_RECT`. */
export function ui(x: number, y: number): Point2D {
    return { x: x + 16, y: y + 16 };
}
