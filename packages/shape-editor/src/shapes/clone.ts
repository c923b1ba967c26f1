/**
 * Structural copies of shapes. Actions copy every shape and point they move
 * into or out of a tree, so history entries never alias live geometry.
 */

import type { MeshVertex, Point2D, Rounding, Shape, Stroke } from '../types';

export function clonePoint(p: Point2D): Point2D {
    return { x: p.x, y: p.y };
}

export function cloneStroke(stroke: Stroke): Stroke {
    return { width: stroke.width, color: stroke.color };
}

export function cloneRounding(rounding: Rounding): Rounding {
    return { nw: rounding.nw, ne: rounding.ne, sw: rounding.sw, se: rounding.se };
}

export function cloneVertex(vertex: MeshVertex): MeshVertex {
    return { pos: clonePoint(vertex.pos), uv: clonePoint(vertex.uv), color: vertex.color };
}

export function cloneShape(shape: Shape): Shape {
    switch (shape.kind) {
        case 'group':
            return { kind: 'group', shapes: shape.shapes.map(cloneShape) };
        case 'empty':
            return { kind: 'empty' };
        case 'line-segment':
            return {
                kind: 'line-segment',
                points: [clonePoint(shape.points[0]), clonePoint(shape.points[1])],
                stroke: cloneStroke(shape.stroke),
            };
        case 'path':
            return {
                kind: 'path',
                points: shape.points.map(clonePoint),
                closed: shape.closed,
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
            };
        case 'circle':
            return {
                kind: 'circle',
                center: clonePoint(shape.center),
                radius: shape.radius,
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
            };
        case 'ellipse':
            return {
                kind: 'ellipse',
                center: clonePoint(shape.center),
                radius: clonePoint(shape.radius),
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
            };
        case 'rect':
            return {
                kind: 'rect',
                min: clonePoint(shape.min),
                max: clonePoint(shape.max),
                rounding: cloneRounding(shape.rounding),
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
                fillTextureId: shape.fillTextureId,
            };
        case 'text':
            return { kind: 'text', pos: clonePoint(shape.pos), text: shape.text, color: shape.color, angle: shape.angle };
        case 'mesh':
            return {
                kind: 'mesh',
                vertices: shape.vertices.map(cloneVertex),
                indices: [...shape.indices],
                textureId: shape.textureId,
            };
        case 'quadratic-bezier':
            return {
                kind: 'quadratic-bezier',
                points: [clonePoint(shape.points[0]), clonePoint(shape.points[1]), clonePoint(shape.points[2])],
                closed: shape.closed,
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
            };
        case 'cubic-bezier':
            return {
                kind: 'cubic-bezier',
                points: [
                    clonePoint(shape.points[0]),
                    clonePoint(shape.points[1]),
                    clonePoint(shape.points[2]),
                    clonePoint(shape.points[3]),
                ],
                closed: shape.closed,
                fill: shape.fill,
                stroke: cloneStroke(shape.stroke),
            };
        case 'callback':
            return { kind: 'callback', id: shape.id };
    }
}
