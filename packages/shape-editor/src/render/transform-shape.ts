/**
 * Shape Transform
 *
 * Copies a content-space shape tree into ui space for painting. Lengths
 * (radii, corner rounding) scale with the view; stroke widths do not.
 */

import type { Point2D, Shape } from '../types';

export type PointMapper = (p: Point2D) => Point2D;

export function transformShape(shape: Shape, map: PointMapper, scale: number): Shape {
    switch (shape.kind) {
        case 'group':
            return { kind: 'group', shapes: shape.shapes.map((child) => transformShape(child, map, scale)) };
        case 'empty':
        case 'callback':
            return { ...shape };
        case 'line-segment':
            return { ...shape, points: [map(shape.points[0]), map(shape.points[1])], stroke: { ...shape.stroke } };
        case 'path':
            return { ...shape, points: shape.points.map(map), stroke: { ...shape.stroke } };
        case 'circle':
            return { ...shape, center: map(shape.center), radius: shape.radius * scale, stroke: { ...shape.stroke } };
        case 'ellipse':
            return {
                ...shape,
                center: map(shape.center),
                radius: { x: shape.radius.x * scale, y: shape.radius.y * scale },
                stroke: { ...shape.stroke },
            };
        case 'rect':
            return {
                ...shape,
                min: map(shape.min),
                max: map(shape.max),
                rounding: {
                    nw: shape.rounding.nw * scale,
                    ne: shape.rounding.ne * scale,
                    sw: shape.rounding.sw * scale,
                    se: shape.rounding.se * scale,
                },
                stroke: { ...shape.stroke },
            };
        case 'text':
            return { ...shape, pos: map(shape.pos) };
        case 'mesh':
            return {
                ...shape,
                vertices: shape.vertices.map((vertex) => ({ pos: map(vertex.pos), uv: { ...vertex.uv }, color: vertex.color })),
                indices: [...shape.indices],
            };
        case 'quadratic-bezier':
            return {
                ...shape,
                points: [map(shape.points[0]), map(shape.points[1]), map(shape.points[2])],
                stroke: { ...shape.stroke },
            };
        case 'cubic-bezier':
            return {
                ...shape,
                points: [map(shape.points[0]), map(shape.points[1]), map(shape.points[2]), map(shape.points[3])],
                stroke: { ...shape.stroke },
            };
    }
}
