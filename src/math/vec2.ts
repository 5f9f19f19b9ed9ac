/**
 * 2D Vectors
 *
 * Int, float and double 2D vectors sharing one layout.
 */

import { INT, FLOAT, DOUBLE } from './scalar';
import type { Scalar } from './scalar';
import { createIntVectorOps, createFloatVectorOps } from './vector';
import type { VectorShape, IntVectorOps, FloatVectorOps } from './vector';
import type { Vec3 } from './vec3';

export interface Vec2 {
    readonly x: number;
    readonly y: number;
}

export type Vec2i = Vec2;
export type Vec2f = Vec2;
export type Vec2d = Vec2;

export const vec2Shape: VectorShape<Vec2> = {
    size: 2,
    create: (c) => ({ x: c[0], y: c[1] }),
    components: (v) => [v.x, v.y],
    fill: (value) => ({ x: value, y: value }),
    map: (v, fn) => ({ x: fn(v.x), y: fn(v.y) }),
    zip: (a, b, fn) => ({ x: fn(a.x, b.x), y: fn(a.y, b.y) }),
    reduce: (v, fn) => fn(v.x, v.y)
};

// ============================================
// Size-specific operations
// ============================================

export interface Vec2Extras {
    readonly right: Vec2;
    readonly left: Vec2;
    readonly up: Vec2;
    readonly down: Vec2;
    create(x: number, y: number): Vec2;
    /** z component of the 3D cross product */
    cross(a: Vec2, b: Vec2): number;
    /** Rotated a quarter turn counter-clockwise */
    perpendicular(v: Vec2): Vec2;
    extend(v: Vec2, z: number): Vec3;
}

export interface Vec2FloatExtras {
    rotate(v: Vec2, angle: number): Vec2;
    /** Angle to the positive x axis in radians, in (-PI, PI] */
    toAngle(v: Vec2): number;
    fromAngle(angle: number, length?: number): Vec2;
    /** x / y */
    aspect(v: Vec2): number;
}

function vec2Extras(s: Scalar): Vec2Extras {
    const create = (x: number, y: number): Vec2 => ({ x: s.cast(x), y: s.cast(y) });
    return {
        right: create(1, 0),
        left: create(-1, 0),
        up: create(0, 1),
        down: create(0, -1),
        create,
        cross: (a, b) => s.sub(s.mul(a.x, b.y), s.mul(a.y, b.x)),
        perpendicular: (v) => ({ x: s.neg(v.y), y: v.x }),
        extend: (v, z) => ({ x: v.x, y: v.y, z: s.cast(z) })
    };
}

function vec2FloatExtras(s: Scalar): Vec2FloatExtras {
    return {
        rotate: (v, angle) => {
            const c = Math.cos(angle);
            const sn = Math.sin(angle);
            return { x: s.cast(v.x * c - v.y * sn), y: s.cast(v.x * sn + v.y * c) };
        },
        toAngle: (v) => Math.atan2(v.y, v.x),
        fromAngle: (angle, length = 1) => ({
            x: s.cast(length * Math.cos(angle)),
            y: s.cast(length * Math.sin(angle))
        }),
        aspect: (v) => s.div(v.x, v.y)
    };
}

export type IntVec2Ops = IntVectorOps<Vec2> & Vec2Extras;
export type FloatVec2Ops = FloatVectorOps<Vec2> & Vec2Extras & Vec2FloatExtras;

function createFloatVec2(s: Scalar): FloatVec2Ops {
    return { ...createFloatVectorOps(vec2Shape, s), ...vec2Extras(s), ...vec2FloatExtras(s) };
}

export const Vec2i: IntVec2Ops = { ...createIntVectorOps(vec2Shape, INT), ...vec2Extras(INT) };
export const Vec2f: FloatVec2Ops = createFloatVec2(FLOAT);
export const Vec2d: FloatVec2Ops = createFloatVec2(DOUBLE);
