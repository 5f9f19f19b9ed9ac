/**
 * 3D Vectors
 *
 * Int, float and double 3D vectors sharing one layout.
 */

import { INT, FLOAT, DOUBLE } from './scalar';
import type { Scalar } from './scalar';
import { createIntVectorOps, createFloatVectorOps } from './vector';
import type { VectorShape, IntVectorOps, FloatVectorOps } from './vector';
import type { Vec2 } from './vec2';
import type { Vec4 } from './vec4';

export interface Vec3 {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export type Vec3i = Vec3;
export type Vec3f = Vec3;
export type Vec3d = Vec3;

export const vec3Shape: VectorShape<Vec3> = {
    size: 3,
    create: (c) => ({ x: c[0], y: c[1], z: c[2] }),
    components: (v) => [v.x, v.y, v.z],
    fill: (value) => ({ x: value, y: value, z: value }),
    map: (v, fn) => ({ x: fn(v.x), y: fn(v.y), z: fn(v.z) }),
    zip: (a, b, fn) => ({ x: fn(a.x, b.x), y: fn(a.y, b.y), z: fn(a.z, b.z) }),
    reduce: (v, fn) => fn(fn(v.x, v.y), v.z)
};

// ============================================
// Size-specific operations
// ============================================

export interface Vec3Extras {
    readonly right: Vec3;
    readonly left: Vec3;
    readonly up: Vec3;
    readonly down: Vec3;
    readonly forward: Vec3;
    readonly backward: Vec3;
    create(x: number, y: number, z: number): Vec3;
    cross(a: Vec3, b: Vec3): Vec3;
    extend(v: Vec3, w: number): Vec4;
    xy(v: Vec3): Vec2;
}

function vec3Extras(s: Scalar): Vec3Extras {
    const create = (x: number, y: number, z: number): Vec3 => ({ x: s.cast(x), y: s.cast(y), z: s.cast(z) });
    return {
        right: create(1, 0, 0),
        left: create(-1, 0, 0),
        up: create(0, 1, 0),
        down: create(0, -1, 0),
        forward: create(0, 0, 1),
        backward: create(0, 0, -1),
        create,
        cross: (a, b) => ({
            x: s.sub(s.mul(a.y, b.z), s.mul(a.z, b.y)),
            y: s.sub(s.mul(a.z, b.x), s.mul(a.x, b.z)),
            z: s.sub(s.mul(a.x, b.y), s.mul(a.y, b.x))
        }),
        extend: (v, w) => ({ x: v.x, y: v.y, z: v.z, w: s.cast(w) }),
        xy: (v) => ({ x: v.x, y: v.y })
    };
}

export type IntVec3Ops = IntVectorOps<Vec3> & Vec3Extras;
export type FloatVec3Ops = FloatVectorOps<Vec3> & Vec3Extras;

function createFloatVec3(s: Scalar): FloatVec3Ops {
    return { ...createFloatVectorOps(vec3Shape, s), ...vec3Extras(s) };
}

export const Vec3i: IntVec3Ops = { ...createIntVectorOps(vec3Shape, INT), ...vec3Extras(INT) };
export const Vec3f: FloatVec3Ops = createFloatVec3(FLOAT);
export const Vec3d: FloatVec3Ops = createFloatVec3(DOUBLE);
