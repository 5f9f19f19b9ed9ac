/**
 * 4D Vectors
 *
 * Int, float and double 4D vectors. Float variants double as homogeneous
 * coordinates for the 4x4 transforms.
 */

import { INT, FLOAT, DOUBLE } from './scalar';
import type { Scalar } from './scalar';
import { createIntVectorOps, createFloatVectorOps } from './vector';
import type { VectorShape, IntVectorOps, FloatVectorOps } from './vector';
import type { Vec3 } from './vec3';

export interface Vec4 {
    readonly x: number;
    readonly y: number;
    readonly z: number;
    readonly w: number;
}

export type Vec4i = Vec4;
export type Vec4f = Vec4;
export type Vec4d = Vec4;

export const vec4Shape: VectorShape<Vec4> = {
    size: 4,
    create: (c) => ({ x: c[0], y: c[1], z: c[2], w: c[3] }),
    components: (v) => [v.x, v.y, v.z, v.w],
    fill: (value) => ({ x: value, y: value, z: value, w: value }),
    map: (v, fn) => ({ x: fn(v.x), y: fn(v.y), z: fn(v.z), w: fn(v.w) }),
    zip: (a, b, fn) => ({ x: fn(a.x, b.x), y: fn(a.y, b.y), z: fn(a.z, b.z), w: fn(a.w, b.w) }),
    reduce: (v, fn) => fn(fn(fn(v.x, v.y), v.z), v.w)
};

// ============================================
// Size-specific operations
// ============================================

export interface Vec4Extras {
    create(x: number, y: number, z: number, w: number): Vec4;
    xyz(v: Vec4): Vec3;
}

export interface Vec4FloatExtras {
    /** Homogeneous to Cartesian: xyz / w */
    perspectiveDivide(v: Vec4): Vec3;
}

function vec4Extras(s: Scalar): Vec4Extras {
    return {
        create: (x, y, z, w) => ({ x: s.cast(x), y: s.cast(y), z: s.cast(z), w: s.cast(w) }),
        xyz: (v) => ({ x: v.x, y: v.y, z: v.z })
    };
}

export type IntVec4Ops = IntVectorOps<Vec4> & Vec4Extras;
export type FloatVec4Ops = FloatVectorOps<Vec4> & Vec4Extras & Vec4FloatExtras;

function createFloatVec4(s: Scalar): FloatVec4Ops {
    return {
        ...createFloatVectorOps(vec4Shape, s),
        ...vec4Extras(s),
        perspectiveDivide: (v) => ({ x: s.div(v.x, v.w), y: s.div(v.y, v.w), z: s.div(v.z, v.w) })
    };
}

export const Vec4i: IntVec4Ops = { ...createIntVectorOps(vec4Shape, INT), ...vec4Extras(INT) };
export const Vec4f: FloatVec4Ops = createFloatVec4(FLOAT);
export const Vec4d: FloatVec4Ops = createFloatVec4(DOUBLE);
