/**
 * 3x3 Matrices
 *
 * Rotation builders follow the right-hand rule: a positive angle turns
 * counter-clockwise when looking down the axis toward the origin.
 */

import { INT } from './scalar';
import type { Scalar } from './scalar';
import { createMatrixOps, createFloatMatrixOps } from './matrix';
import type { MatrixShape, MatrixOps, FloatMatrixOps } from './matrix';
import { Vec3i, Vec3f, Vec3d } from './vec3';
import type { Vec3 } from './vec3';
import type { Mat2 } from './mat2';
import type { VectorOps } from './vector';

export interface Mat3 {
    readonly m00: number; readonly m01: number; readonly m02: number;
    readonly m10: number; readonly m11: number; readonly m12: number;
    readonly m20: number; readonly m21: number; readonly m22: number;
}

export type Mat3i = Mat3;
export type Mat3f = Mat3;
export type Mat3d = Mat3;

export const mat3Shape: MatrixShape<Mat3> = {
    size: 3,
    create: (e) => ({
        m00: e[0], m01: e[1], m02: e[2],
        m10: e[3], m11: e[4], m12: e[5],
        m20: e[6], m21: e[7], m22: e[8]
    }),
    entries: (m) => [
        m.m00, m.m01, m.m02,
        m.m10, m.m11, m.m12,
        m.m20, m.m21, m.m22
    ]
};

export interface Mat3Extras {
    create(
        m00: number, m01: number, m02: number,
        m10: number, m11: number, m12: number,
        m20: number, m21: number, m22: number
    ): Mat3;
    /** Embed in the upper-left corner of an identity matrix */
    fromMat2(m: Mat2): Mat3;
    /** Upper-left 2x2 block */
    toMat2(m: Mat3): Mat2;
}

export interface Mat3FloatExtras {
    rotationX(angle: number): Mat3;
    rotationY(angle: number): Mat3;
    rotationZ(angle: number): Mat3;
    /** Rotation about an arbitrary axis; the axis need not be normalized */
    fromAxisAngle(axis: Vec3, angle: number): Mat3;
    scaling(v: Vec3): Mat3;
}

function mat3Extras(s: Scalar): Mat3Extras {
    return {
        create: (m00, m01, m02, m10, m11, m12, m20, m21, m22) =>
            mat3Shape.create([m00, m01, m02, m10, m11, m12, m20, m21, m22].map(s.cast)),
        fromMat2: (m) => mat3Shape.create([
            m.m00, m.m01, 0,
            m.m10, m.m11, 0,
            0, 0, 1
        ]),
        toMat2: (m) => ({ m00: m.m00, m01: m.m01, m10: m.m10, m11: m.m11 })
    };
}

/** Rotation entries computed in double precision, row-major */
export function axisAngleEntries(axis: Vec3, angle: number): number[] {
    const len = Math.hypot(axis.x, axis.y, axis.z);
    if (len === 0) {
        throw new Error('Rotation axis must not be zero');
    }
    const x = axis.x / len;
    const y = axis.y / len;
    const z = axis.z / len;
    const c = Math.cos(angle);
    const sn = Math.sin(angle);
    const t = 1 - c;
    return [
        t * x * x + c, t * x * y - sn * z, t * x * z + sn * y,
        t * x * y + sn * z, t * y * y + c, t * y * z - sn * x,
        t * x * z - sn * y, t * y * z + sn * x, t * z * z + c
    ];
}

function mat3FloatExtras(s: Scalar): Mat3FloatExtras {
    const build = (entries: number[]): Mat3 => mat3Shape.create(entries.map(s.cast));
    return {
        rotationX: (angle) => {
            const c = Math.cos(angle);
            const sn = Math.sin(angle);
            return build([1, 0, 0, 0, c, -sn, 0, sn, c]);
        },
        rotationY: (angle) => {
            const c = Math.cos(angle);
            const sn = Math.sin(angle);
            return build([c, 0, sn, 0, 1, 0, -sn, 0, c]);
        },
        rotationZ: (angle) => {
            const c = Math.cos(angle);
            const sn = Math.sin(angle);
            return build([c, -sn, 0, sn, c, 0, 0, 0, 1]);
        },
        fromAxisAngle: (axis, angle) => build(axisAngleEntries(axis, angle)),
        scaling: (v) => build([v.x, 0, 0, 0, v.y, 0, 0, 0, v.z])
    };
}

export type IntMat3Ops = MatrixOps<Mat3, Vec3> & Mat3Extras;
export type FloatMat3Ops = FloatMatrixOps<Mat3, Vec3> & Mat3Extras & Mat3FloatExtras;

function createFloatMat3(vectors: VectorOps<Vec3>): FloatMat3Ops {
    const s = vectors.scalar;
    return { ...createFloatMatrixOps(mat3Shape, vectors), ...mat3Extras(s), ...mat3FloatExtras(s) };
}

export const Mat3i: IntMat3Ops = { ...createMatrixOps(mat3Shape, Vec3i), ...mat3Extras(INT) };
export const Mat3f: FloatMat3Ops = createFloatMat3(Vec3f);
export const Mat3d: FloatMat3Ops = createFloatMat3(Vec3d);
