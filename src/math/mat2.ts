/**
 * 2x2 Matrices
 */

import { INT } from './scalar';
import type { Scalar } from './scalar';
import { createMatrixOps, createFloatMatrixOps } from './matrix';
import type { MatrixShape, MatrixOps, FloatMatrixOps } from './matrix';
import { Vec2i, Vec2f, Vec2d } from './vec2';
import type { Vec2 } from './vec2';
import type { VectorOps } from './vector';

export interface Mat2 {
    readonly m00: number; readonly m01: number;
    readonly m10: number; readonly m11: number;
}

export type Mat2i = Mat2;
export type Mat2f = Mat2;
export type Mat2d = Mat2;

export const mat2Shape: MatrixShape<Mat2> = {
    size: 2,
    create: (e) => ({
        m00: e[0], m01: e[1],
        m10: e[2], m11: e[3]
    }),
    entries: (m) => [m.m00, m.m01, m.m10, m.m11]
};

export interface Mat2Extras {
    create(m00: number, m01: number, m10: number, m11: number): Mat2;
}

export interface Mat2FloatExtras {
    /** Counter-clockwise rotation by `angle` radians */
    rotation(angle: number): Mat2;
    scaling(v: Vec2): Mat2;
}

function mat2Extras(s: Scalar): Mat2Extras {
    return {
        create: (m00, m01, m10, m11) => mat2Shape.create([m00, m01, m10, m11].map(s.cast))
    };
}

function mat2FloatExtras(s: Scalar): Mat2FloatExtras {
    return {
        rotation: (angle) => {
            const c = Math.cos(angle);
            const sn = Math.sin(angle);
            return mat2Shape.create([c, -sn, sn, c].map(s.cast));
        },
        scaling: (v) => mat2Shape.create([v.x, 0, 0, v.y].map(s.cast))
    };
}

export type IntMat2Ops = MatrixOps<Mat2, Vec2> & Mat2Extras;
export type FloatMat2Ops = FloatMatrixOps<Mat2, Vec2> & Mat2Extras & Mat2FloatExtras;

function createFloatMat2(vectors: VectorOps<Vec2>): FloatMat2Ops {
    const s = vectors.scalar;
    return { ...createFloatMatrixOps(mat2Shape, vectors), ...mat2Extras(s), ...mat2FloatExtras(s) };
}

export const Mat2i: IntMat2Ops = { ...createMatrixOps(mat2Shape, Vec2i), ...mat2Extras(INT) };
export const Mat2f: FloatMat2Ops = createFloatMat2(Vec2f);
export const Mat2d: FloatMat2Ops = createFloatMat2(Vec2d);
