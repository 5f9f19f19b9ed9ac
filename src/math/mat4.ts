/**
 * 4x4 Matrices
 *
 * Homogeneous 3D transforms. Translation lives in the last column
 * (m03, m13, m23) and projections target OpenGL-style clip space:
 * right-handed view space, camera looking down -z, depth mapped to [-1, 1].
 */

import { INT } from './scalar';
import type { Scalar } from './scalar';
import { createMatrixOps, createFloatMatrixOps } from './matrix';
import type { MatrixShape, MatrixOps, FloatMatrixOps } from './matrix';
import { Vec3d } from './vec3';
import type { Vec3 } from './vec3';
import { Vec4i, Vec4f, Vec4d } from './vec4';
import type { Vec4, FloatVec4Ops } from './vec4';
import { axisAngleEntries } from './mat3';
import type { Mat3 } from './mat3';

export interface Mat4 {
    readonly m00: number; readonly m01: number; readonly m02: number; readonly m03: number;
    readonly m10: number; readonly m11: number; readonly m12: number; readonly m13: number;
    readonly m20: number; readonly m21: number; readonly m22: number; readonly m23: number;
    readonly m30: number; readonly m31: number; readonly m32: number; readonly m33: number;
}

export type Mat4i = Mat4;
export type Mat4f = Mat4;
export type Mat4d = Mat4;

export const mat4Shape: MatrixShape<Mat4> = {
    size: 4,
    create: (e) => ({
        m00: e[0], m01: e[1], m02: e[2], m03: e[3],
        m10: e[4], m11: e[5], m12: e[6], m13: e[7],
        m20: e[8], m21: e[9], m22: e[10], m23: e[11],
        m30: e[12], m31: e[13], m32: e[14], m33: e[15]
    }),
    entries: (m) => [
        m.m00, m.m01, m.m02, m.m03,
        m.m10, m.m11, m.m12, m.m13,
        m.m20, m.m21, m.m22, m.m23,
        m.m30, m.m31, m.m32, m.m33
    ]
};

export interface Mat4Extras {
    create(
        m00: number, m01: number, m02: number, m03: number,
        m10: number, m11: number, m12: number, m13: number,
        m20: number, m21: number, m22: number, m23: number,
        m30: number, m31: number, m32: number, m33: number
    ): Mat4;
    /** Embed in the upper-left corner of an identity matrix */
    fromMat3(m: Mat3): Mat4;
    /** Upper-left 3x3 block */
    toMat3(m: Mat4): Mat3;
}

export interface Mat4FloatExtras {
    translation(v: Vec3): Mat4;
    scaling(v: Vec3): Mat4;
    rotationX(angle: number): Mat4;
    rotationY(angle: number): Mat4;
    rotationZ(angle: number): Mat4;
    fromAxisAngle(axis: Vec3, angle: number): Mat4;
    /**
     * Perspective projection.
     *
     * @param fovY - vertical field of view in radians
     * @param aspect - width / height
     */
    perspective(fovY: number, aspect: number, near: number, far: number): Mat4;
    orthographic(left: number, right: number, bottom: number, top: number, near: number, far: number): Mat4;
    /** View matrix for a camera at `eye` looking at `target` */
    lookAt(eye: Vec3, target: Vec3, up: Vec3): Mat4;
    /** Apply to a point (w = 1), dividing by the resulting w */
    transformPoint(m: Mat4, p: Vec3): Vec3;
    /** Apply to a direction (w = 0); translation is ignored */
    transformDirection(m: Mat4, d: Vec3): Vec3;
}

function mat4Extras(s: Scalar): Mat4Extras {
    return {
        create: (...entries) => mat4Shape.create(entries.map(s.cast)),
        fromMat3: (m) => mat4Shape.create([
            m.m00, m.m01, m.m02, 0,
            m.m10, m.m11, m.m12, 0,
            m.m20, m.m21, m.m22, 0,
            0, 0, 0, 1
        ]),
        toMat3: (m) => ({
            m00: m.m00, m01: m.m01, m02: m.m02,
            m10: m.m10, m11: m.m11, m12: m.m12,
            m20: m.m20, m21: m.m21, m22: m.m22
        })
    };
}

function mat4FloatExtras(ops: MatrixOps<Mat4, Vec4>, vectors: FloatVec4Ops): Mat4FloatExtras {
    const s = ops.scalar;
    const build = (entries: number[]): Mat4 => mat4Shape.create(entries.map(s.cast));
    const rotation = (r: number[]): Mat4 => build([
        r[0], r[1], r[2], 0,
        r[3], r[4], r[5], 0,
        r[6], r[7], r[8], 0,
        0, 0, 0, 1
    ]);

    return {
        translation: (v) => build([
            1, 0, 0, v.x,
            0, 1, 0, v.y,
            0, 0, 1, v.z,
            0, 0, 0, 1
        ]),
        scaling: (v) => build([
            v.x, 0, 0, 0,
            0, v.y, 0, 0,
            0, 0, v.z, 0,
            0, 0, 0, 1
        ]),
        rotationX: (angle) => rotation(axisAngleEntries(Vec3d.right, angle)),
        rotationY: (angle) => rotation(axisAngleEntries(Vec3d.up, angle)),
        rotationZ: (angle) => rotation(axisAngleEntries(Vec3d.forward, angle)),
        fromAxisAngle: (axis, angle) => rotation(axisAngleEntries(axis, angle)),
        perspective: (fovY, aspect, near, far) => {
            const f = 1 / Math.tan(fovY / 2);
            const nf = 1 / (near - far);
            return build([
                f / aspect, 0, 0, 0,
                0, f, 0, 0,
                0, 0, (far + near) * nf, 2 * far * near * nf,
                0, 0, -1, 0
            ]);
        },
        orthographic: (left, right, bottom, top, near, far) => {
            const rl = 1 / (right - left);
            const tb = 1 / (top - bottom);
            const fn = 1 / (far - near);
            return build([
                2 * rl, 0, 0, -(right + left) * rl,
                0, 2 * tb, 0, -(top + bottom) * tb,
                0, 0, -2 * fn, -(far + near) * fn,
                0, 0, 0, 1
            ]);
        },
        lookAt: (eye, target, up) => {
            const f = Vec3d.normalize(Vec3d.sub(target, eye));
            const side = Vec3d.normalize(Vec3d.cross(f, up));
            const u = Vec3d.cross(side, f);
            return build([
                side.x, side.y, side.z, -Vec3d.dot(side, eye),
                u.x, u.y, u.z, -Vec3d.dot(u, eye),
                -f.x, -f.y, -f.z, Vec3d.dot(f, eye),
                0, 0, 0, 1
            ]);
        },
        transformPoint: (m, p) => vectors.perspectiveDivide(ops.mulVec(m, { x: p.x, y: p.y, z: p.z, w: 1 })),
        transformDirection: (m, d) => vectors.xyz(ops.mulVec(m, { x: d.x, y: d.y, z: d.z, w: 0 }))
    };
}

export type IntMat4Ops = MatrixOps<Mat4, Vec4> & Mat4Extras;
export type FloatMat4Ops = FloatMatrixOps<Mat4, Vec4> & Mat4Extras & Mat4FloatExtras;

function createFloatMat4(vectors: FloatVec4Ops): FloatMat4Ops {
    const ops = createFloatMatrixOps(mat4Shape, vectors);
    return { ...ops, ...mat4Extras(vectors.scalar), ...mat4FloatExtras(ops, vectors) };
}

export const Mat4i: IntMat4Ops = { ...createMatrixOps(mat4Shape, Vec4i), ...mat4Extras(INT) };
export const Mat4f: FloatMat4Ops = createFloatMat4(Vec4f);
export const Mat4d: FloatMat4Ops = createFloatMat4(Vec4d);
