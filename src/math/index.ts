/**
 * Math Module
 *
 * Fixed-size vectors and square matrices over int, float and double.
 */

// Scalar domains
export {
    INT_MIN,
    INT_MAX,
    INT,
    FLOAT,
    DOUBLE,
    toInt,
    toFloat,
    toDouble,
    scalarOf,
    clampScalar
} from './scalar';
export type { Int, Float, Double, ScalarKind, Scalar } from './scalar';

// Options and diagnostics
export { DEFAULT_MATH_OPTIONS, configureMath, getMathOptions, resetMathOptions } from './config';
export type { MathOptions } from './config';
export { warnOnce, resetWarnings } from './diagnostics';

// Shared contracts
export { createVectorOps, createIntVectorOps, createFloatVectorOps } from './vector';
export type { VectorShape, VectorOps, IntVectorOps, FloatVectorOps } from './vector';
export { createMatrixOps, createFloatMatrixOps } from './matrix';
export type { MatrixShape, MatrixOps, FloatMatrixOps } from './matrix';

// Vectors
export { Vec2i, Vec2f, Vec2d, vec2Shape } from './vec2';
export type { Vec2, Vec2Extras, Vec2FloatExtras, IntVec2Ops, FloatVec2Ops } from './vec2';
export { Vec3i, Vec3f, Vec3d, vec3Shape } from './vec3';
export type { Vec3, Vec3Extras, IntVec3Ops, FloatVec3Ops } from './vec3';
export { Vec4i, Vec4f, Vec4d, vec4Shape } from './vec4';
export type { Vec4, Vec4Extras, Vec4FloatExtras, IntVec4Ops, FloatVec4Ops } from './vec4';

// Matrices
export { Mat2i, Mat2f, Mat2d, mat2Shape } from './mat2';
export type { Mat2, Mat2Extras, Mat2FloatExtras, IntMat2Ops, FloatMat2Ops } from './mat2';
export { Mat3i, Mat3f, Mat3d, mat3Shape, axisAngleEntries } from './mat3';
export type { Mat3, Mat3Extras, Mat3FloatExtras, IntMat3Ops, FloatMat3Ops } from './mat3';
export { Mat4i, Mat4f, Mat4d, mat4Shape } from './mat4';
export type { Mat4, Mat4Extras, Mat4FloatExtras, IntMat4Ops, FloatMat4Ops } from './mat4';
