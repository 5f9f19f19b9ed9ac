/**
 * Shared Vector Operations
 *
 * The formulas common to every vector size and scalar domain. Each
 * dimension module describes its layout once as a VectorShape, and the
 * factories below turn that into a full set of operations for a domain.
 */

import { clampScalar } from './scalar';
import type { Scalar } from './scalar';
import { getMathOptions } from './config';
import { warnOnce } from './diagnostics';

// ============================================
// Shape
// ============================================

/** Component layout of one vector size */
export interface VectorShape<V> {
    readonly size: number;
    /** Build from the first `size` entries, as given */
    create(components: ArrayLike<number>): V;
    components(v: V): number[];
    fill(value: number): V;
    map(v: V, fn: (c: number) => number): V;
    zip(a: V, b: V, fn: (a: number, b: number) => number): V;
    /** Left fold over the components, starting from the first one */
    reduce(v: V, fn: (acc: number, c: number) => number): number;
}

// ============================================
// Contracts
// ============================================

export interface VectorOps<V> {
    readonly scalar: Scalar;
    readonly size: number;
    readonly zero: V;
    readonly one: V;

    fromArray(values: ArrayLike<number>): V;
    toArray(v: V): number[];
    /** Convert a vector from any domain into this one */
    from(v: V): V;
    format(v: V): string;

    add(a: V, b: V): V;
    sub(a: V, b: V): V;
    neg(v: V): V;
    /** Component-wise product */
    mul(a: V, b: V): V;
    scale(v: V, k: number): V;
    div(v: V, k: number): V;
    divComponents(a: V, b: V): V;

    dot(a: V, b: V): number;
    lengthSquared(v: V): number;
    /** Always computed in double precision */
    length(v: V): number;
    /** Angle between two vectors in radians */
    angle(a: V, b: V): number;

    abs(v: V): V;
    min(a: V, b: V): V;
    max(a: V, b: V): V;
    clamp(v: V, lo: V, hi: V): V;
    equals(a: V, b: V): boolean;
}

export interface IntVectorOps<V> extends VectorOps<V> {
    /** Component remainder, truncated like integer division */
    rem(v: V, k: number): V;
}

export interface FloatVectorOps<V> extends VectorOps<V> {
    normalize(v: V): V;
    isNormalized(v: V, epsilon?: number): boolean;
    /** Unit vector pointing from `from` to `to` */
    directionTo(from: V, to: V): V;
    distanceTo(a: V, b: V): number;
    distanceSquaredTo(a: V, b: V): number;
    /** Mirror `v` across the plane with unit normal `n` */
    reflect(v: V, n: V): V;
    bounce(v: V, n: V): V;
    project(v: V, onto: V): V;
    slide(v: V, n: V): V;
    lerp(a: V, b: V, t: number): V;
    floor(v: V): V;
    ceil(v: V): V;
    round(v: V): V;
    approxEquals(a: V, b: V, epsilon?: number): boolean;
}

// ============================================
// Factories
// ============================================

export function createVectorOps<V>(shape: VectorShape<V>, scalar: Scalar): VectorOps<V> {
    const s = scalar;

    const fromArray = (values: ArrayLike<number>): V => {
        if (values.length < shape.size) {
            throw new RangeError(`Expected at least ${shape.size} components, got ${values.length}`);
        }
        return shape.map(shape.create(values), s.cast);
    };

    const dot = (a: V, b: V): number => shape.reduce(shape.zip(a, b, s.mul), s.add);
    const lengthSquared = (v: V): number => dot(v, v);
    const length = (v: V): number => Math.sqrt(lengthSquared(v));

    return {
        scalar: s,
        size: shape.size,
        zero: shape.fill(0),
        one: shape.fill(1),

        fromArray,
        toArray: (v) => shape.components(v),
        from: (v) => shape.map(v, s.cast),
        format: (v) => `(${shape.components(v).join(', ')})`,

        add: (a, b) => shape.zip(a, b, s.add),
        sub: (a, b) => shape.zip(a, b, s.sub),
        neg: (v) => shape.map(v, s.neg),
        mul: (a, b) => shape.zip(a, b, s.mul),
        scale: (v, k) => {
            const f = s.cast(k);
            return shape.map(v, (c) => s.mul(c, f));
        },
        div: (v, k) => {
            const d = s.cast(k);
            return shape.map(v, (c) => s.div(c, d));
        },
        divComponents: (a, b) => shape.zip(a, b, s.div),

        dot,
        lengthSquared,
        length,
        angle: (a, b) => {
            const cos = dot(a, b) / (length(a) * length(b));
            return Math.acos(clampScalar(cos, -1, 1));
        },

        abs: (v) => shape.map(v, (c) => (c < 0 ? s.neg(c) : c)),
        min: (a, b) => shape.zip(a, b, Math.min),
        max: (a, b) => shape.zip(a, b, Math.max),
        clamp: (v, lo, hi) => shape.zip(shape.zip(v, lo, Math.max), hi, Math.min),
        equals: (a, b) => {
            const ca = shape.components(a);
            const cb = shape.components(b);
            return ca.every((c, i) => c === cb[i]);
        }
    };
}

export function createIntVectorOps<V>(shape: VectorShape<V>, scalar: Scalar): IntVectorOps<V> {
    const base = createVectorOps(shape, scalar);
    return {
        ...base,
        rem: (v, k) => {
            const d = scalar.cast(k);
            return shape.map(v, (c) => scalar.rem(c, d));
        }
    };
}

export function createFloatVectorOps<V>(shape: VectorShape<V>, scalar: Scalar): FloatVectorOps<V> {
    const base = createVectorOps(shape, scalar);
    const { add, sub, neg, scale, dot, lengthSquared } = base;

    const normalize = (v: V): V => {
        const len = base.length(v);
        if (len === 0) {
            warnOnce('normalize-zero', 'Normalizing a zero-length vector produces NaN components');
        }
        return scale(v, 1 / len);
    };

    const reflect = (v: V, n: V): V => sub(v, scale(n, scalar.mul(dot(v, n), 2)));

    const approxEquals = (a: V, b: V, epsilon: number = getMathOptions().epsilon): boolean => {
        const ca = shape.components(a);
        const cb = shape.components(b);
        return ca.every((c, i) => Math.abs(c - cb[i]) <= epsilon);
    };

    return {
        ...base,
        normalize,
        isNormalized: (v, epsilon = getMathOptions().epsilon) => Math.abs(lengthSquared(v) - 1) <= epsilon,
        directionTo: (from, to) => normalize(sub(to, from)),
        distanceTo: (a, b) => base.length(sub(b, a)),
        distanceSquaredTo: (a, b) => lengthSquared(sub(b, a)),
        reflect,
        bounce: (v, n) => neg(reflect(v, n)),
        project: (v, onto) => scale(onto, scalar.div(dot(v, onto), lengthSquared(onto))),
        slide: (v, n) => sub(v, scale(n, dot(v, n))),
        lerp: (a, b, t) => add(a, scale(sub(b, a), t)),
        floor: (v) => shape.map(v, (c) => scalar.cast(Math.floor(c))),
        ceil: (v) => shape.map(v, (c) => scalar.cast(Math.ceil(c))),
        round: (v) => shape.map(v, (c) => scalar.cast(Math.round(c))),
        approxEquals
    };
}
