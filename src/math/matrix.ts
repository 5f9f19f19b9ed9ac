/**
 * Shared Matrix Operations
 *
 * Square matrices stored row-major and applied to column vectors. The
 * dimension modules describe their entry layout as a MatrixShape; the
 * formulas here work on the flat entry list through the row vector type,
 * so each product is a plain row-by-column dot product in the matrix's
 * scalar domain.
 */

import type { Scalar } from './scalar';
import { getMathOptions } from './config';
import { warnOnce } from './diagnostics';
import type { VectorOps } from './vector';

/** Entry layout of one matrix size */
export interface MatrixShape<M> {
    readonly size: number;
    /** Build from `size * size` row-major entries, as given */
    create(entries: ArrayLike<number>): M;
    entries(m: M): number[];
}

// ============================================
// Contracts
// ============================================

export interface MatrixOps<M, V> {
    readonly scalar: Scalar;
    readonly size: number;
    readonly identity: M;
    readonly zero: M;

    /** Row-major entries */
    fromArray(values: ArrayLike<number>): M;
    fromRows(rows: readonly V[]): M;
    toArray(m: M): number[];
    /** Convert a matrix from any domain into this one */
    from(m: M): M;
    format(m: M): string;

    entry(m: M, row: number, col: number): number;
    row(m: M, index: number): V;
    col(m: M, index: number): V;

    add(a: M, b: M): M;
    sub(a: M, b: M): M;
    neg(m: M): M;
    scale(m: M, k: number): M;
    mul(a: M, b: M): M;
    mulVec(m: M, v: V): V;
    transpose(m: M): M;
    trace(m: M): number;
    determinant(m: M): number;
    /**
     * Integer power. A negative exponent raises the transpose, which is the
     * inverse power only for orthogonal matrices.
     */
    power(m: M, exp: number): M;
    equals(a: M, b: M): boolean;
}

export interface FloatMatrixOps<M, V> extends MatrixOps<M, V> {
    inverse(m: M): M;
    approxEquals(a: M, b: M, epsilon?: number): boolean;
    /** m * transpose(m) is the identity within epsilon */
    isOrthogonal(m: M, epsilon?: number): boolean;
}

// ============================================
// Entry helpers
// ============================================

function minorOf(entries: number[], n: number, skipRow: number, skipCol: number): number[] {
    const out: number[] = [];
    for (let r = 0; r < n; r++) {
        if (r === skipRow) continue;
        for (let c = 0; c < n; c++) {
            if (c !== skipCol) out.push(entries[r * n + c]);
        }
    }
    return out;
}

/** Cofactor expansion along the first row */
function determinantOf(entries: number[], n: number, s: Scalar): number {
    if (n === 1) return entries[0];
    if (n === 2) return s.sub(s.mul(entries[0], entries[3]), s.mul(entries[1], entries[2]));

    let det = 0;
    for (let c = 0; c < n; c++) {
        const term = s.mul(entries[c], determinantOf(minorOf(entries, n, 0, c), n - 1, s));
        det = c % 2 === 0 ? s.add(det, term) : s.sub(det, term);
    }
    return det;
}

function checkIndex(kind: string, index: number, n: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= n) {
        throw new RangeError(`${kind} index out of range: ${index} (size ${n})`);
    }
}

// ============================================
// Factories
// ============================================

export function createMatrixOps<M, V>(shape: MatrixShape<M>, vectors: VectorOps<V>): MatrixOps<M, V> {
    const s = vectors.scalar;
    const n = shape.size;

    const identityEntries: number[] = [];
    for (let i = 0; i < n * n; i++) {
        identityEntries.push(i % (n + 1) === 0 ? 1 : 0);
    }
    const identity = shape.create(identityEntries);

    const map = (m: M, fn: (e: number) => number): M => shape.create(shape.entries(m).map(fn));
    const zip = (a: M, b: M, fn: (a: number, b: number) => number): M => {
        const eb = shape.entries(b);
        return shape.create(shape.entries(a).map((e, i) => fn(e, eb[i])));
    };

    const row = (m: M, index: number): V => {
        checkIndex('Row', index, n);
        return vectors.fromArray(shape.entries(m).slice(index * n, index * n + n));
    };
    const col = (m: M, index: number): V => {
        checkIndex('Column', index, n);
        return vectors.fromArray(shape.entries(m).filter((_, i) => i % n === index));
    };

    const mul = (a: M, b: M): M => {
        const out: number[] = [];
        for (let i = 0; i < n; i++) {
            const r = row(a, i);
            for (let j = 0; j < n; j++) {
                out.push(vectors.dot(r, col(b, j)));
            }
        }
        return shape.create(out);
    };

    const transpose = (m: M): M => {
        const e = shape.entries(m);
        return shape.create(e.map((_, i) => e[(i % n) * n + Math.floor(i / n)]));
    };

    return {
        scalar: s,
        size: n,
        identity,
        zero: shape.create(identityEntries.map(() => 0)),

        fromArray: (values) => {
            if (values.length < n * n) {
                throw new RangeError(`Expected at least ${n * n} entries, got ${values.length}`);
            }
            return shape.create(Array.from(values, s.cast).slice(0, n * n));
        },
        fromRows: (rows) => {
            if (rows.length !== n) {
                throw new RangeError(`Expected ${n} rows, got ${rows.length}`);
            }
            return shape.create(rows.flatMap((r) => vectors.toArray(vectors.from(r))));
        },
        toArray: (m) => shape.entries(m),
        from: (m) => map(m, s.cast),
        format: (m) => {
            const e = shape.entries(m);
            const rows: string[] = [];
            for (let i = 0; i < n; i++) {
                rows.push(e.slice(i * n, i * n + n).join(', '));
            }
            return `[${rows.join('; ')}]`;
        },

        entry: (m, r, c) => {
            checkIndex('Row', r, n);
            checkIndex('Column', c, n);
            return shape.entries(m)[r * n + c];
        },
        row,
        col,

        add: (a, b) => zip(a, b, s.add),
        sub: (a, b) => zip(a, b, s.sub),
        neg: (m) => map(m, s.neg),
        scale: (m, k) => {
            const f = s.cast(k);
            return map(m, (e) => s.mul(e, f));
        },
        mul,
        mulVec: (m, v) => {
            const out: number[] = [];
            for (let i = 0; i < n; i++) {
                out.push(vectors.dot(row(m, i), v));
            }
            return vectors.fromArray(out);
        },
        transpose,
        trace: (m) => {
            const e = shape.entries(m);
            let sum = e[0];
            for (let i = 1; i < n; i++) {
                sum = s.add(sum, e[i * n + i]);
            }
            return sum;
        },
        determinant: (m) => determinantOf(shape.entries(m), n, s),
        power: (m, exp) => {
            if (!Number.isInteger(exp)) {
                throw new RangeError(`Matrix power expects an integer exponent, got ${exp}`);
            }
            const base = exp < 0 ? transpose(m) : m;
            let result = identity;
            for (let i = Math.abs(exp); i > 0; i--) {
                result = mul(base, result);
            }
            return result;
        },
        equals: (a, b) => {
            const eb = shape.entries(b);
            return shape.entries(a).every((e, i) => e === eb[i]);
        }
    };
}

export function createFloatMatrixOps<M, V>(shape: MatrixShape<M>, vectors: VectorOps<V>): FloatMatrixOps<M, V> {
    const base = createMatrixOps(shape, vectors);
    const s = base.scalar;
    const n = shape.size;

    const approxEquals = (a: M, b: M, epsilon: number = getMathOptions().epsilon): boolean => {
        const eb = shape.entries(b);
        return shape.entries(a).every((e, i) => Math.abs(e - eb[i]) <= epsilon);
    };

    const isOrthogonal = (m: M, epsilon: number = getMathOptions().epsilon): boolean =>
        approxEquals(base.mul(m, base.transpose(m)), base.identity, epsilon);

    return {
        ...base,
        approxEquals,
        isOrthogonal,
        inverse: (m) => {
            const e = shape.entries(m);
            const det = determinantOf(e, n, s);
            if (det === 0 || !Number.isFinite(det)) {
                throw new Error(`Matrix is not invertible (determinant ${det})`);
            }
            // Adjugate: transposed cofactors
            const out: number[] = [];
            for (let i = 0; i < n; i++) {
                for (let j = 0; j < n; j++) {
                    const minor = determinantOf(minorOf(e, n, j, i), n - 1, s);
                    const cofactor = (i + j) % 2 === 0 ? minor : s.neg(minor);
                    out.push(s.div(cofactor, det));
                }
            }
            return shape.create(out);
        },
        power: (m, exp) => {
            if (exp < 0 && Number.isInteger(exp) && !isOrthogonal(m)) {
                warnOnce('power-negative',
                    'Negative matrix power of a non-orthogonal matrix raises the transpose, not the inverse');
            }
            return base.power(m, exp);
        }
    };
}
