/**
 * Scalar Domains
 *
 * Integer, single-precision and double-precision arithmetic on plain numbers.
 * Every result is rounded back into its domain, so the same formula gives
 * 32-bit wrap-around for ints and binary32 rounding for floats.
 */

// Type aliases for component values (just numbers)
export type Int = number;
export type Float = number;
export type Double = number;

export type ScalarKind = 'int' | 'float' | 'double';

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

// ============================================
// Conversion
// ============================================

/** Truncate toward zero and saturate at the 32-bit range. NaN becomes 0. */
export function toInt(value: number): Int {
    if (Number.isNaN(value)) return 0;
    if (value >= INT_MAX) return INT_MAX;
    if (value <= INT_MIN) return INT_MIN;
    // | 0 also turns -0 into 0
    return Math.trunc(value) | 0;
}

/** Round to the nearest single-precision value */
export function toFloat(value: number): Float {
    return Math.fround(value);
}

export function toDouble(value: number): Double {
    return value;
}

// ============================================
// Domains
// ============================================

export interface Scalar {
    readonly kind: ScalarKind;
    /** Coerce an arbitrary number into this domain */
    cast(value: number): number;
    add(a: number, b: number): number;
    sub(a: number, b: number): number;
    mul(a: number, b: number): number;
    div(a: number, b: number): number;
    rem(a: number, b: number): number;
    neg(a: number): number;
}

function checkIntDivisor(b: Int): void {
    if (b === 0) {
        throw new Error('Integer division by zero');
    }
}

export const INT: Scalar = {
    kind: 'int',
    cast: toInt,
    add: (a, b) => (a + b) | 0,
    sub: (a, b) => (a - b) | 0,
    mul: (a, b) => Math.imul(a, b),
    div: (a, b) => {
        checkIntDivisor(b);
        return (a / b) | 0;
    },
    rem: (a, b) => {
        checkIntDivisor(b);
        return (a % b) | 0;
    },
    neg: (a) => (-a) | 0
};

export const FLOAT: Scalar = {
    kind: 'float',
    cast: toFloat,
    add: (a, b) => Math.fround(a + b),
    sub: (a, b) => Math.fround(a - b),
    mul: (a, b) => Math.fround(a * b),
    div: (a, b) => Math.fround(a / b),
    rem: (a, b) => Math.fround(a % b),
    neg: (a) => -a
};

export const DOUBLE: Scalar = {
    kind: 'double',
    cast: toDouble,
    add: (a, b) => a + b,
    sub: (a, b) => a - b,
    mul: (a, b) => a * b,
    div: (a, b) => a / b,
    rem: (a, b) => a % b,
    neg: (a) => -a
};

/** Look up a domain by name */
export function scalarOf(kind: ScalarKind): Scalar {
    switch (kind) {
        case 'int': return INT;
        case 'float': return FLOAT;
        case 'double': return DOUBLE;
    }
}

export function clampScalar(v: number, min: number, max: number): number {
    return v < min ? min : v > max ? max : v;
}
