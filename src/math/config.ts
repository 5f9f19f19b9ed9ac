/**
 * Library Options
 *
 * Process-wide tolerances and diagnostics switches. Options are replaced
 * wholesale on every change, so callers holding an old snapshot keep it.
 */

export interface MathOptions {
    /** Tolerance for approxEquals, isNormalized and isOrthogonal */
    epsilon: number;
    /** Emit one-time console warnings for suspicious operations */
    warnings: boolean;
}

export const DEFAULT_MATH_OPTIONS: Readonly<MathOptions> = Object.freeze({
    epsilon: 1e-6,
    warnings: true
});

let currentOptions: Readonly<MathOptions> = DEFAULT_MATH_OPTIONS;

export function getMathOptions(): Readonly<MathOptions> {
    return currentOptions;
}

/**
 * Override some options, keeping the rest.
 *
 * @example
 * configureMath({ epsilon: 1e-4 });
 */
export function configureMath(overrides: Partial<MathOptions>): Readonly<MathOptions> {
    const next: MathOptions = { ...currentOptions, ...overrides };
    if (!Number.isFinite(next.epsilon) || next.epsilon < 0) {
        throw new Error(`Invalid epsilon: ${next.epsilon} (expected a finite number >= 0)`);
    }
    currentOptions = Object.freeze(next);
    return currentOptions;
}

export function resetMathOptions(): void {
    currentOptions = DEFAULT_MATH_OPTIONS;
}
