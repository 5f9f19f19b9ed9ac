/**
 * Diagnostics
 *
 * One-time warnings for operations that are legal but usually a bug,
 * such as normalizing a zero vector.
 */

import { getMathOptions } from './config';

const warnedKeys: Set<string> = new Set();

export function warnOnce(key: string, message: string): void {
    if (!getMathOptions().warnings || warnedKeys.has(key)) return;
    warnedKeys.add(key);
    console.warn(`[tinymat] ${message}`);
}

/** Forget which warnings were already shown */
export function resetWarnings(): void {
    warnedKeys.clear();
}
