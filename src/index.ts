/**
 * tinymat - Fixed-Size Linear Algebra Values
 *
 * Features:
 * - 2/3/4D vectors and 2x2/3x3/4x4 matrices
 * - Int (32-bit wrap-around), float (binary32) and double domains
 * - Immutable values: every operation returns a new object
 * - RGBA colors built on float vectors
 */

// ============================================
// Math (Vectors & Matrices)
// ============================================
export * from './math';

// ============================================
// Color
// ============================================
export * from './color';
