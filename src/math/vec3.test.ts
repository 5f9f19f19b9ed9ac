import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Vec3i, Vec3f, Vec3d } from './vec3';
import { INT_MAX, INT_MIN } from './scalar';
import { configureMath, resetMathOptions } from './config';
import { resetWarnings } from './diagnostics';

describe('Vec3i', () => {
  test('adds, subtracts and negates component-wise', () => {
    const a = Vec3i.create(1, 2, 3);
    const b = Vec3i.create(4, 5, 6);
    expect(Vec3i.add(a, b)).toEqual({ x: 5, y: 7, z: 9 });
    expect(Vec3i.sub(b, a)).toEqual({ x: 3, y: 3, z: 3 });
    expect(Vec3i.neg(a)).toEqual({ x: -1, y: -2, z: -3 });
  });

  test('wraps on overflow', () => {
    const v = Vec3i.add(Vec3i.create(INT_MAX, 0, 0), Vec3i.create(1, 0, 0));
    expect(v.x).toBe(INT_MIN);
  });

  test('truncates scalars and components into the int domain', () => {
    expect(Vec3i.create(1.9, -2.5, 3)).toEqual({ x: 1, y: -2, z: 3 });
    expect(Vec3i.scale(Vec3i.create(1, 2, 3), 2.7)).toEqual({ x: 2, y: 4, z: 6 });
    expect(Vec3i.from({ x: 0.5, y: -0.5, z: 7.25 })).toEqual({ x: 0, y: 0, z: 7 });
  });

  test('divides and takes remainders like integer division', () => {
    const v = Vec3i.create(7, -7, 9);
    expect(Vec3i.div(v, 2)).toEqual({ x: 3, y: -3, z: 4 });
    expect(Vec3i.rem(v, 4)).toEqual({ x: 3, y: -3, z: 1 });
    expect(() => Vec3i.div(v, 0)).toThrow('Integer division by zero');
  });

  test('dot, length and cross', () => {
    expect(Vec3i.dot(Vec3i.create(1, 2, 3), Vec3i.create(4, 5, 6))).toBe(32);
    expect(Vec3i.lengthSquared(Vec3i.create(1, 2, 2))).toBe(9);
    expect(Vec3i.length(Vec3i.create(1, 2, 2))).toBe(3);
    expect(Vec3i.cross(Vec3i.right, Vec3i.up)).toEqual(Vec3i.forward);
  });

  test('abs, min, max and clamp', () => {
    expect(Vec3i.abs(Vec3i.create(-1, 2, -3))).toEqual({ x: 1, y: 2, z: 3 });
    expect(Vec3i.min(Vec3i.create(1, 5, 3), Vec3i.create(4, 2, 6))).toEqual({ x: 1, y: 2, z: 3 });
    expect(Vec3i.max(Vec3i.create(1, 5, 3), Vec3i.create(4, 2, 6))).toEqual({ x: 4, y: 5, z: 6 });
    expect(Vec3i.clamp(Vec3i.create(-5, 5, 15), Vec3i.zero, Vec3i.create(10, 10, 10))).toEqual({ x: 0, y: 5, z: 10 });
  });

  test('array conversion and formatting', () => {
    expect(Vec3i.toArray(Vec3i.create(1, 2, 3))).toEqual([1, 2, 3]);
    expect(Vec3i.fromArray([4, 5, 6, 7])).toEqual({ x: 4, y: 5, z: 6 });
    expect(() => Vec3i.fromArray([1, 2])).toThrow(RangeError);
    expect(Vec3i.format(Vec3i.create(1, -2, 3))).toBe('(1, -2, 3)');
  });

  test('extend and xy', () => {
    expect(Vec3i.extend(Vec3i.create(1, 2, 3), 4)).toEqual({ x: 1, y: 2, z: 3, w: 4 });
    expect(Vec3i.xy(Vec3i.create(1, 2, 3))).toEqual({ x: 1, y: 2 });
  });
});

describe('Vec3f', () => {
  test('rounds to single precision', () => {
    const a = Vec3f.create(0.1, 0.2, 0);
    expect(a.x).toBe(Math.fround(0.1));
    expect(Vec3f.add(a, a).y).toBe(Math.fround(Math.fround(0.2) * 2));
    expect(Vec3f.from(Vec3d.create(0.1, 0, 0)).x).toBe(Math.fround(0.1));
  });

  test('cross product follows the right-hand rule', () => {
    expect(Vec3f.cross(Vec3f.up, Vec3f.right)).toEqual({ x: 0, y: 0, z: -1 });
  });

  test('lerp interpolates linearly', () => {
    expect(Vec3f.lerp(Vec3f.zero, Vec3f.create(2, 4, 8), 0.5)).toEqual({ x: 1, y: 2, z: 4 });
  });
});

describe('Vec3d geometry', () => {
  beforeEach(() => {
    resetWarnings();
  });

  afterEach(() => {
    resetMathOptions();
    vi.restoreAllMocks();
  });

  test('normalize', () => {
    expect(Vec3d.normalize(Vec3d.create(0, 0, 2))).toEqual({ x: 0, y: 0, z: 1 });
    expect(Vec3d.approxEquals(Vec3d.normalize(Vec3d.create(3, 0, 4)), Vec3d.create(0.6, 0, 0.8))).toBe(true);
    expect(Vec3d.isNormalized(Vec3d.up)).toBe(true);
    expect(Vec3d.isNormalized(Vec3d.one)).toBe(false);
  });

  test('normalizing a zero vector yields NaN and warns once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const v = Vec3f.normalize(Vec3f.zero);
    Vec3d.normalize(Vec3d.zero);
    expect(Number.isNaN(v.x)).toBe(true);
    expect(Number.isNaN(v.z)).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[tinymat] Normalizing a zero-length vector produces NaN components');
  });

  test('normalizing a zero vector stays silent when warnings are off', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    configureMath({ warnings: false });
    Vec3d.normalize(Vec3d.zero);
    expect(warn).not.toHaveBeenCalled();
  });

  test('reflect, bounce, project and slide', () => {
    const v = Vec3d.create(1, -1, 0);
    expect(Vec3d.reflect(v, Vec3d.up)).toEqual({ x: 1, y: 1, z: 0 });
    expect(Vec3d.equals(Vec3d.bounce(v, Vec3d.up), Vec3d.create(-1, -1, 0))).toBe(true);

    const w = Vec3d.create(2, 3, 0);
    expect(Vec3d.project(w, Vec3d.right)).toEqual({ x: 2, y: 0, z: 0 });
    expect(Vec3d.slide(w, Vec3d.up)).toEqual({ x: 2, y: 0, z: 0 });
  });

  test('angle between vectors', () => {
    expect(Vec3d.angle(Vec3d.right, Vec3d.up)).toBeCloseTo(Math.PI / 2, 12);
    expect(Vec3d.angle(Vec3d.one, Vec3d.one)).toBe(0);
    expect(Vec3d.angle(Vec3d.right, Vec3d.left)).toBeCloseTo(Math.PI, 12);
  });

  test('direction and distance', () => {
    expect(Vec3d.directionTo(Vec3d.one, Vec3d.create(1, 1, 4))).toEqual({ x: 0, y: 0, z: 1 });
    expect(Vec3d.distanceTo(Vec3d.create(1, 2, 3), Vec3d.create(4, 6, 3))).toBe(5);
    expect(Vec3d.distanceSquaredTo(Vec3d.create(1, 2, 3), Vec3d.create(4, 6, 3))).toBe(25);
  });

  test('rounding helpers', () => {
    const v = Vec3d.create(1.5, -1.5, 2.25);
    expect(Vec3d.floor(v)).toEqual({ x: 1, y: -2, z: 2 });
    expect(Vec3d.ceil(v)).toEqual({ x: 2, y: -1, z: 3 });
    expect(Vec3d.round(v)).toEqual({ x: 2, y: -1, z: 2 });
  });

  test('approxEquals uses the configured epsilon', () => {
    const a = Vec3d.zero;
    const b = Vec3d.create(0.0005, 0, 0);
    expect(Vec3d.approxEquals(a, b)).toBe(false);
    expect(Vec3d.approxEquals(a, b, 1e-3)).toBe(true);
    configureMath({ epsilon: 1e-3 });
    expect(Vec3d.approxEquals(a, b)).toBe(true);
  });

  test('operations never mutate their inputs', () => {
    const a = Vec3d.create(1, 2, 3);
    const b = Vec3d.create(4, 5, 6);
    Vec3d.add(a, b);
    Vec3d.normalize(a);
    Vec3d.cross(a, b);
    expect(a).toEqual({ x: 1, y: 2, z: 3 });
    expect(b).toEqual({ x: 4, y: 5, z: 6 });
  });
});
