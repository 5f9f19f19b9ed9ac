import { describe, test, expect } from 'vitest';
import { Color } from './color';

describe('Color construction', () => {
  test('defaults to opaque', () => {
    expect(Color.create(1, 0.5, 0.25)).toEqual({ r: 1, g: 0.5, b: 0.25, a: 1 });
  });

  test('stores single-precision channels', () => {
    expect(Color.create(0.1, 0, 0).r).toBe(Math.fround(0.1));
  });

  test('maps onto Vec4f components', () => {
    expect(Color.toVec4(Color.RED)).toEqual({ x: 1, y: 0, z: 0, w: 1 });
    expect(Color.fromVec4({ x: 0, y: 0, z: 1, w: 1 })).toEqual(Color.BLUE);
  });
});

describe('Color packing', () => {
  test('parses hex strings', () => {
    const orange = Color.fromHex('#ff8000');
    expect(orange.r).toBe(1);
    expect(orange.g).toBe(Math.fround(128 / 255));
    expect(orange.b).toBe(0);
    expect(orange.a).toBe(1);
    expect(Color.equals(Color.fromHex('0f0'), Color.GREEN)).toBe(true);
    expect(Color.fromHex('#0000ff80').a).toBe(Math.fround(128 / 255));
    expect(Color.fromHex('#f008').a).toBe(Math.fround(136 / 255));
  });

  test('rejects malformed hex strings', () => {
    expect(() => Color.fromHex('#12345')).toThrow("Invalid hex color: '#12345'");
    expect(() => Color.fromHex('#gg0000')).toThrow("Invalid hex color: '#gg0000'");
    expect(() => Color.fromHex('  #fff ')).toThrow("Invalid hex color: '  #fff '");
  });

  test('formats hex strings', () => {
    const orange = Color.fromHex('#ff8000');
    expect(Color.toHex(orange)).toBe('#ff8000ff');
    expect(Color.toHex(orange, false)).toBe('#ff8000');
    expect(Color.toHex(Color.TRANSPARENT)).toBe('#00000000');
  });

  test('packs into 0xRRGGBBAA with clamping', () => {
    expect(Color.toRgba32(Color.fromRgba32(0x336699cc))).toBe(0x336699cc);
    expect(Color.toRgba32(Color.create(2, -1, 0.5, 1))).toBe(0xff0080ff);
  });

  test('builds from bytes', () => {
    expect(Color.fromBytes(255, 0, 0)).toEqual(Color.RED);
  });
});

describe('Color arithmetic', () => {
  test('add, mul and scale act per channel', () => {
    expect(Color.add(Color.create(0.25, 0.25, 0.25, 0.5), Color.create(0.5, 0.5, 0.5, 0.5)))
      .toEqual({ r: 0.75, g: 0.75, b: 0.75, a: 1 });
    expect(Color.mul(Color.create(0.5, 1, 0, 1), Color.create(0.5, 0.5, 0.5, 1)))
      .toEqual({ r: 0.25, g: 0.5, b: 0, a: 1 });
    expect(Color.scale(Color.WHITE, 0.5)).toEqual({ r: 0.5, g: 0.5, b: 0.5, a: 0.5 });
    expect(Color.sub(Color.WHITE, Color.create(0.25, 0.5, 0.75, 0)))
      .toEqual({ r: 0.75, g: 0.5, b: 0.25, a: 1 });
  });

  test('lerp and clamp', () => {
    expect(Color.lerp(Color.BLACK, Color.WHITE, 0.25)).toEqual({ r: 0.25, g: 0.25, b: 0.25, a: 1 });
    expect(Color.clamp(Color.create(2, -1, 0.5, 1))).toEqual({ r: 1, g: 0, b: 0.5, a: 1 });
  });

  test('blend composites source over destination', () => {
    expect(Color.blend(Color.create(1, 0, 0, 0.5), Color.WHITE)).toEqual({ r: 1, g: 0.5, b: 0.5, a: 1 });
    expect(Color.blend(Color.TRANSPARENT, Color.TRANSPARENT)).toEqual(Color.TRANSPARENT);
    expect(Color.blend(Color.BLUE, Color.RED)).toEqual(Color.BLUE);
  });

  test('invert keeps alpha', () => {
    expect(Color.invert(Color.create(0.25, 0.5, 1, 0.5))).toEqual({ r: 0.75, g: 0.5, b: 0, a: 0.5 });
  });

  test('lighten and darken', () => {
    expect(Color.lighten(Color.BLACK, 0.5)).toEqual({ r: 0.5, g: 0.5, b: 0.5, a: 1 });
    expect(Color.darken(Color.WHITE, 0.25)).toEqual({ r: 0.75, g: 0.75, b: 0.75, a: 1 });
  });

  test('luminance and grayscale', () => {
    expect(Color.luminance(Color.WHITE)).toBeCloseTo(1, 6);
    expect(Color.luminance(Color.BLACK)).toBe(0);
    const gray = Color.grayscale(Color.create(0.5, 0.5, 0.5, 0.25));
    expect(gray.r).toBeCloseTo(0.5, 6);
    expect(gray.a).toBe(0.25);
  });

  test('approxEquals and format', () => {
    expect(Color.approxEquals(Color.create(0.5, 0.5, 0.5), Color.create(0.5000001, 0.5, 0.5))).toBe(true);
    expect(Color.format(Color.RED)).toBe('rgba(1, 0, 0, 1)');
  });
});

describe('Color HSV', () => {
  test('fromHsv', () => {
    expect(Color.fromHsv(0, 1, 1)).toEqual(Color.RED);
    expect(Color.fromHsv(0.5, 1, 1)).toEqual({ r: 0, g: 1, b: 1, a: 1 });
    expect(Color.fromHsv(0.25, 0, 0.5, 0.5)).toEqual({ r: 0.5, g: 0.5, b: 0.5, a: 0.5 });
  });

  test('toHsv', () => {
    expect(Color.toHsv(Color.create(0, 1, 1))).toEqual({ h: 0.5, s: 1, v: 1 });
    expect(Color.toHsv(Color.BLACK)).toEqual({ h: 0, s: 0, v: 0 });
    expect(Color.toHsv(Color.BLUE).h).toBeCloseTo(2 / 3, 12);
  });

  test('toHsv wraps a hue just below red to 0', () => {
    expect(Color.toHsv(Color.create(1, 0, 1e-20))).toEqual({ h: 0, s: 1, v: 1 });
  });
});
