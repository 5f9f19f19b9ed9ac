/**
 * RGBA Color
 *
 * Single-precision color values. Channels map onto Vec4f (r, g, b, a as
 * x, y, z, w), so the arithmetic is the float vector arithmetic. Channels
 * are nominally in [0, 1] but are not clamped until packed into bytes.
 */

import { Vec4f } from '../math/vec4';
import type { Vec4 } from '../math/vec4';
import { FLOAT, clampScalar } from '../math/scalar';

export interface Color {
    readonly r: number;
    readonly g: number;
    readonly b: number;
    readonly a: number;
}

export interface Hsv {
    /** Hue in turns, [0, 1) */
    h: number;
    s: number;
    v: number;
}

function toVec4(c: Color): Vec4 {
    return { x: c.r, y: c.g, z: c.b, w: c.a };
}

function fromVec4(v: Vec4): Color {
    return { r: v.x, g: v.y, b: v.z, a: v.w };
}

function create(r: number, g: number, b: number, a: number = 1): Color {
    return fromVec4(Vec4f.create(r, g, b, a));
}

// ============================================
// Byte packing
// ============================================

function channelToByte(c: number): number {
    return Math.round(clampScalar(c, 0, 1) * 255);
}

function fromBytes(r: number, g: number, b: number, a: number = 255): Color {
    return create(r / 255, g / 255, b / 255, a / 255);
}

/** Unpack 0xRRGGBBAA */
function fromRgba32(value: number): Color {
    return fromBytes((value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff);
}

/** Pack into 0xRRGGBBAA, clamping each channel */
function toRgba32(c: Color): number {
    return ((channelToByte(c.r) << 24) |
        (channelToByte(c.g) << 16) |
        (channelToByte(c.b) << 8) |
        channelToByte(c.a)) >>> 0;
}

const HEX_PATTERN = /^#?([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse `#rgb`, `#rgba`, `#rrggbb` or `#rrggbbaa`; the `#` is optional.
 *
 * @example
 * Color.fromHex('#ff8000'); // opaque orange
 */
function fromHex(hex: string): Color {
    const match = HEX_PATTERN.exec(hex);
    if (!match) {
        throw new Error(`Invalid hex color: '${hex}'`);
    }
    let digits = match[1];
    if (digits.length <= 4) {
        digits = digits.split('').map((d) => d + d).join('');
    }
    if (digits.length === 6) {
        digits += 'ff';
    }
    return fromRgba32(parseInt(digits, 16));
}

function toHex(c: Color, withAlpha: boolean = true): string {
    const hex = toRgba32(c).toString(16).padStart(8, '0');
    return `#${withAlpha ? hex : hex.slice(0, 6)}`;
}

// ============================================
// HSV
// ============================================

function fromHsv(h: number, s: number, v: number, a: number = 1): Color {
    const h6 = (h - Math.floor(h)) * 6;
    const sector = Math.floor(h6);
    const f = h6 - sector;
    const p = v * (1 - s);
    const q = v * (1 - s * f);
    const t = v * (1 - s * (1 - f));
    switch (sector) {
        case 0: return create(v, t, p, a);
        case 1: return create(q, v, p, a);
        case 2: return create(p, v, t, a);
        case 3: return create(p, q, v, a);
        case 4: return create(t, p, v, a);
        default: return create(v, p, q, a);
    }
}

function toHsv(c: Color): Hsv {
    const max = Math.max(c.r, c.g, c.b);
    const min = Math.min(c.r, c.g, c.b);
    const delta = max - min;
    const s = max === 0 ? 0 : delta / max;

    let h = 0;
    if (delta !== 0) {
        if (max === c.r) {
            h = (c.g - c.b) / delta;
        } else if (max === c.g) {
            h = (c.b - c.r) / delta + 2;
        } else {
            h = (c.r - c.g) / delta + 4;
        }
        h /= 6;
        if (h < 0) h += 1;
        if (h >= 1) h -= 1;
    }
    return { h, s, v: max };
}

// ============================================
// Arithmetic
// ============================================

function add(a: Color, b: Color): Color {
    return fromVec4(Vec4f.add(toVec4(a), toVec4(b)));
}

function sub(a: Color, b: Color): Color {
    return fromVec4(Vec4f.sub(toVec4(a), toVec4(b)));
}

/** Channel-wise product (modulation) */
function mul(a: Color, b: Color): Color {
    return fromVec4(Vec4f.mul(toVec4(a), toVec4(b)));
}

function scale(c: Color, k: number): Color {
    return fromVec4(Vec4f.scale(toVec4(c), k));
}

function lerp(a: Color, b: Color, t: number): Color {
    return fromVec4(Vec4f.lerp(toVec4(a), toVec4(b), t));
}

function clamp(c: Color): Color {
    return fromVec4(Vec4f.clamp(toVec4(c), Vec4f.zero, Vec4f.one));
}

/** Source-over compositing of `over` on top of `under` */
function blend(over: Color, under: Color): Color {
    const outA = over.a + under.a * (1 - over.a);
    if (outA === 0) return TRANSPARENT;
    const mix = (o: number, u: number): number => (o * over.a + u * under.a * (1 - over.a)) / outA;
    return create(mix(over.r, under.r), mix(over.g, under.g), mix(over.b, under.b), outA);
}

function invert(c: Color): Color {
    return create(1 - c.r, 1 - c.g, 1 - c.b, c.a);
}

/** Move each channel toward white by `amount` */
function lighten(c: Color, amount: number): Color {
    return create(
        c.r + (1 - c.r) * amount,
        c.g + (1 - c.g) * amount,
        c.b + (1 - c.b) * amount,
        c.a
    );
}

/** Move each channel toward black by `amount` */
function darken(c: Color, amount: number): Color {
    return create(c.r * (1 - amount), c.g * (1 - amount), c.b * (1 - amount), c.a);
}

/** Rec. 709 relative luminance of linear channels */
function luminance(c: Color): number {
    return FLOAT.cast(0.2126 * c.r + 0.7152 * c.g + 0.0722 * c.b);
}

function grayscale(c: Color): Color {
    const l = luminance(c);
    return create(l, l, l, c.a);
}

function equals(a: Color, b: Color): boolean {
    return Vec4f.equals(toVec4(a), toVec4(b));
}

function approxEquals(a: Color, b: Color, epsilon?: number): boolean {
    return Vec4f.approxEquals(toVec4(a), toVec4(b), epsilon);
}

function format(c: Color): string {
    return `rgba(${c.r}, ${c.g}, ${c.b}, ${c.a})`;
}

const WHITE: Color = create(1, 1, 1);
const BLACK: Color = create(0, 0, 0);
const TRANSPARENT: Color = create(0, 0, 0, 0);
const RED: Color = create(1, 0, 0);
const GREEN: Color = create(0, 1, 0);
const BLUE: Color = create(0, 0, 1);

export const Color = {
    WHITE,
    BLACK,
    TRANSPARENT,
    RED,
    GREEN,
    BLUE,
    create,
    fromVec4,
    toVec4,
    fromBytes,
    fromRgba32,
    toRgba32,
    fromHex,
    toHex,
    fromHsv,
    toHsv,
    add,
    sub,
    mul,
    scale,
    lerp,
    clamp,
    blend,
    invert,
    lighten,
    darken,
    luminance,
    grayscale,
    equals,
    approxEquals,
    format
};
