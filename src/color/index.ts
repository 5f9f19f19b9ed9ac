export { Color } from './color';
export type { Hsv } from './color';
