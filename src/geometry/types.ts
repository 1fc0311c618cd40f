export interface Point {
  x: number;
  y: number;
}

/** Closed polygon; the last vertex connects back to the first. */
export type Path = readonly Point[];

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** Straight (non-premultiplied) 8-bit RGBA. */
export type Rgba = readonly [r: number, g: number, b: number, a: number];

export type Rgb = readonly [r: number, g: number, b: number];

export const opaque = ([r, g, b]: Rgb): Rgba => [r, g, b, 255];
