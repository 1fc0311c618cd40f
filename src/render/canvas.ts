import { IconGeometryError } from '../lib/errors';
import type { Path, Point, Rect, Rgba } from '../geometry/types';

/**
 * Primitive drawing operations the icon is built from. Shape and glyph code
 * only talks to this interface so the pixel backend can be swapped.
 */
export interface DrawingSurface {
  readonly width: number;
  readonly height: number;
  fillPolygon(path: Path, color: Rgba): void;
  fillRoundedRect(rect: Rect, radius: number, color: Rgba): void;
  /**
   * Angles are degrees, clockwise from 3 o'clock. The band of `thickness`
   * pixels grows inward from the ellipse inscribed in `box`.
   */
  strokeArc(box: Rect, startAngle: number, endAngle: number, thickness: number, color: Rgba): void;
  drawLine(from: Point, to: Point, thickness: number, color: Rgba): void;
  compositeOver(layer: RasterCanvas): void;
}

export interface AlphaMask {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

const ARC_SEGMENTS_PER_DEGREE = 0.5;
const CORNER_SEGMENTS = 16;

const assertDimensions = (width: number, height: number) => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new IconGeometryError(`Canvas dimensions must be positive integers, got ${width}x${height}`);
  }
};

/**
 * X coordinates where the horizontal line at `y` crosses the polygon's edges,
 * sorted ascending. Both the scanline fill and the point test go through here
 * so they classify every pixel centre the same way.
 */
export function edgeCrossings(path: Path, y: number): number[] {
  const xs: number[] = [];
  for (let i = 0, j = path.length - 1; i < path.length; j = i++) {
    const a = path[j];
    const b = path[i];
    if (a.y > y !== b.y > y) {
      xs.push(a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y));
    }
  }
  return xs.sort((p, q) => p - q);
}

/** Even-odd rule. */
export function isPointInPolygon(point: Point, path: Path): boolean {
  let inside = false;
  for (const x of edgeCrossings(path, point.y)) {
    if (point.x < x) inside = !inside;
  }
  return inside;
}

export function createPolygonMask(path: Path, width: number, height: number): AlphaMask {
  assertDimensions(width, height);
  const data = new Uint8Array(width * height);
  forEachCoveredPixel(path, width, height, (x, y) => {
    data[y * width + x] = 255;
  });
  return { width, height, data };
}

function forEachCoveredPixel(
  path: Path,
  width: number,
  height: number,
  visit: (x: number, y: number) => void
) {
  if (path.length < 3) return;
  for (let y = 0; y < height; y++) {
    const xs = edgeCrossings(path, y + 0.5);
    for (let k = 0; k + 1 < xs.length; k += 2) {
      const start = xs[k];
      const end = xs[k + 1];
      const first = Math.max(0, Math.floor(start) - 1);
      const last = Math.min(width - 1, Math.ceil(end));
      for (let x = first; x <= last; x++) {
        const cx = x + 0.5;
        if (cx >= start && cx < end) visit(x, y);
      }
    }
  }
}

export function roundedRectPath(rect: Rect, radius: number, cornerSteps = CORNER_SEGMENTS): Path {
  const { left, top, right, bottom } = rect;
  const r = Math.max(0, Math.min(radius, (right - left) / 2, (bottom - top) / 2));
  if (r === 0) {
    return [
      { x: left, y: top },
      { x: right, y: top },
      { x: right, y: bottom },
      { x: left, y: bottom },
    ];
  }

  const corners: Array<[Point, number]> = [
    [{ x: right - r, y: top + r }, -Math.PI / 2],
    [{ x: right - r, y: bottom - r }, 0],
    [{ x: left + r, y: bottom - r }, Math.PI / 2],
    [{ x: left + r, y: top + r }, Math.PI],
  ];
  const points: Point[] = [];
  for (const [center, startAngle] of corners) {
    for (let i = 0; i <= cornerSteps; i++) {
      const angle = startAngle + (Math.PI / 2) * (i / cornerSteps);
      points.push({ x: center.x + r * Math.cos(angle), y: center.y + r * Math.sin(angle) });
    }
  }
  return points;
}

const ellipsePoint = (cx: number, cy: number, rx: number, ry: number, degrees: number): Point => {
  const angle = (degrees * Math.PI) / 180;
  return { x: cx + rx * Math.cos(angle), y: cy + ry * Math.sin(angle) };
};

export function arcBandPath(
  box: Rect,
  startAngle: number,
  endAngle: number,
  thickness: number
): Path {
  const cx = (box.left + box.right) / 2;
  const cy = (box.top + box.bottom) / 2;
  const rx = (box.right - box.left) / 2;
  const ry = (box.bottom - box.top) / 2;
  const innerRx = Math.max(0, rx - thickness);
  const innerRy = Math.max(0, ry - thickness);
  const sweep = endAngle - startAngle;
  const segments = Math.max(2, Math.ceil(Math.abs(sweep) * ARC_SEGMENTS_PER_DEGREE));

  const outer: Point[] = [];
  const inner: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const degrees = startAngle + sweep * (i / segments);
    outer.push(ellipsePoint(cx, cy, rx, ry, degrees));
    inner.push(ellipsePoint(cx, cy, innerRx, innerRy, degrees));
  }
  return [...outer, ...inner.reverse()];
}

export function linePath(from: Point, to: Point, thickness: number): Path {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const length = Math.hypot(dx, dy);
  if (length === 0) {
    const h = thickness / 2;
    return roundedRectPath(
      { left: from.x - h, top: from.y - h, right: from.x + h, bottom: from.y + h },
      0
    );
  }
  const nx = (-dy / length) * (thickness / 2);
  const ny = (dx / length) * (thickness / 2);
  return [
    { x: from.x + nx, y: from.y + ny },
    { x: to.x + nx, y: to.y + ny },
    { x: to.x - nx, y: to.y - ny },
    { x: from.x - nx, y: from.y - ny },
  ];
}

/** Source-over for straight alpha. Returns the blended pixel. */
export function blendOver(src: Rgba, dst: Rgba): Rgba {
  const sa = src[3] / 255;
  const da = dst[3] / 255;
  const outA = sa + da * (1 - sa);
  if (outA === 0) return [0, 0, 0, 0];
  const channel = (s: number, d: number) => Math.round((s * sa + d * da * (1 - sa)) / outA);
  return [
    channel(src[0], dst[0]),
    channel(src[1], dst[1]),
    channel(src[2], dst[2]),
    Math.round(outA * 255),
  ];
}

/**
 * In-memory RGBA raster. Fills overwrite the covered pixels; only
 * `compositeOver` blends.
 */
export class RasterCanvas implements DrawingSurface {
  readonly data: Uint8ClampedArray;

  constructor(
    readonly width: number,
    readonly height: number,
    data?: Uint8ClampedArray
  ) {
    assertDimensions(width, height);
    if (data && data.length !== width * height * 4) {
      throw new IconGeometryError(
        `Pixel buffer holds ${data.length} bytes, expected ${width * height * 4}`
      );
    }
    this.data = data ?? new Uint8ClampedArray(width * height * 4);
  }

  getPixel(x: number, y: number): Rgba {
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  setPixel(x: number, y: number, color: Rgba): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.data.set(color, (y * this.width + x) * 4);
  }

  /** Paints a full-width row; rows off the canvas are ignored. */
  fillRow(y: number, color: Rgba): void {
    if (y < 0 || y >= this.height) return;
    for (let x = 0; x < this.width; x++) {
      this.data.set(color, (y * this.width + x) * 4);
    }
  }

  fillPolygon(path: Path, color: Rgba): void {
    forEachCoveredPixel(path, this.width, this.height, (x, y) => {
      this.data.set(color, (y * this.width + x) * 4);
    });
  }

  fillRoundedRect(rect: Rect, radius: number, color: Rgba): void {
    this.fillPolygon(roundedRectPath(rect, radius), color);
  }

  strokeArc(box: Rect, startAngle: number, endAngle: number, thickness: number, color: Rgba): void {
    this.fillPolygon(arcBandPath(box, startAngle, endAngle, thickness), color);
  }

  drawLine(from: Point, to: Point, thickness: number, color: Rgba): void {
    this.fillPolygon(linePath(from, to, thickness), color);
  }

  compositeOver(layer: RasterCanvas): void {
    if (layer.width !== this.width || layer.height !== this.height) {
      throw new IconGeometryError(
        `Cannot composite a ${layer.width}x${layer.height} layer onto ${this.width}x${this.height}`
      );
    }
    for (let i = 0; i < this.data.length; i += 4) {
      if (layer.data[i + 3] === 0) continue;
      const src: Rgba = [layer.data[i], layer.data[i + 1], layer.data[i + 2], layer.data[i + 3]];
      const dst: Rgba = [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
      this.data.set(blendOver(src, dst), i);
    }
  }

  /** Scales every pixel's alpha by the mask value. */
  applyMask(mask: AlphaMask): void {
    if (mask.width !== this.width || mask.height !== this.height) {
      throw new IconGeometryError('Mask dimensions do not match the canvas');
    }
    for (let p = 0; p < mask.data.length; p++) {
      const i = p * 4 + 3;
      this.data[i] = Math.round((this.data[i] * mask.data[p]) / 255);
    }
  }

  clone(): RasterCanvas {
    return new RasterCanvas(this.width, this.height, new Uint8ClampedArray(this.data));
  }
}
