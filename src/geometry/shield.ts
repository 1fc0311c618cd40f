import { IconGeometryError } from '../lib/errors';
import type { Path, Point } from './types';

export interface ShieldOptions {
  /** Samples per Bézier flank; each top corner gets a quarter of this. */
  steps?: number;
  /** Top corner radius as a fraction of the shield width. */
  cornerRatio?: number;
  /** Fraction of the height the sides stay straight before curving in. */
  straightRatio?: number;
}

const DEFAULT_STEPS = 40;
const DEFAULT_CORNER_RATIO = 0.08;
const DEFAULT_STRAIGHT_RATIO = 0.5;

export const quadraticBezier = (p0: Point, p1: Point, p2: Point, t: number): Point => {
  const u = 1 - t;
  return {
    x: u * u * p0.x + 2 * u * t * p1.x + t * t * p2.x,
    y: u * u * p0.y + 2 * u * t * p1.y + t * t * p2.y,
  };
};

/** Samples t in (0, 1]; the start point is left to the caller so segments chain. */
export const sampleQuadratic = (p0: Point, p1: Point, p2: Point, steps: number): Point[] => {
  const points: Point[] = [];
  for (let i = 1; i <= steps; i++) {
    points.push(quadraticBezier(p0, p1, p2, i / steps));
  }
  return points;
};

const sampleCornerArc = (
  center: Point,
  radius: number,
  startAngle: number,
  segments: number
): Point[] => {
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const angle = startAngle + (Math.PI / 2) * (i / segments);
    points.push({
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle),
    });
  }
  return points;
};

const assertPositive = (label: string, value: number) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new IconGeometryError(`Shield ${label} must be a positive number, got ${value}`);
  }
};

/**
 * Traces a shield silhouette clockwise (in screen space) starting at the
 * top of the left side: rounded top corners, straight upper sides, then two
 * mirrored quadratic curves meeting at the bottom centre. The final vertex
 * lands on the first one.
 */
export function buildShieldPath(
  center: Point,
  width: number,
  height: number,
  options: ShieldOptions = {}
): Path {
  assertPositive('width', width);
  assertPositive('height', height);

  const steps = options.steps ?? DEFAULT_STEPS;
  if (!Number.isInteger(steps) || steps < 4) {
    throw new IconGeometryError(`Shield steps must be an integer >= 4, got ${steps}`);
  }
  const cornerRatio = options.cornerRatio ?? DEFAULT_CORNER_RATIO;
  const straightRatio = options.straightRatio ?? DEFAULT_STRAIGHT_RATIO;

  const { x: cx, y: cy } = center;
  const left = cx - width / 2;
  const right = cx + width / 2;
  const top = cy - height / 2;
  const bottom = cy + height / 2;
  const radius = width * cornerRatio;
  const cornerSegments = Math.floor(steps / 4);
  const straightEnd = top + height * straightRatio;
  const controlY = straightEnd + height * 0.35;

  const tip: Point = { x: cx, y: bottom };
  const rightShoulder: Point = { x: right, y: straightEnd };
  const leftShoulder: Point = { x: left, y: straightEnd };

  return [
    ...sampleCornerArc({ x: left + radius, y: top + radius }, radius, Math.PI, cornerSegments),
    ...sampleCornerArc(
      { x: right - radius, y: top + radius },
      radius,
      (3 * Math.PI) / 2,
      cornerSegments
    ),
    rightShoulder,
    ...sampleQuadratic(rightShoulder, { x: cx + width * 0.25, y: controlY }, tip, steps),
    ...sampleQuadratic(tip, { x: cx - width * 0.25, y: controlY }, leftShoulder, steps),
    { x: left, y: top + radius },
  ];
}

export const pathBounds = (path: Path) => {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of path) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { left: minX, top: minY, right: maxX, bottom: maxY };
};
