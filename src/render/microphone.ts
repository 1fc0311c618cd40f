import type { Point, Rgb } from '../geometry/types';
import { opaque } from '../geometry/types';
import type { DrawingSurface } from './canvas';

export interface MicrophonePalette {
  glyph: Rgb;
  grille: Rgb;
}

const CAPSULE_WIDTH = 100;
const CAPSULE_HEIGHT = 170;
const GRILLE_LINES = 5;
const STAND_HEIGHT = 55;
const BASE_WIDTH = 90;

/** Stroke widths never drop below these, so small scales keep a visible glyph. */
const MIN_GRILLE_THICKNESS = 2;
const MIN_BAR_THICKNESS = 4;

export interface MicrophoneLayout {
  capsule: { left: number; top: number; right: number; bottom: number; radius: number };
  grille: { y: number; left: number; right: number; thickness: number }[];
  cradle: { left: number; top: number; right: number; bottom: number; thickness: number };
  stand: { left: number; top: number; right: number; bottom: number };
  base: { left: number; top: number; right: number; bottom: number };
}

/** Positions of every glyph part for a microphone centred on `center`. */
export function layoutMicrophone(center: Point, scale: number): MicrophoneLayout {
  const { x: cx, y: cy } = center;

  const capW = CAPSULE_WIDTH * scale;
  const capH = CAPSULE_HEIGHT * scale;
  const capTop = cy - capH * 0.45;
  const capBottom = capTop + capH;

  const grilleTop = capTop + capH * 0.12;
  const grilleBottom = capTop + capH * 0.52;
  const indent = capW * 0.22;
  const grilleThickness = Math.max(MIN_GRILLE_THICKNESS, Math.floor(3 * scale));
  const grille = Array.from({ length: GRILLE_LINES }, (_, i) => ({
    y: grilleTop + (grilleBottom - grilleTop) * (i / (GRILLE_LINES - 1)),
    left: cx - capW / 2 + indent,
    right: cx + capW / 2 - indent,
    thickness: grilleThickness,
  }));

  const arcW = capW * 1.7;
  const arcDepth = capH * 0.45;
  const arcY = capBottom - capH * 0.22;
  const barThickness = Math.max(MIN_BAR_THICKNESS, Math.floor(12 * scale));

  const standTop = arcY + arcDepth;
  const standBottom = standTop + STAND_HEIGHT * scale;

  const baseW = BASE_WIDTH * scale;
  const baseTop = standBottom - barThickness / 3;

  return {
    capsule: {
      left: cx - capW / 2,
      top: capTop,
      right: cx + capW / 2,
      bottom: capBottom,
      radius: capW / 2,
    },
    grille,
    cradle: {
      left: cx - arcW / 2,
      top: arcY,
      right: cx + arcW / 2,
      bottom: arcY + arcDepth * 2,
      thickness: barThickness,
    },
    stand: {
      left: cx - barThickness / 2,
      top: standTop,
      right: cx + barThickness / 2,
      bottom: standBottom,
    },
    base: {
      left: cx - baseW / 2,
      top: baseTop,
      right: cx + baseW / 2,
      bottom: baseTop + barThickness,
    },
  };
}

export function drawMicrophone(
  surface: DrawingSurface,
  center: Point,
  scale: number,
  palette: MicrophonePalette
): MicrophoneLayout {
  const layout = layoutMicrophone(center, scale);
  const glyph = opaque(palette.glyph);
  const grille = opaque(palette.grille);
  const { capsule, cradle, stand, base } = layout;

  surface.fillRoundedRect(capsule, capsule.radius, glyph);

  for (const line of layout.grille) {
    surface.drawLine(
      { x: line.left, y: line.y },
      { x: line.right, y: line.y },
      line.thickness,
      grille
    );
  }

  // Lower half of the ellipse: a U opening upward around the capsule.
  surface.strokeArc(cradle, 0, 180, cradle.thickness, glyph);
  surface.fillRoundedRect(stand, (stand.right - stand.left) / 2, glyph);
  surface.fillRoundedRect(base, (base.bottom - base.top) / 2, glyph);

  return layout;
}
