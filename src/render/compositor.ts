import { buildShieldPath } from '../geometry/shield';
import type { Path, Point } from '../geometry/types';
import { opaque } from '../geometry/types';
import type { IconConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { RasterCanvas, createPolygonMask } from './canvas';
import { drawMicrophone } from './microphone';

const log = createLogger('Compositor');

const HIGHLIGHT_SPAN = 0.45;
const SHADE_SPAN = 0.35;

export interface ShieldGeometry {
  center: Point;
  width: number;
  height: number;
  top: number;
  bottom: number;
  path: Path;
}

export function shieldGeometry(config: IconConfig): ShieldGeometry {
  const width = config.size - config.padding * 2;
  const height = width * config.shieldAspect;
  const center = { x: config.size / 2, y: config.size / 2 + config.shieldOffsetY };
  return {
    center,
    width,
    height,
    top: center.y - height / 2,
    bottom: center.y + height / 2,
    path: buildShieldPath(center, width, height, { steps: config.curveSteps }),
  };
}

/**
 * Full-canvas layer with a white ramp fading out over the top 45% of the
 * shield and a black ramp fading in over the bottom 35%. Nothing outside
 * those rows is touched.
 */
export function buildGradientLayer(config: IconConfig, shield: ShieldGeometry): RasterCanvas {
  const layer = new RasterCanvas(config.size, config.size);
  const [hr, hg, hb] = config.palette.highlight;
  const [sr, sg, sb] = config.palette.shade;

  const highlightSpan = shield.height * HIGHLIGHT_SPAN;
  const highlightRows = Math.floor(highlightSpan);
  for (let i = 0; i < highlightRows; i++) {
    const alpha = Math.floor(config.highlightAlpha * (1 - i / highlightSpan));
    layer.fillRow(Math.floor(shield.top + i), [hr, hg, hb, alpha]);
  }

  const shadeSpan = shield.height * SHADE_SPAN;
  const shadeRows = Math.floor(shadeSpan);
  const shadeStart = shield.bottom - shadeRows;
  for (let i = 0; i < shadeRows; i++) {
    const alpha = Math.floor(config.shadeAlpha * (i / shadeSpan));
    layer.fillRow(Math.floor(shadeStart + i), [sr, sg, sb, alpha]);
  }

  return layer;
}

export function composeIcon(config: IconConfig): RasterCanvas {
  const { size, palette } = config;
  const canvas = new RasterCanvas(size, size);

  canvas.fillRoundedRect(
    { left: 0, top: 0, right: size, bottom: size },
    size * config.backgroundRadiusRatio,
    opaque(palette.background)
  );

  const shield = shieldGeometry(config);
  log.debug('Shield path built', {
    points: shield.path.length,
    width: shield.width,
    height: shield.height,
  });
  canvas.fillPolygon(shield.path, opaque(palette.shield));

  // The gradient spans whole rows; the mask confines it to the shield.
  const gradient = buildGradientLayer(config, shield);
  gradient.applyMask(createPolygonMask(shield.path, size, size));
  canvas.compositeOver(gradient);

  const micScale = shield.width / config.micReferenceWidth;
  drawMicrophone(
    canvas,
    { x: shield.center.x, y: shield.center.y - config.shieldOffsetY },
    micScale,
    palette
  );
  log.debug('Microphone drawn', { scale: micScale });

  return canvas;
}
