import fs from 'fs';
import { IconConfigError, describeError } from './errors';
import type { Rgb } from '../geometry/types';

export interface IconPalette {
  background: Rgb;
  shield: Rgb;
  highlight: Rgb;
  shade: Rgb;
  glyph: Rgb;
  grille: Rgb;
}

export interface IconConfig {
  /** Edge length of the square master image in pixels. */
  size: number;
  /** Gap between the canvas edge and the shield's sides. */
  padding: number;
  /** Squircle corner radius as a fraction of `size`. */
  backgroundRadiusRatio: number;
  /** Shield height divided by shield width. */
  shieldAspect: number;
  /** Downward shift of the shield centre from the canvas centre. */
  shieldOffsetY: number;
  /** Shield width at which the microphone is drawn at scale 1. */
  micReferenceWidth: number;
  /** Samples per shield flank curve. */
  curveSteps: number;
  /** Peak alpha of the white highlight at the shield top. */
  highlightAlpha: number;
  /** Peak alpha of the dark shade at the shield bottom. */
  shadeAlpha: number;
  palette: IconPalette;
}

export type IconConfigOverrides = Partial<Omit<IconConfig, 'palette'>> & {
  palette?: Partial<IconPalette>;
};

export const DEFAULT_ICON_CONFIG: IconConfig = {
  size: 1024,
  padding: 80,
  backgroundRadiusRatio: 0.22,
  shieldAspect: 1.05,
  shieldOffsetY: 10,
  micReferenceWidth: 820,
  curveSteps: 40,
  highlightAlpha: 45,
  shadeAlpha: 35,
  palette: {
    background: [245, 248, 250],
    shield: [13, 115, 119],
    highlight: [255, 255, 255],
    shade: [0, 0, 0],
    glyph: [220, 250, 248],
    grille: [80, 170, 165],
  },
};

// Relative to the project root.
export const DEFAULT_OUTPUT_PATHS = {
  master: 'build/app_icon_1024.png',
  iconSet: 'Assets.xcassets/AppIcon.appiconset',
} as const;

const NUMERIC_KEYS = [
  'size',
  'padding',
  'backgroundRadiusRatio',
  'shieldAspect',
  'shieldOffsetY',
  'micReferenceWidth',
  'curveSteps',
  'highlightAlpha',
  'shadeAlpha',
] as const satisfies ReadonlyArray<keyof IconConfig>;

const PALETTE_KEYS = [
  'background',
  'shield',
  'highlight',
  'shade',
  'glyph',
  'grille',
] as const satisfies ReadonlyArray<keyof IconPalette>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isChannel = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;

function parseColor(key: string, value: unknown): Rgb {
  if (Array.isArray(value) && value.length === 3) {
    const [r, g, b]: unknown[] = value;
    if (isChannel(r) && isChannel(g) && isChannel(b)) return [r, g, b];
  }
  throw new IconConfigError(`palette.${key} must be three integers between 0 and 255`);
}

function validate(config: IconConfig): IconConfig {
  const { size, padding } = config;
  if (!Number.isInteger(size) || size <= 0) {
    throw new IconConfigError(`size must be a positive integer, got ${size}`);
  }
  if (!(padding >= 0 && padding < size / 2)) {
    throw new IconConfigError(`padding must be between 0 and ${size / 2} (exclusive), got ${padding}`);
  }
  for (const key of ['backgroundRadiusRatio', 'shieldAspect', 'micReferenceWidth'] as const) {
    if (!(config[key] > 0)) {
      throw new IconConfigError(`${key} must be positive, got ${config[key]}`);
    }
  }
  if (!Number.isInteger(config.curveSteps) || config.curveSteps < 4) {
    throw new IconConfigError(`curveSteps must be an integer of at least 4, got ${config.curveSteps}`);
  }
  for (const key of ['highlightAlpha', 'shadeAlpha'] as const) {
    if (!isChannel(config[key])) {
      throw new IconConfigError(`${key} must be an integer between 0 and 255, got ${config[key]}`);
    }
  }
  for (const key of PALETTE_KEYS) {
    parseColor(key, config.palette[key]);
  }
  return config;
}

export function resolveIconConfig(overrides: IconConfigOverrides = {}): IconConfig {
  return validate({
    ...DEFAULT_ICON_CONFIG,
    ...overrides,
    palette: { ...DEFAULT_ICON_CONFIG.palette, ...overrides.palette },
  });
}

/** Turns parsed JSON into overrides, rejecting unknown keys and wrong types. */
export function parseConfigOverrides(raw: unknown): IconConfigOverrides {
  if (!isRecord(raw)) {
    throw new IconConfigError('Config file must contain a JSON object');
  }

  const overrides: IconConfigOverrides = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'palette') {
      if (!isRecord(value)) throw new IconConfigError('palette must be an object');
      const palette: Partial<Record<keyof IconPalette, Rgb>> = {};
      for (const [colorKey, color] of Object.entries(value)) {
        const paletteKey = PALETTE_KEYS.find((k) => k === colorKey);
        if (!paletteKey) throw new IconConfigError(`Unknown palette entry "${colorKey}"`);
        palette[paletteKey] = parseColor(colorKey, color);
      }
      overrides.palette = palette;
      continue;
    }

    const numericKey = NUMERIC_KEYS.find((k) => k === key);
    if (!numericKey) throw new IconConfigError(`Unknown config key "${key}"`);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new IconConfigError(`${key} must be a number`);
    }
    overrides[numericKey] = value;
  }
  return overrides;
}

/** Reads an optional JSON override file; no path means the built-in defaults. */
export function loadIconConfig(configPath?: string): IconConfig {
  if (!configPath) return resolveIconConfig();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new IconConfigError(`Could not read config ${configPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return resolveIconConfig(parseConfigOverrides(raw));
}
