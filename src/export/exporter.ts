import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { IconExportError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { RasterCanvas } from '../render/canvas';

const log = createLogger('Exporter');

export type IconScale = 1 | 2;

export interface IconSpec {
  /** Logical size in points. */
  size: number;
  scale: IconScale;
  pixelSize: number;
  filename: string;
}

export interface ManifestImage {
  filename: string;
  idiom: 'mac';
  scale: `${IconScale}x`;
  size: string;
}

export interface IconManifest {
  images: ManifestImage[];
  info: { author: 'xcode'; version: 1 };
}

export interface ExportResult {
  files: string[];
  manifestPath: string;
  manifest: IconManifest;
}

export const MANIFEST_FILENAME = 'Contents.json';

const LOGICAL_SIZES = [16, 32, 128, 256, 512] as const;
const SCALES: readonly IconScale[] = [1, 2];

export const iconFilename = (size: number, scale: IconScale): string =>
  `icon_${size}x${size}${scale === 2 ? '@2x' : ''}.png`;

export const ICON_SPECS: readonly IconSpec[] = LOGICAL_SIZES.flatMap((size) =>
  SCALES.map((scale) => ({
    size,
    scale,
    pixelSize: size * scale,
    filename: iconFilename(size, scale),
  }))
);

export function buildManifest(specs: readonly IconSpec[]): IconManifest {
  return {
    images: specs.map(({ filename, scale, size }): ManifestImage => ({
      filename,
      idiom: 'mac',
      scale: `${scale}x`,
      size: `${size}x${size}`,
    })),
    info: { author: 'xcode', version: 1 },
  };
}

export const serializeManifest = (manifest: IconManifest): string =>
  `${JSON.stringify(manifest, null, 2)}\n`;

const toSharp = (canvas: RasterCanvas) =>
  sharp(Buffer.from(canvas.data.buffer, canvas.data.byteOffset, canvas.data.byteLength), {
    raw: { width: canvas.width, height: canvas.height, channels: 4 },
  });

export async function encodePng(canvas: RasterCanvas): Promise<Buffer> {
  return toSharp(canvas).png().toBuffer();
}

/** Lanczos-resampled square PNG of `pixelSize` pixels. */
export async function resizeCanvas(canvas: RasterCanvas, pixelSize: number): Promise<Buffer> {
  return toSharp(canvas)
    .resize(pixelSize, pixelSize, { kernel: 'lanczos3', fit: 'fill' })
    .png()
    .toBuffer();
}

export async function readPng(png: Buffer): Promise<RasterCanvas> {
  const { data, info } = await sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return new RasterCanvas(
    info.width,
    info.height,
    new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength)
  );
}

async function ensureDirectory(dir: string) {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new IconExportError('Could not create directory', dir, { cause: error });
  }
}

async function encodeFor(file: string, encode: () => Promise<Buffer>): Promise<Buffer> {
  try {
    return await encode();
  } catch (error) {
    throw new IconExportError('Could not encode image', file, { cause: error });
  }
}

async function writeOutput(file: string, contents: Buffer | string) {
  try {
    await fs.writeFile(file, contents);
  } catch (error) {
    throw new IconExportError('Could not write file', file, { cause: error });
  }
}

export async function writeMaster(canvas: RasterCanvas, file: string): Promise<void> {
  await ensureDirectory(path.dirname(file));
  await writeOutput(file, await encodeFor(file, () => encodePng(canvas)));
  log.info('Master icon written', { path: file, pixels: canvas.width });
}

/**
 * Writes one PNG per spec into `dir`, one at a time, then the asset
 * catalog manifest. The first failure aborts the export.
 */
export async function exportIconSet(
  canvas: RasterCanvas,
  dir: string,
  specs: readonly IconSpec[] = ICON_SPECS
): Promise<ExportResult> {
  await ensureDirectory(dir);

  const files: string[] = [];
  for (const spec of specs) {
    const file = path.join(dir, spec.filename);
    const png = await encodeFor(file, () => resizeCanvas(canvas, spec.pixelSize));
    await writeOutput(file, png);
    files.push(file);
    log.info(`Created ${spec.filename} (${spec.pixelSize}x${spec.pixelSize}px)`);
  }

  const manifest = buildManifest(specs);
  const manifestPath = path.join(dir, MANIFEST_FILENAME);
  await writeOutput(manifestPath, serializeManifest(manifest));
  log.info('Manifest updated', { path: manifestPath, images: manifest.images.length });

  return { files, manifestPath, manifest };
}
