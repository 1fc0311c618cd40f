import { afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import {
  ICON_SPECS,
  MANIFEST_FILENAME,
  buildManifest,
  exportIconSet,
  iconFilename,
  readPng,
  resizeCanvas,
  serializeManifest,
  writeMaster,
} from '../../src/export/exporter';
import { DEFAULT_ICON_CONFIG, resolveIconConfig } from '../../src/lib/config';
import { IconExportError } from '../../src/lib/errors';
import { RasterCanvas } from '../../src/render/canvas';
import { composeIcon } from '../../src/render/compositor';

const NAMING = /^icon_(16|32|128|256|512)x\1(@2x)?\.png$/;

describe('icon specs', () => {
  it('covers every macOS size at 1x and 2x', () => {
    expect(ICON_SPECS.map((spec) => spec.filename)).toEqual([
      'icon_16x16.png',
      'icon_16x16@2x.png',
      'icon_32x32.png',
      'icon_32x32@2x.png',
      'icon_128x128.png',
      'icon_128x128@2x.png',
      'icon_256x256.png',
      'icon_256x256@2x.png',
      'icon_512x512.png',
      'icon_512x512@2x.png',
    ]);
    expect(ICON_SPECS.map((spec) => spec.pixelSize)).toEqual([
      16, 32, 32, 64, 128, 256, 256, 512, 512, 1024,
    ]);
  });

  it('names retina variants with an @2x suffix', () => {
    expect(iconFilename(32, 1)).toBe('icon_32x32.png');
    expect(iconFilename(32, 2)).toBe('icon_32x32@2x.png');
  });
});

describe('manifest', () => {
  it('serializes in asset catalog layout', () => {
    expect(serializeManifest(buildManifest([ICON_SPECS[1]]))).toBe(
      [
        '{',
        '  "images": [',
        '    {',
        '      "filename": "icon_16x16@2x.png",',
        '      "idiom": "mac",',
        '      "scale": "2x",',
        '      "size": "16x16"',
        '    }',
        '  ],',
        '  "info": {',
        '    "author": "xcode",',
        '    "version": 1',
        '  }',
        '}',
        '',
      ].join('\n')
    );
  });
});

describe('export', () => {
  let master: RasterCanvas;
  let workDir: string;

  beforeAll(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    master = composeIcon(resolveIconConfig({ size: 128, padding: 10 }));
  });

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'icon-export-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('reproduces the master when resized to its own size', async () => {
    const roundTrip = await readPng(await resizeCanvas(master, master.width));
    expect(roundTrip.width).toBe(master.width);
    let maxDiff = 0;
    for (let i = 0; i < master.data.length; i++) {
      maxDiff = Math.max(maxDiff, Math.abs(master.data[i] - roundTrip.data[i]));
    }
    expect(maxDiff).toBeLessThanOrEqual(2);
  });

  it('reproduces the full-size master when resized to 1024px', async () => {
    const full = composeIcon(DEFAULT_ICON_CONFIG);
    const roundTrip = await readPng(await resizeCanvas(full, 1024));
    expect(roundTrip.width).toBe(1024);
    expect(roundTrip.height).toBe(1024);
    let maxDiff = 0;
    for (let i = 0; i < full.data.length; i++) {
      maxDiff = Math.max(maxDiff, Math.abs(full.data[i] - roundTrip.data[i]));
    }
    expect(maxDiff).toBeLessThanOrEqual(2);
  });

  it('keeps the background visible at 16px', async () => {
    const tiny = await readPng(await resizeCanvas(master, 16));
    expect(tiny.width).toBe(16);
    expect(tiny.height).toBe(16);
    expect(tiny.getPixel(8, 8)[3]).toBe(255);
    expect(tiny.getPixel(1, 8)[3]).toBeGreaterThan(0);
  });

  it('writes ten images and a matching manifest', async () => {
    const dir = path.join(workDir, 'AppIcon.appiconset');
    const result = await exportIconSet(master, dir);

    const pngs = fs.readdirSync(dir).filter((name) => name.endsWith('.png'));
    expect(pngs).toHaveLength(10);
    expect(new Set(pngs).size).toBe(10);
    pngs.forEach((name) => expect(name).toMatch(NAMING));

    const manifest = JSON.parse(fs.readFileSync(path.join(dir, MANIFEST_FILENAME), 'utf-8'));
    expect(manifest.images).toHaveLength(10);
    expect(manifest.info).toEqual({ author: 'xcode', version: 1 });
    expect(manifest.images[3]).toEqual({
      filename: 'icon_32x32@2x.png',
      idiom: 'mac',
      scale: '2x',
      size: '32x32',
    });
    expect([...manifest.images.map((image: { filename: string }) => image.filename)].sort()).toEqual(
      [...pngs].sort()
    );

    expect(result.files).toHaveLength(10);
    expect(result.manifestPath).toBe(path.join(dir, MANIFEST_FILENAME));
  });

  it('resizes each image to its pixel size', async () => {
    const dir = path.join(workDir, 'icons');
    await exportIconSet(master, dir);
    const retina = await sharp(path.join(dir, 'icon_512x512@2x.png')).metadata();
    const small = await sharp(path.join(dir, 'icon_16x16.png')).metadata();
    expect(retina.width).toBe(1024);
    expect(small.width).toBe(16);
  });

  it('produces identical output on a second run', async () => {
    const first = path.join(workDir, 'first');
    const second = path.join(workDir, 'second');
    await exportIconSet(master, first);
    await exportIconSet(master, second);

    for (const name of [MANIFEST_FILENAME, ...ICON_SPECS.map((spec) => spec.filename)]) {
      const a = fs.readFileSync(path.join(first, name));
      const b = fs.readFileSync(path.join(second, name));
      expect(a.equals(b), `${name} differs between runs`).toBe(true);
    }
  });

  it('writes the master into a fresh directory', async () => {
    const file = path.join(workDir, 'build', 'app_icon.png');
    await writeMaster(master, file);
    const meta = await sharp(file).metadata();
    expect(meta.width).toBe(128);
    expect(meta.format).toBe('png');
  });

  it('reports encoder failures as export errors naming the file', async () => {
    const dir = path.join(workDir, 'bad-size');
    const failure = exportIconSet(new RasterCanvas(8, 8), dir, [
      { size: 0, scale: 1, pixelSize: 0, filename: 'icon_0x0.png' },
    ]);
    await expect(failure).rejects.toThrow(IconExportError);
    await expect(failure).rejects.toMatchObject({ path: path.join(dir, 'icon_0x0.png') });
  });

  it('fails the whole export when the target cannot be created', async () => {
    const blocker = path.join(workDir, 'blocker');
    fs.writeFileSync(blocker, '');
    await expect(exportIconSet(master, path.join(blocker, 'icons'))).rejects.toThrow(
      IconExportError
    );
  });
});
