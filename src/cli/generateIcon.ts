import path from 'path';
import { parseArgs } from 'util';
import { exportIconSet, writeMaster, type ExportResult } from '../export/exporter';
import { DEFAULT_OUTPUT_PATHS, loadIconConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { composeIcon } from '../render/compositor';

const log = createLogger('GenerateIcon');

export interface GenerateResult extends ExportResult {
  masterPath: string;
}

/**
 * Renders the icon and writes the master plus the icon set. `--master` and
 * `--output` resolve against the working directory; their defaults resolve
 * against `root`.
 */
export async function run(args: string[], root: string): Promise<GenerateResult> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      master: { type: 'string' },
      output: { type: 'string' },
    },
    strict: true,
  });

  const config = loadIconConfig(values.config && path.resolve(values.config));
  log.info('Generating app icon', { size: config.size });

  const icon = composeIcon(config);

  const masterPath = values.master
    ? path.resolve(values.master)
    : path.join(root, DEFAULT_OUTPUT_PATHS.master);
  await writeMaster(icon, masterPath);

  const iconSetDir = values.output
    ? path.resolve(values.output)
    : path.join(root, DEFAULT_OUTPUT_PATHS.iconSet);
  log.info('Generating icon sizes', { dir: iconSetDir });
  const result = await exportIconSet(icon, iconSetDir);

  log.info('Done! App icon is ready.', { images: result.files.length });
  return { ...result, masterPath };
}

/** Process exit code for a run: 0 on success, 1 after logging the failure. */
export async function runCli(args: string[], root: string): Promise<number> {
  try {
    await run(args, root);
    return 0;
  } catch (error) {
    log.error('Icon generation failed', error);
    return 1;
  }
}
