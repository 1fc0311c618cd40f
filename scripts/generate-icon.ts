import path from 'path';
import { fileURLToPath } from 'url';
import { runCli } from '../src/cli/generateIcon';

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

runCli(process.argv.slice(2), ROOT).then((code) => {
  process.exitCode = code;
});
