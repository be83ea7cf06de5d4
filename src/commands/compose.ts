import type { CliOptions } from '../types/index.js';
import { runManifestCheck } from './check.js';

export async function composeCommand(file: string | undefined, opts: CliOptions): Promise<number> {
  return runManifestCheck('compose', file, opts);
}
