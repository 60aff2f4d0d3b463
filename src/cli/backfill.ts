/**
 * Chat Archiver — Backfill Command
 */

import { loadBackfillConfig, type BackfillCliOptions } from '../config/loader.js';
import type { BackfillConfig } from '../config/types.js';
import { runBackfill, type BackfillDeps } from '../backfill/backfill.js';
import { printError } from './helpers.js';

export async function backfillCommand(
  input: string | undefined,
  output: string | undefined,
  options: BackfillCliOptions,
  deps: BackfillDeps = {}
): Promise<void> {
  const chalk = (await import('chalk')).default;

  let config: BackfillConfig;
  try {
    config = loadBackfillConfig(input, output, options);
  } catch (error) {
    printError('Invalid configuration', error);
    return;
  }

  try {
    const summary = await runBackfill(config, deps);
    process.stderr.write(chalk.green(`\n  Wrote ${summary.written} documents to ${summary.files.length} file(s)`));
    process.stderr.write(chalk.gray(` (${summary.skipped} of ${summary.lines} lines skipped)\n`));
    for (const file of summary.files) {
      process.stderr.write(chalk.gray(`    ${file}\n`));
    }
    process.stderr.write('\n');
  } catch (error) {
    printError('Backfill failed', error);
  }
}
