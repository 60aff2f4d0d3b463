/**
 * Chat Archiver — Global Options
 *
 * Applies global flags (--no-color, --verbose, --debug) to the root
 * Commander program. These are inherited by all subcommands.
 */

import type { Command } from 'commander';
import { setLogLevel } from '../utils/logger.js';

export interface GlobalOptions {
  color?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

/** Whether --verbose was set (report session state changes). */
let verboseEnabled = false;

export function isVerbose(): boolean {
  return verboseEnabled;
}

/**
 * Register global flags and a preAction hook that applies them
 * before any subcommand runs.
 */
export function applyGlobalOptions(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Report connection state changes')
    .option('--debug', 'Show debug-level diagnostics');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();

    // Commander stores --no-color as color=false
    if (opts.color === false) {
      process.env.NO_COLOR = '1';
    }

    if (opts.debug) {
      setLogLevel('debug');
      verboseEnabled = true;
    } else if (opts.verbose) {
      verboseEnabled = true;
    }
  });
}
