/**
 * Chat Archiver — Program Definition
 *
 * Commander-based CLI. Live outputs are grouped under
 * `chat-archiver archive *`; the offline tools sit at the top level.
 */

import { Command } from 'commander';
import {
  DEFAULT_BACKFILL_INDEX,
  DEFAULT_BACKFILL_PATTERN,
  DEFAULT_ROTATION_LIMIT,
  VERSION_STRING,
} from '../config/defaults.js';
import {
  loadElasticOutput,
  loadRotatingOutput,
  type ArchiveCliOptions,
  type BackfillCliOptions,
} from '../config/loader.js';
import { ExitCode } from '../utils/output.js';
import { archiveCommand } from './archive.js';
import { backfillCommand } from './backfill.js';
import { compactCommand } from './compact.js';
import { applyGlobalOptions } from './global-options.js';
import { collect, didYouMean } from './helpers.js';

interface RotationOptions {
  rotationLimit?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chat-archiver')
    .description('Chat Archiver — Record live chat channels to log files or a search index')
    .version(VERSION_STRING, '-V, --version', 'Show version information');

  // ── Global Options ────────────────────────────────────────────────────

  applyGlobalOptions(program);

  // ── Archive Subcommand Group ────────────────────────────────────────────

  const archive = program
    .command('archive')
    .description('Join channels and archive every message until interrupted')
    .option('-c, --channel <name>', 'Channel to join (repeatable)', collect)
    .option('-n, --nick <nick>', 'Login name (anonymous when omitted)')
    .option('-p, --pass <password>', 'Login password, e.g. oauth:<token>')
    .option('--pass-file <file>', 'Read the login password from a file')
    .option('--dont-filter', 'Keep handshake and keep-alive traffic');

  archive
    .command('irc [file]')
    .description('Write raw wire-format lines (stdout when no file is given)')
    .option('--rotation-limit <bytes>', 'Rotate the file past this size', String(DEFAULT_ROTATION_LIMIT))
    .action((file: string | undefined, opts: RotationOptions, cmd: Command) =>
      archiveCommand(cmd.optsWithGlobals<ArchiveCliOptions>(), () =>
        loadRotatingOutput('irc', file, opts.rotationLimit)
      )
    );

  archive
    .command('json [file]')
    .description('Write one JSON document per line (stdout when no file is given)')
    .option('--rotation-limit <bytes>', 'Rotate the file past this size', String(DEFAULT_ROTATION_LIMIT))
    .action((file: string | undefined, opts: RotationOptions, cmd: Command) =>
      archiveCommand(cmd.optsWithGlobals<ArchiveCliOptions>(), () =>
        loadRotatingOutput('json', file, opts.rotationLimit)
      )
    );

  archive
    .command('elastic <address> <api-key-file> <indices...>')
    .description('Index every message into Elasticsearch; one index pattern with "*" or one index per channel')
    .action((address: string, apiKeyFile: string, indices: string[], _opts: unknown, cmd: Command) =>
      archiveCommand(cmd.optsWithGlobals<ArchiveCliOptions>(), (config) =>
        loadElasticOutput(config.channels, address, apiKeyFile, indices)
      )
    );

  // ── Offline Tools ───────────────────────────────────────────────────────

  program
    .command('backfill [input] [output]')
    .description(`Turn archived wire logs into _bulk files (input defaults to stdin, output to ${DEFAULT_BACKFILL_PATTERN})`)
    .option('--index <name>', 'Target index', DEFAULT_BACKFILL_INDEX)
    .option('--dont-filter', 'Keep handshake and keep-alive traffic')
    .option('--chunk-size <bytes>', 'Start a new file before this many bytes')
    .action((input: string | undefined, output: string | undefined, opts: BackfillCliOptions) =>
      backfillCommand(input, output, opts)
    );

  program
    .command('compact [input] [output]')
    .description('Rewrite an archived wire log with compact message ids')
    .action((input: string | undefined, output: string | undefined) => compactCommand(input, output));

  // ── Unknown Command Handler (did you mean?) ─────────────────────────────

  program.on('command:*', (operands: string[]) => {
    const unknown = operands[0];
    const commands = program.commands.map((c) => c.name());
    const suggestion = didYouMean(unknown, commands);

    process.stderr.write(`\n  Error: Unknown command "${unknown}".`);
    if (suggestion) {
      process.stderr.write(` Did you mean "${suggestion}"?`);
    }
    process.stderr.write(`\n  Run \`chat-archiver --help\` for available commands.\n\n`);
    process.exitCode = ExitCode.USAGE_ERROR;
  });

  return program;
}
