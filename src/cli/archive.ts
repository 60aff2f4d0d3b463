/**
 * Chat Archiver — Archive Command
 *
 * Joins the configured channels and streams every kept message into the
 * chosen sink until interrupted. `archive irc|json|elastic` differ only
 * in the sink.
 */

import type { ArchiveConfig, OutputConfig } from '../config/types.js';
import { loadArchiveConfig, type ArchiveCliOptions } from '../config/loader.js';
import { runArchiveSession, type SessionState } from '../session/session.js';
import { createTlsTransport, type Transport } from '../session/transport.js';
import { createSink } from '../sinks/index.js';
import type { LogSink } from '../sinks/types.js';
import { ExitCode } from '../utils/output.js';
import { isVerbose } from './global-options.js';
import { printError } from './helpers.js';

export type OutputResolver = (config: ArchiveConfig) => OutputConfig;

/** Seams for tests; production wiring uses the TLS transport and real sinks. */
export interface ArchiveDeps {
  createTransport?: (config: ArchiveConfig) => Transport;
  createSink?: (output: OutputConfig) => LogSink;
}

function describeOutput(output: OutputConfig): string {
  switch (output.kind) {
    case 'irc':
    case 'json':
      return `${output.kind} → ${output.rotation.file ?? 'stdout'}`;
    case 'elastic':
      return `elastic → ${output.address}`;
  }
}

export async function archiveCommand(
  options: ArchiveCliOptions,
  resolveOutput: OutputResolver,
  deps: ArchiveDeps = {}
): Promise<void> {
  const chalk = (await import('chalk')).default;

  let config: ArchiveConfig;
  let output: OutputConfig;
  try {
    config = loadArchiveConfig(options);
    output = resolveOutput(config);
  } catch (error) {
    printError('Invalid configuration', error);
    return;
  }

  const transport = deps.createTransport?.(config) ?? createTlsTransport({
    host: config.server.host,
    port: config.server.port,
    idleTimeoutMs: config.reconnect.watchdogTimeoutMs,
  });
  const sink = (deps.createSink ?? createSink)(output);

  const controller = new AbortController();
  const stop = () => {
    process.exitCode = ExitCode.SIGINT;
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.stderr.write(chalk.bold(`\n  Archiving ${config.channels.map((ch) => `#${ch}`).join(', ')}\n`));
  process.stderr.write(chalk.gray(`  ${describeOutput(output)} as ${config.nick}\n\n`));

  const onStateChange = isVerbose()
    ? (state: SessionState) => process.stderr.write(chalk.gray(`  [${state}]\n`))
    : undefined;

  try {
    await runArchiveSession({ config, transport, sink, signal: controller.signal, onStateChange });
  } catch (error) {
    printError('Archiving stopped', error);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await sink.close();
  }
}
