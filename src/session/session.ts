/**
 * Chat Archiver — Live Archive Session
 *
 *   connecting → handshaking → streaming
 *        ↑                         │ transport error / RECONNECT
 *   backing-off ← disconnected ←───┘
 *
 * PINGs are answered before anything else happens to the line. The
 * welcome numeric marks a successful connection and resets the backoff.
 * Sink failures are not recoverable and end the session.
 */

import type { ArchiveConfig } from '../config/types.js';
import { CAPABILITIES } from '../config/defaults.js';
import { compressMessage } from '../irc/compress.js';
import { isIgnoredCommand } from '../irc/filter.js';
import { parseMessage, writeMessage } from '../irc/message.js';
import type { LogSink } from '../sinks/types.js';
import { advanceBackoff, INITIAL_BACKOFF, sleep as defaultSleep } from '../utils/backoff.js';
import { createLogger } from '../utils/logger.js';
import { TransportError, type LineConnection, type Transport } from './transport.js';

const log = createLogger('Session');

const WELCOME = '001';

/** NOTICEs the server sends before closing a connection with bad credentials. */
const AUTH_FAILURE_NOTICES: ReadonlySet<string> = new Set([
  'Login authentication failed',
  'Improperly formatted auth',
]);

// ============================================================================
// TYPES & ERRORS
// ============================================================================

export type SessionState =
  | 'connecting'
  | 'handshaking'
  | 'streaming'
  | 'disconnected'
  | 'backing-off';

export type LineAction = 'pong' | 'welcome' | 'filtered' | 'written' | 'skipped';

export class ReconnectRequestedError extends Error {
  constructor() {
    super('Server requested a reconnect');
    this.name = 'ReconnectRequestedError';
  }
}

export class HandshakeError extends Error {
  constructor(notice: string) {
    super(`Handshake rejected: ${notice}`);
    this.name = 'HandshakeError';
  }
}

export class ReconnectExhaustedError extends Error {
  constructor(public readonly failures: number, options?: { cause?: unknown }) {
    super(`Giving up after ${failures} consecutive connection failures`, options);
    this.name = 'ReconnectExhaustedError';
  }
}

export function isRecoverable(error: unknown): boolean {
  return (
    error instanceof TransportError ||
    error instanceof ReconnectRequestedError ||
    error instanceof HandshakeError
  );
}

export interface SessionOptions {
  config: ArchiveConfig;
  transport: Transport;
  sink: LogSink;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onStateChange?: (state: SessionState) => void;
}

// ============================================================================
// HANDSHAKE
// ============================================================================

export function handshakeLines(config: Pick<ArchiveConfig, 'nick' | 'pass' | 'channels'>): string[] {
  const lines: string[] = [];
  if (config.pass) lines.push(`PASS ${config.pass}`);
  lines.push(`NICK ${config.nick}`);
  lines.push(`CAP REQ :${CAPABILITIES.join(' ')}`);
  for (const channel of config.channels) {
    lines.push(`JOIN #${channel}`);
  }
  return lines;
}

// ============================================================================
// LINE HANDLING
// ============================================================================

export interface LineContext {
  connection: LineConnection;
  sink: LogSink;
  dontFilter: boolean;
}

/**
 * Process one received line. Throws ReconnectRequestedError or
 * HandshakeError to end the connection.
 */
export async function handleLine(line: string, context: LineContext): Promise<LineAction> {
  const message = parseMessage(line);

  if (message.command === 'PING') {
    await context.connection.send(writeMessage({ tags: [], command: 'PONG', params: message.params }));
    return 'pong';
  }

  if (message.command === 'RECONNECT') {
    throw new ReconnectRequestedError();
  }

  if (message.command === '') {
    log.debug('Skipping line without a command', { line });
    return 'skipped';
  }

  if (message.command === 'NOTICE' && message.params[0] === '*') {
    const text = message.params[1] ?? '';
    if (AUTH_FAILURE_NOTICES.has(text)) throw new HandshakeError(text);
  }

  const isWelcome = message.command === WELCOME;

  if (!context.dontFilter && isIgnoredCommand(message.command)) {
    return isWelcome ? 'welcome' : 'filtered';
  }

  compressMessage(message);
  await context.sink.write(message);
  return isWelcome ? 'welcome' : 'written';
}

// ============================================================================
// SESSION LOOP
// ============================================================================

/**
 * Run one connection until it fails or the signal aborts.
 */
async function runConnection(options: SessionOptions, onStreaming: () => void): Promise<void> {
  const { config, transport, sink, signal, onStateChange } = options;

  onStateChange?.('connecting');
  const connection = await transport.connect();

  // Aborted while connecting; the listener below would never fire
  if (signal?.aborted) {
    connection.close();
    return;
  }

  const onAbort = () => connection.close();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    onStateChange?.('handshaking');
    for (const line of handshakeLines(config)) {
      await connection.send(line);
    }
    log.info('Handshake sent', { channels: config.channels.join(','), nick: config.nick });

    const context: LineContext = { connection, sink, dontFilter: config.dontFilter };
    for await (const line of connection.lines()) {
      const action = await handleLine(line, context);
      if (action === 'welcome') {
        onStateChange?.('streaming');
        onStreaming();
      }
    }

    if (!signal?.aborted) {
      throw new TransportError('Connection closed by server');
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    connection.close();
  }
}

/**
 * Archive until aborted. Recoverable failures reconnect with backoff;
 * throws ReconnectExhaustedError once the backoff cap is passed, and
 * rethrows anything unrecoverable.
 */
export async function runArchiveSession(options: SessionOptions): Promise<void> {
  const { config, signal, onStateChange, sleep = defaultSleep } = options;

  let backoff = INITIAL_BACKOFF;
  let failures = 0;

  while (!signal?.aborted) {
    try {
      await runConnection(options, () => {
        backoff = INITIAL_BACKOFF;
        failures = 0;
      });
    } catch (error) {
      if (signal?.aborted) break;
      if (!isRecoverable(error)) throw error;

      onStateChange?.('disconnected');
      failures++;

      const step = advanceBackoff(config.reconnect, backoff);
      if (step.kind === 'exhausted') {
        throw new ReconnectExhaustedError(failures, { cause: error });
      }
      backoff = step.next;

      log.warn('Connection lost', {
        error: error instanceof Error ? error.message : String(error),
        failures,
        delayMs: step.delayMs,
      });

      onStateChange?.('backing-off');
      if (step.delayMs > 0) {
        try {
          await sleep(step.delayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) break;
          throw sleepError;
        }
      }
    }
  }

  log.info('Session stopped');
}
