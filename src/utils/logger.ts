/**
 * Chat Archiver — Logger
 *
 * Scoped logger writing to stderr; stdout is reserved for archived output.
 * Respects NO_COLOR and non-TTY environments. The initial level comes
 * from CHAT_ARCHIVER_LOG when set.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[90m';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.CHAT_ARCHIVER_LOG;
let globalLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

function isColorless(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  if (!process.stderr.isTTY) return true;
  return false;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown> | Error): void;
}

/**
 * Render one data value. Errors collapse to their message, strings are
 * written bare, everything else as JSON.
 */
function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown> | Error) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const timestamp = new Date().toISOString().slice(11, 23);
    const levelTag = level.toUpperCase().padEnd(5);
    const noColor = isColorless();

    let line: string;

    if (noColor) {
      line = `${timestamp} ${levelTag} [${scope}] ${message}`;
    } else {
      const color = LEVEL_COLORS[level];
      line = `${RESET}${DIM}${timestamp}${RESET} ${color}${levelTag}${RESET} ${DIM}[${scope}]${RESET} ${message}`;
    }

    if (data instanceof Error) {
      line += noColor ? ` ${data.message}` : ` ${LEVEL_COLORS.error}${data.message}${RESET}`;
      if (data.stack && globalLevel === 'debug') {
        line += `\n${data.stack}`;
      }
    } else if (data) {
      const fields = Object.entries(data).filter(([, v]) => v !== undefined);
      if (fields.length > 0) {
        const formatted = fields.map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
        line += noColor ? ` ${formatted}` : ` ${DIM}${formatted}${RESET}`;
      }
    }

    process.stderr.write(line + '\n');
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}
