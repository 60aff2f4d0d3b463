/**
 * Chat Archiver — Exit Codes & Error Output
 */

export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
  SIGINT: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Print a structured error to stderr.
 */
export function printErrorResult(error: {
  code: string;
  message: string;
  suggestion?: string;
}): void {
  process.stderr.write(`\n  Error: ${error.message}\n`);
  if (error.suggestion) {
    process.stderr.write(`  ${error.suggestion}\n`);
  }
  process.stderr.write('\n');
}

/**
 * Write one chunk and resolve once the stream has accepted it.
 */
export function writeChunk(stream: NodeJS.WritableStream, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(chunk, (error?: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}
