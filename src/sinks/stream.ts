/**
 * Chat Archiver — Output Streams
 *
 * stdout when no file is configured; otherwise a size-rotated file whose
 * rotated generations are gzipped as `<file>.<n>.gz`.
 */

import { basename, dirname } from 'node:path';
import { createStream } from 'rotating-file-stream';
import type { RotationConfig } from '../config/types.js';
import { createLogger } from '../utils/logger.js';
import type { LogStream } from './types.js';

const log = createLogger('Output');

export function rotatedFileName(file: string): (time: number | Date, index?: number) => string {
  const name = basename(file);
  return (_time, index) => (index ? `${name}.${index}.gz` : name);
}

export function openLogStream(rotation: RotationConfig): LogStream {
  if (!rotation.file) {
    return {
      stream: process.stdout,
      // stdout stays open for the life of the process
      close: async () => {},
    };
  }

  const stream = createStream(rotatedFileName(rotation.file), {
    path: dirname(rotation.file),
    size: `${rotation.rotationLimit}B`,
    compress: 'gzip',
  });

  // Rotation failures arrive outside any write; later writes then reject
  stream.on('error', (error: Error) => {
    log.error('Log file failed', error);
    stream.destroy();
  });

  return {
    stream,
    close: () => new Promise<void>((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    }),
  };
}
