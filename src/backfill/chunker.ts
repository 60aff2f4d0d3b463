/**
 * Chat Archiver — Bulk Chunker
 *
 * Accumulates bulk units in memory and writes them out as numbered files.
 * Before appending a unit that would bring the buffer to or past the
 * byte budget, the buffer is flushed to the next file.
 */

import { writeFile as fsWriteFile } from 'node:fs/promises';
import { CHUNK_PLACEHOLDER } from '../config/defaults.js';

export type WriteFileFn = (path: string, data: string) => Promise<void>;

export interface BulkChunkerOptions {
  /** File name pattern; every `%` becomes the zero-based chunk index. */
  pattern: string;
  /** Byte budget per file; unbounded when absent. */
  chunkSize?: number;
  writeFile?: WriteFileFn;
}

export function chunkPath(pattern: string, index: number): string {
  return pattern.replaceAll(CHUNK_PLACEHOLDER, String(index));
}

export class BulkChunker {
  private buffer = '';
  private bufferedBytes = 0;
  private nextIndex = 0;
  private readonly chunkSize: number;
  private readonly writeFile: WriteFileFn;
  readonly files: string[] = [];

  constructor(private readonly options: BulkChunkerOptions) {
    this.chunkSize = options.chunkSize ?? Infinity;
    this.writeFile = options.writeFile ?? ((path, data) => fsWriteFile(path, data, 'utf-8'));
  }

  async append(unit: string): Promise<void> {
    const bytes = Buffer.byteLength(unit, 'utf-8');
    if (this.bufferedBytes + bytes >= this.chunkSize) {
      await this.flush();
    }
    this.buffer += unit;
    this.bufferedBytes += bytes;
  }

  /** Write whatever is left. No file is written when nothing is buffered. */
  async finish(): Promise<void> {
    if (this.bufferedBytes > 0) {
      await this.flush();
    }
  }

  private async flush(): Promise<void> {
    const path = chunkPath(this.options.pattern, this.nextIndex);
    await this.writeFile(path, this.buffer);
    this.files.push(path);
    this.nextIndex++;
    this.buffer = '';
    this.bufferedBytes = 0;
  }
}
