/**
 * Chat Archiver — Compact Command
 */

import { runCompact, type CompactStreams } from '../backfill/compact.js';
import { printError } from './helpers.js';

export async function compactCommand(
  input: string | undefined,
  output: string | undefined,
  streams: CompactStreams = {}
): Promise<void> {
  try {
    await runCompact({ input, output }, streams);
  } catch (error) {
    printError('Compact failed', error);
  }
}
