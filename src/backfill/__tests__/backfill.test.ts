import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Readable } from 'node:stream';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

// ── Hoisted mock variables ─────────────────────────────────────────────────────

const { mockLog } = vi.hoisted(() => ({
  mockLog: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => mockLog,
}));

import { BackfillConfigSchema } from '../../config/types.js';
import { runBackfill, toBulkUnit } from '../backfill.js';

const CANONICAL = '0f1e2d3c-4b5a-6978-8796-a5b4c3d2e1f0';
const COMPACT = 'Dx4tPEtaaXiHlqW0w9Lh8A';

const settings = { index: 'twitch-logs', dontFilter: false };

function lines(...input: string[]): Readable {
  return Readable.from([input.join('\n') + '\n']);
}

beforeEach(() => {
  Object.values(mockLog).forEach((fn) => fn.mockReset());
});

describe('toBulkUnit', () => {
  it('writes a create header and the normalized document', () => {
    const unit = toBulkUnit(
      `@id=${CANONICAL};tmi-sent-ts=1000;emotes= :nick!nick@nick.tmi.twitch.tv PRIVMSG #chan :hello`,
      settings
    );

    expect(unit).toBe(
      `{"create":{"_index":"twitch-logs","_id":"${CANONICAL}"}}\n` +
      '{"@timestamp":1000,"channel":"chan","name":"nick","message":"hello","tags":{},' +
      '"irc.nick":"nick","irc.cmd":"PRIVMSG"}\n'
    );
  });

  it('expands compact message and reply ids', () => {
    const unit = toBulkUnit(
      `@id=${COMPACT};tmi-sent-ts=2000;reply-parent-msg-id=${COMPACT} PRIVMSG #chan :reply`,
      settings
    );

    expect(unit).toBe(
      `{"create":{"_index":"twitch-logs","_id":"${CANONICAL}"}}\n` +
      `{"@timestamp":2000,"channel":"chan","message":"reply","tags":{"reply-parent-msg-id":"${CANONICAL}"},` +
      '"irc.cmd":"PRIVMSG"}\n'
    );
  });

  it('skips lines without an id or a sent timestamp', () => {
    expect(toBulkUnit('@id=abc PRIVMSG #chan :x', settings)).toBeUndefined();
    expect(toBulkUnit('@tmi-sent-ts=1 PRIVMSG #chan :x', settings)).toBeUndefined();
  });

  it('skips ignored commands unless told not to', () => {
    const line = `@id=${CANONICAL};tmi-sent-ts=1 :tmi.twitch.tv 001 me :Welcome`;
    expect(toBulkUnit(line, settings)).toBeUndefined();
    expect(toBulkUnit(line, { ...settings, dontFilter: true })).toContain('"irc.cmd":"001"');
  });

  it('warns about lines without a command', () => {
    expect(toBulkUnit('@id=abc', settings)).toBeUndefined();
    expect(mockLog.warn).toHaveBeenCalledWith('Failed to parse line', { line: '@id=abc' });
  });

  it('throws for ids it cannot repair', () => {
    expect(() => toBulkUnit('@id=bad;tmi-sent-ts=1 PRIVMSG #chan :x', settings)).toThrow(
      'Not a canonical or compact message id: "bad"'
    );
  });
});

describe('runBackfill', () => {
  it('counts written and skipped lines and writes one file', async () => {
    const written = new Map<string, string>();
    const config = BackfillConfigSchema.parse({ output: 'out-%.ndjson' });

    const summary = await runBackfill(config, {
      input: lines(
        `@id=${CANONICAL};tmi-sent-ts=1000 PRIVMSG #chan :one`,
        ':tmi.twitch.tv 001 me :Welcome',
        '',
        '@id=abc PRIVMSG #chan :no timestamp',
        '@id=bad;tmi-sent-ts=3000 PRIVMSG #chan :broken',
        `@id=${COMPACT};tmi-sent-ts=2000 PRIVMSG #chan :two`
      ),
      writeFile: async (path, data) => {
        written.set(path, data);
      },
    });

    expect(summary).toEqual({ lines: 5, written: 2, skipped: 3, files: ['out-0.ndjson'] });
    expect(written.get('out-0.ndjson')?.split('\n')).toHaveLength(5);
    expect(mockLog.warn).toHaveBeenCalledWith('Skipping line with unrepairable id', { value: 'bad' });
  });

  it('splits output across files by chunk size', async () => {
    const files: string[] = [];
    const line = `@id=${CANONICAL};tmi-sent-ts=1000 PRIVMSG #chan :x`;
    const unitBytes = Buffer.byteLength(toBulkUnit(line, settings) ?? '');
    const config = BackfillConfigSchema.parse({ chunkSize: unitBytes + 1 });

    const summary = await runBackfill(config, {
      input: lines(line, line, line),
      writeFile: async (path) => {
        files.push(path);
      },
    });

    expect(summary.written).toBe(3);
    expect(files).toEqual(['backfill-0.ndjson', 'backfill-1.ndjson', 'backfill-2.ndjson']);
  });

  it('reads the input file and writes chunk files to disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'chat-archiver-'));
    try {
      const input = join(dir, 'archive.log');
      await writeFile(input, `@id=${CANONICAL};tmi-sent-ts=1000 PRIVMSG #chan :disk\n`);

      const config = BackfillConfigSchema.parse({ input, output: join(dir, 'bulk-%.ndjson'), index: 'logs' });
      await runBackfill(config);

      const content = await readFile(join(dir, 'bulk-0.ndjson'), 'utf-8');
      expect(content.split('\n')[0]).toBe(`{"create":{"_index":"logs","_id":"${CANONICAL}"}}`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
