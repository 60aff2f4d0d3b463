import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

// ── Hoisted mock variables ─────────────────────────────────────────────────────

const { mockRunBackfill, mockRunCompact } = vi.hoisted(() => ({
  mockRunBackfill: vi.fn(),
  mockRunCompact: vi.fn(),
}));

vi.mock('../../backfill/backfill.js', () => ({
  runBackfill: (...args: unknown[]) => mockRunBackfill(...args),
}));

vi.mock('../../backfill/compact.js', () => ({
  runCompact: (...args: unknown[]) => mockRunCompact(...args),
}));

// chalk — passthrough for all style methods
vi.mock('chalk', () => {
  const passthrough = (s: string) => s;
  const handler: ProxyHandler<typeof passthrough> = {
    get: () => new Proxy(passthrough, handler),
    apply: (_target, _thisArg, args: [string]) => args[0],
  };
  return { default: new Proxy(passthrough, handler) };
});

import { backfillCommand } from '../backfill.js';
import { compactCommand } from '../compact.js';

describe('offline commands', () => {
  let stderrSpy: MockInstance;

  beforeEach(() => {
    mockRunBackfill.mockReset();
    mockRunCompact.mockReset();
    process.exitCode = undefined;
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    process.exitCode = undefined;
  });

  function stderr(): string {
    return stderrSpy.mock.calls.map(([chunk]) => String(chunk)).join('');
  }

  describe('backfillCommand', () => {
    it('runs with the validated config and prints a summary', async () => {
      mockRunBackfill.mockResolvedValue({ lines: 4, written: 3, skipped: 1, files: ['out-0.ndjson'] });

      await backfillCommand('in.log', 'out-%.ndjson', { chunkSize: '500' });

      expect(mockRunBackfill).toHaveBeenCalledWith(
        { input: 'in.log', output: 'out-%.ndjson', index: 'twitch-logs', dontFilter: false, chunkSize: 500 },
        {}
      );
      expect(stderr()).toContain('Wrote 3 documents to 1 file(s) (1 of 4 lines skipped)');
      expect(stderr()).toContain('    out-0.ndjson\n');
      expect(process.exitCode).toBeUndefined();
    });

    it('rejects an invalid chunk size without reading input', async () => {
      await backfillCommand(undefined, undefined, { chunkSize: '-5' });

      expect(mockRunBackfill).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(2);
    });

    it('reports a failed run', async () => {
      mockRunBackfill.mockRejectedValue(new Error('ENOENT: no such file'));

      await backfillCommand('missing.log', undefined, {});

      expect(stderr()).toContain('Error: Backfill failed: ENOENT: no such file');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('compactCommand', () => {
    it('passes the paths through', async () => {
      mockRunCompact.mockResolvedValue({ lines: 0, written: 0, skipped: 0 });

      await compactCommand('in.log', 'out.log');

      expect(mockRunCompact).toHaveBeenCalledWith({ input: 'in.log', output: 'out.log' }, {});
    });

    it('reports a failed run', async () => {
      mockRunCompact.mockRejectedValue(new Error('EACCES'));

      await compactCommand(undefined, undefined);

      expect(stderr()).toContain('Error: Compact failed: EACCES');
      expect(process.exitCode).toBe(1);
    });
  });
});
