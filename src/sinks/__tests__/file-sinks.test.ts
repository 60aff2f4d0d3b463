import { describe, it, expect, vi, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseMessage } from '../../irc/message.js';
import { IrcLogSink } from '../irc.js';
import { JsonLogSink, serializeRecord } from '../json.js';
import { openLogStream, rotatedFileName } from '../stream.js';
import type { LogStream } from '../types.js';

function memoryStream() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  const output: LogStream = { stream, close: vi.fn(async () => {}) };
  return { output, text: () => chunks.join('') };
}

describe('IrcLogSink', () => {
  it('writes one wire line per message', async () => {
    const { output, text } = memoryStream();
    const sink = new IrcLogSink(output);

    await sink.write(parseMessage('@id=a :nick PRIVMSG #chan :hello'));
    await sink.write(parseMessage(':nick PART #chan'));

    expect(text()).toBe('@id=a :nick PRIVMSG #chan :hello\n:nick PART #chan\n');
  });

  it('closes its output', async () => {
    const { output } = memoryStream();
    await new IrcLogSink(output).close();
    expect(output.close).toHaveBeenCalledTimes(1);
  });
});

describe('JsonLogSink', () => {
  it('writes one document per line, led by its id', async () => {
    const { output, text } = memoryStream();
    const sink = new JsonLogSink(output);

    await sink.write(parseMessage('@id=abc;tmi-sent-ts=1000;subscriber=1 :nick PRIVMSG #chan :hello'));

    expect(text()).toBe(
      '{"_id":"abc","@timestamp":1000,"channel":"chan","name":"nick","message":"hello",' +
      '"tags":{"subscriber":true},"irc.nick":"nick","irc.cmd":"PRIVMSG"}\n'
    );
  });

  it('uses injected id and clock for untagged messages', async () => {
    const { output, text } = memoryStream();
    const sink = new JsonLogSink(output, { generateId: () => 'fresh', now: () => 42 });

    await sink.write(parseMessage('PING'));

    expect(JSON.parse(text())).toEqual({ _id: 'fresh', '@timestamp': 42, tags: {}, 'irc.cmd': 'PING' });
  });
});

describe('serializeRecord', () => {
  it('puts _id first', () => {
    const line = serializeRecord({ id: 'x', timestamp: 1, tags: {}, irc: { cmd: 'PING', extras: [] } });
    expect(line).toBe('{"_id":"x","@timestamp":1,"tags":{},"irc.cmd":"PING"}');
  });
});

describe('rotatedFileName', () => {
  it('keeps the base name for the live file and numbers gzipped generations', () => {
    const name = rotatedFileName('/var/log/chat/archive.log');
    expect(name(new Date(0))).toBe('archive.log');
    expect(name(new Date(0), 3)).toBe('archive.log.3.gz');
  });
});

describe('openLogStream', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('uses stdout when no file is given', async () => {
    const output = openLogStream({ rotationLimit: 1024 });
    expect(output.stream).toBe(process.stdout);
    await output.close();
  });

  it('writes to the configured file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'chat-archiver-'));
    const file = join(dir, 'archive.log');
    const output = openLogStream({ file, rotationLimit: 1 << 20 });
    const sink = new IrcLogSink(output);

    await sink.write(parseMessage(':nick PRIVMSG #chan :stored'));
    await sink.close();

    expect(await readFile(file, 'utf-8')).toBe(':nick PRIVMSG #chan :stored\n');
  });

  it('fails later writes after the file stream errors', async () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    dir = await mkdtemp(join(tmpdir(), 'chat-archiver-'));
    const output = openLogStream({ file: join(dir, 'archive.log'), rotationLimit: 1 << 20 });
    const sink = new IrcLogSink(output);

    output.stream.emit('error', new Error('rotation failed'));

    await expect(sink.write(parseMessage(':nick PRIVMSG #chan :lost'))).rejects.toMatchObject({
      code: 'ERR_STREAM_DESTROYED',
    });
    await sink.close();
    expect(String(stderrSpy.mock.calls[0][0])).toContain('Log file failed');
    stderrSpy.mockRestore();
  });
});
