import { describe, it, expect } from 'vitest';
import { formatPrefix, parseMessage, parsePrefix, writeMessage } from '../message.js';
import { rawTag } from '../tags.js';

describe('parsePrefix', () => {
  it('splits nick, user and host', () => {
    expect(parsePrefix('nick!user@host')).toEqual({ nick: 'nick', user: 'user', host: 'host' });
  });

  it('accepts a bare nick', () => {
    expect(parsePrefix('tmi.twitch.tv')).toEqual({ nick: 'tmi.twitch.tv' });
  });

  it('accepts a host without a user', () => {
    expect(parsePrefix('nick@host')).toEqual({ nick: 'nick', host: 'host' });
  });

  it('cuts at the last @ and then the last !', () => {
    expect(parsePrefix('a!b!c@d@e')).toEqual({ nick: 'a!b', user: 'c@d', host: 'e' });
  });
});

describe('parseMessage', () => {
  it('parses tags, prefix, command and a trailing parameter', () => {
    const message = parseMessage(
      '@badges=subscriber/12;id=abc :nick!nick@nick.tmi.twitch.tv PRIVMSG #chan :hello there'
    );

    expect(message).toEqual({
      tags: [
        ['badges', rawTag('subscriber/12')],
        ['id', rawTag('abc')],
      ],
      prefix: { nick: 'nick', user: 'nick', host: 'nick.tmi.twitch.tv' },
      command: 'PRIVMSG',
      params: ['#chan', 'hello there'],
    });
  });

  it('treats a tag without = as empty', () => {
    const message = parseMessage('@flag;k=v PING');
    expect(message.tags).toEqual([
      ['flag', rawTag('')],
      ['k', rawTag('v')],
    ]);
  });

  it('leaves the prefix absent when there is none', () => {
    const message = parseMessage('PING :tmi.twitch.tv');
    expect(message).toEqual({ tags: [], command: 'PING', params: ['tmi.twitch.tv'] });
    expect('prefix' in message).toBe(false);
  });

  it('keeps colons inside the trailing parameter', () => {
    expect(parseMessage('PRIVMSG #c :a :b').params).toEqual(['#c', 'a :b']);
  });

  it('returns an empty command for a line without one', () => {
    expect(parseMessage('@a=b').command).toBe('');
    expect(parseMessage('').command).toBe('');
  });

  it('parses middle parameters', () => {
    expect(parseMessage(':tmi.twitch.tv 353 nick = #chan :nick').params).toEqual(['nick', '=', '#chan', 'nick']);
  });
});

describe('writeMessage', () => {
  it('reproduces a typical line byte for byte', () => {
    const line = '@badge-info=;color=#1E90FF;display-name=Nick\\sName :nick!nick@nick.tmi.twitch.tv PRIVMSG #chan :hi all';
    expect(writeMessage(parseMessage(line))).toBe(line);
  });

  it('writes a trailing channel without a colon', () => {
    expect(writeMessage({ tags: [], command: 'JOIN', params: ['#chan'] })).toBe('JOIN #chan');
  });

  it('always prefixes a non-channel last parameter with a colon', () => {
    expect(writeMessage({ tags: [], command: 'PONG', params: ['tmi.twitch.tv'] })).toBe('PONG :tmi.twitch.tv');
  });

  it('writes a bare command', () => {
    expect(writeMessage({ tags: [], command: 'RECONNECT', params: [] })).toBe('RECONNECT');
  });
});

describe('formatPrefix', () => {
  it('omits absent parts', () => {
    expect(formatPrefix({ nick: 'n', host: 'h' })).toBe('n@h');
    expect(formatPrefix({ nick: 'n' })).toBe('n');
  });
});
