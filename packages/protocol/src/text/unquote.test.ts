// Tests for percent-decoding of server strings

import { describe, it, expect } from 'vitest';
import { unquoteString, unquoteAny, unquotePayload } from './unquote.js';

describe('unquoteString', () => {
  it('should decode percent-encoded text', () => {
    expect(unquoteString('Alice%20Smith')).toBe('Alice Smith');
    expect(unquoteString('caf%C3%A9')).toBe('café');
  });

  it('should leave plain text alone', () => {
    expect(unquoteString('Alice')).toBe('Alice');
    expect(unquoteString('Alice+Smith')).toBe('Alice+Smith');
  });

  it('should leave malformed escapes alone', () => {
    expect(unquoteString('100% real')).toBe('100% real');
  });

  it('should not decode text that would encode differently', () => {
    // encodeURIComponent writes upper-case hex
    expect(unquoteString('a%2fb')).toBe('a%2fb');
    expect(unquoteString('a%2Fb')).toBe('a/b');
  });
});

describe('unquoteAny', () => {
  it('should decode strings nested in arrays and objects', () => {
    const input = {
      topic: 'Hello%20world',
      tags: ['dance', 'rock%20%26%20roll'],
      count: 3,
      nested: { empty: null, flag: true },
    };

    expect(unquoteAny(input)).toEqual({
      topic: 'Hello world',
      tags: ['dance', 'rock & roll'],
      count: 3,
      nested: { empty: null, flag: true },
    });
  });

  it('should not mutate its input', () => {
    const input = ['Hello%20world'];
    unquoteAny(input);
    expect(input).toEqual(['Hello%20world']);
  });
});

describe('unquotePayload', () => {
  it('should decode flat fields and group entries', () => {
    const result = unquotePayload({
      sessionId: 7,
      name: 'Alice%20Smith',
      model: { topic: 'Say%20hi', flags: 64 },
    });

    expect(result).toEqual({
      sessionId: 7,
      name: 'Alice Smith',
      model: { topic: 'Say hi', flags: 64 },
    });
  });

  it('should drop undefined fields', () => {
    const result = unquotePayload({ sessionId: undefined, name: 'Bob' });
    expect(result).toEqual({ name: 'Bob' });
    expect('sessionId' in result).toBe(false);
  });
});
