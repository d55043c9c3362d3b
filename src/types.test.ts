import { describe, it, expect } from 'vitest';
import {
  highSurrogate,
  lowSurrogate,
  utf16Length,
  MAX_CODEPOINT,
  RUNE_ACCEPT,
  RUNE_REJECT,
  STATE_STRIDE,
} from './types';

describe('surrogate pairs', () => {
  it('splits U+10000 into D800 DC00', () => {
    expect(highSurrogate(0x10000)).toBe(0xd800);
    expect(lowSurrogate(0x10000)).toBe(0xdc00);
  });

  it('splits U+10FFFF into DBFF DFFF', () => {
    expect(highSurrogate(MAX_CODEPOINT)).toBe(0xdbff);
    expect(lowSurrogate(MAX_CODEPOINT)).toBe(0xdfff);
  });

  it('matches the platform for emoji', () => {
    for (const ch of ['🤓', '😎', '🥸', '🤩', '🤯']) {
      const codepoint = ch.codePointAt(0) ?? 0;
      expect(highSurrogate(codepoint)).toBe(ch.charCodeAt(0));
      expect(lowSurrogate(codepoint)).toBe(ch.charCodeAt(1));
    }
  });
});

describe('utf16Length', () => {
  it('uses one unit up to U+FFFF', () => {
    expect(utf16Length(0)).toBe(1);
    expect(utf16Length(0xd800)).toBe(1);
    expect(utf16Length(0xffff)).toBe(1);
  });

  it('uses two units above U+FFFF', () => {
    expect(utf16Length(0x10000)).toBe(2);
    expect(utf16Length(MAX_CODEPOINT)).toBe(2);
  });
});

describe('states', () => {
  it('places accept and reject in the first two rows', () => {
    expect(RUNE_ACCEPT).toBe(0);
    expect(RUNE_REJECT).toBe(STATE_STRIDE);
  });
});
