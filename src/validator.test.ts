import { describe, it, expect } from 'vitest';
import { validate, validateAt, countRunes } from './validator';
import { UTF8_TABLES, WTF8_TABLES, TEXT_TABLES } from './tables';
import { expectMalformed, utf8Bytes } from '../tests/helpers';

describe('validate', () => {
  it('accepts the empty buffer', () => {
    expect(validate(UTF8_TABLES, new Uint8Array(0))).toBe(true);
  });

  it('accepts well-formed text of every sequence length', () => {
    expect(validate(UTF8_TABLES, utf8Bytes('abcde'))).toBe(true);
    expect(validate(UTF8_TABLES, utf8Bytes('αβγδε'))).toBe(true);
    expect(validate(UTF8_TABLES, utf8Bytes('∅⊄⊅⊆⊇'))).toBe(true);
    expect(validate(UTF8_TABLES, utf8Bytes('🤓😎🥸🤩🤯'))).toBe(true);
  });

  it('rejects a truncated sequence at the end', () => {
    expect(validate(UTF8_TABLES, new Uint8Array([0xe0]))).toBe(false);
    expect(validate(UTF8_TABLES, new Uint8Array([0x61, 0xf0, 0x9f, 0x98]))).toBe(false);
  });

  it('rejects overlong encodings', () => {
    expect(validate(UTF8_TABLES, new Uint8Array([0xc0, 0x80]))).toBe(false);
    expect(validate(UTF8_TABLES, new Uint8Array([0xe0, 0x9f, 0xbf]))).toBe(false);
  });

  it('rejects encoded surrogates only in strict UTF-8', () => {
    const surrogate = new Uint8Array([0xed, 0xa0, 0x80]);
    expect(validate(UTF8_TABLES, surrogate)).toBe(false);
    expect(validate(WTF8_TABLES, surrogate)).toBe(true);
  });

  it('rejects a stray continuation byte after ASCII', () => {
    expect(validate(UTF8_TABLES, new Uint8Array([0x61, 0x62, 0xbf]))).toBe(false);
  });
});

describe('validateAt', () => {
  it('moves the cursor to the end on success', () => {
    const data = utf8Bytes('héllo');
    const cursor = { offset: 0 };
    expect(validateAt(UTF8_TABLES, data, cursor)).toBe(true);
    expect(cursor.offset).toBe(6);
  });

  it('starts from the cursor', () => {
    const data = new Uint8Array([0xff, 0x61, 0x62]);
    const cursor = { offset: 1 };
    expect(validateAt(UTF8_TABLES, data, cursor)).toBe(true);
    expect(cursor.offset).toBe(3);
  });

  it('stops on the rejecting byte', () => {
    const cursor = { offset: 0 };
    expect(validateAt(UTF8_TABLES, new Uint8Array([0x61, 0xe2, 0x41, 0x42]), cursor)).toBe(false);
    expect(cursor.offset).toBe(2);
  });

  it('stops on the lead byte of a truncated tail', () => {
    const cursor = { offset: 0 };
    expect(validateAt(UTF8_TABLES, new Uint8Array([0x61, 0x62, 0xe2, 0x82]), cursor)).toBe(false);
    expect(cursor.offset).toBe(2);
  });

  it('accepts a cursor at the end of the buffer', () => {
    const cursor = { offset: 2 };
    expect(validateAt(UTF8_TABLES, new Uint8Array([0x61, 0x62]), cursor)).toBe(true);
    expect(cursor.offset).toBe(2);
  });

  it('throws RangeError for a cursor outside the buffer', () => {
    const data = new Uint8Array([0xff, 0xc0]);
    expect(() => validateAt(UTF8_TABLES, data, { offset: -1 })).toThrow(RangeError);
    expect(() => validateAt(UTF8_TABLES, data, { offset: 0.5 })).toThrow(RangeError);
    expect(() => validateAt(UTF8_TABLES, data, { offset: 3 })).toThrow(RangeError);
    expect(() => validateAt(UTF8_TABLES, data, { offset: NaN })).toThrow(RangeError);
  });
});

describe('text variant', () => {
  it('accepts tabs and line breaks', () => {
    expect(validate(TEXT_TABLES, utf8Bytes('a\tb\r\nc\n'))).toBe(true);
  });

  it('accepts multi-byte text', () => {
    expect(validate(TEXT_TABLES, utf8Bytes('café ∅ 😎'))).toBe(true);
  });

  it('rejects NUL, escape and DEL', () => {
    for (const b of [0x00, 0x1b, 0x7f]) {
      const cursor = { offset: 0 };
      expect(validateAt(TEXT_TABLES, new Uint8Array([0x61, b]), cursor)).toBe(false);
      expect(cursor.offset).toBe(1);
    }
  });

  it('rejects a control byte inside a sequence', () => {
    const cursor = { offset: 0 };
    expect(validateAt(TEXT_TABLES, new Uint8Array([0xc3, 0x01]), cursor)).toBe(false);
    expect(cursor.offset).toBe(1);
  });

  it('counts runes with the text tables', () => {
    expect(countRunes(TEXT_TABLES, utf8Bytes('a\tb'))).toBe(3);
    expectMalformed(() => countRunes(TEXT_TABLES, new Uint8Array([0x61, 0x07])), 1);
  });
});

describe('countRunes', () => {
  it('counts nothing in the empty buffer', () => {
    expect(countRunes(UTF8_TABLES, new Uint8Array(0))).toBe(0);
  });

  it('counts five codepoints of each length', () => {
    expect(countRunes(UTF8_TABLES, utf8Bytes('abcde'))).toBe(5);
    expect(countRunes(UTF8_TABLES, utf8Bytes('αβγδε'))).toBe(5);
    expect(countRunes(UTF8_TABLES, utf8Bytes('∅⊄⊅⊆⊇'))).toBe(5);
    expect(countRunes(UTF8_TABLES, utf8Bytes('🤓😎🥸🤩🤯'))).toBe(5);
  });

  it('counts mixed text', () => {
    const s = 'naïve ∑ 🎉 done';
    expect(countRunes(UTF8_TABLES, utf8Bytes(s))).toBe(Array.from(s).length);
  });

  it('fails on a truncated tail at its lead byte', () => {
    expectMalformed(() => countRunes(UTF8_TABLES, new Uint8Array([0x61, 0x62, 0xe0])), 2);
  });

  it('fails on the rejecting byte', () => {
    expectMalformed(() => countRunes(UTF8_TABLES, new Uint8Array([0x61, 0xf0, 0x9f, 0x41, 0x42])), 3);
  });

  it('counts encoded surrogates in WTF-8', () => {
    expect(countRunes(WTF8_TABLES, new Uint8Array([0x61, 0xed, 0xa0, 0x80, 0xed, 0xb0, 0x80]))).toBe(3);
    expectMalformed(() => countRunes(UTF8_TABLES, new Uint8Array([0x61, 0xed, 0xa0, 0x80])), 2);
  });
});
