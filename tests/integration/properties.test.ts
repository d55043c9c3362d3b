/**
 * Property-based tests for the decoding engine using fast-check.
 *
 * - Counting, validating and iterating agree on every input
 * - Cursor decoding and view iteration visit the same offsets
 * - Chunked decoding is independent of where the chunks split
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import {
  utf8,
  wtf8,
  text,
  MalformedEncodingError,
  RuneView,
  RuneStreamDecoder,
} from '../../src';
import type { RuneCodec } from '../../src';

// Mostly boundary bytes, so random buffers hit multi-byte sequences often.
const arbByte = fc.oneof(
  fc.integer({ min: 0, max: 255 }),
  fc.constantFrom(0x41, 0x80, 0x8f, 0x90, 0xa0, 0xbf, 0xc2, 0xe0, 0xed, 0xef, 0xf0, 0xf4)
);

const arbBytes = fc.array(arbByte, { maxLength: 48 }).map((values) => Uint8Array.from(values));

const arbText = fc.string({ unit: 'binary', maxLength: 32 });

const encoder = new TextEncoder();

function countOrNull(codec: RuneCodec, bytes: Uint8Array): number | null {
  try {
    return codec.countRunes(bytes);
  } catch (e) {
    if (e instanceof MalformedEncodingError) {
      return null;
    }
    throw e;
  }
}

describe.each([
  ['utf8', utf8],
  ['wtf8', wtf8],
  ['text', text],
])('%s', (_name, codec) => {
  it('counts exactly when the buffer validates', () => {
    fc.assert(
      fc.property(arbBytes, (bytes) => {
        const count = countOrNull(codec, bytes);
        expect(count !== null).toBe(codec.validate(bytes));
        if (count !== null) {
          expect(codec.view(bytes).toArray().length).toBe(count);
        }
      })
    );
  });

  it('rejects at the same offset whether validating or counting', () => {
    fc.assert(
      fc.property(arbBytes, (bytes) => {
        const cursor = { offset: 0 };
        if (codec.validateAt(bytes, cursor)) {
          return;
        }
        try {
          codec.countRunes(bytes);
        } catch (e) {
          expect(e).toBeInstanceOf(MalformedEncodingError);
          if (e instanceof MalformedEncodingError) {
            expect(e.offset).toBe(cursor.offset);
          }
          return;
        }
        throw new Error('countRunes accepted a buffer validateAt rejected');
      })
    );
  });
});

describe('cursor decoding and iteration', () => {
  it('visit the same codepoints at the same offsets', () => {
    fc.assert(
      fc.property(arbText, (s) => {
        const bytes = encoder.encode(s);
        const iter = RuneView.fromValidated(bytes).iterator();
        const cursor = { offset: 0 };

        while (cursor.offset < bytes.length) {
          expect(iter.position).toBe(cursor.offset);
          expect(iter.nextRune()).toBe(utf8.decodeRune(bytes, cursor));
        }
        expect(iter.nextRune()).toBeNull();
      })
    );
  });
});

describe('platform agreement', () => {
  it('counts what TextDecoder decodes', () => {
    fc.assert(
      fc.property(arbText, (s) => {
        const bytes = encoder.encode(s);
        const decoded = new TextDecoder().decode(bytes);
        expect(utf8.countRunes(bytes)).toBe(Array.from(decoded).length);
        expect(utf8.decodeString(bytes)).toBe(decoded);
      })
    );
  });

  it('validates what a fatal TextDecoder accepts', () => {
    const fatal = new TextDecoder('utf-8', { fatal: true });
    fc.assert(
      fc.property(arbBytes, (bytes) => {
        let accepted = true;
        try {
          fatal.decode(bytes);
        } catch {
          accepted = false;
        }
        expect(utf8.validate(bytes)).toBe(accepted);
      })
    );
  });

  it('WTF-8 accepts everything UTF-8 accepts', () => {
    fc.assert(
      fc.property(arbBytes, (bytes) => {
        if (utf8.validate(bytes)) {
          expect(wtf8.validate(bytes)).toBe(true);
        }
      })
    );
  });
});

describe('chunked decoding', () => {
  it('yields the same runes for any split', () => {
    fc.assert(
      fc.property(arbText, fc.nat(), (s, at) => {
        const bytes = encoder.encode(s);
        const split = bytes.length === 0 ? 0 : at % (bytes.length + 1);
        const decoder = new RuneStreamDecoder();
        const runes = [
          ...decoder.write(bytes.subarray(0, split)),
          ...decoder.write(bytes.subarray(split)),
        ];
        decoder.end();
        expect(runes).toEqual(RuneView.fromValidated(bytes).toArray());
      })
    );
  });
});
