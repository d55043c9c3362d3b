/**
 * UTF-8 / WTF-8 to UTF-16LE transcoding.
 *
 * Destination buffers hold little-endian 16-bit code units as raw bytes, the
 * same layout `Buffer.from(str, "utf16le")` produces. One source byte never
 * yields more than one code unit, so `2 * source.length` bytes always suffice.
 */

import { checkOffset } from "./decoder";
import { BufferOverflowError, MalformedEncodingError } from "./errors";
import { RUNE_ACCEPT, RUNE_REJECT, highSurrogate, lowSurrogate } from "./types";
import type { DfaTables, Utf16Cursor } from "./types";

/** Number of code units decoded per String.fromCharCode call. */
const STRING_CHUNK_UNITS = 8192;

/**
 * Worst-case destination size in bytes for a source of `sourceLength` bytes.
 */
export function maxUtf16LeByteLength(sourceLength: number): number {
  return sourceLength * 2;
}

/**
 * Transcodes `source` into `dest` as UTF-16LE and returns the total number of
 * code units written.
 *
 * Starts at `cursor.source` / `cursor.dest` and advances both. When a
 * sequence is rejected, `cursor.dest` holds the units written so far and
 * `cursor.source` the offset of the offending byte (the lead byte for a
 * truncated sequence).
 *
 * @throws RangeError if the cursor lies outside `source` or `dest`
 * @throws MalformedEncodingError on ill-formed input
 * @throws BufferOverflowError if `dest` runs out of room
 */
export function transcodeToUtf16Le(
  tables: DfaTables,
  dest: Uint8Array,
  source: Uint8Array,
  cursor: Utf16Cursor = { source: 0, dest: 0 }
): number {
  const { byteClass, classMask, transition, sequenceLength, asciiStart, asciiEnd } = tables;
  const view = new DataView(dest.buffer, dest.byteOffset, dest.byteLength);
  const len = source.length;
  checkOffset(cursor.source, len, "Source offset");
  checkOffset(cursor.dest, dest.length >> 1, "Destination unit");
  let src = cursor.source;
  let unit = cursor.dest;

  const ensureRoom = (units: number): void => {
    const needed = (unit + units) * 2;
    if (needed > dest.length) {
      cursor.source = src;
      cursor.dest = unit;
      throw new BufferOverflowError(needed, dest.length);
    }
  };

  while (src < len) {
    const lead = source[src];

    if (lead >= asciiStart && lead < asciiEnd) {
      ensureRoom(1);
      view.setUint16(unit * 2, lead, true);
      unit++;
      src++;
      continue;
    }

    const cls = byteClass[lead];
    let state = transition[RUNE_ACCEPT + cls];
    if (state === RUNE_REJECT) {
      cursor.source = src;
      cursor.dest = unit;
      throw new MalformedEncodingError(src);
    }

    const end = src + sequenceLength[cls];
    if (end > len) {
      cursor.source = src;
      cursor.dest = unit;
      throw new MalformedEncodingError(src, "truncated sequence");
    }

    let codepoint = lead & classMask[cls];
    let i = src + 1;
    while (state !== RUNE_ACCEPT) {
      const b = source[i];
      state = transition[state + byteClass[b]];
      if (state === RUNE_REJECT) {
        cursor.source = i;
        cursor.dest = unit;
        throw new MalformedEncodingError(i);
      }
      codepoint = (codepoint << 6) | (b & 0x3f);
      i++;
    }

    if (codepoint > 0xffff) {
      ensureRoom(2);
      view.setUint16(unit * 2, highSurrogate(codepoint), true);
      view.setUint16(unit * 2 + 2, lowSurrogate(codepoint), true);
      unit += 2;
    } else {
      ensureRoom(1);
      view.setUint16(unit * 2, codepoint, true);
      unit++;
    }
    src = i;
  }

  cursor.source = src;
  cursor.dest = unit;
  return unit;
}

/**
 * Transcodes `source` into a freshly allocated UTF-16LE buffer.
 *
 * @throws MalformedEncodingError on ill-formed input
 */
export function toUtf16Le(tables: DfaTables, source: Uint8Array): Uint8Array {
  const dest = new Uint8Array(maxUtf16LeByteLength(source.length));
  const units = transcodeToUtf16Le(tables, dest, source);
  return dest.subarray(0, units * 2);
}

/**
 * Decodes `source` into a JavaScript string.
 *
 * JavaScript strings are sequences of UTF-16 code units, so the lone
 * surrogates WTF-8 admits come back as lone surrogates.
 *
 * @throws MalformedEncodingError on ill-formed input
 */
export function decodeString(tables: DfaTables, source: Uint8Array): string {
  const bytes = toUtf16Le(tables, source);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const total = bytes.length / 2;
  const units: number[] = [];
  let result = "";

  for (let i = 0; i < total; i++) {
    units.push(view.getUint16(i * 2, true));
    if (units.length === STRING_CHUNK_UNITS) {
      result += String.fromCharCode(...units);
      units.length = 0;
    }
  }
  if (units.length > 0) {
    result += String.fromCharCode(...units);
  }
  return result;
}
