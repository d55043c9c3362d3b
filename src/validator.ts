import { checkOffset, decodeRune } from "./decoder";
import { RUNE_ACCEPT, RUNE_REJECT } from "./types";
import type { Cursor, DfaTables } from "./types";

/**
 * Checks that `bytes` is well-formed from `cursor.offset` to the end.
 *
 * On success the cursor ends at `bytes.length`. On failure it points at the
 * byte that produced the rejection, or at the lead byte of a sequence cut off
 * by the end of the buffer; this is the same offset decodeRune reports.
 *
 * @throws RangeError if `cursor.offset` is not an integer in `[0, bytes.length]`
 */
export function validateAt(tables: DfaTables, bytes: Uint8Array, cursor: Cursor): boolean {
  const { byteClass, transition, sequenceLength, asciiStart, asciiEnd } = tables;
  const len = bytes.length;
  checkOffset(cursor.offset, len);
  let state = RUNE_ACCEPT;

  for (let i = cursor.offset; i < len; i++) {
    const b = bytes[i];
    if (state === RUNE_ACCEPT) {
      if (b >= asciiStart && b < asciiEnd) {
        continue;
      }
      const cls = byteClass[b];
      state = transition[cls];
      if (state === RUNE_REJECT || i + sequenceLength[cls] > len) {
        cursor.offset = i;
        return false;
      }
      continue;
    }

    state = transition[state + byteClass[b]];
    if (state === RUNE_REJECT) {
      cursor.offset = i;
      return false;
    }
  }

  cursor.offset = len;
  return true;
}

/**
 * Returns true if the whole buffer is well-formed. The empty buffer is.
 */
export function validate(tables: DfaTables, bytes: Uint8Array): boolean {
  return validateAt(tables, bytes, { offset: 0 });
}

/**
 * Counts the codepoints in `bytes`.
 *
 * @throws MalformedEncodingError at the first ill-formed or truncated sequence
 */
export function countRunes(tables: DfaTables, bytes: Uint8Array): number {
  const cursor = { offset: 0 };
  let count = 0;
  while (cursor.offset < bytes.length) {
    decodeRune(tables, bytes, cursor);
    count++;
  }
  return count;
}
