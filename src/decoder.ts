import { MalformedEncodingError } from "./errors";
import { UTF8_TABLES } from "./tables";
import { RUNE_ACCEPT, RUNE_REJECT, STEP_PENDING, STEP_REJECTED } from "./types";
import type { Cursor, DfaState, DfaTables, StepOutcome, StepResult } from "./types";

/**
 * Advances the DFA by one byte.
 *
 * On a lead byte (`state` is RUNE_ACCEPT) the accumulator restarts from the
 * masked lead bits; on a continuation byte six more bits are shifted in. The
 * returned value is only meaningful once the returned state is RUNE_ACCEPT.
 */
export function decodeStep(
  tables: DfaTables,
  state: DfaState,
  accumulator: number,
  byte: number
): StepOutcome {
  const cls = tables.byteClass[byte];
  const value =
    state !== RUNE_ACCEPT ? (accumulator << 6) | (byte & 0x3f) : byte & tables.classMask[cls];
  return { state: tables.transition[state + cls], value };
}

/**
 * Checks that `offset` is an integer in `[0, length]`.
 *
 * @throws RangeError otherwise
 */
export function checkOffset(offset: number, length: number, what = "Cursor offset"): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > length) {
    throw new RangeError(`${what} ${offset} outside buffer of length ${length}`);
  }
}

/**
 * Decodes one codepoint at `cursor.offset` and advances the cursor past it.
 *
 * On failure the cursor is left on the byte that drove the DFA into
 * RUNE_REJECT, or on the lead byte when fewer bytes remain than the lead byte
 * announces. Nothing past the end of `bytes` is ever read.
 *
 * @throws RangeError if the cursor is not inside the buffer
 * @throws MalformedEncodingError if the sequence is ill-formed or truncated
 */
export function decodeRune(tables: DfaTables, bytes: Uint8Array, cursor: Cursor): number {
  const start = cursor.offset;
  if (!Number.isInteger(start) || start < 0 || start >= bytes.length) {
    throw new RangeError(`Cursor offset ${start} outside buffer of length ${bytes.length}`);
  }

  const lead = bytes[start];
  const cls = tables.byteClass[lead];
  let state = tables.transition[RUNE_ACCEPT + cls];

  if (state === RUNE_ACCEPT) {
    cursor.offset = start + 1;
    return lead;
  }
  if (state === RUNE_REJECT) {
    throw new MalformedEncodingError(start);
  }

  const end = start + tables.sequenceLength[cls];
  if (end > bytes.length) {
    throw new MalformedEncodingError(start, "truncated sequence");
  }

  let value = lead & tables.classMask[cls];
  for (let i = start + 1; i < end; i++) {
    const b = bytes[i];
    state = tables.transition[state + tables.byteClass[b]];
    if (state === RUNE_REJECT) {
      cursor.offset = i;
      throw new MalformedEncodingError(i);
    }
    value = (value << 6) | (b & 0x3f);
    if (state === RUNE_ACCEPT) {
      cursor.offset = i + 1;
      return value;
    }
  }

  // Every lead state needs exactly sequenceLength - 1 continuation bytes.
  throw new MalformedEncodingError(start, "truncated sequence");
}

/**
 * Length of the sequence introduced by `lead`, which must start a well-formed
 * sequence. Bytes that cannot start one give meaningless results.
 */
export function runeLengthAssumeValid(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead < 0xe0) return 2;
  if (lead < 0xf0) return 3;
  return 4;
}

/**
 * Decodes the codepoint at `offset` without consulting the DFA.
 *
 * The caller guarantees `bytes` holds a complete, well-formed sequence at
 * `offset`, typically because the buffer went through a validator. Used by
 * RuneIterator; breaking the guarantee yields garbage codepoints, never an
 * exception.
 */
export function decodeRuneAssumeValid(bytes: Uint8Array, offset: number): number {
  const b0 = bytes[offset];
  if (b0 < 0x80) {
    return b0;
  }
  if (b0 < 0xe0) {
    return ((b0 & 0x1f) << 6) | (bytes[offset + 1] & 0x3f);
  }
  if (b0 < 0xf0) {
    return ((b0 & 0x0f) << 12) | ((bytes[offset + 1] & 0x3f) << 6) | (bytes[offset + 2] & 0x3f);
  }
  return (
    ((b0 & 0x07) << 18) |
    ((bytes[offset + 1] & 0x3f) << 12) |
    ((bytes[offset + 2] & 0x3f) << 6) |
    (bytes[offset + 3] & 0x3f)
  );
}

/**
 * DecoderState carries the DFA state and the partial codepoint between calls,
 * so input can be fed one byte at a time across chunk boundaries.
 *
 * @example
 * ```typescript
 * const decoder = new DecoderState();
 * for (const byte of chunk) {
 *   const result = decoder.step(byte);
 *   if (result.kind === "accepted") {
 *     emit(result.codepoint);
 *   } else if (result.kind === "rejected") {
 *     throw new Error("bad input");
 *   }
 * }
 * ```
 */
export class DecoderState {
  private readonly tables: DfaTables;
  private _state: DfaState;
  private _value: number;

  constructor(tables: DfaTables = UTF8_TABLES) {
    this.tables = tables;
    this._state = RUNE_ACCEPT;
    this._value = 0;
  }

  /**
   * Returns the current DFA state.
   */
  get state(): DfaState {
    return this._state;
  }

  /**
   * Returns the accumulated value of the sequence in progress.
   */
  get value(): number {
    return this._value;
  }

  /**
   * Returns true between codepoints.
   */
  get isIdle(): boolean {
    return this._state === RUNE_ACCEPT;
  }

  /**
   * Returns true once a byte has been rejected. Only reset() leaves this state.
   */
  get isRejected(): boolean {
    return this._state === RUNE_REJECT;
  }

  /**
   * Feeds one byte.
   */
  step(byte: number): StepResult {
    if (this._state === RUNE_REJECT) {
      return STEP_REJECTED;
    }

    const next = decodeStep(this.tables, this._state, this._value, byte);
    this._state = next.state;
    this._value = next.value;

    if (next.state === RUNE_ACCEPT) {
      return { kind: "accepted", codepoint: next.value };
    }
    return next.state === RUNE_REJECT ? STEP_REJECTED : STEP_PENDING;
  }

  /**
   * Discards any partial sequence and the rejected flag.
   */
  reset(): void {
    this._state = RUNE_ACCEPT;
    this._value = 0;
  }
}
