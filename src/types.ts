/**
 * Byte classes used by the decoding DFA.
 *
 * Every input byte maps to exactly one class. Continuation bytes are split
 * three ways so the transition table can forbid overlong forms, encoded
 * surrogates and values above U+10FFFF from the second byte alone.
 */
export enum ByteClass {
  /** 0x00..0x7F */
  Ascii = 0,
  /** 0x80..0x8F */
  ContLow = 1,
  /** 0xC2..0xDF */
  Lead2 = 2,
  /** 0xE1..0xEC, 0xEE..0xEF */
  Lead3 = 3,
  /** 0xED (strict UTF-8 only; continuation limited to 0x80..0x9F) */
  Lead3Ed = 4,
  /** 0xF4 (continuation limited to 0x80..0x8F) */
  Lead4F4 = 5,
  /** 0xF1..0xF3 */
  Lead4 = 6,
  /** 0xA0..0xBF */
  ContHigh = 7,
  /** 0xC0, 0xC1, 0xF5..0xFF */
  Invalid = 8,
  /** 0x90..0x9F */
  ContMid = 9,
  /** 0xE0 (continuation limited to 0xA0..0xBF) */
  Lead3E0 = 10,
  /** 0xF0 (continuation limited to 0x90..0xBF) */
  Lead4F0 = 11,
  /** Disallowed control byte (text variant only) */
  Control = 12,
}

/**
 * DFA state. Always a multiple of STATE_STRIDE found in a transition table.
 */
export type DfaState = number;

/** Start state, and the state after every complete codepoint. */
export const RUNE_ACCEPT: DfaState = 0;

/** Permanent error sink. */
export const RUNE_REJECT: DfaState = 12;

/** Distance between two states in a transition table. */
export const STATE_STRIDE = 12;

/** Largest Unicode scalar value. */
export const MAX_CODEPOINT = 0x10ffff;

/**
 * A complete, immutable set of lookup tables for one encoding variant.
 */
export interface DfaTables {
  /** Variant name, for messages. */
  readonly name: string;
  /** Byte value to ByteClass. */
  readonly byteClass: readonly number[];
  /** Per class: bits of a lead byte that carry codepoint value. */
  readonly classMask: readonly number[];
  /** Per class: total sequence length implied by a byte of this class in lead position. */
  readonly sequenceLength: readonly number[];
  /** Next state, indexed by `state + class`. */
  readonly transition: readonly number[];
  /** Number of byte classes the variant uses. */
  readonly classCount: number;
  /**
   * Bytes in `[asciiStart, asciiEnd)` are accepted as complete codepoints
   * from ACCEPT and may skip the tables.
   */
  readonly asciiStart: number;
  readonly asciiEnd: number;
}

/**
 * Byte offset into a buffer, advanced in place by cursor operations.
 */
export interface Cursor {
  offset: number;
}

/**
 * Source and destination positions of a UTF-16 transcode.
 * `dest` counts 16-bit code units, not bytes.
 */
export interface Utf16Cursor {
  source: number;
  dest: number;
}

/**
 * Output of one single-step decode.
 */
export interface StepOutcome {
  state: DfaState;
  value: number;
}

/**
 * Result of feeding one byte to a DecoderState.
 */
export type StepResult =
  | { readonly kind: "pending" }
  | { readonly kind: "accepted"; readonly codepoint: number }
  | { readonly kind: "rejected" };

export const STEP_PENDING: StepResult = Object.freeze({ kind: "pending" });
export const STEP_REJECTED: StepResult = Object.freeze({ kind: "rejected" });

/**
 * Number of UTF-16 code units needed for a codepoint.
 */
export function utf16Length(codepoint: number): number {
  return codepoint > 0xffff ? 2 : 1;
}

/**
 * Leading (high) surrogate of a supplementary-plane codepoint.
 */
export function highSurrogate(codepoint: number): number {
  return ((codepoint - 0x10000) >> 10) + 0xd800;
}

/**
 * Trailing (low) surrogate of a supplementary-plane codepoint.
 */
export function lowSurrogate(codepoint: number): number {
  return (codepoint & 0x3ff) + 0xdc00;
}
