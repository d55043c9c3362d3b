/**
 * runedfa - table-driven UTF-8 / WTF-8 decoding for TypeScript
 *
 * Decodes, validates, counts and transcodes with a byte-class DFA.
 *
 * @example
 * ```typescript
 * import { utf8, wtf8, RuneView } from 'runedfa';
 *
 * const bytes = new TextEncoder().encode("αβγ");
 * utf8.validate(bytes);    // true
 * utf8.countRunes(bytes);  // 3
 * utf8.toUtf16Le(bytes);   // 6 bytes
 *
 * for (const rune of RuneView.fromValidated(bytes)) {
 *   // 0x3b1, 0x3b2, 0x3b3
 * }
 * ```
 */

// Core types
export {
  ByteClass,
  RUNE_ACCEPT,
  RUNE_REJECT,
  STATE_STRIDE,
  MAX_CODEPOINT,
  STEP_PENDING,
  STEP_REJECTED,
  utf16Length,
  highSurrogate,
  lowSurrogate,
} from "./types";
export type {
  DfaState,
  DfaTables,
  Cursor,
  Utf16Cursor,
  StepOutcome,
  StepResult,
} from "./types";

// Tables
export { UTF8_TABLES, WTF8_TABLES, TEXT_TABLES, DFA_STATES } from "./tables";

// Errors
export {
  RuneDfaError,
  DecodeError,
  MalformedEncodingError,
  MalformedChunkError,
  EncodeError,
  BufferOverflowError,
} from "./errors";

// Engine
export {
  decodeStep,
  decodeRune,
  decodeRuneAssumeValid,
  runeLengthAssumeValid,
  DecoderState,
} from "./decoder";
export { validate, validateAt, countRunes } from "./validator";
export {
  transcodeToUtf16Le,
  toUtf16Le,
  decodeString,
  maxUtf16LeByteLength,
} from "./transcode";
export { RuneView, RuneIterator } from "./view";

// Streaming support
export { RuneStreamDecoder } from "./stream";
export type { StreamDecoderOptions } from "./stream";

// Per-variant facades
export { RuneCodec, utf8, wtf8, text, codecFor, isVariantName } from "./codec";
export type { VariantName } from "./codec";

/**
 * Library version.
 */
export const VERSION = "0.3.0";
