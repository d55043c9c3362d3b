import { decodeRune, decodeStep } from "./decoder";
import { RuneStreamDecoder } from "./stream";
import { TEXT_TABLES, UTF8_TABLES, WTF8_TABLES } from "./tables";
import { decodeString, toUtf16Le, transcodeToUtf16Le } from "./transcode";
import { countRunes, validate, validateAt } from "./validator";
import { RuneView } from "./view";
import type { Cursor, DfaState, DfaTables, StepOutcome, Utf16Cursor } from "./types";

/**
 * Names of the built-in encoding variants.
 */
export type VariantName = "utf8" | "wtf8" | "text";

/**
 * RuneCodec exposes every engine operation bound to one table set.
 *
 * @example
 * ```typescript
 * import { utf8, wtf8 } from "runedfa";
 *
 * utf8.validate(new Uint8Array([0xed, 0xa0, 0x80])); // false
 * wtf8.validate(new Uint8Array([0xed, 0xa0, 0x80])); // true
 * wtf8.countRunes(bytes);
 * ```
 */
export class RuneCodec {
  readonly tables: DfaTables;

  constructor(tables: DfaTables) {
    this.tables = tables;
  }

  /**
   * Returns the variant name.
   */
  get name(): string {
    return this.tables.name;
  }

  /**
   * Advances the DFA by one byte.
   */
  decodeStep(state: DfaState, accumulator: number, byte: number): StepOutcome {
    return decodeStep(this.tables, state, accumulator, byte);
  }

  /**
   * Decodes one codepoint at the cursor and advances it.
   */
  decodeRune(bytes: Uint8Array, cursor: Cursor): number {
    return decodeRune(this.tables, bytes, cursor);
  }

  /**
   * Returns true if the whole buffer is well-formed.
   */
  validate(bytes: Uint8Array): boolean {
    return validate(this.tables, bytes);
  }

  /**
   * Validates from the cursor; see validateAt.
   */
  validateAt(bytes: Uint8Array, cursor: Cursor): boolean {
    return validateAt(this.tables, bytes, cursor);
  }

  /**
   * Counts codepoints.
   */
  countRunes(bytes: Uint8Array): number {
    return countRunes(this.tables, bytes);
  }

  /**
   * Transcodes into `dest` as UTF-16LE; returns code units written.
   */
  transcodeToUtf16Le(dest: Uint8Array, source: Uint8Array, cursor?: Utf16Cursor): number {
    return transcodeToUtf16Le(this.tables, dest, source, cursor);
  }

  /**
   * Transcodes into a new UTF-16LE buffer.
   */
  toUtf16Le(source: Uint8Array): Uint8Array {
    return toUtf16Le(this.tables, source);
  }

  /**
   * Decodes into a JavaScript string.
   */
  decodeString(source: Uint8Array): string {
    return decodeString(this.tables, source);
  }

  /**
   * Validates and wraps `bytes` in a RuneView.
   */
  view(bytes: Uint8Array): RuneView {
    return RuneView.fromValidated(bytes, this.tables);
  }

  /**
   * Wraps `bytes` in a RuneView without validation.
   */
  trustedView(bytes: Uint8Array): RuneView {
    return RuneView.fromTrusted(bytes, this.tables);
  }

  /**
   * Creates an incremental decoder.
   */
  streamDecoder(): RuneStreamDecoder {
    return new RuneStreamDecoder({ tables: this.tables });
  }
}

export const utf8 = new RuneCodec(UTF8_TABLES);
export const wtf8 = new RuneCodec(WTF8_TABLES);
export const text = new RuneCodec(TEXT_TABLES);

const CODECS: Record<VariantName, RuneCodec> = { utf8, wtf8, text };

/**
 * Returns true if `name` names a built-in variant.
 */
export function isVariantName(name: string): name is VariantName {
  return Object.prototype.hasOwnProperty.call(CODECS, name);
}

/**
 * Returns the codec for a built-in variant.
 */
export function codecFor(name: VariantName): RuneCodec {
  return CODECS[name];
}
