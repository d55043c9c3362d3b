import { decodeRuneAssumeValid, runeLengthAssumeValid } from "./decoder";
import { MalformedEncodingError } from "./errors";
import { UTF8_TABLES } from "./tables";
import { validateAt } from "./validator";
import type { DfaTables } from "./types";

/**
 * RuneView wraps a byte buffer known to be well-formed.
 *
 * A view never copies or modifies its bytes and can hand out any number of
 * independent iterators.
 *
 * @example
 * ```typescript
 * const view = RuneView.fromValidated(bytes);
 *
 * let sum = 0;
 * for (const rune of view) {
 *   sum += rune;
 * }
 *
 * const it = view.iterator();
 * const firstTwo = it.peek(2);
 * ```
 */
export class RuneView implements Iterable<number> {
  private readonly buffer: Uint8Array;
  private readonly _tables: DfaTables;

  private constructor(buffer: Uint8Array, tables: DfaTables) {
    this.buffer = buffer;
    this._tables = tables;
  }

  /**
   * Validates `bytes` and wraps them.
   *
   * @throws MalformedEncodingError at the first bad byte
   */
  static fromValidated(bytes: Uint8Array, tables: DfaTables = UTF8_TABLES): RuneView {
    const cursor = { offset: 0 };
    if (!validateAt(tables, bytes, cursor)) {
      throw new MalformedEncodingError(cursor.offset, `not valid ${tables.name}`);
    }
    return new RuneView(bytes, tables);
  }

  /**
   * Wraps `bytes` without validating them.
   *
   * The caller asserts the buffer is well-formed for `tables`. If it is not,
   * iteration still terminates but yields unspecified codepoints.
   */
  static fromTrusted(bytes: Uint8Array, tables: DfaTables = UTF8_TABLES): RuneView {
    return new RuneView(bytes, tables);
  }

  /**
   * Returns the underlying bytes.
   */
  get bytes(): Uint8Array {
    return this.buffer;
  }

  /**
   * Returns the length in bytes.
   */
  get byteLength(): number {
    return this.buffer.length;
  }

  /**
   * Returns the table set the view was created for.
   */
  get tables(): DfaTables {
    return this._tables;
  }

  /**
   * Returns a new iterator positioned at the start.
   */
  iterator(): RuneIterator {
    return new RuneIterator(this);
  }

  /**
   * Iterates over all codepoints.
   */
  [Symbol.iterator](): IterableIterator<number> {
    return this.iterator().runes();
  }

  /**
   * Collects all codepoints into an array.
   */
  toArray(): number[] {
    return Array.from(this);
  }
}

/**
 * RuneIterator steps through a RuneView one codepoint at a time.
 */
export class RuneIterator {
  private readonly view: RuneView;
  private readonly buffer: Uint8Array;
  private pos: number;

  constructor(view: RuneView) {
    this.view = view;
    this.buffer = view.bytes;
    this.pos = 0;
  }

  /**
   * Returns the byte offset of the next codepoint.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns true if there are more codepoints.
   */
  get hasMore(): boolean {
    return this.pos < this.buffer.length;
  }

  /**
   * Returns the end offset of the sequence starting at `offset`, clamped to
   * the buffer.
   */
  private sequenceEnd(offset: number): number {
    return Math.min(offset + runeLengthAssumeValid(this.buffer[offset]), this.buffer.length);
  }

  /**
   * Returns the next codepoint, or null at the end of the view.
   */
  nextRune(): number | null {
    if (!this.hasMore) {
      return null;
    }
    const rune = decodeRuneAssumeValid(this.buffer, this.pos);
    this.pos = this.sequenceEnd(this.pos);
    return rune;
  }

  /**
   * Returns the bytes of the next codepoint, or null at the end of the view.
   * The result shares memory with the view.
   */
  nextBytes(): Uint8Array | null {
    if (!this.hasMore) {
      return null;
    }
    const start = this.pos;
    this.pos = this.sequenceEnd(start);
    return this.buffer.subarray(start, this.pos);
  }

  /**
   * Returns the bytes spanning the next `n` codepoints without advancing.
   * Fewer codepoints are covered if the view ends first.
   */
  peek(n: number): Uint8Array {
    let end = this.pos;
    for (let i = 0; i < n && end < this.buffer.length; i++) {
      end = this.sequenceEnd(end);
    }
    return this.buffer.subarray(this.pos, end);
  }

  /**
   * Moves back to the start of the view.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Returns a fresh iterator over the same view.
   */
  restart(): RuneIterator {
    return this.view.iterator();
  }

  /**
   * Yields the remaining codepoints.
   */
  *runes(): IterableIterator<number> {
    for (let rune = this.nextRune(); rune !== null; rune = this.nextRune()) {
      yield rune;
    }
  }

  /**
   * Yields the remaining codepoints as byte slices.
   */
  *slices(): IterableIterator<Uint8Array> {
    for (let bytes = this.nextBytes(); bytes !== null; bytes = this.nextBytes()) {
      yield bytes;
    }
  }
}
