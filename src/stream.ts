/**
 * Incremental decoding for input that arrives in pieces.
 *
 * A multi-byte sequence may be split across any number of chunks; the partial
 * codepoint is carried in a DecoderState between writes.
 */

import { DecoderState } from "./decoder";
import { MalformedChunkError, MalformedEncodingError } from "./errors";
import { UTF8_TABLES } from "./tables";
import type { DfaTables } from "./types";

/**
 * Options for RuneStreamDecoder configuration.
 */
export interface StreamDecoderOptions {
  /** Table set to decode with. Default: UTF8_TABLES */
  tables?: DfaTables;
}

/**
 * RuneStreamDecoder decodes a byte stream chunk by chunk.
 *
 * @example
 * ```typescript
 * const decoder = new RuneStreamDecoder();
 *
 * socket.on("data", (chunk) => {
 *   for (const rune of decoder.write(chunk)) {
 *     handle(rune);
 *   }
 * });
 * socket.on("end", () => decoder.end());
 * ```
 */
export class RuneStreamDecoder {
  private readonly state: DecoderState;
  private pos: number;
  private sequenceStart: number;

  constructor(options: StreamDecoderOptions = {}) {
    this.state = new DecoderState(options.tables ?? UTF8_TABLES);
    this.pos = 0;
    this.sequenceStart = 0;
  }

  /**
   * Returns the number of bytes consumed so far.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes held in an incomplete sequence.
   */
  get pending(): number {
    return this.state.isIdle ? 0 : this.pos - this.sequenceStart;
  }

  /**
   * Decodes a chunk and returns the codepoints it completes.
   *
   * @throws MalformedChunkError with the offset counted from the start of the
   *         stream and the codepoints completed before it; the decoder stays
   *         failed until reset()
   */
  write(chunk: Uint8Array): number[] {
    if (this.state.isRejected) {
      throw new MalformedEncodingError(this.pos, "decoder already failed");
    }

    const runes: number[] = [];
    for (let i = 0; i < chunk.length; i++) {
      if (this.state.isIdle) {
        this.sequenceStart = this.pos;
      }
      const result = this.state.step(chunk[i]);
      if (result.kind === "rejected") {
        throw new MalformedChunkError(this.pos, runes);
      }
      this.pos++;
      if (result.kind === "accepted") {
        runes.push(result.codepoint);
      }
    }
    return runes;
  }

  /**
   * Signals the end of input.
   *
   * @throws MalformedEncodingError at the lead byte if a sequence is incomplete
   */
  end(): void {
    if (this.state.isRejected) {
      throw new MalformedEncodingError(this.pos, "decoder already failed");
    }
    if (!this.state.isIdle) {
      throw new MalformedEncodingError(this.sequenceStart, "truncated sequence");
    }
  }

  /**
   * Resets the decoder for a new stream.
   */
  reset(): void {
    this.state.reset();
    this.pos = 0;
    this.sequenceStart = 0;
  }
}
