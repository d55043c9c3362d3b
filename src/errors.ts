/**
 * Base error class for runedfa errors.
 */
export class RuneDfaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuneDfaError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends RuneDfaError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the DFA reaches the reject state.
 *
 * `offset` is the byte that produced the rejecting transition, which may lie
 * past the first byte of the ill-formed sequence. For a sequence cut short by
 * the end of the input it is the offset of the lead byte.
 */
export class MalformedEncodingError extends DecodeError {
  readonly offset: number;

  constructor(offset: number, detail?: string) {
    super(
      detail === undefined
        ? `Malformed encoding at byte offset ${offset}`
        : `Malformed encoding at byte offset ${offset}: ${detail}`
    );
    this.name = "MalformedEncodingError";
    this.offset = offset;
  }
}

/**
 * Error thrown by RuneStreamDecoder.write when a chunk is rejected.
 *
 * `runes` holds the codepoints the chunk completed before the rejecting byte.
 */
export class MalformedChunkError extends MalformedEncodingError {
  readonly runes: readonly number[];

  constructor(offset: number, runes: readonly number[]) {
    super(offset);
    this.name = "MalformedChunkError";
    this.runes = runes;
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends RuneDfaError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when a destination buffer is too small during transcoding.
 */
export class BufferOverflowError extends EncodeError {
  constructor(needed: number, available: number) {
    super(`Buffer overflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferOverflowError";
  }
}
