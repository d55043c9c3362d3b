/**
 * CLI commands as pure functions over the input bytes.
 */

import { codecFor, isVariantName } from "../codec";
import type { RuneCodec } from "../codec";
import { MalformedEncodingError } from "../errors";
import { failure, misuse, success } from "./result";
import type { CliResult } from "./result";

export type CommandName = "count" | "validate" | "sum" | "transcode";

export interface CommandInput {
  readonly encoding: string;
  readonly bytes: Uint8Array;
  /** Destination path; transcode only. */
  readonly out?: string;
}

function malformedAt(offset: number, lines: readonly string[] = []): CliResult {
  return failure(`malformed encoding at byte offset ${offset}`, lines);
}

function malformed(err: unknown): CliResult {
  if (err instanceof MalformedEncodingError) {
    return malformedAt(err.offset);
  }
  throw err;
}

/**
 * Result for an input file that cannot be read; a bad argument, not bad input.
 */
export function unreadableInput(file: string, err: unknown): CliResult {
  return misuse(`cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
}

export function executeCountCommand(codec: RuneCodec, bytes: Uint8Array): CliResult {
  try {
    return success([`counted ${codec.countRunes(bytes)} runes`]);
  } catch (err) {
    return malformed(err);
  }
}

export function executeValidateCommand(codec: RuneCodec, bytes: Uint8Array): CliResult {
  const cursor = { offset: 0 };
  if (codec.validateAt(bytes, cursor)) {
    return success(["validated: true"]);
  }
  return malformedAt(cursor.offset, ["validated: false"]);
}

/**
 * Sums every codepoint; a cheap checksum of the decoded content.
 */
export function executeSumCommand(codec: RuneCodec, bytes: Uint8Array): CliResult {
  try {
    let sum = 0;
    for (const rune of codec.view(bytes)) {
      sum += rune;
    }
    return success([`sum: ${sum}`]);
  } catch (err) {
    return malformed(err);
  }
}

export function executeTranscodeCommand(
  codec: RuneCodec,
  bytes: Uint8Array,
  out: string | undefined
): CliResult {
  if (out === undefined) {
    return misuse("transcode needs an output path (-o <file>)");
  }
  try {
    const data = codec.toUtf16Le(bytes);
    return success([`transcoded ${data.length / 2} units to ${out}`], { path: out, data });
  } catch (err) {
    return malformed(err);
  }
}

/**
 * Resolves the encoding and runs `command`.
 */
export function executeCommand(command: CommandName, input: CommandInput): CliResult {
  if (!isVariantName(input.encoding)) {
    return misuse(`unknown encoding "${input.encoding}" (expected utf8, wtf8 or text)`);
  }
  const codec = codecFor(input.encoding);

  switch (command) {
    case "count":
      return executeCountCommand(codec, input.bytes);
    case "validate":
      return executeValidateCommand(codec, input.bytes);
    case "sum":
      return executeSumCommand(codec, input.bytes);
    case "transcode":
      return executeTranscodeCommand(codec, input.bytes, input.out);
  }
}
