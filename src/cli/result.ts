/**
 * Outcomes of CLI commands. Commands return these; only the entry point
 * turns them into console output and an exit code.
 */

/**
 * Exit codes: 1 for bad input, 2 for bad arguments.
 */
export type ExitCode = 1 | 2;

/**
 * A file the entry point should write on success.
 */
export interface CliFile {
  readonly path: string;
  readonly data: Uint8Array;
}

export type CliResult =
  | { kind: "success"; lines: readonly string[]; file?: CliFile }
  | { kind: "failure"; exitCode: ExitCode; message: string; lines: readonly string[] };

export function success(lines: readonly string[], file?: CliFile): CliResult {
  return { kind: "success", lines, file };
}

export function failure(message: string, lines: readonly string[] = []): CliResult {
  return { kind: "failure", exitCode: 1, message, lines };
}

export function misuse(message: string): CliResult {
  return { kind: "failure", exitCode: 2, message, lines: [] };
}
