#!/usr/bin/env node
/**
 * runedfa CLI: count, validate, sum or transcode a file.
 *
 * The only module that touches the file system and the process; the commands
 * themselves live in ./cli/commands.
 */

import { Command } from "commander";
import fs from "fs";

import { executeCommand, unreadableInput } from "./cli/commands";
import type { CommandName } from "./cli/commands";
import type { CliResult } from "./cli/result";
import { VERSION } from "./index";

interface GlobalOptions {
  encoding: string;
}

function printResult(result: CliResult): void {
  for (const line of result.lines) {
    console.log(line);
  }
  if (result.kind === "failure") {
    console.error(`error: ${result.message}`);
    process.exitCode = result.exitCode;
  }
}

function readInput(file: string): Uint8Array | CliResult {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    return unreadableInput(file, err);
  }
}

function run(command: CommandName, file: string, out?: string): void {
  const input = readInput(file);
  if (!(input instanceof Uint8Array)) {
    printResult(input);
    return;
  }

  const { encoding } = program.opts<GlobalOptions>();
  const result = executeCommand(command, { encoding, bytes: input, out });
  if (result.kind === "success" && result.file !== undefined) {
    fs.writeFileSync(result.file.path, result.file.data);
  }
  printResult(result);
}

const program = new Command();

program
  .name("runedfa")
  .description("Table-driven UTF-8 / WTF-8 decoding tools")
  .version(VERSION)
  .option("-e, --encoding <variant>", "utf8, wtf8 or text", "utf8");

program
  .command("count")
  .description("Count codepoints")
  .argument("<file>")
  .action((file: string) => run("count", file));

program
  .command("validate")
  .description("Check that a file is well-formed")
  .argument("<file>")
  .action((file: string) => run("validate", file));

program
  .command("sum")
  .description("Sum all codepoints")
  .argument("<file>")
  .action((file: string) => run("sum", file));

program
  .command("transcode")
  .description("Transcode to UTF-16LE")
  .argument("<file>")
  .option("-o, --out <file>", "output path")
  .action((file: string, options: { out?: string }) => run("transcode", file, options.out));

program.parse();
