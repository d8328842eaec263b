/* eslint-disable no-console */

import { promises as fs } from "fs";

import type { DumpError } from "#errors";
import { Analysis } from "#ir";

import { dumpOptions, isOptionName, optionDescriptions } from "./options.js";

/**
 * Everything the command touches outside the process
 */
export interface Io {
  /** Destination of the dump itself */
  stdout: Analysis.Sink;
  log(line: string): void;
  error(line: string): void;
  readFile(path: string): Promise<string>;
  writeFile(path: string, text: string): Promise<void>;
}

export const processIo = (): Io => ({
  stdout: new Analysis.StreamSink(process.stdout),
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  readFile: (path) => fs.readFile(path, "utf-8"),
  writeFile: (path, text) => fs.writeFile(path, text, "utf-8"),
});

/**
 * `<severity> [<code>]: <message>`
 */
export const formatMessage = (error: DumpError): string =>
  `${error.severity} [${error.code}]: ${error.message}`;

export function displayMessages(io: Io, messages: DumpError[]): void {
  for (const message of messages) {
    io.error(formatMessage(message));
  }
}

export function showHelp(io: Io): void {
  io.log("Dump a mid-level IR executable as text\n");
  io.log("Usage: irdump <file.yaml> [options]");
  io.log("\nOptions:");
  for (const name of Object.keys(dumpOptions).filter(isOptionName)) {
    const option = dumpOptions[name];
    const shortFlag = "short" in option ? `-${option.short}, ` : "    ";
    const argument = option.type === "string" ? ` <${name}>` : "";
    io.log(
      `  ${shortFlag}${`--${name}${argument}`.padEnd(20)} ${optionDescriptions[name]}`,
    );
  }
  io.log("\nExamples:");
  io.log("  irdump examples/return-constant.yaml");
  io.log("  irdump program.yaml --validate --indent 2 --output program.ir");
}
