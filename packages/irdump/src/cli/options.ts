import { parseArgs } from "util";

import { DumpError } from "#errors";

export enum ErrorCode {
  USAGE = "IRC001",
  READ_FAILED = "IRC002",
  WRITE_FAILED = "IRC003",
}

export class UsageError extends DumpError {
  constructor(message: string) {
    super(message, ErrorCode.USAGE);
    this.name = "UsageError";
  }
}

export interface DumpOptions {
  file: string;
  indent: number;
  validate: boolean;
  output?: string;
}

export type ParsedArgs = { help: true } | ({ help: false } & DumpOptions);

/**
 * Flags accepted by `irdump`, exactly as `parseArgs` takes them
 */
export const dumpOptions = {
  indent: { type: "string", short: "i" },
  validate: { type: "boolean" },
  output: { type: "string", short: "o" },
  help: { type: "boolean", short: "h" },
} as const;

export type OptionName = keyof typeof dumpOptions;

/**
 * Text `--help` shows for each flag; kept apart from `dumpOptions` so that
 * `parseArgs` only sees the keys it knows
 */
export const optionDescriptions: { [N in OptionName]: string } = {
  indent: "Spaces before every instruction line (default: 0)",
  validate: "Check the executable before dumping it",
  output: "Write the dump to a file instead of stdout",
  help: "Show this help message",
};

export const isOptionName = (name: string): name is OptionName =>
  Object.hasOwn(dumpOptions, name);

export function parseDumpArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parse(argv);

  if (values.help) {
    return { help: true };
  }

  const [file, ...extra] = positionals;
  if (file === undefined) {
    throw new UsageError("No input file given");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  return {
    help: false,
    file,
    indent: parseIndent(values.indent),
    validate: values.validate ?? false,
    output: values.output,
  };
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: dumpOptions,
    });
  } catch (error) {
    if (error instanceof TypeError) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

function parseIndent(value: string | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (!/^\d+$/.test(value)) {
    throw new UsageError(
      `--indent expects a non-negative integer, got '${value}'`,
    );
  }
  return Number(value);
}
