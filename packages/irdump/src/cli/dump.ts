/**
 * `irdump` command: load a description, optionally validate it, dump it
 */

import { DumpError } from "#errors";
import { Analysis } from "#ir";
import { Loader } from "#loader";
import { Result } from "#result";

import { ErrorCode, parseDumpArgs } from "./options.js";
import { displayMessages, type Io, processIo, showHelp } from "./output.js";

/**
 * Run the command and return the process exit code
 */
export async function handleDumpCommand(
  argv: string[],
  io: Io = processIo(),
): Promise<number> {
  try {
    const args = parseDumpArgs(argv);
    if (args.help) {
      showHelp(io);
      return 0;
    }

    const source = await read(io, args.file);

    const loaded = Loader.load(source);
    displayMessages(io, Result.warnings(loaded));
    if (!loaded.success) {
      displayMessages(io, Result.errors(loaded));
      return 1;
    }

    let executable = loaded.value;
    if (args.validate) {
      const validated = new Analysis.Validator().validate(executable);
      displayMessages(io, Result.warnings(validated));
      if (!validated.success) {
        displayMessages(io, Result.errors(validated));
        return 1;
      }
      executable = validated.value;
    }

    const formatter = new Analysis.Formatter({ indent: args.indent });
    if (args.output === undefined) {
      formatter.dump(executable, io.stdout);
    } else {
      await write(io, args.output, formatter.format(executable));
    }
    return 0;
  } catch (error) {
    if (error instanceof DumpError) {
      displayMessages(io, [error]);
      return 1;
    }
    throw error;
  }
}

async function read(io: Io, path: string): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (error) {
    throw new DumpError(
      `Cannot read ${path}: ${describe(error)}`,
      ErrorCode.READ_FAILED,
      path,
    );
  }
}

async function write(io: Io, path: string, text: string): Promise<void> {
  try {
    await io.writeFile(path, text);
  } catch (error) {
    throw new DumpError(
      `Cannot write ${path}: ${describe(error)}`,
      ErrorCode.WRITE_FAILED,
      path,
    );
  }
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
