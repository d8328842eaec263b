/**
 * CLI module exports
 */

export { handleDumpCommand } from "./dump.js";
export {
  type DumpOptions,
  type ParsedArgs,
  type OptionName,
  ErrorCode,
  UsageError,
  dumpOptions,
  optionDescriptions,
  isOptionName,
  parseDumpArgs,
} from "./options.js";
export {
  type Io,
  processIo,
  formatMessage,
  displayMessages,
  showHelp,
} from "./output.js";
