import { DumpError } from "#errors";

/**
 * Problems found while reading an executable description
 */
export enum ErrorCode {
  SYNTAX = "IRL001",
  INVALID_NODE = "IRL002",
  UNKNOWN_TYPE = "IRL003",
  TYPE_CYCLE = "IRL004",
  UNKNOWN_KIND = "IRL005",
  UNKNOWN_OPERATOR = "IRL006",
  DUPLICATE_BLOCK = "IRL007",
  DUPLICATE_INSTRUCTION = "IRL008",
  INVALID_VALUE = "IRL009",
  UNRESOLVED_OPERAND = "IRL010",
}

export const ErrorMessages = {
  [ErrorCode.SYNTAX]: "Invalid YAML",
  [ErrorCode.INVALID_NODE]: "Unexpected node",
  [ErrorCode.UNKNOWN_TYPE]: "Unknown type",
  [ErrorCode.TYPE_CYCLE]: "Type refers to itself",
  [ErrorCode.UNKNOWN_KIND]: "Unknown kind",
  [ErrorCode.UNKNOWN_OPERATOR]: "Unknown operator",
  [ErrorCode.DUPLICATE_BLOCK]: "Duplicate block id",
  [ErrorCode.DUPLICATE_INSTRUCTION]: "Duplicate instruction id",
  [ErrorCode.INVALID_VALUE]: "Value does not fit its type",
  [ErrorCode.UNRESOLVED_OPERAND]: "Unknown instruction",
};

export class Error extends DumpError {
  constructor(code: ErrorCode, message: string, location: string) {
    const base = ErrorMessages[code];
    super(
      location ? `${base} at ${location}: ${message}` : `${base}: ${message}`,
      code,
      location || undefined,
    );
    this.name = "LoaderError";
  }
}
