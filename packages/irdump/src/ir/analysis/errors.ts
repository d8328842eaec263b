import { DumpError } from "#errors";

/**
 * Internal invariant violations found while rendering
 *
 * None of these is recoverable: a well-formed graph never produces them, and
 * rendering stops at the first one.
 */
export enum ErrorCode {
  UNKNOWN_INSTRUCTION = "IRD001",
  UNKNOWN_TYPE = "IRD002",
  RUNTIME_VALUE_INLINED = "IRD003",
  VALUE_MISMATCH = "IRD004",
  ARRAY_LENGTH_MISMATCH = "IRD005",
  EMPTY_PHI = "IRD006",
  MISSING_INSTRUCTION = "IRD007",
  MISSING_BLOCK = "IRD008",
  UNTYPED_CONSTANT = "IRD009",
  UNKNOWN_VALUE_STATE = "IRD010",
  STREAM_FAILED = "IRD011",
}

export const ErrorMessages = {
  [ErrorCode.UNKNOWN_INSTRUCTION]: "Unknown instruction kind",
  [ErrorCode.UNKNOWN_TYPE]: "Unknown type kind",
  [ErrorCode.RUNTIME_VALUE_INLINED]:
    "Runtime value reached the constant renderer",
  [ErrorCode.VALUE_MISMATCH]: "Constant does not match its type",
  [ErrorCode.ARRAY_LENGTH_MISMATCH]:
    "Array constant length differs from its type",
  [ErrorCode.EMPTY_PHI]: "Phi has no incoming edges",
  [ErrorCode.MISSING_INSTRUCTION]: "Reference to an unknown instruction",
  [ErrorCode.MISSING_BLOCK]: "Reference to an unknown block",
  [ErrorCode.UNTYPED_CONSTANT]: "Constant operand has no type",
  [ErrorCode.UNKNOWN_VALUE_STATE]: "Unknown evaluation state",
  [ErrorCode.STREAM_FAILED]: "Output stream failed",
};

export class Error extends DumpError {
  constructor(code: ErrorCode, message?: string) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code);
  }
}

/**
 * Fail on a variant the closed unions do not know about; `never` makes the
 * compiler reject any dispatch site that forgets a variant
 */
export function unreachable(code: ErrorCode, value: never): never {
  throw new Error(code, describe(value));
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return String(value);
}
