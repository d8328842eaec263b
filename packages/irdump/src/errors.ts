/**
 * Base error type shared by every irdump component
 */

import { Severity } from "#result";

/**
 * Location of the offending node in the input that produced an error,
 * e.g. `blocks[0].instructions[2].operand` for a loaded description
 */
export type Location = string;

export class DumpError extends Error {
  public readonly code: string;
  public readonly location?: Location;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: Location,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = "DumpError";
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}
