/**
 * irdump - debug textualization of a compiler's mid-level IR
 */

export const VERSION = "0.1.0";

export * as Ir from "#ir";
export { Loader } from "#loader";
export { Result, Severity, type Messages } from "#result";
export { DumpError, type Location } from "#errors";
