/**
 * Result type for operations that report messages instead of throwing
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
}

interface Reportable {
  severity: Severity;
}

export type Messages<E extends Reportable> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends Reportable> =
  | { success: true; value: T; messages: Messages<E> }
  | { success: false; messages: Messages<E> };

export namespace Result {
  export function ok<T, E extends Reportable = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  /**
   * Successful result that still carries messages (usually warnings)
   */
  export function okWith<T, E extends Reportable>(
    value: T,
    messages: E[],
  ): Result<T, E> {
    return { success: true, value, messages: group(messages) };
  }

  export function err<T, E extends Reportable>(
    errors: E | E[],
  ): Result<T, E> {
    return {
      success: false,
      messages: group(Array.isArray(errors) ? errors : [errors]),
    };
  }

  export function map<T, U, E extends Reportable>(
    result: Result<T, E>,
    f: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: f(result.value), messages: result.messages };
  }

  export function errors<T, E extends Reportable>(result: Result<T, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  }

  export function warnings<T, E extends Reportable>(
    result: Result<T, E>,
  ): E[] {
    return result.messages[Severity.Warning] ?? [];
  }

  function group<E extends Reportable>(messages: E[]): Messages<E> {
    const grouped: Messages<E> = {};
    for (const message of messages) {
      const bucket = grouped[message.severity] ?? [];
      bucket.push(message);
      grouped[message.severity] = bucket;
    }
    return grouped;
  }
}
