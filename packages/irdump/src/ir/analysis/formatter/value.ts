/**
 * Constant-value rendering
 *
 * Dispatches on the kind of the type a value is read at, mirroring how the
 * type table interprets constant storage. Nested values (array elements,
 * pointees, optional payloads) recurse at their child types. Value nesting
 * is finite because the IR cannot build self-containing arrays or pointers;
 * nothing here checks for cycles.
 */

import type { Type, Value } from "#ir/spec";

import { Error, ErrorCode, unreachable } from "../errors.js";
import type { Context } from "./context.js";
import { formatOperand } from "./operand.js";

export function formatValue(
  context: Context,
  type: Type,
  value: Value,
): string {
  switch (value.special) {
    case "runtime":
      throw new Error(ErrorCode.RUNTIME_VALUE_INLINED, `at type ${type.name}`);
    case "undef":
      return "undefined";
    case "zeroes":
      return "zeroes";
    case "static":
      return formatData(context, type, value.data);
    default:
      return unreachable(ErrorCode.UNKNOWN_VALUE_STATE, value);
  }
}

function formatData(context: Context, type: Type, data: Value.Data): string {
  switch (type.kind) {
    case "type_decl":
      return formatData(context, type.canonical, data);
    case "invalid":
      return "(invalid)";
    case "var":
      return "(var)";
    case "void":
      return "{}";
    case "int_literal":
    case "int":
      return formatInteger(expect(data, "int", type).value);
    case "float_literal":
    case "float":
      return formatFloat(expect(data, "float", type).value);
    case "meta_type":
      return expect(data, "type", type).type.name;
    case "unreachable":
      return "@unreachable()";
    case "bool":
      return expect(data, "bool", type).value ? "true" : "false";
    case "pointer":
      return `&${formatValue(context, type.child, expect(data, "pointer", type).pointee)}`;
    case "fn":
      return expect(data, "fn", type).fn.symbolName;
    case "block": {
      const { position } = expect(data, "scope", type);
      return `(scope:${position.line + 1}:${position.column + 1})`;
    }
    case "array": {
      const { elements } = expect(data, "array", type);
      if (elements.length !== type.length) {
        throw new Error(
          ErrorCode.ARRAY_LENGTH_MISMATCH,
          `${type.name} holds ${elements.length} elements`,
        );
      }
      const items = elements.map((element) =>
        formatValue(context, type.child, element),
      );
      return `${type.name}{${items.join(",")}}`;
    }
    case "null_literal":
      return "null";
    case "undefined_literal":
      return "undefined";
    case "maybe": {
      const { child } = expect(data, "maybe", type);
      return child ? formatValue(context, type.child, child) : "null";
    }
    case "namespace":
      return `(namespace: ${expect(data, "namespace", type).path})`;
    case "bound_fn": {
      const { fn, firstArg } = expect(data, "bound_fn", type);
      return `bound ${fn.symbolName} to ${formatOperand(context, firstArg)}`;
    }
    case "struct":
      return `(struct ${type.name} constant)`;
    case "enum":
      return `(enum ${type.name} constant)`;
    case "error_union":
      return `(error union ${type.name} constant)`;
    case "union":
      return `(union ${type.name} constant)`;
    case "pure_error":
      return "(pure error constant)";
    default:
      return unreachable(ErrorCode.UNKNOWN_TYPE, type);
  }
}

/**
 * Decimal digits, with a leading minus sign only for negative values
 */
export const formatInteger = (value: bigint): string =>
  value < 0n ? `-${-value}` : `${value}`;

/**
 * Six fractional digits, as `printf("%f")` prints them
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (Object.is(value, -0)) {
    return "-0.000000";
  }
  // toFixed switches to exponent notation from 1e21 up; doubles that large
  // are whole numbers, so their digits come from BigInt exactly
  if (Math.abs(value) >= 1e21) {
    return `${BigInt(value)}.000000`;
  }
  return value.toFixed(6);
}

function expect<K extends Value.DataKind>(
  data: Value.Data,
  kind: K,
  type: Type,
): Extract<Value.Data, { kind: K }> {
  if (isDataKind(data, kind)) {
    return data;
  }
  throw new Error(
    ErrorCode.VALUE_MISMATCH,
    `expected ${kind} data for ${type.name}, found ${data.kind}`,
  );
}

const isDataKind = <K extends Value.DataKind>(
  data: Value.Data,
  kind: K,
): data is Extract<Value.Data, { kind: K }> => data.kind === kind;
