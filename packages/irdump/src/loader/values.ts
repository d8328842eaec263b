/**
 * Evaluation state decoding
 *
 * A constant payload means nothing on its own; the kind of the type it is
 * read at decides how it is decoded, the same way the formatter decides how
 * it is rendered.
 */

import { type Type, Value } from "#ir/spec";

import { ErrorCode } from "./errors.js";
import type { Node } from "./reader.js";
import type { TypeTable } from "./types.js";

const specials = ["runtime", "undef", "zeroes"] as const;

/**
 * Decode an instruction's `value` entry; an absent entry is a runtime value
 */
export function decodeValue(
  node: Node | undefined,
  type: Type | null,
  types: TypeTable,
): Value {
  if (!node) {
    return Value.runtime();
  }
  const special = decodeSpecial(node);
  if (special) {
    return special;
  }
  if (!type) {
    return node.fail(ErrorCode.INVALID_VALUE, "a constant needs a type");
  }
  return Value.of(decodeData(node, type, types));
}

function decodeSpecial(node: Node): Value | undefined {
  if (!node.isMap() || !node.has("special")) {
    return undefined;
  }
  switch (node.field("special").oneOf(specials, ErrorCode.INVALID_VALUE)) {
    case "runtime":
      return Value.runtime();
    case "undef":
      return Value.undef();
    case "zeroes":
      return Value.zeroes();
  }
}

/**
 * Values nested inside another constant are never runtime values
 */
function decodeNested(node: Node, type: Type, types: TypeTable): Value {
  const value = decodeValue(node, type, types);
  if (value.special === "runtime") {
    return node.fail(
      ErrorCode.INVALID_VALUE,
      "a nested value must be known at compile time",
    );
  }
  return value;
}

function decodeData(node: Node, type: Type, types: TypeTable): Value.Data {
  switch (type.kind) {
    case "type_decl":
      return decodeData(node, type.canonical, types);
    case "int":
    case "int_literal":
      return { kind: "int", value: node.bigint() };
    case "float":
    case "float_literal":
      return { kind: "float", value: node.number() };
    case "bool":
      return { kind: "bool", value: node.boolean() };
    case "meta_type":
      return { kind: "type", type: types.lookup(node) };
    case "pointer":
      return { kind: "pointer", pointee: decodeNested(node, type.child, types) };
    case "fn":
      return { kind: "fn", fn: { symbolName: node.string() } };
    case "block":
      return {
        kind: "scope",
        position: {
          line: node.field("line").index(),
          column: node.field("column").index(),
        },
      };
    case "array": {
      const elements = node.list();
      if (elements.length !== type.length) {
        return node.fail(
          ErrorCode.INVALID_VALUE,
          `${type.name} needs ${type.length} elements, found ${elements.length}`,
        );
      }
      return {
        kind: "array",
        elements: elements.map((element) =>
          decodeNested(element, type.child, types),
        ),
      };
    }
    case "maybe":
      return {
        kind: "maybe",
        child: node.isNull() ? null : decodeNested(node, type.child, types),
      };
    case "namespace":
      return { kind: "namespace", path: node.string() };
    case "bound_fn":
      return {
        kind: "bound_fn",
        fn: { symbolName: node.field("fn").string() },
        firstArg: node.field("firstArg").index(),
      };
    case "pure_error":
      return { kind: "pure_error" };
    case "struct":
    case "enum":
    case "union":
    case "error_union":
      return { kind: "aggregate" };
    case "invalid":
    case "var":
    case "void":
    case "unreachable":
    case "null_literal":
    case "undefined_literal":
      return { kind: "void" };
  }
}
