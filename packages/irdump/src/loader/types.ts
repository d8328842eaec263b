/**
 * Type table decoding
 *
 * Types are declared by name under the document's `types` mapping and
 * referenced by name everywhere else. Children are resolved lazily, so a
 * declaration may refer to one that appears later in the mapping.
 */

import { Type } from "#ir/spec";

import { ErrorCode } from "./errors.js";
import type { Node } from "./reader.js";

const builtins: Type[] = [
  Type.void_,
  Type.bool,
  Type.metaType,
  Type.unreachable,
  Type.intLiteral,
  Type.floatLiteral,
  Type.nullLiteral,
  Type.undefinedLiteral,
  Type.pureError,
  Type.namespace_,
  Type.block,
  Type.boundFn,
  ...[8, 16, 32, 64].flatMap((bits) => [
    Type.int(bits, false),
    Type.int(bits, true),
  ]),
  { kind: "int", name: "usize", bits: 64, signed: false },
  { kind: "int", name: "isize", bits: 64, signed: true },
  Type.float(32),
  Type.float(64),
];

const kinds = [
  "invalid",
  "var",
  "void",
  "bool",
  "unreachable",
  "int",
  "float",
  "int_literal",
  "float_literal",
  "null_literal",
  "undefined_literal",
  "meta_type",
  "pointer",
  "array",
  "maybe",
  "error_union",
  "pure_error",
  "struct",
  "enum",
  "union",
  "fn",
  "block",
  "namespace",
  "bound_fn",
  "type_decl",
] as const satisfies readonly Type.Kind[];

export class TypeTable {
  private readonly resolved = new Map<string, Type>();
  private readonly declarations = new Map<string, Node>();
  private readonly resolving = new Set<string>();

  constructor(declarations?: Node) {
    for (const type of builtins) {
      this.resolved.set(type.name, type);
    }
    for (const [name, node] of declarations?.entries() ?? []) {
      this.resolved.delete(name);
      this.declarations.set(name, node);
    }
  }

  /**
   * Names of the declared (not built-in) types, in declaration order
   */
  declared(): string[] {
    return [...this.declarations.keys()];
  }

  /**
   * Resolve the type named by a string node
   */
  lookup(node: Node): Type {
    return this.resolve(node.string(), node);
  }

  resolve(name: string, site: Node): Type {
    const known = this.resolved.get(name);
    if (known) {
      return known;
    }

    const declaration = this.declarations.get(name);
    if (!declaration) {
      return site.fail(ErrorCode.UNKNOWN_TYPE, `'${name}'`);
    }
    if (this.resolving.has(name)) {
      return declaration.fail(ErrorCode.TYPE_CYCLE, `'${name}'`);
    }

    this.resolving.add(name);
    try {
      const type = this.decode(name, declaration);
      this.resolved.set(name, type);
      return type;
    } finally {
      this.resolving.delete(name);
    }
  }

  private decode(key: string, node: Node): Type {
    const kind = node.field("kind").oneOf(kinds, ErrorCode.UNKNOWN_KIND);
    const name = node.optional("name")?.string() ?? key;
    const child = (): Type => this.lookup(node.field("child"));
    const fields = (): Type.Field[] =>
      node.optionalList("fields").map((field) => ({ name: field.string() }));

    switch (kind) {
      case "int":
        return {
          kind,
          name,
          bits: node.field("bits").index(),
          signed: node.optionalBoolean("signed", false),
        };
      case "float":
        return { kind, name, bits: node.field("bits").index() };
      case "pointer":
        return {
          kind,
          name,
          child: child(),
          isConst: node.optionalBoolean("isConst", false),
        };
      case "array":
        return {
          kind,
          name,
          child: child(),
          length: node.field("length").index(),
        };
      case "maybe":
      case "error_union":
        return { kind, name, child: child() };
      case "struct":
      case "enum":
      case "union":
        return { kind, name, fields: fields() };
      case "type_decl":
        return {
          kind,
          name,
          canonical: this.lookup(node.field("canonical")),
        };
      case "invalid":
      case "var":
      case "void":
      case "bool":
      case "unreachable":
      case "int_literal":
      case "float_literal":
      case "null_literal":
      case "undefined_literal":
      case "meta_type":
      case "pure_error":
      case "fn":
      case "block":
      case "namespace":
      case "bound_fn":
        return { kind, name };
    }
  }
}
