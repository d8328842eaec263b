/**
 * Instruction decoding
 *
 * One decoder per instruction kind. Field names in the document follow the
 * data model's; operands are instruction ids and branch targets are block
 * ids.
 */

import { Instruction, Type } from "#ir/spec";

import { ErrorCode } from "./errors.js";
import type { Node } from "./reader.js";
import type { TypeTable } from "./types.js";

/**
 * Fields every instruction shares, decoded before the kind-specific ones
 */
export type Common = Pick<
  Instruction.Base,
  "id" | "type" | "refCount" | "value"
>;

type Decoder = (node: Node, common: Common, types: TypeTable) => Instruction;

const operand = (node: Node, key: string): Instruction.Id =>
  node.field(key).index();

const operands = (node: Node, key: string): Instruction.Id[] =>
  node.optionalList(key).map((item) => item.index());

const variable = (node: Node): Instruction.Variable => {
  const entry = node.field("variable");
  return {
    name: entry.field("name").string(),
    isConst: entry.optionalBoolean("isConst", false),
    isInline: entry.optionalBoolean("isInline", false),
  };
};

/**
 * Field of an aggregate type, checked against the type's declared fields
 * when it has any
 */
function field(node: Node, key: string, type: Type | null): Type.Field {
  const entry = node.field(key);
  const name = entry.string();
  const canonical = type ? Type.canonical(type) : null;
  if (
    canonical &&
    Type.isAggregate(canonical) &&
    canonical.fields.length > 0 &&
    !canonical.fields.some((candidate) => candidate.name === name)
  ) {
    return entry.fail(
      ErrorCode.INVALID_NODE,
      `${canonical.name} has no field '${name}'`,
    );
  }
  return { name };
}

/**
 * Kinds made of nothing but a single `operand`
 */
type OperandOnly =
  | "return"
  | "test_null"
  | "type_of"
  | "to_ptr_type"
  | "ptr_type_child"
  | "clz"
  | "ctz"
  | "enum_tag"
  | "static_eval"
  | "array_len"
  | "ref";

const unary =
  (kind: OperandOnly): Decoder =>
  (node, common) => ({ ...common, kind, operand: operand(node, "operand") });

export const decoders: { [K in Instruction.Kind]: Decoder } = {
  return: unary("return"),
  const: (_, common) => ({ ...common, kind: "const" }),
  bin_op: (node, common) => ({
    ...common,
    kind: "bin_op",
    op: node
      .field("op")
      .oneOf(Instruction.BinOp.operators, ErrorCode.UNKNOWN_OPERATOR),
    lhs: operand(node, "lhs"),
    rhs: operand(node, "rhs"),
  }),
  un_op: (node, common) => ({
    ...common,
    kind: "un_op",
    op: node
      .field("op")
      .oneOf(Instruction.UnOp.operators, ErrorCode.UNKNOWN_OPERATOR),
    operand: operand(node, "operand"),
  }),
  decl_var: (node, common) => ({
    ...common,
    kind: "decl_var",
    variable: variable(node),
    ...(node.has("varType") ? { varType: operand(node, "varType") } : {}),
    init: operand(node, "init"),
  }),
  cast: (node, common, types) => ({
    ...common,
    kind: "cast",
    operand: operand(node, "operand"),
    destType: types.lookup(node.field("destType")),
  }),
  call: (node, common) => {
    const callee = node.field("callee");
    return {
      ...common,
      kind: "call",
      callee:
        typeof callee.value === "string"
          ? { kind: "fn", fn: { symbolName: callee.string() } }
          : { kind: "ref", operand: callee.index() },
      args: operands(node, "args"),
    };
  },

  cond_br: (node, common) => ({
    ...common,
    kind: "cond_br",
    condition: operand(node, "condition"),
    thenBlock: node.field("thenBlock").index(),
    elseBlock: node.field("elseBlock").index(),
    isInline: node.optionalBoolean("isInline", false),
  }),
  br: (node, common) => ({
    ...common,
    kind: "br",
    dest: node.field("dest").index(),
    isInline: node.optionalBoolean("isInline", false),
  }),
  phi: (node, common) => ({
    ...common,
    kind: "phi",
    incoming: node.optionalList("incoming").map((edge) => ({
      block: edge.field("block").index(),
      value: operand(edge, "value"),
    })),
  }),
  switch_br: (node, common) => ({
    ...common,
    kind: "switch_br",
    target: operand(node, "target"),
    cases: node.optionalList("cases").map((entry) => ({
      value: operand(entry, "value"),
      block: entry.field("block").index(),
    })),
    elseBlock: node.field("elseBlock").index(),
    isInline: node.optionalBoolean("isInline", false),
  }),
  switch_var: (node, common) => ({
    ...common,
    kind: "switch_var",
    targetPtr: operand(node, "targetPtr"),
    prong: operand(node, "prong"),
  }),
  switch_target: (node, common) => ({
    ...common,
    kind: "switch_target",
    targetPtr: operand(node, "targetPtr"),
  }),
  unreachable: (_, common) => ({ ...common, kind: "unreachable" }),

  container_init_list: (node, common) => ({
    ...common,
    kind: "container_init_list",
    containerType: operand(node, "containerType"),
    items: operands(node, "items"),
  }),
  container_init_fields: (node, common) => ({
    ...common,
    kind: "container_init_fields",
    containerType: operand(node, "containerType"),
    fields: node.optionalList("fields").map((entry) => ({
      name: entry.field("name").string(),
      value: operand(entry, "value"),
    })),
  }),
  struct_init: (node, common, types) => {
    const structType = types.lookup(node.field("structType"));
    return {
      ...common,
      kind: "struct_init",
      structType,
      fields: node.optionalList("fields").map((entry) => ({
        field: field(entry, "field", structType),
        value: operand(entry, "value"),
      })),
    };
  },

  elem_ptr: (node, common) => ({
    ...common,
    kind: "elem_ptr",
    arrayPtr: operand(node, "arrayPtr"),
    index: operand(node, "index"),
    safetyCheckOn: node.optionalBoolean("safetyCheckOn", true),
  }),
  var_ptr: (node, common) => ({
    ...common,
    kind: "var_ptr",
    variable: variable(node),
  }),
  load_ptr: (node, common) => ({
    ...common,
    kind: "load_ptr",
    ptr: operand(node, "ptr"),
  }),
  store_ptr: (node, common) => ({
    ...common,
    kind: "store_ptr",
    ptr: operand(node, "ptr"),
    operand: operand(node, "operand"),
  }),
  field_ptr: (node, common) => ({
    ...common,
    kind: "field_ptr",
    containerPtr: operand(node, "containerPtr"),
    fieldName: node.field("fieldName").string(),
  }),
  struct_field_ptr: (node, common) => ({
    ...common,
    kind: "struct_field_ptr",
    structPtr: operand(node, "structPtr"),
    field: field(node, "field", null),
  }),
  enum_field_ptr: (node, common) => ({
    ...common,
    kind: "enum_field_ptr",
    enumPtr: operand(node, "enumPtr"),
    field: field(node, "field", null),
  }),
  test_null: unary("test_null"),
  unwrap_maybe: (node, common) => ({
    ...common,
    kind: "unwrap_maybe",
    operand: operand(node, "operand"),
    safetyCheckOn: node.optionalBoolean("safetyCheckOn", true),
  }),

  type_of: unary("type_of"),
  to_ptr_type: unary("to_ptr_type"),
  ptr_type_child: unary("ptr_type_child"),
  array_type: (node, common) => ({
    ...common,
    kind: "array_type",
    size: operand(node, "size"),
    childType: operand(node, "childType"),
  }),
  slice_type: (node, common) => ({
    ...common,
    kind: "slice_type",
    childType: operand(node, "childType"),
    isConst: node.optionalBoolean("isConst", false),
  }),

  set_fn_test: (node, common) => ({
    ...common,
    kind: "set_fn_test",
    fnValue: operand(node, "fnValue"),
    isTest: operand(node, "isTest"),
  }),
  set_fn_visible: (node, common) => ({
    ...common,
    kind: "set_fn_visible",
    fnValue: operand(node, "fnValue"),
    isVisible: operand(node, "isVisible"),
  }),
  set_debug_safety: (node, common) => ({
    ...common,
    kind: "set_debug_safety",
    scopeValue: operand(node, "scopeValue"),
    debugSafetyOn: operand(node, "debugSafetyOn"),
  }),
  compile_var: (node, common) => ({
    ...common,
    kind: "compile_var",
    name: operand(node, "name"),
  }),
  size_of: (node, common) => ({
    ...common,
    kind: "size_of",
    typeValue: operand(node, "typeValue"),
  }),
  clz: unary("clz"),
  ctz: unary("ctz"),
  enum_tag: unary("enum_tag"),
  static_eval: unary("static_eval"),
  import: (node, common) => ({
    ...common,
    kind: "import",
    name: operand(node, "name"),
  }),
  array_len: unary("array_len"),
  ref: unary("ref"),

  asm: (node, common) => ({
    ...common,
    kind: "asm",
    template: node.field("template").string(),
    outputs: node.optionalList("outputs").map((output) => ({
      symbolicName: output.field("symbolicName").string(),
      constraint: output.field("constraint").string(),
      target: output.has("returnType")
        ? { kind: "return", type: operand(output, "returnType") }
        : { kind: "variable", name: output.field("variable").string() },
    })),
    inputs: node.optionalList("inputs").map((input) => ({
      symbolicName: input.field("symbolicName").string(),
      constraint: input.field("constraint").string(),
      operand: operand(input, "operand"),
    })),
    clobbers: node.optionalList("clobbers").map((clobber) => clobber.string()),
    isVolatile: node.optionalBoolean("isVolatile", false),
  }),
};

export const isKind = (kind: string): kind is Instruction.Kind =>
  Object.hasOwn(decoders, kind);
