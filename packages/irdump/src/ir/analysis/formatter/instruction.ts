/**
 * Instruction rendering - dispatcher
 */

import { Instruction } from "#ir/spec";

import { ErrorCode, unreachable } from "../errors.js";
import type { Context } from "./context.js";
import {
  formatArrayLen,
  formatArrayType,
  formatAsm,
  formatBinOp,
  formatBr,
  formatBuiltinCall,
  formatCall,
  formatCast,
  formatCondBr,
  formatConst,
  formatContainerInitFields,
  formatContainerInitList,
  formatDeclVar,
  formatElemPtr,
  formatEnumFieldPtr,
  formatEnumTag,
  formatFieldPtr,
  formatLoadPtr,
  formatPhi,
  formatRef,
  formatReturn,
  formatSliceType,
  formatStorePtr,
  formatStructFieldPtr,
  formatStructInit,
  formatSwitchBr,
  formatSwitchTarget,
  formatSwitchVar,
  formatTestNull,
  formatUnOp,
  formatUnreachable,
  formatUnwrapMaybe,
  formatVarPtr,
} from "./instructions/index.js";

/**
 * Render one instruction line (without its trailing newline): the
 * id/type/use-count columns followed by the kind-specific body
 */
export function formatInstruction(context: Context, inst: Instruction): string {
  return `${formatPrefix(context, inst)}${formatBody(context, inst)}`;
}

/**
 * Fixed-width columns: `#<id>`, type name, and the use count, which reads
 * `-` for instructions kept for their side effects
 */
export function formatPrefix(context: Context, inst: Instruction): string {
  const typeName = inst.type ? inst.type.name : "(unknown)";
  const refCount = Instruction.hasSideEffects(inst) ? "-" : `${inst.refCount}`;
  const margin = " ".repeat(context.indent);
  return `${margin}#${`${inst.id}`.padEnd(3)}| ${typeName.padEnd(12)}| ${refCount.padEnd(2)}| `;
}

export function formatBody(context: Context, inst: Instruction): string {
  switch (inst.kind) {
    case "return":
      return formatReturn(context, inst);
    case "const":
      return formatConst(context, inst);
    case "bin_op":
      return formatBinOp(context, inst);
    case "un_op":
      return formatUnOp(context, inst);
    case "decl_var":
      return formatDeclVar(context, inst);
    case "cast":
      return formatCast(context, inst);
    case "call":
      return formatCall(context, inst);
    case "cond_br":
      return formatCondBr(context, inst);
    case "br":
      return formatBr(context, inst);
    case "phi":
      return formatPhi(context, inst);
    case "switch_br":
      return formatSwitchBr(context, inst);
    case "switch_var":
      return formatSwitchVar(context, inst);
    case "switch_target":
      return formatSwitchTarget(context, inst);
    case "unreachable":
      return formatUnreachable();
    case "container_init_list":
      return formatContainerInitList(context, inst);
    case "container_init_fields":
      return formatContainerInitFields(context, inst);
    case "struct_init":
      return formatStructInit(context, inst);
    case "elem_ptr":
      return formatElemPtr(context, inst);
    case "var_ptr":
      return formatVarPtr(inst);
    case "load_ptr":
      return formatLoadPtr(context, inst);
    case "store_ptr":
      return formatStorePtr(context, inst);
    case "field_ptr":
      return formatFieldPtr(context, inst);
    case "struct_field_ptr":
      return formatStructFieldPtr(context, inst);
    case "enum_field_ptr":
      return formatEnumFieldPtr(context, inst);
    case "test_null":
      return formatTestNull(context, inst);
    case "unwrap_maybe":
      return formatUnwrapMaybe(context, inst);
    case "type_of":
      return formatBuiltinCall(context, "typeOf", inst.operand);
    case "to_ptr_type":
      return formatBuiltinCall(context, "toPtrType", inst.operand);
    case "ptr_type_child":
      return formatBuiltinCall(context, "ptrTypeChild", inst.operand);
    case "array_type":
      return formatArrayType(context, inst);
    case "slice_type":
      return formatSliceType(context, inst);
    case "set_fn_test":
      return formatBuiltinCall(context, "setFnTest", inst.fnValue, inst.isTest);
    case "set_fn_visible":
      return formatBuiltinCall(
        context,
        "setFnVisible",
        inst.fnValue,
        inst.isVisible,
      );
    case "set_debug_safety":
      return formatBuiltinCall(
        context,
        "setDebugSafety",
        inst.scopeValue,
        inst.debugSafetyOn,
      );
    case "compile_var":
      return formatBuiltinCall(context, "compileVar", inst.name);
    case "size_of":
      return formatBuiltinCall(context, "sizeOf", inst.typeValue);
    case "clz":
      return formatBuiltinCall(context, "clz", inst.operand);
    case "ctz":
      return formatBuiltinCall(context, "ctz", inst.operand);
    case "enum_tag":
      return formatEnumTag(context, inst);
    case "static_eval":
      return formatBuiltinCall(context, "staticEval", inst.operand);
    case "import":
      return formatBuiltinCall(context, "import", inst.name);
    case "array_len":
      return formatArrayLen(context, inst);
    case "ref":
      return formatRef(context, inst);
    case "asm":
      return formatAsm(context, inst);
    default:
      return unreachable(ErrorCode.UNKNOWN_INSTRUCTION, inst);
  }
}
