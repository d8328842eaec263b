import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatOperand, formatReference } from "../operand.js";

const safetyComment = (safetyCheckOn: boolean): string =>
  safetyCheckOn ? "" : " // no safety";

export const formatElemPtr = (
  context: Context,
  inst: Ir.Instruction.ElemPtr,
): string =>
  `&${formatOperand(context, inst.arrayPtr)}[${formatOperand(context, inst.index)}]${safetyComment(inst.safetyCheckOn)}`;

export const formatVarPtr = (inst: Ir.Instruction.VarPtr): string =>
  `&${inst.variable.name}`;

export const formatLoadPtr = (
  context: Context,
  inst: Ir.Instruction.LoadPtr,
): string => `*${formatOperand(context, inst.ptr)}`;

/**
 * The destination pointer is always shown by reference, even when its
 * address is known
 */
export const formatStorePtr = (
  context: Context,
  inst: Ir.Instruction.StorePtr,
): string =>
  `*${formatReference(inst.ptr)} = ${formatOperand(context, inst.operand)}`;

export const formatFieldPtr = (
  context: Context,
  inst: Ir.Instruction.FieldPtr,
): string =>
  `fieldptr ${formatOperand(context, inst.containerPtr)}.${inst.fieldName}`;

export const formatStructFieldPtr = (
  context: Context,
  inst: Ir.Instruction.StructFieldPtr,
): string =>
  `@StructFieldPtr(&${formatOperand(context, inst.structPtr)}.${inst.field.name})`;

export const formatEnumFieldPtr = (
  context: Context,
  inst: Ir.Instruction.EnumFieldPtr,
): string =>
  `@EnumFieldPtr(&${formatOperand(context, inst.enumPtr)}.${inst.field.name})`;

export const formatTestNull = (
  context: Context,
  inst: Ir.Instruction.TestNull,
): string => `*${formatOperand(context, inst.operand)} == null`;

export const formatUnwrapMaybe = (
  context: Context,
  inst: Ir.Instruction.UnwrapMaybe,
): string =>
  `&??*${formatOperand(context, inst.operand)}${safetyComment(inst.safetyCheckOn)}`;
