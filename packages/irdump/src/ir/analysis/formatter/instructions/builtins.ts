import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatOperand } from "../operand.js";

/**
 * `@name(a, b, ...)`
 */
export const formatBuiltinCall = (
  context: Context,
  name: string,
  ...args: Ir.Instruction.Id[]
): string =>
  `@${name}(${args.map((arg) => formatOperand(context, arg)).join(", ")})`;

export const formatEnumTag = (
  context: Context,
  inst: Ir.Instruction.EnumTag,
): string => `enumtag ${formatOperand(context, inst.operand)}`;

export const formatArrayLen = (
  context: Context,
  inst: Ir.Instruction.ArrayLen,
): string => `${formatOperand(context, inst.operand)}.len`;

export const formatRef = (
  context: Context,
  inst: Ir.Instruction.Ref,
): string => `ref ${formatOperand(context, inst.operand)}`;
