import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatConstant, formatOperand } from "../operand.js";
import { binaryOperators, unaryOperators } from "./operators.js";

export const formatReturn = (
  context: Context,
  inst: Ir.Instruction.Return,
): string => `return ${formatOperand(context, inst.operand)}`;

/**
 * A constant shows its own value; it is never a runtime value
 */
export const formatConst = (
  context: Context,
  inst: Ir.Instruction.Const,
): string => formatConstant(context, inst);

export const formatBinOp = (
  context: Context,
  inst: Ir.Instruction.BinOp,
): string =>
  `${formatOperand(context, inst.lhs)} ${binaryOperators[inst.op]} ${formatOperand(context, inst.rhs)}`;

export const formatUnOp = (
  context: Context,
  inst: Ir.Instruction.UnOp,
): string =>
  `${unaryOperators[inst.op]} ${formatOperand(context, inst.operand)}`;

export function formatDeclVar(
  context: Context,
  inst: Ir.Instruction.DeclVar,
): string {
  const { variable } = inst;
  const inlineKeyword = variable.isInline ? "inline " : "";
  const varOrConst = variable.isConst ? "const" : "var";
  const annotation =
    inst.varType === undefined
      ? ""
      : `: ${formatOperand(context, inst.varType)}`;
  return `${inlineKeyword}${varOrConst} ${variable.name}${annotation} = ${formatOperand(context, inst.init)}`;
}

export const formatCast = (
  context: Context,
  inst: Ir.Instruction.Cast,
): string =>
  `cast ${formatOperand(context, inst.operand)} to ${inst.destType.name}`;

export function formatCall(
  context: Context,
  inst: Ir.Instruction.Call,
): string {
  const callee =
    inst.callee.kind === "fn"
      ? inst.callee.fn.symbolName
      : formatOperand(context, inst.callee.operand);
  const args = inst.args.map((arg) => formatOperand(context, arg));
  return `${callee}(${args.join(", ")})`;
}
