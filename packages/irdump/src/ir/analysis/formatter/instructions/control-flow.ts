import type * as Ir from "#ir/spec";

import { Error, ErrorCode } from "../../errors.js";
import type { Context } from "../context.js";
import { formatBlockReference, formatOperand } from "../operand.js";

const inlineKeyword = (isInline: boolean): string =>
  isInline ? "inline " : "";

export const formatCondBr = (
  context: Context,
  inst: Ir.Instruction.CondBr,
): string =>
  `${inlineKeyword(inst.isInline)}if (${formatOperand(context, inst.condition)}) ${formatBlockReference(context, inst.thenBlock)} else ${formatBlockReference(context, inst.elseBlock)}`;

export const formatBr = (
  context: Context,
  inst: Ir.Instruction.Br,
): string =>
  `${inlineKeyword(inst.isInline)}goto ${formatBlockReference(context, inst.dest)}`;

export function formatPhi(
  context: Context,
  inst: Ir.Instruction.Phi,
): string {
  if (inst.incoming.length === 0) {
    throw new Error(ErrorCode.EMPTY_PHI, `#${inst.id}`);
  }
  return inst.incoming
    .map(
      ({ block, value }) =>
        `${formatBlockReference(context, block)}:${formatOperand(context, value)}`,
    )
    .join(" ");
}

export function formatSwitchBr(
  context: Context,
  inst: Ir.Instruction.SwitchBr,
): string {
  const cases = inst.cases
    .map(
      ({ value, block }) =>
        `${formatOperand(context, value)} => ${formatBlockReference(context, block)}, `,
    )
    .join("");
  return `${inlineKeyword(inst.isInline)}switch (${formatOperand(context, inst.target)}) ${cases}else => ${formatBlockReference(context, inst.elseBlock)}`;
}

export const formatSwitchVar = (
  context: Context,
  inst: Ir.Instruction.SwitchVar,
): string =>
  `switchvar ${formatOperand(context, inst.targetPtr)}, ${formatOperand(context, inst.prong)}`;

export const formatSwitchTarget = (
  context: Context,
  inst: Ir.Instruction.SwitchTarget,
): string => `switchtarget ${formatOperand(context, inst.targetPtr)}`;

export const formatUnreachable = (): string => "unreachable";
