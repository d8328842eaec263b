import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatOperand } from "../operand.js";

export const formatArrayType = (
  context: Context,
  inst: Ir.Instruction.ArrayType,
): string =>
  `[${formatOperand(context, inst.size)}]${formatOperand(context, inst.childType)}`;

export const formatSliceType = (
  context: Context,
  inst: Ir.Instruction.SliceType,
): string =>
  `[]${inst.isConst ? "const " : ""}${formatOperand(context, inst.childType)}`;
