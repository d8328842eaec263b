/**
 * Operand references
 *
 * An operand appears either as its value, when that value is known at dump
 * time, or as a `#<id>` token. Only the operand itself is inspected; its own
 * operands are never followed, which keeps rendering depth bounded by value
 * nesting rather than by the size of the instruction graph.
 */

import { Block, type Instruction, Value } from "#ir/spec";

import { Error, ErrorCode } from "../errors.js";
import { type Context, lookupBlock, lookupInstruction } from "./context.js";
import { formatValue } from "./value.js";

/**
 * Whether uses of `instruction` expand to its value instead of a reference
 */
export const isInlined = (instruction: Instruction): boolean =>
  Value.isKnown(instruction.value);

export const formatReference = (id: Instruction.Id): string => `#${id}`;

export function formatOperand(context: Context, id: Instruction.Id): string {
  const instruction = lookupInstruction(context, id);
  if (!isInlined(instruction)) {
    return formatReference(instruction.id);
  }
  return formatConstant(context, instruction);
}

/**
 * Render an instruction's own evaluation state
 */
export function formatConstant(
  context: Context,
  instruction: Instruction,
): string {
  const { type, value } = instruction;
  switch (value.special) {
    case "runtime":
      throw new Error(
        ErrorCode.RUNTIME_VALUE_INLINED,
        formatReference(instruction.id),
      );
    case "undef":
      return "undefined";
    case "zeroes":
      return "zeroes";
    default:
      if (type === null) {
        throw new Error(
          ErrorCode.UNTYPED_CONSTANT,
          formatReference(instruction.id),
        );
      }
      return formatValue(context, type, value);
  }
}

export const formatBlockReference = (context: Context, id: Block.Id): string =>
  Block.label(lookupBlock(context, id));
