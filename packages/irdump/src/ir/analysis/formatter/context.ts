import type * as Ir from "#ir/spec";

import { Error, ErrorCode } from "../errors.js";

/**
 * Read-only state shared by every renderer during one dump
 */
export interface Context {
  readonly executable: Ir.Executable;
  /** Fixed left margin before each instruction line */
  readonly indent: number;
}

export const createContext = (
  executable: Ir.Executable,
  indent: number,
): Context => Object.freeze({ executable, indent });

export function lookupInstruction(
  context: Context,
  id: Ir.Instruction.Id,
): Ir.Instruction {
  const instruction = context.executable.instructions.get(id);
  if (!instruction) {
    throw new Error(ErrorCode.MISSING_INSTRUCTION, `#${id}`);
  }
  return instruction;
}

export function lookupBlock(context: Context, id: Ir.Block.Id): Ir.Block {
  const block = context.executable.blocks.get(id);
  if (!block) {
    throw new Error(ErrorCode.MISSING_BLOCK, `block ${id}`);
  }
  return block;
}
