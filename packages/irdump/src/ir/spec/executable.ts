import type { Block } from "./block.js";
import type { Instruction } from "./instruction.js";

/**
 * Executable - the unit the dumper renders
 *
 * Blocks are kept in declaration order (Map insertion order). Instructions
 * live in an arena addressed by debug id; operands and block references are
 * plain ids into these maps, so nothing in the graph owns anything it
 * refers to.
 */
export interface Executable {
  blocks: Map<Block.Id, Block>;
  instructions: Map<Instruction.Id, Instruction>;
}

export namespace Executable {
  export const empty = (): Executable => ({
    blocks: new Map(),
    instructions: new Map(),
  });
}
