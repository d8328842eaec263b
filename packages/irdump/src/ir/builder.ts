import { Block, Executable, Instruction, Value } from "./spec/index.js";

/**
 * Incrementally assembles an executable
 *
 * Debug ids are handed out from two monotonic counters, one for blocks and
 * one for instructions, so ids are never reused within a builder. Use counts
 * are maintained as instructions are appended: every operand slot of a new
 * instruction counts as one use of the instruction it names, including
 * uses recorded before the used instruction has been appended.
 */
export class Builder {
  private readonly executable: Executable = Executable.empty();
  private readonly pendingUses = new Map<Instruction.Id, number>();
  private nextBlockId: Block.Id = 0;
  private nextInstructionId: Instruction.Id = 0;

  /**
   * Append an empty block and return its id
   */
  block(nameHint: string): Block.Id {
    const id = this.nextBlockId++;
    this.executable.blocks.set(id, { id, nameHint, instructions: [] });
    return id;
  }

  /**
   * Id the next appended instruction will receive, for forward references
   */
  peekId(): Instruction.Id {
    return this.nextInstructionId;
  }

  /**
   * Append an instruction to the end of `blockId` and return its id
   */
  add(blockId: Block.Id, draft: Builder.Draft): Instruction.Id {
    const block = this.executable.blocks.get(blockId);
    if (!block) {
      throw new RangeError(`No block with id ${blockId}`);
    }

    const id = this.nextInstructionId++;
    const instruction: Instruction = {
      ...draft,
      id,
      type: draft.type ?? null,
      value: draft.value ?? Value.runtime(),
      refCount: (draft.refCount ?? 0) + (this.pendingUses.get(id) ?? 0),
    };
    this.pendingUses.delete(id);

    for (const operand of Instruction.operands(instruction)) {
      const used = this.executable.instructions.get(operand);
      if (used) {
        used.refCount++;
      } else {
        this.pendingUses.set(operand, (this.pendingUses.get(operand) ?? 0) + 1);
      }
    }

    this.executable.instructions.set(id, instruction);
    block.instructions.push(id);
    return id;
  }

  build(): Executable {
    return this.executable;
  }
}

export namespace Builder {
  type Managed = "id" | "type" | "refCount" | "value";

  /**
   * Instruction without the fields the builder manages; `type`, `value`
   * and an initial `refCount` may still be given
   */
  export type Draft<I extends Instruction = Instruction> = I extends Instruction
    ? Omit<I, Managed> & Partial<Pick<I, Exclude<Managed, "id">>>
    : never;
}
