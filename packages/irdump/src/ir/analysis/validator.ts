/**
 * IR Validator - checks the structural consistency of an executable before
 * it is dumped
 */

import { DumpError } from "#errors";
import { Result, Severity } from "#result";
import { Block, type Executable, Instruction, Value } from "#ir/spec";

export class Validator {
  private messages: Validator.Error[] = [];
  private owners: Map<Instruction.Id, Block.Id[]> = new Map();
  private uses: Map<Instruction.Id, number> = new Map();

  validate(executable: Executable): Result<Executable, Validator.Error> {
    this.messages = [];
    this.owners = new Map();
    this.uses = new Map();

    this.validateBlocks(executable);
    this.validateOwnership(executable);

    for (const [key, instruction] of executable.instructions) {
      this.validateInstruction(executable, key, instruction);
    }

    this.checkUseCounts(executable);

    const hasErrors = this.messages.some(
      ({ severity }) => severity === Severity.Error,
    );
    return hasErrors
      ? Result.err(this.messages)
      : Result.okWith(executable, this.messages);
  }

  private validateBlocks(executable: Executable): void {
    const seen = new Set<Block.Id>();

    for (const [key, block] of executable.blocks) {
      const label = Block.label(block);

      if (seen.has(block.id)) {
        this.error(
          Validator.ErrorCode.DUPLICATE_BLOCK,
          `Block id ${block.id} is declared more than once`,
          label,
        );
      }
      seen.add(block.id);

      if (key !== block.id) {
        this.error(
          Validator.ErrorCode.ID_MISMATCH,
          `Block stored under id ${key} has id ${block.id}`,
          label,
        );
      }

      for (const id of block.instructions) {
        const owners = this.owners.get(id) ?? [];
        owners.push(block.id);
        this.owners.set(id, owners);

        if (!executable.instructions.has(id)) {
          this.error(
            Validator.ErrorCode.UNKNOWN_INSTRUCTION,
            `Block lists #${id}, which does not exist`,
            label,
          );
        }
      }

      this.checkTerminator(executable, block);
    }
  }

  private checkTerminator(executable: Executable, block: Block): void {
    const lastId = block.instructions[block.instructions.length - 1];
    const last =
      lastId === undefined ? undefined : executable.instructions.get(lastId);

    if (lastId === undefined) {
      this.warning(
        Validator.ErrorCode.MISSING_TERMINATOR,
        "Block is empty",
        Block.label(block),
      );
    } else if (last && !Instruction.isTerminator(last)) {
      this.warning(
        Validator.ErrorCode.MISSING_TERMINATOR,
        `Block ends with ${last.kind} instead of a terminator`,
        Block.label(block),
      );
    }
  }

  private validateOwnership(executable: Executable): void {
    for (const id of executable.instructions.keys()) {
      const owners = this.owners.get(id) ?? [];
      if (owners.length === 0) {
        this.error(
          Validator.ErrorCode.ORPHAN_INSTRUCTION,
          "Instruction belongs to no block",
          `#${id}`,
        );
      } else if (owners.length > 1) {
        const labels = owners.map((owner) => {
          const block = executable.blocks.get(owner);
          return block ? Block.label(block) : `${owner}`;
        });
        this.error(
          Validator.ErrorCode.SHARED_INSTRUCTION,
          `Instruction is listed by several blocks: ${labels.join(", ")}`,
          `#${id}`,
        );
      }
    }
  }

  private validateInstruction(
    executable: Executable,
    key: Instruction.Id,
    instruction: Instruction,
  ): void {
    const location = `#${key}`;

    if (key !== instruction.id) {
      this.error(
        Validator.ErrorCode.ID_MISMATCH,
        `Instruction stored under id ${key} has id ${instruction.id}`,
        location,
      );
    }

    for (const operand of Instruction.operands(instruction)) {
      this.uses.set(operand, (this.uses.get(operand) ?? 0) + 1);
      if (!executable.instructions.has(operand)) {
        this.error(
          Validator.ErrorCode.UNRESOLVED_OPERAND,
          `Operand #${operand} does not exist`,
          location,
        );
      }
    }

    for (const reference of Value.references(instruction.value)) {
      if (!executable.instructions.has(reference)) {
        this.error(
          Validator.ErrorCode.UNRESOLVED_OPERAND,
          `Value refers to #${reference}, which does not exist`,
          location,
        );
      }
    }

    for (const target of Instruction.targets(instruction)) {
      if (!executable.blocks.has(target)) {
        this.error(
          Validator.ErrorCode.UNRESOLVED_BLOCK,
          `Block ${target} does not exist`,
          location,
        );
      }
    }

    if (instruction.kind === "phi" && instruction.incoming.length === 0) {
      this.error(
        Validator.ErrorCode.EMPTY_PHI,
        "Phi has no incoming edges",
        location,
      );
    }
  }

  private checkUseCounts(executable: Executable): void {
    for (const [key, instruction] of executable.instructions) {
      if (Instruction.hasSideEffects(instruction)) {
        continue;
      }

      const counted = this.uses.get(key) ?? 0;
      if (instruction.refCount !== counted) {
        this.warning(
          Validator.ErrorCode.REFCOUNT_MISMATCH,
          `Use count is ${instruction.refCount} but ${counted} uses were found`,
          `#${key}`,
        );
      }
    }
  }

  private error(
    code: Validator.ErrorCode,
    message: string,
    location: string,
  ): void {
    this.messages.push(new Validator.Error(code, message, location));
  }

  private warning(
    code: Validator.ErrorCode,
    message: string,
    location: string,
  ): void {
    this.messages.push(
      new Validator.Error(code, message, location, Severity.Warning),
    );
  }
}

export namespace Validator {
  export enum ErrorCode {
    DUPLICATE_BLOCK = "IRV001",
    ID_MISMATCH = "IRV002",
    ORPHAN_INSTRUCTION = "IRV003",
    SHARED_INSTRUCTION = "IRV004",
    UNKNOWN_INSTRUCTION = "IRV005",
    UNRESOLVED_OPERAND = "IRV006",
    UNRESOLVED_BLOCK = "IRV007",
    EMPTY_PHI = "IRV008",
    REFCOUNT_MISMATCH = "IRV101",
    MISSING_TERMINATOR = "IRV102",
  }

  export class Error extends DumpError {
    constructor(
      code: ErrorCode,
      message: string,
      location: string,
      severity: Severity = Severity.Error,
    ) {
      super(`${location}: ${message}`, code, location, severity);
      this.name = "ValidatorError";
    }
  }
}
