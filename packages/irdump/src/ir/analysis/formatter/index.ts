/**
 * IR dumper: renders an executable as text, one line per block label and
 * one line per instruction
 */

import { Block } from "#ir/spec";
import type * as Ir from "#ir/spec";

import { BufferSink, type Sink } from "../sink.js";
import { type Context, createContext, lookupInstruction } from "./context.js";
import { formatInstruction } from "./instruction.js";

export { formatInstruction, formatPrefix, formatBody } from "./instruction.js";
export {
  isInlined,
  formatOperand,
  formatReference,
  formatBlockReference,
} from "./operand.js";
export { formatValue, formatInteger, formatFloat } from "./value.js";
export type { Context } from "./context.js";
export { createContext } from "./context.js";

export class Formatter {
  private readonly indent: number;

  constructor(options: Formatter.Options = {}) {
    const indent = options.indent ?? 0;
    if (!Number.isInteger(indent) || indent < 0) {
      throw new RangeError(`Indent must be a non-negative integer: ${indent}`);
    }
    this.indent = indent;
  }

  /**
   * Write the dump of `executable` to `sink`, block by block in
   * declaration order. Lines are written as they are produced, so a dump
   * that fails leaves everything before the failure in the sink.
   */
  dump(executable: Ir.Executable, sink: Sink): void {
    const context = createContext(executable, this.indent);

    for (const block of executable.blocks.values()) {
      sink.write(`${Block.label(block)}:\n`);
      for (const id of block.instructions) {
        const line = this.formatLine(context, id);
        sink.write(`${line}\n`);
      }
    }
  }

  format(executable: Ir.Executable): string {
    const sink = new BufferSink();
    this.dump(executable, sink);
    return sink.toString();
  }

  private formatLine(context: Context, id: Ir.Instruction.Id): string {
    return formatInstruction(context, lookupInstruction(context, id));
  }
}

export namespace Formatter {
  export interface Options {
    /** Spaces before every instruction line; never increases with nesting */
    indent?: number;
  }
}
