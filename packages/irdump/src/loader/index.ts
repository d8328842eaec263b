/**
 * Executable descriptions in YAML
 *
 * A description lists a type table and the executable's blocks in
 * declaration order, each with its instructions. Problems are collected per
 * entry so that one bad instruction does not hide the next.
 */

import YAML from "yaml";

import { Result } from "#result";
import { type Block, Executable, Instruction, Value } from "#ir/spec";

import {
  Error as LoadError,
  ErrorCode as LoadErrorCode,
  ErrorMessages as LoadErrorMessages,
} from "./errors.js";
import { type Common, decoders, isKind } from "./instructions.js";
import { Node } from "./reader.js";
import { TypeTable } from "./types.js";
import { decodeValue } from "./values.js";

export namespace Loader {
  export type Error = LoadError;
  export const Error = LoadError;
  export type ErrorCode = LoadErrorCode;
  export const ErrorCode = LoadErrorCode;
  export const ErrorMessages = LoadErrorMessages;

  /**
   * Block name hint used when a block entry has none
   */
  export const defaultBlockName = "block";

  export function load(source: string): Result<Executable, Error> {
    const document = YAML.parseDocument(source, { intAsBigInt: true });
    if (document.errors.length > 0) {
      return Result.err(
        document.errors.map(
          (error) => new LoadError(LoadErrorCode.SYNTAX, error.message, ""),
        ),
      );
    }

    const contents: unknown = document.toJS();
    return new Session(new Node(contents)).run();
  }

  /**
   * State for one `load` call
   */
  class Session {
    private readonly errors: Error[] = [];
    private readonly executable = Executable.empty();
    private readonly explicitRefCounts = new Set<Instruction.Id>();
    private readonly valueNodes = new Map<Instruction.Id, Node>();

    constructor(private readonly root: Node) {}

    run(): Result<Executable, Error> {
      if (this.attempt(() => this.root.map()) === undefined) {
        return Result.err(this.errors);
      }

      const types =
        this.attempt(() => new TypeTable(this.root.optional("types"))) ??
        new TypeTable();
      for (const name of types.declared()) {
        this.attempt(() => types.resolve(name, this.root));
      }

      const blocks = this.attempt(() => this.root.field("blocks").list()) ?? [];
      for (const node of blocks) {
        this.attempt(() => this.loadBlock(node, types));
      }

      this.countUses();
      this.checkValueReferences();

      return this.errors.length > 0
        ? Result.err(this.errors)
        : Result.ok(this.executable);
    }

    private loadBlock(node: Node, types: TypeTable): void {
      const idNode = node.field("id");
      const id = idNode.index();
      if (this.executable.blocks.has(id)) {
        idNode.fail(LoadErrorCode.DUPLICATE_BLOCK, `${id}`);
      }

      const block: Block = {
        id,
        nameHint: node.optional("name")?.string() ?? defaultBlockName,
        instructions: [],
      };
      this.executable.blocks.set(id, block);

      for (const entry of node.optionalList("instructions")) {
        this.attempt(() => {
          const instruction = this.loadInstruction(entry, types);
          block.instructions.push(instruction.id);
        });
      }
    }

    private loadInstruction(node: Node, types: TypeTable): Instruction {
      const kindNode = node.field("kind");
      const kind = kindNode.string();
      if (!isKind(kind)) {
        return kindNode.fail(LoadErrorCode.UNKNOWN_KIND, `'${kind}'`);
      }

      const idNode = node.field("id");
      const id = idNode.index();
      if (this.executable.instructions.has(id)) {
        return idNode.fail(LoadErrorCode.DUPLICATE_INSTRUCTION, `#${id}`);
      }

      const typeNode = node.optional("type");
      const type =
        typeNode === undefined || typeNode.isNull()
          ? null
          : types.lookup(typeNode);

      const refCountNode = node.optional("refCount");
      const valueNode = node.optional("value");
      const common: Common = {
        id,
        type,
        refCount: refCountNode?.index() ?? 0,
        value: decodeValue(valueNode, type, types),
      };

      const instruction = decoders[kind](node, common, types);
      this.executable.instructions.set(id, instruction);
      if (refCountNode) {
        this.explicitRefCounts.add(id);
      }
      if (valueNode) {
        this.valueNodes.set(id, valueNode);
      }
      return instruction;
    }

    /**
     * Fill in use counts the description leaves out
     */
    private countUses(): void {
      const uses = new Map<Instruction.Id, number>();
      for (const instruction of this.executable.instructions.values()) {
        for (const operand of Instruction.operands(instruction)) {
          uses.set(operand, (uses.get(operand) ?? 0) + 1);
        }
      }

      for (const [id, instruction] of this.executable.instructions) {
        if (!this.explicitRefCounts.has(id)) {
          instruction.refCount = uses.get(id) ?? 0;
        }
      }
    }

    /**
     * Constants may name other instructions (a bound function's first
     * argument); each must exist once every block is loaded
     */
    private checkValueReferences(): void {
      for (const [id, node] of this.valueNodes) {
        const instruction = this.executable.instructions.get(id);
        if (!instruction) {
          continue;
        }
        for (const reference of Value.references(instruction.value)) {
          if (!this.executable.instructions.has(reference)) {
            this.attempt(() =>
              node.fail(LoadErrorCode.UNRESOLVED_OPERAND, `#${reference}`),
            );
          }
        }
      }
    }

    private attempt<T>(step: () => T): T | undefined {
      try {
        return step();
      } catch (error) {
        if (error instanceof LoadError) {
          this.errors.push(error);
          return undefined;
        }
        throw error;
      }
    }
  }
}
