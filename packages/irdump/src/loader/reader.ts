/**
 * Typed access to a parsed YAML document
 *
 * Every node remembers its path from the document root so that a failure
 * can point at the offending entry, e.g. `blocks[0].instructions[1].lhs`.
 */

import { Error, ErrorCode } from "./errors.js";

export class Node {
  constructor(
    public readonly value: unknown,
    public readonly path: string = "",
  ) {}

  /**
   * Required mapping entry
   */
  field(key: string): Node {
    const node = this.optional(key);
    if (!node) {
      return this.fail(ErrorCode.INVALID_NODE, `missing field '${key}'`);
    }
    return node;
  }

  /**
   * Mapping entry, or undefined when the key is absent
   */
  optional(key: string): Node | undefined {
    const map = this.map();
    if (!Object.hasOwn(map, key)) {
      return undefined;
    }
    return new Node(map[key], this.path ? `${this.path}.${key}` : key);
  }

  has(key: string): boolean {
    return isRecord(this.value) && Object.hasOwn(this.value, key);
  }

  isMap(): boolean {
    return isRecord(this.value);
  }

  isNull(): boolean {
    return this.value === null || this.value === undefined;
  }

  map(): Record<string, unknown> {
    if (!isRecord(this.value)) {
      return this.fail(ErrorCode.INVALID_NODE, `expected a mapping`);
    }
    return this.value;
  }

  entries(): [string, Node][] {
    return Object.keys(this.map()).map((key) => [key, this.field(key)]);
  }

  list(): Node[] {
    if (!Array.isArray(this.value)) {
      return this.fail(ErrorCode.INVALID_NODE, `expected a list`);
    }
    return this.value.map(
      (item: unknown, index) => new Node(item, `${this.path}[${index}]`),
    );
  }

  string(): string {
    if (typeof this.value !== "string") {
      return this.fail(ErrorCode.INVALID_NODE, `expected a string`);
    }
    return this.value;
  }

  boolean(): boolean {
    if (typeof this.value !== "boolean") {
      return this.fail(ErrorCode.INVALID_NODE, `expected a boolean`);
    }
    return this.value;
  }

  number(): number {
    if (typeof this.value === "number") {
      return this.value;
    }
    if (typeof this.value === "bigint") {
      return Number(this.value);
    }
    return this.fail(ErrorCode.INVALID_NODE, `expected a number`);
  }

  /**
   * Non-negative safe integer, as used for ids, lengths and positions
   */
  index(): number {
    const value = this.number();
    if (!Number.isSafeInteger(value) || value < 0) {
      return this.fail(
        ErrorCode.INVALID_NODE,
        `expected a non-negative integer, found ${value}`,
      );
    }
    return value;
  }

  /**
   * Arbitrary-precision integer from an integer scalar or a decimal string
   */
  bigint(): bigint {
    const { value } = this;
    if (typeof value === "bigint") {
      return value;
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
      return BigInt(value);
    }
    if (typeof value === "string" && /^-?\d+$/.test(value)) {
      return BigInt(value);
    }
    return this.fail(ErrorCode.INVALID_NODE, `expected an integer`);
  }

  /**
   * String restricted to `options`
   */
  oneOf<T extends string>(options: readonly T[], code: ErrorCode): T {
    const value = this.string();
    const match = options.find((option) => option === value);
    if (match === undefined) {
      return this.fail(code, `'${value}'`);
    }
    return match;
  }

  fail(code: ErrorCode, message: string): never {
    throw new Error(code, message, this.path);
  }

  // Optional scalars with defaults

  optionalBoolean(key: string, fallback: boolean): boolean {
    return this.optional(key)?.boolean() ?? fallback;
  }

  optionalList(key: string): Node[] {
    return this.optional(key)?.list() ?? [];
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
