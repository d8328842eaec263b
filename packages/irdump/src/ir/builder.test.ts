import { describe, it, expect } from "vitest";

import { Builder } from "./builder.js";
import { Type, Value } from "./spec/index.js";

const i32 = Type.int(32, true);

describe("Builder", () => {
  it("should hand out block and instruction ids from separate counters", () => {
    const builder = new Builder();
    const entry = builder.block("entry");
    const first = builder.add(entry, { kind: "unreachable" });
    const exit = builder.block("exit");
    const second = builder.add(exit, { kind: "unreachable" });

    expect([entry, exit]).toEqual([0, 1]);
    expect([first, second]).toEqual([0, 1]);
  });

  it("should keep instructions in their block in append order", () => {
    const builder = new Builder();
    const entry = builder.block("entry");
    const exit = builder.block("exit");
    builder.add(exit, { kind: "unreachable" });
    builder.add(entry, { kind: "unreachable" });
    builder.add(exit, { kind: "unreachable" });

    const executable = builder.build();
    expect(executable.blocks.get(entry)?.instructions).toEqual([1]);
    expect(executable.blocks.get(exit)?.instructions).toEqual([0, 2]);
  });

  it("should default the type, value and use count", () => {
    const builder = new Builder();
    const entry = builder.block("entry");
    const id = builder.add(entry, { kind: "const" });

    expect(builder.build().instructions.get(id)).toEqual({
      kind: "const",
      id: 0,
      type: null,
      refCount: 0,
      value: Value.runtime(),
    });
  });

  it("should count one use per operand slot", () => {
    const builder = new Builder();
    const entry = builder.block("entry");
    const x = builder.add(entry, { kind: "const", type: i32, value: Value.int(2n) });
    builder.add(entry, { kind: "bin_op", op: "mult", lhs: x, rhs: x });

    expect(builder.build().instructions.get(x)?.refCount).toBe(2);
  });

  it("should count uses recorded before the used instruction exists", () => {
    const builder = new Builder();
    const loop = builder.block("loop");
    const next = builder.peekId() + 1;
    const phi = builder.add(loop, {
      kind: "phi",
      type: i32,
      incoming: [{ block: loop, value: next }],
    });
    const step = builder.add(loop, {
      kind: "bin_op",
      type: i32,
      op: "add",
      lhs: phi,
      rhs: phi,
    });

    const executable = builder.build();
    expect(step).toBe(next);
    expect(executable.instructions.get(step)?.refCount).toBe(1);
    expect(executable.instructions.get(phi)?.refCount).toBe(2);
  });

  it("should add to an explicit initial use count", () => {
    const builder = new Builder();
    const entry = builder.block("entry");
    const x = builder.add(entry, { kind: "const", type: i32, refCount: 3 });
    builder.add(entry, { kind: "return", operand: x });

    expect(builder.build().instructions.get(x)?.refCount).toBe(4);
  });

  it("should reject unknown blocks", () => {
    expect(() => new Builder().add(7, { kind: "unreachable" })).toThrow(
      RangeError,
    );
  });
});
