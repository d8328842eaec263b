import { describe, it, expect } from "vitest";

import { Executable, Type, Value } from "#ir/spec";

import { Error as AnalysisError, ErrorCode } from "../errors.js";
import { createContext } from "./context.js";
import { formatFloat, formatInteger, formatValue } from "./value.js";

const u8 = Type.int(8, false);
const i32 = Type.int(32, true);

const context = createContext(Executable.empty(), 0);

function errorCode(render: () => string): string | undefined {
  try {
    render();
  } catch (error) {
    if (error instanceof AnalysisError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe("formatValue", () => {
  describe("evaluation states", () => {
    it("should render undef as undefined at any type", () => {
      expect(formatValue(context, i32, Value.undef())).toBe("undefined");
      expect(formatValue(context, Type.bool, Value.undef())).toBe("undefined");
    });

    it("should render zeroes as zeroes", () => {
      expect(formatValue(context, Type.array(u8, 3), Value.zeroes())).toBe(
        "zeroes",
      );
    });

    it("should refuse runtime values", () => {
      expect(errorCode(() => formatValue(context, i32, Value.runtime()))).toBe(
        ErrorCode.RUNTIME_VALUE_INLINED,
      );
    });
  });

  describe("integers", () => {
    it("should render decimal digits", () => {
      expect(formatValue(context, i32, Value.int(42n))).toBe("42");
      expect(formatValue(context, i32, Value.int(0n))).toBe("0");
    });

    it("should prefix negative values with a minus sign", () => {
      expect(formatValue(context, i32, Value.int(-7n))).toBe("-7");
    });

    it("should keep full precision for literals", () => {
      expect(
        formatValue(context, Type.intLiteral, Value.int(18446744073709551615n)),
      ).toBe("18446744073709551615");
    });
  });

  describe("floats", () => {
    it("should render six fractional digits", () => {
      expect(formatValue(context, Type.float(64), Value.float(1.5))).toBe(
        "1.500000",
      );
      expect(formatValue(context, Type.floatLiteral, Value.float(0.1))).toBe(
        "0.100000",
      );
    });

    it("should render non-finite values by name", () => {
      expect(formatFloat(Number.NaN)).toBe("nan");
      expect(formatFloat(Number.POSITIVE_INFINITY)).toBe("inf");
      expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("-inf");
    });

    it("should keep the sign of negative values and negative zero", () => {
      expect(formatFloat(-2.25)).toBe("-2.250000");
      expect(formatFloat(-0)).toBe("-0.000000");
    });

    it("should print large magnitudes in positional notation", () => {
      expect(formatValue(context, Type.float(64), Value.float(1e21))).toBe(
        "1000000000000000000000.000000",
      );
      expect(formatFloat(-1e22)).toBe("-10000000000000000000000.000000");
      expect(formatFloat(1e20)).toBe("100000000000000000000.000000");
    });
  });

  it("should format integers without a plus sign", () => {
    expect(formatInteger(5n)).toBe("5");
    expect(formatInteger(-5n)).toBe("-5");
  });

  describe("scalars and markers", () => {
    it("should render booleans", () => {
      expect(formatValue(context, Type.bool, Value.bool(true))).toBe("true");
      expect(formatValue(context, Type.bool, Value.bool(false))).toBe("false");
    });

    it("should render placeholder types", () => {
      const invalid: Type = { kind: "invalid", name: "(invalid)" };
      const variable: Type = { kind: "var", name: "(var)" };
      expect(formatValue(context, invalid, Value.void_())).toBe("(invalid)");
      expect(formatValue(context, variable, Value.void_())).toBe("(var)");
      expect(formatValue(context, Type.void_, Value.void_())).toBe("{}");
      expect(formatValue(context, Type.unreachable, Value.void_())).toBe(
        "@unreachable()",
      );
    });

    it("should render null and undefined literals", () => {
      expect(formatValue(context, Type.nullLiteral, Value.void_())).toBe(
        "null",
      );
      expect(formatValue(context, Type.undefinedLiteral, Value.void_())).toBe(
        "undefined",
      );
    });

    it("should render a type value by the referenced type's name", () => {
      expect(formatValue(context, Type.metaType, Value.type(u8))).toBe("u8");
      expect(
        formatValue(context, Type.metaType, Value.type(Type.pointer(u8, true))),
      ).toBe("&const u8");
    });

    it("should render functions by symbol name", () => {
      expect(formatValue(context, Type.fn("fn() void"), Value.fn("main"))).toBe(
        "main",
      );
    });

    it("should render scopes with one-based positions", () => {
      expect(formatValue(context, Type.block, Value.scope(2, 4))).toBe(
        "(scope:3:5)",
      );
    });

    it("should render namespaces by path", () => {
      expect(
        formatValue(context, Type.namespace_, Value.namespace_("std.io")),
      ).toBe("(namespace: std.io)");
    });
  });

  describe("nested values", () => {
    it("should render pointers through their pointee", () => {
      const type = Type.pointer(Type.bool);
      expect(formatValue(context, type, Value.pointer(Value.bool(true)))).toBe(
        "&true",
      );
      expect(formatValue(context, type, Value.pointer(Value.undef()))).toBe(
        "&undefined",
      );
    });

    it("should render arrays with their type name", () => {
      const type = Type.array(u8, 3);
      const elements = [Value.int(0n), Value.int(0n), Value.int(0n)];
      expect(formatValue(context, type, Value.array(elements))).toBe(
        "[3]u8{0,0,0}",
      );
    });

    it("should keep zeroes elements distinct from zero elements", () => {
      const type = Type.array(u8, 3);
      const elements = [Value.zeroes(), Value.zeroes(), Value.zeroes()];
      expect(formatValue(context, type, Value.array(elements))).toBe(
        "[3]u8{zeroes,zeroes,zeroes}",
      );
    });

    it("should render an empty array", () => {
      expect(formatValue(context, Type.array(u8, 0), Value.array([]))).toBe(
        "[0]u8{}",
      );
    });

    it("should reject arrays whose length differs from the type", () => {
      const type = Type.array(u8, 3);
      expect(
        errorCode(() =>
          formatValue(context, type, Value.array([Value.int(1n)])),
        ),
      ).toBe(ErrorCode.ARRAY_LENGTH_MISMATCH);
    });

    it("should render a present optional as its payload", () => {
      expect(
        formatValue(context, Type.maybe(i32), Value.maybe(Value.int(5n))),
      ).toBe("5");
    });

    it("should render an absent optional as null", () => {
      expect(formatValue(context, Type.maybe(i32), Value.maybe(null))).toBe(
        "null",
      );
    });

    it("should read declared types at their canonical type", () => {
      const byte = Type.decl("Byte", u8);
      expect(formatValue(context, byte, Value.int(255n))).toBe("255");
    });
  });

  describe("aggregates", () => {
    it("should render opaque placeholders", () => {
      const data = Value.aggregate();
      expect(
        formatValue(context, Type.struct("Point", ["x", "y"]), data),
      ).toBe("(struct Point constant)");
      expect(formatValue(context, Type.enum_("Color", ["Red"]), data)).toBe(
        "(enum Color constant)",
      );
      expect(formatValue(context, Type.union("Either"), data)).toBe(
        "(union Either constant)",
      );
      expect(formatValue(context, Type.errorUnion(u8), data)).toBe(
        "(error union %u8 constant)",
      );
      expect(
        formatValue(context, Type.pureError, Value.pureError()),
      ).toBe("(pure error constant)");
    });
  });

  describe("bound functions", () => {
    it("should reference a runtime receiver by id", () => {
      const executable = Executable.empty();
      executable.instructions.set(7, {
        kind: "var_ptr",
        id: 7,
        type: Type.pointer(i32),
        refCount: 0,
        value: Value.runtime(),
        variable: { name: "self", isConst: false, isInline: false },
      });

      expect(
        formatValue(
          createContext(executable, 0),
          Type.boundFn,
          Value.boundFn("foo", 7),
        ),
      ).toBe("bound foo to #7");
    });

    it("should inline a known receiver", () => {
      const executable = Executable.empty();
      executable.instructions.set(3, {
        kind: "const",
        id: 3,
        type: i32,
        refCount: 0,
        value: Value.int(9n),
      });

      expect(
        formatValue(
          createContext(executable, 0),
          Type.boundFn,
          Value.boundFn("bar", 3),
        ),
      ).toBe("bound bar to 9");
    });
  });

  describe("mismatches", () => {
    it("should reject data of the wrong kind", () => {
      expect(() =>
        formatValue(context, Type.bool, Value.int(1n)),
      ).toThrowError(
        "Constant does not match its type: expected bool data for bool, found int",
      );
      expect(
        errorCode(() => formatValue(context, Type.bool, Value.int(1n))),
      ).toBe(ErrorCode.VALUE_MISMATCH);
    });
  });
});
