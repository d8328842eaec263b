import type { Instruction } from "#ir/spec";

/**
 * Source-level token for each binary operator; wrapping arithmetic carries
 * a trailing `%`
 */
export const binaryOperators: {
  [O in Instruction.BinOp.Operator]: string;
} = {
  bool_or: "BoolOr",
  bool_and: "BoolAnd",
  cmp_eq: "==",
  cmp_not_eq: "!=",
  cmp_less_than: "<",
  cmp_greater_than: ">",
  cmp_less_or_eq: "<=",
  cmp_greater_or_eq: ">=",
  bin_or: "|",
  bin_xor: "^",
  bin_and: "&",
  bit_shift_left: "<<",
  bit_shift_left_wrap: "<<%",
  bit_shift_right: ">>",
  add: "+",
  add_wrap: "+%",
  sub: "-",
  sub_wrap: "-%",
  mult: "*",
  mult_wrap: "*%",
  div: "/",
  mod: "%",
  array_cat: "++",
  array_mult: "**",
};

export const unaryOperators: {
  [O in Instruction.UnOp.Operator]: string;
} = {
  bool_not: "!",
  bin_not: "~",
  negation: "-",
  negation_wrap: "-%",
  address_of: "&",
  const_address_of: "&const",
  dereference: "*",
  maybe: "?",
  error: "%",
  unwrap_error: "%%",
  unwrap_maybe: "??",
  maybe_return: "?return",
  error_return: "%return",
};
