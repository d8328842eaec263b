import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatOperand } from "../operand.js";

/**
 * `asm[ volatile] ("<template>") : <outputs> : <inputs> : <clobbers>)`
 *
 * The closing parenthesis after the clobbers has no opening partner.
 */
export function formatAsm(context: Context, inst: Ir.Instruction.Asm): string {
  const volatileKeyword = inst.isVolatile ? " volatile" : "";

  const outputs = inst.outputs.map(({ symbolicName, constraint, target }) => {
    const destination =
      target.kind === "return"
        ? `-> ${formatOperand(context, target.type)}`
        : target.name;
    return `[${symbolicName}] "${constraint}" (${destination})`;
  });

  const inputs = inst.inputs.map(
    ({ symbolicName, constraint, operand }) =>
      `[${symbolicName}] "${constraint}" (${formatOperand(context, operand)})`,
  );

  const clobbers = inst.clobbers.map((register) => `"${register}"`);

  return `asm${volatileKeyword} ("${inst.template}") : ${outputs.join(", ")} : ${inputs.join(", ")} : ${clobbers.join(", ")})`;
}
