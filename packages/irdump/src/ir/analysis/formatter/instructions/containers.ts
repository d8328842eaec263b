import type * as Ir from "#ir/spec";

import type { Context } from "../context.js";
import { formatOperand } from "../operand.js";

export function formatContainerInitList(
  context: Context,
  inst: Ir.Instruction.ContainerInitList,
): string {
  const items = inst.items.map((item) => formatOperand(context, item));
  return `${formatOperand(context, inst.containerType)}{${items.join(", ")}}`;
}

export function formatContainerInitFields(
  context: Context,
  inst: Ir.Instruction.ContainerInitFields,
): string {
  const fields = inst.fields.map(
    ({ name, value }) => `.${name} = ${formatOperand(context, value)}`,
  );
  return `${formatOperand(context, inst.containerType)}{${fields.join(", ")}} // container init`;
}

export function formatStructInit(
  context: Context,
  inst: Ir.Instruction.StructInit,
): string {
  const fields = inst.fields.map(
    ({ field, value }) => `.${field.name} = ${formatOperand(context, value)}`,
  );
  return `${inst.structType.name} {${fields.join(", ")}} // struct init`;
}
