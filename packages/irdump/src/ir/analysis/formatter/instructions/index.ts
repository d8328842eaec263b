export {
  formatReturn,
  formatConst,
  formatBinOp,
  formatUnOp,
  formatDeclVar,
  formatCast,
  formatCall,
} from "./values.js";
export {
  formatCondBr,
  formatBr,
  formatPhi,
  formatSwitchBr,
  formatSwitchVar,
  formatSwitchTarget,
  formatUnreachable,
} from "./control-flow.js";
export {
  formatContainerInitList,
  formatContainerInitFields,
  formatStructInit,
} from "./containers.js";
export {
  formatElemPtr,
  formatVarPtr,
  formatLoadPtr,
  formatStorePtr,
  formatFieldPtr,
  formatStructFieldPtr,
  formatEnumFieldPtr,
  formatTestNull,
  formatUnwrapMaybe,
} from "./pointers.js";
export { formatArrayType, formatSliceType } from "./types.js";
export {
  formatBuiltinCall,
  formatEnumTag,
  formatArrayLen,
  formatRef,
} from "./builtins.js";
export { formatAsm } from "./asm.js";
