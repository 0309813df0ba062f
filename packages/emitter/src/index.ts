/**
 * dispatchgen emitter - C header, dispatch source and Vala bindings
 */

export {
  type EmitterOptions,
  defaultOptions,
  resolveOptions,
} from "./c/options.js";
export {
  CodeWriter,
  copyrightCommentLines,
  generatedFileComment,
  paramDeclarations,
  forwardedArguments,
} from "./c/format.js";
export { emitHeader, enumDefines, renderTypedef } from "./c/header.js";
export {
  emitDispatchSource,
  labelTable,
  entryPointTable,
  MAX_LABEL_TABLE_SIZE,
  type StringTable,
} from "./c/dispatch-source.js";
export {
  emitVapi,
  valaBaseType,
  valaParams,
  valaGroupedParams,
  valaReturnType,
} from "./c/vapi.js";
export * from "./artifacts.js";
