/**
 * Dispatch model - public API
 */

export * from "./types.js";
export * from "./families.js";
export * from "./near-aliases.js";
export {
  buildFunctionModel,
  type BuildOptions,
  WRAPPED_FUNCTIONS,
  BLOCKED_FUNCTIONS,
  BOOTSTRAP_FUNCTIONS,
  TARGET_NAME_MARKERS,
  UNAVAILABLE_HEADER_TYPES,
} from "./builder.js";
export { resolveAliases, aliasRoot, type AliasInput } from "./aliases.js";
export {
  ProviderTable,
  providerIdForLabel,
  internBindings,
} from "./providers.js";
export {
  planResolution,
  gatherCandidates,
  compareCandidates,
  toPlan,
  planCandidates,
} from "./planner.js";
export {
  dispatchSymbolName,
  pointerTypeName,
  UNWRAPPED_SUFFIX,
} from "./symbols.js";
