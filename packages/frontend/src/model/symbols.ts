/**
 * C symbol names derived from function names
 */

import type { ApiFunction } from "./types.js";

export const UNWRAPPED_SUFFIX = "_unwrapped";

/**
 * Name of the dispatch slot for `fn`. Wrapped entry points get an internal
 * name so hand-written code can own the public symbol.
 */
export const dispatchSymbolName = (fn: ApiFunction): string =>
  fn.wrapped ? `${fn.name}${UNWRAPPED_SUFFIX}` : fn.name;

/**
 * Function-pointer typedef name: glDrawArrays -> PFNGLDRAWARRAYSPROC
 */
export const pointerTypeName = (fn: ApiFunction): string =>
  `PFN${fn.name.toUpperCase()}PROC`;
