/**
 * dispatchgen runtime - the lazy dispatch contract in executable form
 */

export {
  type ProviderHost,
  type ResolutionFailureHook,
  type FailureReporter,
  type ResolverEnvironment,
  processFailureReporter,
  describeResolutionFailure,
  failResolution,
  resolveCandidates,
  resolveSingle,
} from "./resolver.js";
export {
  type SlotState,
  UNRESOLVED,
  resolveSlotState,
  DispatchSlot,
} from "./slot.js";
export {
  type DispatchTemplate,
  DispatchTable,
  DispatchContextRegistry,
} from "./dispatch-table.js";
export { Dispatcher, planResolver } from "./dispatcher.js";
