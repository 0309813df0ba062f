/**
 * Ordered-candidate resolution procedure
 *
 * Mirrors the provider resolver emitted into the dispatch source: conditions
 * are evaluated in plan order, the first available provider's loader wins,
 * and running out of candidates is fatal unless a failure hook takes over.
 */

import type { Provider, ResolutionCandidate } from "@dispatchgen/frontend";

/**
 * Platform collaborators: condition checks and symbol lookup. Both must be
 * idempotent for a given process state.
 */
export type ProviderHost<TAddress> = {
  readonly isAvailable: (provider: Provider) => boolean;
  readonly load: (provider: Provider, entryPoint: string) => TAddress;
};

/**
 * Replaces the fatal path when no candidate is available. May return a
 * substitute address or throw a recoverable error.
 */
export type ResolutionFailureHook<TAddress> = (
  functionName: string
) => TAddress;

/**
 * Where the default failure path reports and how it stops the process
 */
export type FailureReporter = {
  readonly write: (line: string) => void;
  readonly terminate: () => never;
};

export const processFailureReporter: FailureReporter = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  },
  terminate: () => process.abort(),
};

export type ResolverEnvironment<TAddress> = {
  readonly host: ProviderHost<TAddress>;
  readonly failureHook?: ResolutionFailureHook<TAddress>;
  readonly reporter?: FailureReporter;
};

/**
 * Diagnostic lines printed when `functionName` has no available provider
 */
export const describeResolutionFailure = (
  functionName: string,
  candidates: readonly ResolutionCandidate[]
): readonly string[] => {
  const lines = [`No provider of ${functionName} found.  Requires one of:`];
  for (const candidate of candidates) {
    lines.push(`    ${candidate.provider.label}`);
  }
  if (candidates.length === 0) {
    lines.push(
      "    No known providers.  This is likely a bug in dispatch code generation"
    );
  }
  return lines;
};

/**
 * Exhausted candidates: hand over to the failure hook, or report every
 * candidate label and terminate.
 */
export const failResolution = <TAddress>(
  functionName: string,
  candidates: readonly ResolutionCandidate[],
  environment: ResolverEnvironment<TAddress>
): TAddress => {
  if (environment.failureHook) {
    return environment.failureHook(functionName);
  }

  const reporter = environment.reporter ?? processFailureReporter;
  for (const line of describeResolutionFailure(functionName, candidates)) {
    reporter.write(line);
  }
  return reporter.terminate();
};

/**
 * Resolve `functionName` by trying `candidates` in order.
 *
 * Never evaluates a candidate after the first available one.
 */
export const resolveCandidates = <TAddress>(
  functionName: string,
  candidates: readonly ResolutionCandidate[],
  environment: ResolverEnvironment<TAddress>
): TAddress => {
  const { host } = environment;
  for (const candidate of candidates) {
    if (host.isAvailable(candidate.provider)) {
      return host.load(candidate.provider, candidate.entryPoint);
    }
  }
  return failResolution(functionName, candidates, environment);
};

/**
 * Single-candidate shortcut: one condition, then the loader. Fails exactly
 * like the ordered form with a one-element list.
 */
export const resolveSingle = <TAddress>(
  functionName: string,
  candidate: ResolutionCandidate,
  environment: ResolverEnvironment<TAddress>
): TAddress =>
  environment.host.isAvailable(candidate.provider)
    ? environment.host.load(candidate.provider, candidate.entryPoint)
    : failResolution(functionName, [candidate], environment);
