/**
 * Resolution planner - decides, per function, which providers are tried at
 * first call and in which order.
 */

import type {
  ApiFunction,
  FunctionProviderBinding,
  ResolutionCandidate,
  ResolutionPlan,
} from "./types.js";
import { type NearAliasPair, nearAliasIndex } from "./near-aliases.js";

const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Candidate order for a function named `name`:
 * 1. entry point equal to the function's own name first
 * 2. provider label
 * 3. provider identifier
 * 4. entry point, so the order is total
 */
export const compareCandidates =
  (name: string) =>
  (a: ResolutionCandidate, b: ResolutionCandidate): number => {
    const aOwn = a.entryPoint === name ? 0 : 1;
    const bOwn = b.entryPoint === name ? 0 : 1;
    return (
      aOwn - bOwn ||
      compareStrings(a.provider.label, b.provider.label) ||
      compareStrings(a.provider.id, b.provider.id) ||
      compareStrings(a.entryPoint, b.entryPoint)
    );
  };

const groupByFunction = (
  bindings: readonly FunctionProviderBinding[]
): ReadonlyMap<number, readonly FunctionProviderBinding[]> => {
  const grouped = new Map<number, FunctionProviderBinding[]>();
  for (const binding of bindings) {
    const list = grouped.get(binding.functionIndex) ?? [];
    list.push(binding);
    grouped.set(binding.functionIndex, list);
  }
  return grouped;
};

/**
 * Gather and order the candidates of one function: bindings of its alias
 * root, of every alias of that root, and of its near-alias partner.
 */
export const gatherCandidates = (
  functions: readonly ApiFunction[],
  fn: ApiFunction,
  bindingsByFunction: ReadonlyMap<number, readonly FunctionProviderBinding[]>,
  nearAliases: ReadonlyMap<string, string>,
  indexByName: ReadonlyMap<string, number>
): readonly ResolutionCandidate[] => {
  const root = functions[fn.rootIndex] ?? fn;
  const sources = [root.index, ...root.aliasIndices];

  const partner = nearAliases.get(fn.name);
  const partnerIndex =
    partner !== undefined ? indexByName.get(partner) : undefined;
  if (partnerIndex !== undefined) {
    sources.push(partnerIndex);
  }

  const seen = new Set<string>();
  const candidates: ResolutionCandidate[] = [];
  for (const index of sources) {
    for (const binding of bindingsByFunction.get(index) ?? []) {
      const key = `${binding.entryPoint}\u0000${binding.provider.id}`;
      if (seen.has(key)) continue;
      seen.add(key);
      candidates.push({
        entryPoint: binding.entryPoint,
        provider: binding.provider,
      });
    }
  }

  return candidates.sort(compareCandidates(fn.name));
};

/**
 * Plan for one function. The single-candidate form is chosen exactly when
 * the only candidate loads the function under its own name.
 */
export const toPlan = (
  fn: ApiFunction,
  candidates: readonly ResolutionCandidate[]
): ResolutionPlan => {
  const only = candidates[0];
  if (candidates.length === 1 && only && only.entryPoint === fn.name) {
    return { kind: "single", functionIndex: fn.index, candidate: only };
  }
  return { kind: "ordered", functionIndex: fn.index, candidates };
};

/**
 * Plan every function of a resolved arena, indexed like `functions`.
 */
export const planResolution = (
  functions: readonly ApiFunction[],
  bindings: readonly FunctionProviderBinding[],
  nearAliasPairs?: readonly NearAliasPair[]
): readonly ResolutionPlan[] => {
  const bindingsByFunction = groupByFunction(bindings);
  const nearAliases = nearAliasIndex(nearAliasPairs);
  const indexByName = new Map(functions.map((fn) => [fn.name, fn.index]));

  return functions.map((fn) =>
    toPlan(
      fn,
      gatherCandidates(
        functions,
        fn,
        bindingsByFunction,
        nearAliases,
        indexByName
      )
    )
  );
};

/**
 * Candidates of a plan in resolution order
 */
export const planCandidates = (
  plan: ResolutionPlan
): readonly ResolutionCandidate[] =>
  plan.kind === "single" ? [plan.candidate] : plan.candidates;
