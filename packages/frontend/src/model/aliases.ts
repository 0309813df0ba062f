/**
 * Alias resolution - collapses alias chains onto one root per equivalence
 * class.
 *
 * Runs once over the whole arena after every command is known, since the
 * registry may declare an alias before its target.
 */

import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { ApiFunction } from "./types.js";

export type AliasInput = {
  readonly functions: readonly ApiFunction[];
  /** Commands the registry declares but the target dropped */
  readonly dropped: readonly string[];
  /** Registry file name, for diagnostics */
  readonly file: string;
};

/**
 * Resolve every function's alias root.
 *
 * Afterwards `rootIndex` points at a function whose `rootIndex` is itself,
 * `aliasName` is the root's name and each root lists its dependents in
 * `aliasIndices` (arena order).
 */
export const resolveAliases = (
  input: AliasInput
): Result<readonly ApiFunction[], readonly Diagnostic[]> => {
  const { functions, file } = input;
  const dropped = new Set(input.dropped);
  const indexByName = new Map(functions.map((fn) => [fn.name, fn.index]));
  const roots: (number | undefined)[] = functions.map((fn) =>
    fn.aliasName === fn.name ? fn.index : undefined
  );
  const diagnostics: Diagnostic[] = [];
  // Nodes already reported as part of a broken chain
  const failed = new Set<number>();

  const findRoot = (start: number): number | undefined => {
    const path: number[] = [];
    const onPath = new Set<number>();
    let current = start;

    const fail = (): undefined => {
      for (const visited of path) failed.add(visited);
      return undefined;
    };

    while (roots[current] === undefined) {
      const fn = functions[current];
      if (fn === undefined || failed.has(current)) return fail();

      if (onPath.has(current)) {
        const cycle = [...path.slice(path.indexOf(current)), current]
          .map((index) => functions[index]?.name ?? String(index))
          .join(" -> ");
        diagnostics.push(
          createDiagnostic(
            "DGN4001",
            "error",
            `Alias chain does not terminate: ${cycle}`,
            { file, element: `command ${fn.name}` },
            "The registry is corrupt: an alias chain must end at a command that names itself"
          )
        );
        return fail();
      }
      onPath.add(current);
      path.push(current);

      const target = indexByName.get(fn.aliasName);
      if (target === undefined) {
        if (!dropped.has(fn.aliasName)) {
          diagnostics.push(
            createDiagnostic(
              "DGN3002",
              "error",
              `'${fn.name}' is an alias of '${fn.aliasName}', which is never declared as a command`,
              { file, element: `command ${fn.name}` }
            )
          );
          return fail();
        }
        // Target filtered out for this target: stand alone.
        roots[current] = current;
        break;
      }
      current = target;
    }

    const root = roots[current];
    for (const visited of path) {
      roots[visited] = root;
    }
    return root;
  };

  for (const fn of functions) {
    findRoot(fn.index);
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  const dependents = new Map<number, number[]>();
  functions.forEach((fn, index) => {
    const root = roots[index] ?? index;
    if (root === index) return;
    const list = dependents.get(root) ?? [];
    list.push(index);
    dependents.set(root, list);
  });

  return ok(
    functions.map((fn, index) => {
      const rootIndex = roots[index] ?? index;
      return {
        ...fn,
        aliasName: functions[rootIndex]?.name ?? fn.name,
        rootIndex,
        aliasIndices: dependents.get(index) ?? [],
      };
    })
  );
};

/**
 * Root of a resolved function
 */
export const aliasRoot = (
  functions: readonly ApiFunction[],
  fn: ApiFunction
): ApiFunction => functions[fn.rootIndex] ?? fn;
