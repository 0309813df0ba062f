/**
 * Generation pipeline: registry -> function model -> alias roots ->
 * interned providers -> resolution plans.
 */

import type { Result } from "./types/result.js";
import { flatMap, map } from "./types/result.js";
import type { Diagnostic } from "./types/diagnostic.js";
import type { Registry } from "./registry/types.js";
import { loadRegistryFile, targetNameOf } from "./registry/loader.js";
import type { DispatchModel } from "./model/types.js";
import { buildFunctionModel, type BuildOptions } from "./model/builder.js";
import { resolveAliases } from "./model/aliases.js";
import { ProviderTable, internBindings } from "./model/providers.js";
import { planResolution } from "./model/planner.js";
import type { NearAliasPair } from "./model/near-aliases.js";

export type GenerateOptions = BuildOptions & {
  readonly nearAliasPairs?: readonly NearAliasPair[];
};

/**
 * Build the finished dispatch model for one registry.
 *
 * The returned model is never mutated afterwards; emitters only read it.
 */
export const generateDispatchModel = (
  registry: Registry,
  target: string,
  options: GenerateOptions = {}
): Result<DispatchModel, readonly Diagnostic[]> =>
  flatMap(buildFunctionModel(registry, target, options), (model) =>
    flatMap(
      resolveAliases({
        functions: model.functions,
        dropped: model.dropped,
        file: registry.fileName,
      }),
      (functions) => {
        const table = new ProviderTable(registry.fileName);
        return map(
          internBindings(table, model.bindings),
          (bindings): DispatchModel => ({
            ...model,
            functions,
            bindings,
            providers: table.providers(),
            plans: planResolution(functions, bindings, options.nearAliasPairs),
          })
        );
      }
    )
  );

/**
 * Load a registry file and build its model; the target is the file's base
 * name.
 */
export const generateFromFile = (
  filePath: string,
  options: GenerateOptions = {}
): Result<DispatchModel, readonly Diagnostic[]> =>
  flatMap(loadRegistryFile(filePath), (registry) =>
    generateDispatchModel(registry, targetNameOf(filePath), options)
  );
