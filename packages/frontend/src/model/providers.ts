/**
 * Provider interning
 *
 * Many functions share one availability condition and loader (every
 * Desktop OpenGL 2.0 entry point, say), so providers are deduplicated by
 * label into a table the dispatch source references by identifier.
 */

import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { fault } from "../types/diagnostic.js";
import type {
  FunctionProviderBinding,
  Provider,
  ProviderBindingSpec,
  ProviderSpec,
} from "./types.js";

/**
 * Derive the C identifier for a provider label:
 * `Desktop OpenGL 2.0` -> `PROVIDER_Desktop_OpenGL_2_0`.
 */
export const providerIdForLabel = (label: string): string =>
  "PROVIDER_" +
  label
    .replaceAll('\\"', "")
    .replace(/[ .]/g, "_")
    .replace(/[^A-Za-z0-9_]/g, "");

const compareLabels = (a: Provider, b: Provider): number =>
  a.label < b.label ? -1 : a.label > b.label ? 1 : 0;

/**
 * Label -> provider table. First sighting of a label defines the provider;
 * later sightings must describe it identically.
 */
export class ProviderTable {
  private readonly byLabel = new Map<string, Provider>();
  private readonly labelById = new Map<string, string>();

  constructor(private readonly file: string = "<registry>") {}

  intern(spec: ProviderSpec): Result<Provider, readonly Diagnostic[]> {
    const existing = this.byLabel.get(spec.label);
    if (existing) {
      if (
        existing.condition !== spec.condition ||
        existing.loader !== spec.loader
      ) {
        const differs =
          existing.condition !== spec.condition
            ? `condition '${existing.condition}' vs '${spec.condition}'`
            : `loader '${existing.loader}' vs '${spec.loader}'`;
        return error(
          fault(
            "DGN5001",
            `Provider '${spec.label}' is described with conflicting semantics: ${differs}`,
            { file: this.file, element: `provider ${spec.label}` },
            "Two parts of the registry name the same capability; they must agree on how it is detected and loaded"
          )
        );
      }
      return ok(existing);
    }

    const id = providerIdForLabel(spec.label);
    const clash = this.labelById.get(id);
    if (clash !== undefined) {
      return error(
        fault(
          "DGN5002",
          `Provider labels '${clash}' and '${spec.label}' both map to identifier ${id}`,
          { file: this.file, element: `provider ${spec.label}` }
        )
      );
    }

    const provider: Provider = {
      id,
      label: spec.label,
      condition: spec.condition,
      loader: spec.loader,
    };
    this.byLabel.set(spec.label, provider);
    this.labelById.set(id, spec.label);
    return ok(provider);
  }

  get(label: string): Provider | undefined {
    return this.byLabel.get(label);
  }

  get size(): number {
    return this.byLabel.size;
  }

  /**
   * Interned providers sorted by label
   */
  providers(): readonly Provider[] {
    return [...this.byLabel.values()].sort(compareLabels);
  }
}

/**
 * Intern every binding's provider into `table`.
 * Stops at the first conflict.
 */
export const internBindings = (
  table: ProviderTable,
  specs: readonly ProviderBindingSpec[]
): Result<readonly FunctionProviderBinding[], readonly Diagnostic[]> => {
  const bindings: FunctionProviderBinding[] = [];
  for (const spec of specs) {
    const provider = table.intern(spec.spec);
    if (!provider.ok) {
      return provider;
    }
    bindings.push({
      functionIndex: spec.functionIndex,
      entryPoint: spec.entryPoint,
      provider: provider.value,
    });
  }
  return ok(bindings);
};
