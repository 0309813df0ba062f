/**
 * Dispatcher - binds a dispatch model to a provider host.
 *
 * Exposes one process-wide slot per function and a per-thread table
 * template built from the same resolvers.
 */

import {
  type ApiFunction,
  type DispatchModel,
  type ResolutionPlan,
  dispatchSymbolName,
} from "@dispatchgen/frontend";
import {
  type ResolverEnvironment,
  resolveCandidates,
  resolveSingle,
} from "./resolver.js";
import { DispatchSlot } from "./slot.js";
import {
  DispatchContextRegistry,
  type DispatchTemplate,
} from "./dispatch-table.js";

/**
 * Resolver procedure for one function's plan
 */
export const planResolver =
  <TAddress>(
    fn: ApiFunction,
    plan: ResolutionPlan,
    environment: ResolverEnvironment<TAddress>
  ) =>
  (): TAddress =>
    plan.kind === "single"
      ? resolveSingle(fn.name, plan.candidate, environment)
      : resolveCandidates(fn.name, plan.candidates, environment);

export class Dispatcher<TAddress> {
  private readonly slots = new Map<string, DispatchSlot<TAddress>>();
  readonly template: DispatchTemplate<TAddress>;

  constructor(
    readonly model: DispatchModel,
    environment: ResolverEnvironment<TAddress>
  ) {
    const resolvers = model.functions.map((fn) => {
      const plan = model.plans[fn.index];
      if (!plan) {
        throw new Error(`Dispatch model has no plan for ${fn.name}`);
      }
      return planResolver(fn, plan, environment);
    });

    model.functions.forEach((fn, index) => {
      const resolver = resolvers[index];
      if (resolver) {
        const symbol = dispatchSymbolName(fn);
        this.slots.set(symbol, new DispatchSlot(symbol, resolver));
      }
    });

    this.template = {
      symbols: model.functions.map(dispatchSymbolName),
      resolvers,
    };
  }

  /**
   * Process-wide slot by symbol name. Wrapped entry points are only
   * reachable under their `_unwrapped` name.
   */
  slot(symbol: string): DispatchSlot<TAddress> | undefined {
    return this.slots.get(symbol);
  }

  get symbols(): readonly string[] {
    return this.template.symbols;
  }

  /**
   * Fresh per-thread registry sharing this dispatcher's resolvers
   */
  createContextRegistry(): DispatchContextRegistry<TAddress> {
    return new DispatchContextRegistry(this.template);
  }
}
