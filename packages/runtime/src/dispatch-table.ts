/**
 * Per-thread dispatch tables
 *
 * Threads bound to different contexts resolve independently. Each thread
 * owns a table created as a flat copy of the all-unresolved template, so no
 * cross-thread synchronization is involved.
 */

import { threadId as currentThreadId } from "node:worker_threads";
import { type SlotState, UNRESOLVED, resolveSlotState } from "./slot.js";

export type DispatchTemplate<TAddress> = {
  /** Slot symbol names, by function index */
  readonly symbols: readonly string[];
  /** Resolvers, by function index */
  readonly resolvers: readonly (() => TAddress)[];
};

export class DispatchTable<TAddress> {
  private readonly slots: SlotState<TAddress>[];
  private readonly indexBySymbol: ReadonlyMap<string, number>;

  constructor(private readonly template: DispatchTemplate<TAddress>) {
    this.slots = template.symbols.map(() => UNRESOLVED);
    this.indexBySymbol = new Map(
      template.symbols.map((symbol, index) => [symbol, index])
    );
  }

  get size(): number {
    return this.slots.length;
  }

  indexOf(symbol: string): number | undefined {
    return this.indexBySymbol.get(symbol);
  }

  state(index: number): SlotState<TAddress> | undefined {
    return this.slots[index];
  }

  /**
   * Resolved address of slot `index`, resolving on this thread's first use.
   */
  address(index: number): TAddress {
    const current = this.slots[index];
    const resolver = this.template.resolvers[index];
    if (current === undefined || resolver === undefined) {
      throw new RangeError(`No dispatch slot at index ${index}`);
    }
    const next = resolveSlotState(current, resolver);
    this.slots[index] = next;
    return next.address;
  }

  /**
   * Reset every slot to the template state, e.g. after the thread's context
   * changes.
   */
  reset(): void {
    this.slots.fill(UNRESOLVED);
  }
}

/**
 * Thread identity -> that thread's dispatch table
 */
export class DispatchContextRegistry<TAddress> {
  private readonly tables = new Map<number, DispatchTable<TAddress>>();

  constructor(private readonly template: DispatchTemplate<TAddress>) {}

  /**
   * Table owned by `thread`, created from the template on first lookup.
   */
  tableFor(thread: number = currentThreadId): DispatchTable<TAddress> {
    const existing = this.tables.get(thread);
    if (existing) return existing;
    const table = new DispatchTable(this.template);
    this.tables.set(thread, table);
    return table;
  }

  release(thread: number = currentThreadId): boolean {
    return this.tables.delete(thread);
  }

  get threadCount(): number {
    return this.tables.size;
  }
}
