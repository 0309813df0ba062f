/**
 * Process-wide dispatch slot
 *
 * A slot starts unresolved; the first use runs its resolver and stores the
 * address, every later use returns the stored address. Resolution is a pure
 * function of process state, so a repeated or racing resolution stores the
 * same address again and no locking is needed.
 */

export type SlotState<TAddress> =
  | { readonly state: "unresolved" }
  | { readonly state: "resolved"; readonly address: TAddress };

export const UNRESOLVED: { readonly state: "unresolved" } = {
  state: "unresolved",
};

/**
 * Transition function: resolved slots are terminal.
 */
export const resolveSlotState = <TAddress>(
  current: SlotState<TAddress>,
  resolve: () => TAddress
): { readonly state: "resolved"; readonly address: TAddress } =>
  current.state === "resolved"
    ? current
    : { state: "resolved", address: resolve() };

export class DispatchSlot<TAddress> {
  private current: SlotState<TAddress> = UNRESOLVED;

  constructor(
    readonly symbol: string,
    private readonly resolver: () => TAddress
  ) {}

  get state(): SlotState<TAddress> {
    return this.current;
  }

  /**
   * Resolved address, resolving on first use
   */
  address(): TAddress {
    const next = resolveSlotState(this.current, this.resolver);
    this.current = next;
    return next.address;
  }

  /**
   * Call through the slot, forwarding the arguments to the resolved entry
   * point.
   */
  invoke<TArgs extends unknown[], TResult>(
    this: DispatchSlot<(...args: TArgs) => TResult>,
    ...args: TArgs
  ): TResult {
    return this.address()(...args);
  }
}
