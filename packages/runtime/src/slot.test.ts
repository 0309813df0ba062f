/**
 * Tests for dispatch slots
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { DispatchSlot, UNRESOLVED, resolveSlotState } from "./slot.js";

describe("DispatchSlot", () => {
  it("should start unresolved and resolve on first use", () => {
    let calls = 0;
    const slot = new DispatchSlot("glClear", () => {
      calls++;
      return 0x1000;
    });
    expect(slot.state).to.deep.equal({ state: "unresolved" });
    expect(slot.address()).to.equal(0x1000);
    expect(slot.address()).to.equal(0x1000);
    expect(calls).to.equal(1);
    expect(slot.state).to.deep.equal({ state: "resolved", address: 0x1000 });
  });

  it("should forward arguments through invoke", () => {
    const slot = new DispatchSlot(
      "glAdd",
      () => (a: number, b: number) => a + b
    );
    expect(slot.invoke(2, 3)).to.equal(5);
  });

  it("should stay unresolved when the resolver throws", () => {
    const slot = new DispatchSlot<number>("glFail", () => {
      throw new Error("no provider");
    });
    expect(() => slot.address()).to.throw("no provider");
    expect(slot.state).to.equal(UNRESOLVED);
  });

  it("should never re-run the resolver of a resolved state", () => {
    const resolved = resolveSlotState(UNRESOLVED, () => "first");
    const again = resolveSlotState(resolved, () => "second");
    expect(again).to.equal(resolved);
    expect(again.address).to.equal("first");
  });
});
