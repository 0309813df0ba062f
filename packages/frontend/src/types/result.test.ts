/**
 * Tests for Result helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { collect, error, flatMap, map, ok } from "./result.js";

describe("Result", () => {
  it("should map over a success value", () => {
    const result = map(ok<number, string>(2), (value) => value * 3);
    expect(result).to.deep.equal({ ok: true, value: 6 });
  });

  it("should pass errors through map and flatMap untouched", () => {
    const failed = error<number, string>("boom");
    expect(map(failed, (value) => value + 1)).to.deep.equal({
      ok: false,
      error: "boom",
    });
    expect(flatMap(failed, (value) => ok(value + 1))).to.deep.equal({
      ok: false,
      error: "boom",
    });
  });

  it("should chain with flatMap", () => {
    const result = flatMap(ok<number, string>(4), (value) =>
      value > 3 ? error<number, string>("too big") : ok(value)
    );
    expect(result).to.deep.equal({ ok: false, error: "too big" });
  });

  describe("collect", () => {
    it("should gather values in order when all succeed", () => {
      const result = collect([
        ok<number, string[]>(1),
        ok<number, string[]>(2),
      ]);
      expect(result).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should concatenate every error list", () => {
      const result = collect<number, string>([
        error(["a"]),
        ok(1),
        error(["b", "c"]),
      ]);
      expect(result).to.deep.equal({ ok: false, error: ["a", "b", "c"] });
    });
  });
});
