/**
 * Tests for the dispatcher
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Provider } from "@dispatchgen/frontend";
import { SAMPLE_REGISTRY, buildModel } from "@dispatchgen/frontend/testing";
import { Dispatcher } from "./dispatcher.js";

const hostWith = (available: readonly string[]) => {
  const loads: string[] = [];
  return {
    loads,
    host: {
      isAvailable: (provider: Provider) => available.includes(provider.label),
      load: (provider: Provider, entryPoint: string) => {
        loads.push(entryPoint);
        return `${provider.id}:${entryPoint}`;
      },
    },
  };
};

describe("Dispatcher", () => {
  const model = buildModel(SAMPLE_REGISTRY);

  it("should expose one slot per function", () => {
    const { host } = hostWith([]);
    const dispatcher = new Dispatcher(model, { host });
    expect(dispatcher.symbols).to.deep.equal([
      "glFoo",
      "glFooARB",
      "glGetString",
    ]);
    expect(dispatcher.slot("glFoo")?.state).to.deep.equal({
      state: "unresolved",
    });
  });

  it("should resolve through the planned candidates on first use", () => {
    const { host, loads } = hostWith(["GL_ARB_foo"]);
    const dispatcher = new Dispatcher(model, { host });
    const slot = dispatcher.slot("glFoo");
    expect(slot?.address()).to.equal("PROVIDER_GL_ARB_foo:glFoo");
    expect(slot?.address()).to.equal("PROVIDER_GL_ARB_foo:glFoo");
    expect(loads).to.deep.equal(["glFoo"]);
  });

  it("should load an alias through its own entry point first", () => {
    const { host } = hostWith(["GL_ARB_foo"]);
    const dispatcher = new Dispatcher(model, { host });
    expect(dispatcher.slot("glFooARB")?.address()).to.equal(
      "PROVIDER_GL_ARB_foo:glFooARB"
    );
  });

  it("should resolve bootstrap functions through the single form", () => {
    const { host } = hostWith(["always present"]);
    const dispatcher = new Dispatcher(model, { host });
    expect(dispatcher.slot("glGetString")?.address()).to.equal(
      "PROVIDER_always_present:glGetString"
    );
  });

  it("should expose wrapped functions only under their unwrapped name", () => {
    const wrapped = buildModel({ commands: [{ name: "glBegin" }] });
    const dispatcher = new Dispatcher(wrapped, { host: hostWith([]).host });
    expect(dispatcher.slot("glBegin")).to.equal(undefined);
    expect(dispatcher.slot("glBegin_unwrapped")?.symbol).to.equal(
      "glBegin_unwrapped"
    );
  });

  it("should resolve per-thread tables independently of the global slots", () => {
    const { host, loads } = hostWith(["Desktop OpenGL 2.0"]);
    const dispatcher = new Dispatcher(model, { host });
    const contexts = dispatcher.createContextRegistry();
    const table = contexts.tableFor(7);
    const index = table.indexOf("glFoo");
    expect(index).to.equal(0);
    if (index === undefined) return;
    expect(table.address(index)).to.equal("PROVIDER_Desktop_OpenGL_2_0:glFoo");
    expect(dispatcher.slot("glFoo")?.state.state).to.equal("unresolved");
    expect(contexts.tableFor(8).state(index)).to.deep.equal({
      state: "unresolved",
    });
    expect(loads).to.deep.equal(["glFoo"]);
  });
});
