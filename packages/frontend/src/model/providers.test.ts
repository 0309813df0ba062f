/**
 * Tests for provider interning
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ProviderTable,
  internBindings,
  providerIdForLabel,
} from "./providers.js";

const core20 = {
  label: "Desktop OpenGL 2.0",
  condition: "epoxy_is_desktop_gl() && epoxy_conservative_gl_version() >= 20",
  loader: "epoxy_get_core_proc_address({0}, 20)",
};

describe("Provider interning", () => {
  describe("providerIdForLabel", () => {
    it("should turn spaces and dots into underscores", () => {
      expect(providerIdForLabel("Desktop OpenGL 2.0")).to.equal(
        "PROVIDER_Desktop_OpenGL_2_0"
      );
      expect(providerIdForLabel("GL_ARB_foo")).to.equal("PROVIDER_GL_ARB_foo");
    });

    it("should drop characters that cannot appear in an identifier", () => {
      expect(providerIdForLabel('GL \\"x\\"-y')).to.equal("PROVIDER_GL_xy");
    });
  });

  describe("ProviderTable", () => {
    it("should return the same provider for identical descriptions", () => {
      const table = new ProviderTable("gl.xml");
      const first = table.intern(core20);
      const second = table.intern({ ...core20 });
      expect(first.ok && second.ok).to.equal(true);
      if (!first.ok || !second.ok) return;
      expect(second.value).to.equal(first.value);
      expect(table.size).to.equal(1);
      expect(first.value.id).to.equal("PROVIDER_Desktop_OpenGL_2_0");
    });

    it("should reject a label re-registered with another condition", () => {
      const table = new ProviderTable("gl.xml");
      table.intern(core20);
      const result = table.intern({ ...core20, condition: "true" });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("DGN5001");
      expect(result.error[0]?.message).to.equal(
        `Provider 'Desktop OpenGL 2.0' is described with conflicting semantics: condition '${core20.condition}' vs 'true'`
      );
    });

    it("should reject a label re-registered with another loader", () => {
      const table = new ProviderTable();
      table.intern(core20);
      const result = table.intern({ ...core20, loader: "dlsym({0})" });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("DGN5001");
      expect(result.error[0]?.location).to.deep.equal({
        file: "<registry>",
        element: "provider Desktop OpenGL 2.0",
      });
    });

    it("should reject two labels that share an identifier", () => {
      const table = new ProviderTable();
      table.intern({ label: "GL 2.0", condition: "a", loader: "b" });
      const result = table.intern({
        label: "GL 2_0",
        condition: "a",
        loader: "b",
      });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("DGN5002");
    });

    it("should list providers sorted by label", () => {
      const table = new ProviderTable();
      table.intern({ label: "always present", condition: "true", loader: "x" });
      table.intern({ label: "GL_ARB_foo", condition: "c", loader: "l" });
      table.intern(core20);
      expect(table.providers().map((p) => p.label)).to.deep.equal([
        "Desktop OpenGL 2.0",
        "GL_ARB_foo",
        "always present",
      ]);
    });
  });

  it("should stop interning bindings at the first conflict", () => {
    const table = new ProviderTable();
    const result = internBindings(table, [
      { functionIndex: 0, entryPoint: "glFoo", spec: core20 },
      {
        functionIndex: 1,
        entryPoint: "glBar",
        spec: { ...core20, loader: "other({0})" },
      },
      {
        functionIndex: 2,
        entryPoint: "glBaz",
        spec: { label: "GL_EXT_baz", condition: "c", loader: "l" },
      },
    ]);
    expect(result.ok).to.equal(false);
    expect(table.get("GL_EXT_baz")).to.equal(undefined);
  });
});
