/**
 * Tests for the dispatch source emitter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { DispatchModel } from "@dispatchgen/frontend";
import {
  SAMPLE_REGISTRY,
  buildModel,
  extensionXml,
} from "@dispatchgen/frontend/testing";
import {
  MAX_LABEL_TABLE_SIZE,
  emitDispatchSource,
  entryPointTable,
  labelTable,
} from "./dispatch-source.js";

const sourceLines = (model: DispatchModel): readonly string[] => {
  const result = emitDispatchSource(model);
  if (!result.ok) throw new Error(result.error[0]?.message);
  return result.value.split("\n");
};

/** Lines from the first line equal to `first` through the next "}" */
const block = (lines: readonly string[], first: string): readonly string[] => {
  const start = lines.indexOf(first);
  expect(start, first).to.be.greaterThan(-1);
  const end = lines.indexOf("}", start);
  return lines.slice(start, end + 1);
};

describe("Dispatch source emitter", () => {
  const model = buildModel(SAMPLE_REGISTRY);
  const lines = sourceLines(model);

  it("should include the dispatch support and public headers", () => {
    expect(lines[0]).to.equal("/* GL dispatch code.");
    expect(lines).to.include('#include "dispatch_common.h"');
    expect(lines).to.include('#include "epoxy/gl.h"');
  });

  it("should list providers after the terminator", () => {
    const start = lines.indexOf("enum gl_provider {");
    expect(lines.slice(start, start + 7)).to.deep.equal([
      "enum gl_provider {",
      "    gl_provider_terminator = 0,",
      "    PROVIDER_Desktop_OpenGL_2_0,",
      "    PROVIDER_GL_ARB_foo,",
      "    PROVIDER_always_present,",
      "} PACKED;",
      "ENDPACKED",
    ]);
  });

  it("should pack labels into one string with 16-bit offsets", () => {
    const start = lines.indexOf("static const char *enum_string =");
    expect(lines.slice(start, start + 5)).to.deep.equal([
      "static const char *enum_string =",
      '    "Desktop OpenGL 2.0\\0"',
      '    "GL_ARB_foo\\0"',
      '    "always present\\0"',
      "     ;",
    ]);
    const offsets = lines.indexOf(
      "static const uint16_t enum_string_offsets[] = {"
    );
    expect(lines.slice(offsets + 1, offsets + 5)).to.deep.equal([
      "    -1, /* gl_provider_terminator, unused */",
      "    0, /* Desktop OpenGL 2.0 */",
      "    19, /* GL_ARB_foo */",
      "    30, /* always present */",
    ]);
  });

  it("should spell entry points out character by character", () => {
    const start = lines.indexOf("static const char entrypoint_strings[] = {");
    expect(lines.slice(start + 1, start + 7)).to.deep.equal([
      "   'g',",
      "   'l',",
      "   'F',",
      "   'o',",
      "   'o',",
      "   0, // glFoo",
    ]);
  });

  it("should evaluate every provider's condition in the provider resolver", () => {
    const start = lines.indexOf("        case PROVIDER_always_present:");
    expect(lines.slice(start, start + 4)).to.deep.equal([
      "        case PROVIDER_always_present:",
      "            if (true)",
      "                return epoxy_get_bootstrap_proc_address(entrypoint_strings + entrypoints[i]);",
      "            break;",
    ]);
    expect(lines).to.include(
      "            if (epoxy_conservative_has_gl_extension(provider_name))"
    );
  });

  it("should write ordered resolvers in planner order", () => {
    expect(block(lines, "epoxy_glFoo_resolver(void)")).to.deep.equal([
      "epoxy_glFoo_resolver(void)",
      "{",
      "    static const enum gl_provider providers[] = {",
      "        PROVIDER_Desktop_OpenGL_2_0,",
      "        PROVIDER_GL_ARB_foo,",
      "        PROVIDER_GL_ARB_foo,",
      "        gl_provider_terminator",
      "    };",
      "    static const uint32_t entrypoints[] = {",
      '        0 /* "glFoo" */,',
      '        0 /* "glFoo" */,',
      '        6 /* "glFooARB" */,',
      "    };",
      '    return gl_provider_resolver(entrypoint_strings + 0 /* "glFoo" */,',
      "                                providers, entrypoints);",
      "}",
    ]);
  });

  it("should use the single resolver exactly where planned", () => {
    expect(block(lines, "epoxy_glGetString_resolver(void)")).to.deep.equal([
      "epoxy_glGetString_resolver(void)",
      "{",
      "    return gl_single_resolver(PROVIDER_always_present, 15 /* glGetString */);",
      "}",
    ]);
    expect(
      lines.filter((line) => line.includes("gl_single_resolver(PROVIDER_"))
    ).to.have.length(1);
  });

  it("should write the alias entry point when the only candidate is renamed", () => {
    const renamed = sourceLines(
      buildModel({
        commands: [{ name: "glBar" }, { name: "glBarEXT", alias: "glBar" }],
        extensions: [extensionXml("GL_EXT_bar", "gl", ["glBarEXT"])],
      })
    );
    expect(block(renamed, "epoxy_glBar_resolver(void)")).to.deep.equal([
      "epoxy_glBar_resolver(void)",
      "{",
      "    static const enum gl_provider providers[] = {",
      "        PROVIDER_GL_EXT_bar,",
      "        gl_provider_terminator",
      "    };",
      "    static const uint32_t entrypoints[] = {",
      '        6 /* "glBarEXT" */,',
      "    };",
      '    return gl_provider_resolver(entrypoint_strings + 0 /* "glBar" */,',
      "                                providers, entrypoints);",
      "}",
    ]);
  });

  it("should write a placeholder entry point for a function nothing provides", () => {
    const orphan = sourceLines(
      buildModel({ commands: [{ name: "glOrphan" }] })
    );
    expect(block(orphan, "epoxy_glOrphan_resolver(void)")).to.include(
      "        0 /* None */,"
    );
  });

  it("should write thunks and global pointers", () => {
    expect(lines).to.include("GEN_THUNKS(glFoo, (GLenum mode), (mode))");
    expect(lines).to.include(
      "GEN_THUNKS_RET(const GLubyte *, glGetString, (GLenum name), (name))"
    );
    expect(lines).to.include(
      "PFNGLFOOPROC epoxy_glFoo = epoxy_glFoo_global_rewrite_ptr;"
    );
    expect(lines).to.include(
      "    epoxy_glFoo = epoxy_glFoo_dispatch_table_thunk;"
    );
  });

  it("should route wrapped functions through their unwrapped symbol", () => {
    const wrapped = sourceLines(
      buildModel({ commands: [{ name: "glBegin" }] })
    );
    expect(wrapped).to.include("    PFNGLBEGINPROC epoxy_glBegin_unwrapped;");
    expect(wrapped).to.include("GEN_THUNKS(glBegin_unwrapped, (void), ())");
    expect(wrapped).to.include("epoxy_glBegin_unwrapped_resolver(void)");
  });

  it("should fault on a handle argument past the register positions", () => {
    const params = [1, 2, 3, 4, 5, 6].map((n) => ({
      type: "GLint",
      name: `p${n}`,
    }));
    const result = emitDispatchSource(
      buildModel({
        commands: [
          {
            name: "glManyARB",
            params: [...params, { type: "GLhandleARB", name: "obj" }],
          },
        ],
      })
    );
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("DGN6002");
    expect(result.error[0]?.message).to.equal(
      "GLhandleARB argument 7 of glManyARB is beyond the 6th register position"
    );
  });

  it("should fault when labels overflow 16-bit offsets", () => {
    const long = "x".repeat(MAX_LABEL_TABLE_SIZE);
    const provider = {
      id: "PROVIDER_long",
      label: long,
      condition: "true",
      loader: "{0}",
    };
    const result = emitDispatchSource({ ...model, providers: [provider] });
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("DGN6001");
  });

  it("should compute string table offsets", () => {
    expect(labelTable(model.providers).size).to.equal(45);
    expect([...entryPointTable(model.functions).offsets]).to.deep.equal([
      ["glFoo", 0],
      ["glFooARB", 6],
      ["glGetString", 15],
    ]);
  });
});
