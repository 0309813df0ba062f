/**
 * Tests for the Vala binding emitter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { SAMPLE_REGISTRY, buildModel } from "@dispatchgen/frontend/testing";
import { emitVapi, valaBaseType, valaParams } from "./vapi.js";

describe("VAPI emitter", () => {
  const lines = emitVapi(buildModel(SAMPLE_REGISTRY)).split("\n");

  it("should open the GL namespace on the public header", () => {
    expect(lines[0]).to.equal("/* VAPI for the GL dispatch header");
    expect(lines).to.include('[CCode (cheader_filename = "epoxy/gl.h")]');
    expect(lines).to.include("namespace GL {");
    expect(lines[lines.length - 2]).to.equal("}");
  });

  it("should describe scalar typedefs as simple types", () => {
    const start = lines.indexOf('\t[CCode (cname = "GLenum", cprefix = "")]');
    expect(lines.slice(start, start + 4)).to.deep.equal([
      '\t[CCode (cname = "GLenum", cprefix = "")]',
      "\t[SimpleType]",
      "\tpublic struct GLenum : uint {",
      "\t}",
    ]);
  });

  it("should describe callback typedefs as delegates", () => {
    expect(lines).to.include(
      "\tpublic delegate void GLDEBUGPROC (GLenum source);"
    );
  });

  it("should write the hand-written GLhandleARB type once", () => {
    expect(
      lines.filter((line) => line === "\tpublic struct GLhandleARB : uint {")
    ).to.have.length(1);
  });

  it("should write enum groups", () => {
    const start = lines.indexOf("\tpublic enum PrimitiveType {");
    expect(lines.slice(start, start + 4)).to.deep.equal([
      "\tpublic enum PrimitiveType {",
      '\t\t [CCode (cname = "GL_LINES")] GL_LINES,',
      '\t\t [CCode (cname = "GL_POINTS")] GL_POINTS,',
      "\t}",
    ]);
  });

  it("should drop const from return types", () => {
    expect(lines).to.include(
      "\tpublic delegate GLubyte * PFNGLGETSTRINGPROC(GLenum name);"
    );
    expect(lines).to.include(
      "\tpublic GLubyte * epoxy_glGetString(GLenum name);"
    );
  });

  it("should type grouped parameters by their enum group", () => {
    expect(lines).to.include("\tpublic void glFoo(PrimitiveType mode);");
    expect(lines).to.include("\tpublic void glFooARB(GLenum mode);");
    expect(lines).to.include(
      "\tpublic GLubyte * glGetString(StringName name);"
    );
  });

  it("should declare version constants", () => {
    expect(lines).to.include("\tpublic const int GL_VERSION_2_0;");
    expect(lines).to.include("\tpublic const int GL_ARB_foo;");
  });

  describe("helpers", () => {
    it("should map unsigned C types", () => {
      expect(valaBaseType("typedef unsigned short ")).to.equal("ushort");
      expect(valaBaseType("typedef void *")).to.equal("void *");
    });

    it("should strip qualifiers Vala rejects", () => {
      expect(valaParams("void")).to.equal("");
      expect(
        valaParams("const GLchar *const* strings, struct _cl_event * event")
      ).to.equal("GLchar ** strings, _cl_event * event");
    });
  });
});
