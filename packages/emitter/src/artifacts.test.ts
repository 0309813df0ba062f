/**
 * Tests for artifact selection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { SAMPLE_REGISTRY, buildModel } from "@dispatchgen/frontend/testing";
import { artifactFileName, emitArtifacts } from "./artifacts.js";

describe("Artifacts", () => {
  const model = buildModel(SAMPLE_REGISTRY, "gl");

  it("should write the header and source by default", () => {
    const result = emitArtifacts(model);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(
      result.value.map((artifact) => [artifact.kind, artifact.fileName])
    ).to.deep.equal([
      ["header", "gl_generated.h"],
      ["source", "gl_generated_dispatch.c"],
    ]);
  });

  it("should write only the selected artifacts", () => {
    const result = emitArtifacts(model, {
      header: false,
      source: false,
      vapi: true,
    });
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.map((artifact) => artifact.fileName)).to.deep.equal([
      "gl_generated.vapi",
    ]);
  });

  it("should return nothing when the source cannot be emitted", () => {
    const handles = [1, 2, 3, 4, 5, 6, 7].map((n) => ({
      type: "GLhandleARB",
      name: `h${n}`,
    }));
    const result = emitArtifacts(
      buildModel({ commands: [{ name: "glHandles", params: handles }] })
    );
    expect(result.ok).to.equal(false);
  });

  it("should name artifacts after the target", () => {
    expect(artifactFileName("egl", "source")).to.equal(
      "egl_generated_dispatch.c"
    );
  });
});
