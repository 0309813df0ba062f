/**
 * Tests for the generate command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SAMPLE_REGISTRY, registryXml } from "@dispatchgen/frontend/testing";
import type { Reporter } from "../reporter.js";
import type { ResolvedConfig } from "../types.js";
import { generateCommand } from "./generate.js";

const recordingReporter = (): Reporter & {
  readonly infos: string[];
  readonly errors: string[];
} => {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: (message) => {
      infos.push(message);
    },
    detail: () => undefined,
    error: (message) => {
      errors.push(message);
    },
  };
};

describe("generate command", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dispatchgen-generate-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const configFor = (
    registries: readonly string[],
    overrides: Partial<ResolvedConfig> = {}
  ): ResolvedConfig => ({
    registries,
    outputDirectory: dir,
    includeDirectory: join(dir, "include"),
    sourceDirectory: join(dir, "src"),
    artifacts: { header: true, source: true, vapi: false },
    verbose: false,
    quiet: false,
    ...overrides,
  });

  it("should write headers and sources to their directories", () => {
    const registry = join(dir, "gl.xml");
    writeFileSync(registry, registryXml(SAMPLE_REGISTRY));
    const reporter = recordingReporter();

    const result = generateCommand(configFor([registry]), reporter);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.written).to.deep.equal([
      join(dir, "include", "gl_generated.h"),
      join(dir, "src", "gl_generated_dispatch.c"),
    ]);
    const header = readFileSync(
      join(dir, "include", "gl_generated.h"),
      "utf-8"
    );
    expect(header.split("\n")[0]).to.equal("/* GL dispatch header.");
    expect(reporter.infos).to.deep.equal([
      "Generated 2 files from 1 registries",
    ]);
  });

  it("should put the VAPI beside the headers", () => {
    const registry = join(dir, "gl.xml");
    writeFileSync(registry, registryXml(SAMPLE_REGISTRY));
    const result = generateCommand(
      configFor([registry], {
        artifacts: { header: false, source: false, vapi: true },
      }),
      recordingReporter()
    );
    expect(result.ok).to.equal(true);
    expect(existsSync(join(dir, "include", "gl_generated.vapi"))).to.equal(
      true
    );
    expect(existsSync(join(dir, "src"))).to.equal(false);
  });

  it("should write nothing for a failing registry and report its diagnostics", () => {
    const good = join(dir, "gl.xml");
    const bad = join(dir, "egl.xml");
    writeFileSync(good, registryXml(SAMPLE_REGISTRY));
    writeFileSync(
      bad,
      registryXml({
        commands: [
          { name: "eglA", alias: "eglB" },
          { name: "eglB", alias: "eglA" },
        ],
      })
    );
    const reporter = recordingReporter();

    const result = generateCommand(configFor([good, bad]), reporter);

    expect(result).to.deep.equal({
      ok: false,
      error: "Generation failed for 1 of 2 registries",
    });
    expect(reporter.errors).to.deep.equal([
      "egl.xml (command eglA): error DGN4001: Alias chain does not terminate: eglA -> eglB -> eglA Hint: The registry is corrupt: an alias chain must end at a command that names itself",
    ]);
    expect(existsSync(join(dir, "include", "egl_generated.h"))).to.equal(false);
    expect(existsSync(join(dir, "include", "gl_generated.h"))).to.equal(true);
  });

  it("should remove partial output and continue when a write fails", () => {
    const gl = join(dir, "gl.xml");
    const egl = join(dir, "egl.xml");
    writeFileSync(gl, registryXml(SAMPLE_REGISTRY));
    writeFileSync(egl, registryXml({ commands: [{ name: "eglFoo" }] }));
    const blocked = join(dir, "blocked");
    writeFileSync(blocked, "");
    const reporter = recordingReporter();

    const result = generateCommand(
      configFor([gl, egl], { sourceDirectory: blocked }),
      reporter
    );

    expect(result).to.deep.equal({
      ok: false,
      error: "Generation failed for 2 of 2 registries",
    });
    expect(reporter.errors).to.have.length(2);
    expect(reporter.errors[0]?.startsWith(`${gl}: Write failed: `)).to.equal(
      true
    );
    expect(reporter.errors[1]?.startsWith(`${egl}: Write failed: `)).to.equal(
      true
    );
    expect(existsSync(join(dir, "include", "gl_generated.h"))).to.equal(false);
    expect(existsSync(join(dir, "include", "egl_generated.h"))).to.equal(false);
  });

  it("should require at least one registry", () => {
    const result = generateCommand(configFor([]), recordingReporter());
    expect(result.ok).to.equal(false);
  });
});
