/**
 * dispatchgen generate command - write dispatch code for each registry
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  type Diagnostic,
  formatDiagnostic,
  generateFromFile,
  flatMap,
} from "@dispatchgen/frontend";
import {
  type ArtifactKind,
  type EmitterOptions,
  type GeneratedArtifact,
  emitArtifacts,
} from "@dispatchgen/emitter";
import type { Reporter } from "../reporter.js";
import type { ResolvedConfig, Result } from "../types.js";

export type GenerateSummary = {
  /** Absolute paths of every file written */
  readonly written: readonly string[];
};

const directoryFor = (config: ResolvedConfig, kind: ArtifactKind): string =>
  kind === "source" ? config.sourceDirectory : config.includeDirectory;

const reportDiagnostics = (
  reporter: Reporter,
  diagnostics: readonly Diagnostic[]
): void => {
  for (const diagnostic of diagnostics) {
    reporter.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Write one registry's rendered artifacts. If any write fails, the files
 * already written for this registry are removed.
 */
const writeArtifacts = (
  config: ResolvedConfig,
  artifacts: readonly GeneratedArtifact[]
): Result<readonly string[], string> => {
  const written: string[] = [];
  try {
    for (const artifact of artifacts) {
      const directory = directoryFor(config, artifact.kind);
      mkdirSync(directory, { recursive: true });
      const outputPath = join(directory, artifact.fileName);
      written.push(outputPath);
      writeFileSync(outputPath, artifact.content, "utf-8");
    }
    return { ok: true, value: written };
  } catch (error) {
    for (const path of written) {
      rmSync(path, { force: true });
    }
    return {
      ok: false,
      error: `Write failed: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Generate every configured registry. A registry whose pipeline or writes
 * fail leaves no files behind; the others are still generated.
 */
export const generateCommand = (
  config: ResolvedConfig,
  reporter: Reporter,
  emitterOptions: Partial<EmitterOptions> = {}
): Result<GenerateSummary, string> => {
  if (config.registries.length === 0) {
    return {
      ok: false,
      error: "No registry files given (pass file.xml or set 'registries')",
    };
  }

  const written: string[] = [];
  let failures = 0;

  for (const registryPath of config.registries) {
    reporter.detail(`Loading ${registryPath}`);

    const result = flatMap(generateFromFile(registryPath), (model) => {
      reporter.detail(
        `  ${model.target}: ${model.functions.length} functions, ` +
          `${model.providers.length} providers`
      );
      return emitArtifacts(model, config.artifacts, emitterOptions);
    });

    if (!result.ok) {
      reportDiagnostics(reporter, result.error);
      failures++;
      continue;
    }

    const writes = writeArtifacts(config, result.value);
    if (!writes.ok) {
      reporter.error(`${registryPath}: ${writes.error}`);
      failures++;
      continue;
    }

    for (const outputPath of writes.value) {
      written.push(outputPath);
      reporter.detail(`  wrote ${outputPath}`);
    }
  }

  if (failures > 0) {
    return {
      ok: false,
      error:
        `Generation failed for ${failures} of ` +
        `${config.registries.length} registries`,
    };
  }

  reporter.info(
    `Generated ${written.length} files from ` +
      `${config.registries.length} registries`
  );
  return { ok: true, value: { written } };
};
