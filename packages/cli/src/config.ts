/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { type ArtifactSelection, defaultArtifacts } from "@dispatchgen/emitter";
import type {
  DispatchgenConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "dispatchgen.json";

const ARTIFACT_KEYS = ["header", "source", "vapi"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (
  record: Record<string, unknown>,
  key: string
): Result<string | undefined, string> => {
  const value = record[key];
  if (value === undefined || typeof value === "string") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${key}' must be a string` };
};

/**
 * Validate parsed JSON against the configuration shape
 */
export const validateConfig = (
  value: unknown
): Result<DispatchgenConfig, string> => {
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const registries = value["registries"];
  if (
    registries !== undefined &&
    !(
      Array.isArray(registries) &&
      registries.every((entry) => typeof entry === "string")
    )
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'registries' must be an array of file paths`,
    };
  }

  const artifacts = value["artifacts"];
  const selection: Partial<Record<keyof ArtifactSelection, boolean>> = {};
  if (artifacts !== undefined) {
    if (!isRecord(artifacts)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'artifacts' must be an object`,
      };
    }
    for (const key of ARTIFACT_KEYS) {
      const flag = artifacts[key];
      if (flag === undefined) continue;
      if (typeof flag !== "boolean") {
        return {
          ok: false,
          error: `${CONFIG_FILE_NAME}: 'artifacts.${key}' must be true or false`,
        };
      }
      selection[key] = flag;
    }
  }

  const schema = optionalString(value, "$schema");
  if (!schema.ok) return schema;
  const outputDirectory = optionalString(value, "outputDirectory");
  if (!outputDirectory.ok) return outputDirectory;
  const includeDirectory = optionalString(value, "includeDirectory");
  if (!includeDirectory.ok) return includeDirectory;
  const sourceDirectory = optionalString(value, "sourceDirectory");
  if (!sourceDirectory.ok) return sourceDirectory;

  return {
    ok: true,
    value: {
      $schema: schema.value,
      registries: Array.isArray(registries)
        ? registries.filter(
            (entry): entry is string => typeof entry === "string"
          )
        : undefined,
      outputDirectory: outputDirectory.value,
      includeDirectory: includeDirectory.value,
      sourceDirectory: sourceDirectory.value,
      artifacts: artifacts === undefined ? undefined : selection,
    },
  };
};

/**
 * Load dispatchgen.json
 */
export const loadConfig = (
  configPath: string
): Result<DispatchgenConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find dispatchgen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Pick the artifacts to write. Flags win over the file; when the result
 * selects nothing the header and source are written.
 */
export const resolveArtifacts = (
  fromFile: Partial<ArtifactSelection> | undefined,
  cliOptions: CliOptions
): ArtifactSelection => {
  const selection: ArtifactSelection = {
    header: cliOptions.header ?? fromFile?.header ?? false,
    source: cliOptions.source ?? fromFile?.source ?? false,
    vapi: cliOptions.vapi ?? fromFile?.vapi ?? false,
  };
  return selection.header || selection.source || selection.vapi
    ? selection
    : defaultArtifacts;
};

/**
 * Merge configuration file values with CLI options.
 *
 * File paths resolve against `configDir`, CLI paths against `workingDir`.
 * Registries named on the command line replace the file's list.
 */
export const resolveConfig = (
  config: DispatchgenConfig,
  cliOptions: CliOptions,
  registries: readonly string[],
  workingDir: string,
  configDir: string = workingDir
): ResolvedConfig => {
  const fromCli = (path: string | undefined): string | undefined =>
    path ? resolve(workingDir, path) : undefined;
  const fromFile = (path: string | undefined): string | undefined =>
    path ? resolve(configDir, path) : undefined;

  const outputDirectory =
    fromCli(cliOptions.outputDir) ??
    fromFile(config.outputDirectory) ??
    resolve(workingDir);

  return {
    registries:
      registries.length > 0
        ? registries.map((path) => resolve(workingDir, path))
        : (config.registries ?? []).map((path) => resolve(configDir, path)),
    outputDirectory,
    includeDirectory:
      fromCli(cliOptions.includeDir) ??
      fromFile(config.includeDirectory) ??
      outputDirectory,
    sourceDirectory:
      fromCli(cliOptions.srcDir) ??
      fromFile(config.sourceDirectory) ??
      outputDirectory,
    artifacts: resolveArtifacts(config.artifacts, cliOptions),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
