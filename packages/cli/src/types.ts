/**
 * Type definitions for CLI
 */

import type { ArtifactSelection } from "@dispatchgen/emitter";

export type { Result } from "@dispatchgen/frontend";

/**
 * Configuration file (dispatchgen.json)
 */
export type DispatchgenConfig = {
  readonly $schema?: string;
  /** Registry XML files, relative to the configuration file */
  readonly registries?: readonly string[];
  readonly outputDirectory?: string;
  /** Where headers and VAPI files go; defaults to outputDirectory */
  readonly includeDirectory?: string;
  /** Where dispatch sources go; defaults to outputDirectory */
  readonly sourceDirectory?: string;
  readonly artifacts?: Partial<ArtifactSelection>;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  outputDir?: string;
  includeDir?: string;
  srcDir?: string;
  header?: boolean;
  source?: boolean;
  vapi?: boolean;
};

export type ParsedArgs = {
  readonly command: string;
  /** Registry files named on the command line */
  readonly registries: readonly string[];
  readonly options: CliOptions;
};

/**
 * Resolved configuration: file values under CLI overrides, paths absolute
 */
export type ResolvedConfig = {
  readonly registries: readonly string[];
  readonly outputDirectory: string;
  readonly includeDirectory: string;
  readonly sourceDirectory: string;
  readonly artifacts: ArtifactSelection;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
