/**
 * Dispatch model types
 *
 * Functions live in an arena (a readonly array) and refer to each other by
 * index; alias roots are resolved once into `rootIndex` and never walked
 * again.
 */

import type { RawTypedef } from "../registry/types.js";
import type { PlatformFamily } from "./families.js";

export type Typedef = RawTypedef;

export type EnumConstant = {
  readonly name: string;
  readonly value: string;
  readonly groups: readonly string[];
};

export type EnumGroup = {
  readonly name: string;
  /** Constant names in registry order */
  readonly members: readonly string[];
};

export type ApiParam = {
  readonly type: string;
  readonly name: string;
  /** Semantic enum group; only recorded for GLenum/GLbitfield parameters */
  readonly group?: string;
};

export type ApiFunction = {
  readonly index: number;
  readonly name: string;
  readonly returnType: string;
  readonly params: readonly ApiParam[];
  /**
   * Alias target: the registry's declared alias (or the name itself) before
   * alias resolution, the root's name after it.
   */
  readonly aliasName: string;
  /** Arena index of the alias root; the function's own index for roots */
  readonly rootIndex: number;
  /** Dependents of this root, by arena index; empty on non-roots */
  readonly aliasIndices: readonly number[];
  /**
   * Entry point with hand-written bookkeeping: its dispatch slot is exposed
   * under `<name>_unwrapped` instead of the public symbol.
   */
  readonly wrapped: boolean;
};

/**
 * A provider as described by one part of the registry, before interning.
 */
export type ProviderSpec = {
  /** Human-readable condition label; the interning key */
  readonly label: string;
  /** C expression deciding availability */
  readonly condition: string;
  /** C expression template with `{0}` for the entry-point name */
  readonly loader: string;
};

/**
 * Canonical, interned provider
 */
export type Provider = ProviderSpec & {
  /** C identifier derived from the label, e.g. `PROVIDER_GL_ARB_foo` */
  readonly id: string;
};

export type ProviderBindingSpec = {
  readonly functionIndex: number;
  /** Literal name handed to the loader */
  readonly entryPoint: string;
  readonly spec: ProviderSpec;
};

export type FunctionProviderBinding = {
  readonly functionIndex: number;
  readonly entryPoint: string;
  readonly provider: Provider;
};

export type FeatureDescriptor = {
  readonly name: string;
  readonly number: string;
  readonly family: PlatformFamily;
  readonly commands: readonly string[];
};

export type ExtensionDescriptor = {
  readonly name: string;
  readonly families: readonly PlatformFamily[];
  readonly commands: readonly string[];
};

/**
 * Output of the loader stage: functions and raw provider bindings
 */
export type FunctionModel = {
  readonly target: string;
  readonly comment: string;
  readonly typedefs: readonly Typedef[];
  readonly enums: readonly EnumConstant[];
  readonly groups: readonly EnumGroup[];
  readonly functions: readonly ApiFunction[];
  /** Declared commands removed by the target's filters */
  readonly dropped: readonly string[];
  readonly bindings: readonly ProviderBindingSpec[];
  readonly features: readonly FeatureDescriptor[];
  readonly extensions: readonly ExtensionDescriptor[];
  /** Feature names, for `#define` emission */
  readonly supportedVersions: readonly string[];
  /** Extension names, for `#define` emission */
  readonly supportedExtensions: readonly string[];
};

export type ResolutionCandidate = {
  readonly entryPoint: string;
  readonly provider: Provider;
};

export type ResolutionPlan =
  | {
      readonly kind: "single";
      readonly functionIndex: number;
      readonly candidate: ResolutionCandidate;
    }
  | {
      readonly kind: "ordered";
      readonly functionIndex: number;
      readonly candidates: readonly ResolutionCandidate[];
    };

/**
 * The finished, immutable model handed to emitters
 */
export type DispatchModel = Omit<FunctionModel, "bindings"> & {
  readonly bindings: readonly FunctionProviderBinding[];
  /** Interned providers sorted by label */
  readonly providers: readonly Provider[];
  /** One plan per function, indexed like `functions` */
  readonly plans: readonly ResolutionPlan[];
};
