/**
 * Function model builder - turns a raw registry into the function arena and
 * the provider bindings contributed by features and extensions.
 */

import type { Result } from "../types/result.js";
import { ok, error, collect } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { RawCommand, RawParam, Registry } from "../registry/types.js";
import {
  DISABLED_FAMILY_TOKEN,
  EXTENSION_POLICIES,
  FEATURE_POLICIES,
  type ExtensionPolicy,
  type FeaturePolicy,
  type PlatformFamily,
  extensionProviders,
  featureProvider,
  parseFeatureVersion,
  parsePlatformFamily,
} from "./families.js";
import type {
  ApiFunction,
  ApiParam,
  EnumConstant,
  EnumGroup,
  ExtensionDescriptor,
  FeatureDescriptor,
  FunctionModel,
  ProviderBindingSpec,
  ProviderSpec,
} from "./types.js";

/**
 * Entry points with hand-written wrappers in the dispatch runtime
 * (begin/end tracking and context switches).
 */
export const WRAPPED_FUNCTIONS: ReadonlySet<string> = new Set([
  "glBegin",
  "glEnd",
  "wglMakeCurrent",
  "wglMakeContextCurrentEXT",
  "wglMakeContextCurrentARB",
  "wglMakeAssociatedContextCurrentAMD",
]);

/**
 * Legacy commands removed unconditionally. wglUseFontBitmaps is an
 * ANSI/Unicode pair mapped by hand in the public wgl header.
 */
export const BLOCKED_FUNCTIONS: ReadonlySet<string> = new Set([
  "wglUseFontBitmaps",
]);

/**
 * Types declared only by headers a generated header cannot include
 * (old SGIX GLX extensions).
 */
export const UNAVAILABLE_HEADER_TYPES: readonly string[] = [
  "VLServer",
  "DMparams",
];

/**
 * Targets whose default loader only reaches entry points whose name contains
 * a marker; WGL 1.0 lists a handful of gdi32 functions that opengl32 lookups
 * cannot find.
 */
export const TARGET_NAME_MARKERS: ReadonlyMap<string, string> = new Map([
  ["wgl", "wgl"],
]);

/**
 * Enum constants whose hexadecimal definitions collide with the decimal
 * ones in wingdi.h
 */
const SKIPPED_ENUMS: ReadonlySet<string> = new Set([
  "WGL_SWAP_OVERLAY",
  "WGL_SWAP_UNDERLAY",
  "WGL_SWAP_MAIN_PLANE",
]);

/**
 * Functions used while choosing loaders; resolving them through the
 * regular providers would recurse into their own resolvers.
 */
export const BOOTSTRAP_FUNCTIONS: ReadonlyMap<string, ProviderSpec> = new Map([
  [
    "glGetString",
    {
      label: "always present",
      condition: "true",
      loader: "epoxy_get_bootstrap_proc_address({0})",
    },
  ],
  [
    "glGetIntegerv",
    {
      label: "always present",
      condition: "true",
      loader: "epoxy_get_bootstrap_proc_address({0})",
    },
  ],
  // Formally a GLX extension, but the Linux OpenGL ABI requires it as an
  // exported symbol.
  [
    "glXGetProcAddress",
    {
      label: "always present",
      condition: "true",
      loader: "epoxy_glx_dlsym({0})",
    },
  ],
]);

/** Win32 headers define `near` and `far` as keywords */
const RENAMED_PARAMS: ReadonlyMap<string, string> = new Map([
  ["near", "hither"],
  ["far", "yon"],
]);

const GROUPED_PARAM_TYPES: ReadonlySet<string> = new Set([
  "GLenum",
  "GLbitfield",
]);

export type BuildOptions = {
  readonly featurePolicies?: readonly FeaturePolicy[];
  readonly extensionPolicies?: readonly ExtensionPolicy[];
};

const normalizeParam = (param: RawParam): ApiParam => {
  const name = RENAMED_PARAMS.get(param.name) ?? param.name;
  return GROUPED_PARAM_TYPES.has(param.type) && param.group !== undefined
    ? { type: param.type, name, group: param.group }
    : { type: param.type, name };
};

const referencesUnavailableType = (command: RawCommand): boolean =>
  command.params.some((param) =>
    UNAVAILABLE_HEADER_TYPES.some((type) => param.type.includes(type))
  );

/**
 * Whether a command survives the target's filters. Dropped commands are
 * silently skipped when a feature or extension mentions them.
 */
const isKept = (command: RawCommand, target: string): boolean => {
  if (BLOCKED_FUNCTIONS.has(command.name)) return false;
  if (referencesUnavailableType(command)) return false;
  const marker = TARGET_NAME_MARKERS.get(target);
  return marker === undefined || command.name.includes(marker);
};

const buildEnums = (
  registry: Registry
): { enums: readonly EnumConstant[]; groups: readonly EnumGroup[] } => {
  const enums = registry.enums.filter(
    (constant) => !SKIPPED_ENUMS.has(constant.name)
  );
  const groups = new Map<string, string[]>();
  for (const constant of enums) {
    for (const group of constant.groups) {
      const members = groups.get(group) ?? [];
      members.push(constant.name);
      groups.set(group, members);
    }
  }
  return {
    enums,
    groups: [...groups].map(([name, members]) => ({ name, members })),
  };
};

/**
 * Build the function arena and raw provider bindings for one target.
 *
 * @param target - Target name, the registry file's base name (`gl`, `glx`, ...)
 */
export const buildFunctionModel = (
  registry: Registry,
  target: string,
  options: BuildOptions = {}
): Result<FunctionModel, readonly Diagnostic[]> => {
  const file = registry.fileName;
  const diagnostics: Diagnostic[] = [];
  const featurePolicies = options.featurePolicies ?? FEATURE_POLICIES;
  const extensionPolicies = options.extensionPolicies ?? EXTENSION_POLICIES;

  const declared = new Set<string>();
  for (const command of registry.commands) {
    if (declared.has(command.name)) {
      diagnostics.push(
        createDiagnostic(
          "DGN3001",
          "error",
          `Command '${command.name}' is declared more than once`,
          { file, element: `command ${command.name}` }
        )
      );
    }
    declared.add(command.name);
  }

  const kept = registry.commands
    .filter((command) => isKept(command, target))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const indexByName = new Map<string, number>();
  const functions: ApiFunction[] = kept.map((command, index) => {
    indexByName.set(command.name, index);
    return {
      index,
      name: command.name,
      returnType: command.returnType,
      params: command.params.map(normalizeParam),
      aliasName: command.alias ?? command.name,
      rootIndex: index,
      aliasIndices: [],
      wrapped: WRAPPED_FUNCTIONS.has(command.name),
    };
  });

  // Keyed by function index, then label; identical re-declarations
  // (a command listed in two require blocks) collapse.
  const bindingKeys = new Set<string>();
  const bindings: ProviderBindingSpec[] = [];

  const bindCommands = (
    commands: readonly string[],
    spec: ProviderSpec,
    element: string
  ): void => {
    for (const name of commands) {
      const functionIndex = indexByName.get(name);
      if (functionIndex === undefined) {
        if (!declared.has(name)) {
          diagnostics.push(
            createDiagnostic(
              "DGN3002",
              "error",
              `'${name}' is required by ${element} but never declared as a command`,
              { file, element }
            )
          );
        }
        continue;
      }
      const key = [functionIndex, spec.label, spec.condition, spec.loader].join(
        "\u0000"
      );
      if (bindingKeys.has(key)) continue;
      bindingKeys.add(key);
      bindings.push({ functionIndex, entryPoint: name, spec });
    }
  };

  const features: FeatureDescriptor[] = [];
  for (const feature of registry.features) {
    const element = `feature ${feature.name}`;
    const family = parsePlatformFamily(feature.api, { file, element });
    const version = parseFeatureVersion(feature.number, { file, element });
    if (!family.ok || !version.ok) {
      if (!family.ok) diagnostics.push(...family.error);
      if (!version.ok) diagnostics.push(...version.error);
      continue;
    }

    features.push({
      name: feature.name,
      number: feature.number,
      family: family.value,
      commands: feature.commands,
    });

    const spec = featureProvider(
      family.value,
      feature.number,
      version.value,
      featurePolicies
    );
    if (spec) {
      bindCommands(feature.commands, spec, element);
    }
  }

  const extensions: ExtensionDescriptor[] = [];
  for (const extension of registry.extensions) {
    const element = `extension ${extension.name}`;
    const parsed = collect(
      extension.supported
        .filter((token) => token !== DISABLED_FAMILY_TOKEN)
        .map((token) => parsePlatformFamily(token, { file, element }))
    );
    if (!parsed.ok) diagnostics.push(...parsed.error);
    const families = new Set<PlatformFamily>(parsed.ok ? parsed.value : []);

    extensions.push({
      name: extension.name,
      families: [...families],
      commands: extension.commands,
    });

    for (const spec of extensionProviders(
      extension.name,
      families,
      extensionPolicies
    )) {
      bindCommands(extension.commands, spec, element);
    }
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  const bootstrapped = bindings.filter((binding) => {
    const fn = functions[binding.functionIndex];
    return fn === undefined || !BOOTSTRAP_FUNCTIONS.has(fn.name);
  });
  for (const fn of functions) {
    const spec = BOOTSTRAP_FUNCTIONS.get(fn.name);
    if (spec) {
      bootstrapped.push({ functionIndex: fn.index, entryPoint: fn.name, spec });
    }
  }

  const { enums, groups } = buildEnums(registry);

  return ok({
    target,
    comment: registry.comment,
    typedefs: registry.typedefs,
    enums,
    groups,
    functions,
    dropped: registry.commands
      .filter((command) => !indexByName.has(command.name))
      .map((command) => command.name),
    bindings: bootstrapped,
    features,
    extensions,
    supportedVersions: [...new Set(registry.features.map((f) => f.name))],
    supportedExtensions: [...new Set(registry.extensions.map((e) => e.name))],
  });
};
