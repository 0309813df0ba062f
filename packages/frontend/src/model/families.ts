/**
 * Platform families and their provider policies.
 *
 * Which condition guards a core entry point and which loader fetches it is
 * registry trivia that cannot be derived from the schema, so it is written
 * down here as tables keyed by family and version range. Templates use
 * `{number}` for the feature number as written ("3.2"), `{version}` for the
 * packed version (32) and `{0}` for the entry-point expression filled in by
 * the emitter.
 */

import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { fault } from "../types/diagnostic.js";
import type { ProviderSpec } from "./types.js";

export const PLATFORM_FAMILIES = [
  "gl",
  "glcore",
  "gles1",
  "gles2",
  "glsc2",
  "glx",
  "egl",
  "wgl",
] as const;

export type PlatformFamily = (typeof PLATFORM_FAMILIES)[number];

/** Extension `supported` token meaning the extension applies nowhere */
export const DISABLED_FAMILY_TOKEN = "disabled";

export const parsePlatformFamily = (
  value: string,
  location?: SourceLocation
): Result<PlatformFamily, readonly Diagnostic[]> => {
  const family = PLATFORM_FAMILIES.find((candidate) => candidate === value);
  return family !== undefined
    ? ok(family)
    : error(
        fault(
          "DGN2001",
          `Unknown platform family '${value}'`,
          location,
          `Known families: ${PLATFORM_FAMILIES.join(", ")}`
        )
      );
};

/**
 * Pack a feature number such as "4.6" into 46.
 */
export const parseFeatureVersion = (
  number: string,
  location?: SourceLocation
): Result<number, readonly Diagnostic[]> => {
  const match = /^([0-9])\.([0-9])/.exec(number);
  const major = match?.[1];
  const minor = match?.[2];
  if (major === undefined || minor === undefined) {
    return error(
      fault(
        "DGN2002",
        `Malformed feature version number '${number}'`,
        location,
        "Expected <major>.<minor> with single digits"
      )
    );
  }
  return ok(Number(major) * 10 + Number(minor));
};

/**
 * Half-open packed version range, `until` exclusive
 */
export type VersionRange = {
  readonly from: number;
  readonly until?: number;
};

export type FeaturePolicy =
  | {
      readonly family: PlatformFamily;
      readonly versions: VersionRange;
      readonly kind: "provider";
      readonly label: string;
      readonly condition: string;
      readonly loader: string;
    }
  | {
      readonly family: PlatformFamily;
      readonly versions: VersionRange;
      readonly kind: "skip";
    };

const ALL_VERSIONS: VersionRange = { from: 0 };

export const FEATURE_POLICIES: readonly FeaturePolicy[] = [
  {
    family: "gl",
    versions: { from: 0, until: 11 },
    kind: "provider",
    label: "Desktop OpenGL {number}",
    condition: "epoxy_is_desktop_gl()",
    loader: "epoxy_get_core_proc_address({0}, {version})",
  },
  {
    family: "gl",
    versions: { from: 11 },
    kind: "provider",
    label: "Desktop OpenGL {number}",
    condition:
      "epoxy_is_desktop_gl() && epoxy_conservative_gl_version() >= {version}",
    loader: "epoxy_get_core_proc_address({0}, {version})",
  },
  {
    family: "gles2",
    versions: { from: 0, until: 21 },
    kind: "provider",
    label: "OpenGL ES {number}",
    condition: "!epoxy_is_desktop_gl() && epoxy_gl_version() >= {version}",
    loader: "epoxy_gles2_dlsym({0})",
  },
  {
    family: "gles2",
    versions: { from: 21 },
    kind: "provider",
    label: "OpenGL ES {number}",
    condition: "!epoxy_is_desktop_gl() && epoxy_gl_version() >= {version}",
    loader: "epoxy_gles3_dlsym({0})",
  },
  {
    family: "gles1",
    versions: ALL_VERSIONS,
    kind: "provider",
    label: "OpenGL ES 1.0",
    condition:
      "!epoxy_is_desktop_gl() && epoxy_gl_version() >= 10 && epoxy_gl_version() < 20",
    loader: "epoxy_gles1_dlsym({0})",
  },
  // dlsym() is a cheaper lookup than glXGetProcAddress() for GLX 1.3 and
  // older, which the Linux OpenGL ABI guarantees as exported symbols.
  {
    family: "glx",
    versions: { from: 0, until: 14 },
    kind: "provider",
    label: "GLX {version}",
    condition: "true",
    loader: "epoxy_glx_dlsym({0})",
  },
  {
    family: "glx",
    versions: { from: 14 },
    kind: "provider",
    label: "GLX {version}",
    condition: "epoxy_conservative_glx_version() >= {version}",
    loader: "glXGetProcAddress((const GLubyte *){0})",
  },
  // eglGetProcAddress() returns NULL for core EGL entry points.
  {
    family: "egl",
    versions: { from: 0, until: 11 },
    kind: "provider",
    label: "EGL {version}",
    condition: "true",
    loader: "epoxy_egl_dlsym({0})",
  },
  {
    family: "egl",
    versions: { from: 11 },
    kind: "provider",
    label: "EGL {version}",
    condition: "epoxy_conservative_egl_version() >= {version}",
    loader: "epoxy_egl_dlsym({0})",
  },
  {
    family: "wgl",
    versions: ALL_VERSIONS,
    kind: "provider",
    label: "WGL {version}",
    condition: "true",
    loader: "epoxy_gl_dlsym({0})",
  },
  { family: "glsc2", versions: ALL_VERSIONS, kind: "skip" },
  { family: "glcore", versions: ALL_VERSIONS, kind: "skip" },
];

const inRange = (range: VersionRange, version: number): boolean =>
  version >= range.from && (range.until === undefined || version < range.until);

const expandFeatureTemplate = (
  template: string,
  number: string,
  version: number
): string =>
  template
    .replaceAll("{number}", number)
    .replaceAll("{version}", String(version));

/**
 * Provider spec for a core feature, or `undefined` when the family's
 * features do not produce providers.
 */
export const featureProvider = (
  family: PlatformFamily,
  number: string,
  version: number,
  policies: readonly FeaturePolicy[] = FEATURE_POLICIES
): ProviderSpec | undefined => {
  const policy = policies.find(
    (candidate) =>
      candidate.family === family && inRange(candidate.versions, version)
  );
  if (!policy || policy.kind === "skip") return undefined;
  return {
    label: expandFeatureTemplate(policy.label, number, version),
    condition: expandFeatureTemplate(policy.condition, number, version),
    loader: expandFeatureTemplate(policy.loader, number, version),
  };
};

export type ExtensionPolicy = {
  /** Families whose presence in `supported` selects this policy */
  readonly families: readonly PlatformFamily[];
  readonly condition: string;
  readonly loader: string;
};

/**
 * One binding per matching row; the GL APIs share a single row so an
 * extension supported on desktop GL and GLES yields one provider.
 * `provider_name` is the label variable in scope inside the generated
 * provider resolver.
 */
export const EXTENSION_POLICIES: readonly ExtensionPolicy[] = [
  {
    families: ["glx"],
    condition: "epoxy_conservative_has_glx_extension(provider_name)",
    loader: "glXGetProcAddress((const GLubyte *){0})",
  },
  {
    families: ["egl"],
    condition: "epoxy_conservative_has_egl_extension(provider_name)",
    loader: "eglGetProcAddress({0})",
  },
  {
    families: ["wgl"],
    condition: "epoxy_conservative_has_wgl_extension(provider_name)",
    loader: "wglGetProcAddress({0})",
  },
  {
    families: ["gl", "gles1", "gles2"],
    condition: "epoxy_conservative_has_gl_extension(provider_name)",
    loader: "epoxy_get_proc_address({0})",
  },
];

export const extensionProviders = (
  extensionName: string,
  families: ReadonlySet<PlatformFamily>,
  policies: readonly ExtensionPolicy[] = EXTENSION_POLICIES
): readonly ProviderSpec[] =>
  policies
    .filter((policy) => policy.families.some((family) => families.has(family)))
    .map((policy) => ({
      label: extensionName,
      condition: policy.condition,
      loader: policy.loader,
    }));
