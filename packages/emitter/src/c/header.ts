/**
 * Public header emitter: typedefs, enum constants, function-pointer
 * declarations and the name -> pointer macros.
 */

import {
  type DispatchModel,
  type Typedef,
  pointerTypeName,
} from "@dispatchgen/frontend";
import { type EmitterOptions, resolveOptions } from "./options.js";
import {
  CodeWriter,
  compareStrings,
  generatedFileComment,
  paramDeclarations,
} from "./format.js";

/**
 * khrplatform.h types the GL registry relies on. The header itself is
 * missing on many systems, so the definitions are inlined.
 */
const KHRONOS_PLATFORM_TYPES = `#define __khrplatform_h_ 1
typedef int8_t khronos_int8_t;
typedef int16_t khronos_int16_t;
typedef int32_t khronos_int32_t;
typedef int64_t khronos_int64_t;
typedef uint8_t khronos_uint8_t;
typedef uint16_t khronos_uint16_t;
typedef uint32_t khronos_uint32_t;
typedef uint64_t khronos_uint64_t;
typedef float khronos_float_t;
#ifdef _WIN64
typedef signed   long long int khronos_intptr_t;
typedef unsigned long long int khronos_uintptr_t;
typedef signed   long long int khronos_ssize_t;
typedef unsigned long long int khronos_usize_t;
#else
typedef signed   long int      khronos_intptr_t;
typedef unsigned long int      khronos_uintptr_t;
typedef signed   long int      khronos_ssize_t;
typedef unsigned long int      khronos_usize_t;
#endif
typedef uint64_t khronos_utime_nanoseconds_t;
typedef int64_t khronos_stime_nanoseconds_t;
#define KHRONOS_MAX_ENUM 0x7FFFFFFF
typedef enum {
    KHRONOS_FALSE = 0,
    KHRONOS_TRUE  = 1,
    KHRONOS_BOOLEAN_ENUM_FORCE_SIZE = KHRONOS_MAX_ENUM
} khronos_boolean_enum_t;`;

/** Older eglplatform.h releases lack EGL_CAST */
const EGL_CAST_FALLBACK = `#include "EGL/eglplatform.h"
#ifndef EGL_CAST
#if defined(__cplusplus)
#define EGL_CAST(type, value) (static_cast<type>(value))
#else
#define EGL_CAST(type, value) ((type) (value))
#endif
#endif`;

const X11_INCLUDES = `#include <X11/Xlib.h>
#include <X11/Xutil.h>`;

export const renderTypedef = (typedef: Typedef): string =>
  typedef.prefix +
  (typedef.isApiEntry ? "APIENTRY *" : "") +
  typedef.name +
  typedef.postfix;

/**
 * `#define` lines for enum constants, ordered by value text then name and
 * aligned on the longest name. Later definitions of a name win.
 */
export const enumDefines = (model: DispatchModel): readonly string[] => {
  const values = new Map<string, string>();
  for (const constant of model.enums) {
    values.set(constant.name, constant.value);
  }
  const width = Math.max(1, ...[...values.keys()].map((name) => name.length));
  return [...values.keys()]
    .sort(compareStrings)
    .sort((a, b) => compareStrings(values.get(a) ?? "", values.get(b) ?? ""))
    .map(
      (name) => `#define ${name.padEnd(width + 3)}${values.get(name) ?? ""}`
    );
};

const platformPreamble = (
  target: string,
  options: EmitterOptions
): string[] => {
  const lines = [`#include "${options.headerDirectory}/common.h"`];
  if (target !== "gl") {
    lines.push(`#include "${options.headerDirectory}/gl.h"`);
    if (target === "egl") {
      lines.push(EGL_CAST_FALLBACK);
    }
  } else {
    lines.push(KHRONOS_PLATFORM_TYPES);
  }
  if (target === "glx") {
    lines.push(X11_INCLUDES);
  }
  return lines;
};

/**
 * Emit `<target>_generated.h`
 */
export const emitHeader = (
  model: DispatchModel,
  options: Partial<EmitterOptions> = {}
): string => {
  const resolved = resolveOptions(options);
  const { symbolPrefix, publicMacro, callSpecMacro } = resolved;
  const out = new CodeWriter();

  out
    .append(generatedFileComment("GL dispatch header.", model.comment))
    .line()
    .line("#pragma once")
    .line("#include <inttypes.h>")
    .line("#include <stddef.h>")
    .line()
    .raw(platformPreamble(model.target, resolved).join("\n"));

  for (const typedef of model.typedefs) {
    out.raw(`${renderTypedef(typedef)}\n`);
  }
  out.line();

  for (const name of [...model.supportedVersions].sort(compareStrings)) {
    out.line(`#define ${name} 1`);
  }
  out.line();
  for (const name of [...model.supportedExtensions].sort(compareStrings)) {
    out.line(`#define ${name} 1`);
  }
  out.line();
  out.append(enumDefines(model));
  out.line();

  for (const fn of model.functions) {
    out.line(
      `typedef ${fn.returnType} (GLAPIENTRY *${pointerTypeName(fn)})(${paramDeclarations(fn)});`
    );
  }

  for (const fn of model.functions) {
    out.line(
      `${publicMacro} ${fn.returnType} (${callSpecMacro} *${symbolPrefix}${fn.name})(${paramDeclarations(fn)});`
    );
    out.line();
  }

  for (const fn of model.functions) {
    out.line(`#define ${fn.name} ${symbolPrefix}${fn.name}`);
  }

  return out.toString();
};
