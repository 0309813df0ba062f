/**
 * Vala binding emitter (`<target>_generated.vapi`)
 */

import {
  type ApiFunction,
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

const KHRONOS_SIMPLE_TYPES: readonly (readonly [string, string])[] = [
  ["khronos_int8_t", "int8"],
  ["khronos_int16_t", "int16"],
  ["khronos_int32_t", "int32"],
  ["khronos_int64_t", "int64"],
  ["khronos_uint8_t", "uint8"],
  ["khronos_uint16_t", "uint16"],
  ["khronos_uint32_t", "uint32"],
  ["khronos_uint64_t", "uint64"],
  ["khronos_float_t", "float"],
  ["khronos_intptr_t", "long"],
  ["khronos_uintptr_t", "ulong"],
  // Really `long`; int64 lets Vala's ulong sizeof() convert implicitly.
  ["khronos_ssize_t", "int64"],
  ["khronos_usize_t", "ulong"],
  ["khronos_utime_nanoseconds_t", "uint64"],
  ["khronos_stime_nanoseconds_t", "int64"],
];

/** Typedefs written out by hand ahead of the registry's own */
const HAND_WRITTEN_TYPES: ReadonlySet<string> = new Set([
  "",
  "GLhandleARB",
  "GLsync",
]);

/** Return types lose their qualifiers */
export const valaReturnType = (type: string): string =>
  type.replaceAll("const ", "");

/**
 * C type named by a typedef prefix: `typedef unsigned int ` -> `uint`
 */
export const valaBaseType = (prefix: string): string =>
  prefix
    .slice("typedef ".length)
    .replaceAll("unsigned ", "u")
    .replaceAll(" (", "")
    .trim();

const validType = (text: string): string =>
  text
    .replaceAll("const ", "")
    .replaceAll("const*", "*")
    .replaceAll("struct _cl_", "_cl_");

/** C declaration list rewritten into what Vala accepts */
export const valaParams = (decl: string): string =>
  decl === "void" ? "" : validType(decl.replaceAll("(void)", "()"));

/** Parameters typed by their enum group where the registry names one */
export const valaGroupedParams = (fn: ApiFunction): string =>
  fn.params
    .map((param) => `${param.group ?? validType(param.type)} ${param.name}`)
    .join(", ");

const writeTypedef = (out: CodeWriter, typedef: Typedef): void => {
  if (typedef.isApiEntry) {
    out.line(
      `\t[CCode (cname = "${typedef.name}", cprefix = "", has_target="false")]`
    );
    const returnType = valaBaseType(typedef.prefix);
    const params = valaParams(typedef.postfix.slice(1));
    out.line(`\tpublic delegate ${returnType} ${typedef.name} ${params}`);
    return;
  }
  if (HAND_WRITTEN_TYPES.has(typedef.name) || typedef.prefix === "") return;

  const base = valaBaseType(typedef.prefix);
  out.line(`\t[CCode (cname = "${typedef.name}", cprefix = "")]`);
  if (base === "void *") {
    // void * typedefs are opaque handles
    out.line("\t[Compact]");
    out.line(`\tpublic class ${typedef.name} {`);
  } else if (base === "void") {
    out.line("\t[SimpleType]");
    out.line(`\tpublic struct ${typedef.name} {`);
  } else {
    out.line("\t[SimpleType]");
    out.line(`\tpublic struct ${typedef.name} : ${base} {`);
  }
  out.line("\t}");
};

/**
 * Emit `<target>_generated.vapi`
 */
export const emitVapi = (
  model: DispatchModel,
  options: Partial<EmitterOptions> = {}
): string => {
  const { symbolPrefix, headerDirectory } = resolveOptions(options);
  const out = new CodeWriter();

  out
    .append(
      generatedFileComment("VAPI for the GL dispatch header", model.comment)
    )
    .line()
    .line(`[CCode (cheader_filename = "${headerDirectory}/gl.h")]`)
    .line("namespace GL {");

  out.line("\t// khrplatform.h types, defined inline by the dispatch header");
  for (const [name, base] of KHRONOS_SIMPLE_TYPES) {
    out.line(`\t[SimpleType] public struct ${name} : ${base} {}`);
  }
  out
    .line("\tpublic const int KHRONOS_MAX_ENUM;")
    .line("\tpublic enum khronos_boolean_enum_t {")
    .line('\t    [CCode(cname = "KHRONOS_FALSE")] FALSE,')
    .line('\t    [CCode(cname = "KHRONOS_TRUE")] TRUE,')
    .line(
      '\t    [CCode(cname = "KHRONOS_BOOLEAN_ENUM_FORCE_SIZE")] FORCE_SIZE,'
    )
    .line("\t}")
    .line();

  out
    .line('\t[CCode (cname = "GLsync", cprefix = "")]')
    .line("\t[Compact]")
    .line("\tpublic class GLsync {")
    .line("\t}")
    .line('\t[CCode (cname = "GLhandleARB", cprefix = "")]')
    .line("\t[SimpleType]")
    .line("\tpublic struct GLhandleARB : uint {")
    .line("\t}")
    .line('\t[CCode (cname = "struct _cl_context", cprefix = "")]')
    .line("\t[SimpleType]")
    .line("\tpublic struct _cl_context {")
    .line("\t}")
    .line('\t[CCode (cname = "_cl_event", cprefix = "")]')
    .line("\t[SimpleType]")
    .line("\tpublic struct _cl_event {")
    .line("\t}");

  for (const typedef of model.typedefs) {
    writeTypedef(out, typedef);
  }
  out.line();

  // Vala has no #ifdef; the constants exist for parity with C callers.
  for (const name of [...model.supportedVersions].sort(compareStrings)) {
    out.line(`\tpublic const int ${name};`);
  }
  for (const name of [...model.supportedExtensions].sort(compareStrings)) {
    out.line(`\tpublic const int ${name};`);
  }
  out.line();

  for (const group of model.groups) {
    out.line('\t[CCode (cname = "int", cprefix = "", has_type_id = false)]');
    out.line(`\tpublic enum ${group.name} {`);
    for (const member of group.members) {
      out.line(`\t\t [CCode (cname = "${member}")] ${member},`);
    }
    out.line("\t}");
  }
  out.line();

  for (const fn of model.functions) {
    const pointer = pointerTypeName(fn);
    const returnType = valaReturnType(fn.returnType);
    out.line(
      `\t[CCode (cname = "${pointer}", cprefix = "", has_target = "false")]`
    );
    out.line(
      `\tpublic delegate ${returnType} ${pointer}(${valaParams(paramDeclarations(fn))});`
    );
  }
  out.line();

  // Vala's sizeof() yields ulong; this one yields GLsizei.
  out
    .line('\t[CCode (cname = "sizeof", simple_generics = true)]')
    .line("\tGLsizei glSizeof<T>(T x);")
    .line();

  for (const fn of model.functions) {
    out.line(`\t[CCode (cname = "${fn.name}", cprefix = "")]`);
    const returnType = valaReturnType(fn.returnType);
    const params = valaParams(paramDeclarations(fn));
    out.line(`\tpublic ${returnType} ${symbolPrefix}${fn.name}(${params});`);
  }
  out.line();

  for (const fn of model.functions) {
    out.line(`\t[CCode (cname = "${fn.name}", cprefix = "")]`);
    out.line(
      `\tpublic ${valaReturnType(fn.returnType)} ${fn.name}(${valaGroupedParams(fn)});`
    );
  }

  out.line("}");
  return out.toString();
};
