/**
 * Dispatch source emitter
 *
 * Writes the provider table, the label and entry-point string tables, the
 * shared provider resolver, one resolver per function (in planner order),
 * the self-patching thunks and the per-thread dispatch table plumbing.
 */

import {
  type ApiFunction,
  type Diagnostic,
  type DispatchModel,
  type Provider,
  type ResolutionPlan,
  type Result,
  createDiagnostic,
  dispatchSymbolName,
  error,
  ok,
  pointerTypeName,
} from "@dispatchgen/frontend";
import { type EmitterOptions, resolveOptions } from "./options.js";
import {
  CodeWriter,
  forwardedArguments,
  generatedFileComment,
  literalLength,
  paramDeclarations,
} from "./format.js";

/** Offsets into the label blob are stored as uint16_t */
export const MAX_LABEL_TABLE_SIZE = 65536;

export type StringTable = {
  readonly offsets: ReadonlyMap<string, number>;
  readonly size: number;
};

/**
 * Offsets of provider labels in the NUL-separated label blob
 */
export const labelTable = (providers: readonly Provider[]): StringTable => {
  const offsets = new Map<string, number>();
  let size = 0;
  for (const provider of providers) {
    offsets.set(provider.label, size);
    size += literalLength(provider.label) + 1;
  }
  return { offsets, size };
};

/**
 * Offsets of function names in the entry-point blob, in arena order
 */
export const entryPointTable = (
  functions: readonly ApiFunction[]
): StringTable => {
  const offsets = new Map<string, number>();
  let size = 0;
  for (const fn of functions) {
    if (offsets.has(fn.name)) continue;
    offsets.set(fn.name, size);
    size += fn.name.length + 1;
  }
  return { offsets, size };
};

type SourceContext = {
  readonly model: DispatchModel;
  readonly options: EmitterOptions;
  readonly labels: StringTable;
  readonly entryPoints: StringTable;
  readonly diagnostics: Diagnostic[];
};

const entryPointOffset = (context: SourceContext, name: string): number => {
  const offset = context.entryPoints.offsets.get(name);
  if (offset === undefined) {
    context.diagnostics.push(
      createDiagnostic(
        "DGN3002",
        "error",
        `Entry point '${name}' is not a declared command of target '${context.model.target}'`,
        { file: `${context.model.target}_generated_dispatch.c` }
      )
    );
    return 0;
  }
  return offset;
};

const writeProviderEnum = (out: CodeWriter, context: SourceContext): void => {
  const { target } = context.model;
  out.line();
  out.line(`enum ${target}_provider {`);
  // 0 terminates every provider list
  out.line(`    ${target}_provider_terminator = 0,`);
  for (const provider of context.model.providers) {
    out.line(`    ${provider.id},`);
  }
  out.line("} PACKED;");
  out.line("ENDPACKED");
  out.line();
};

const writeLabelStrings = (out: CodeWriter, context: SourceContext): void => {
  const { target, providers } = context.model;
  out.line("static const char *enum_string =");
  for (const provider of providers) {
    out.line(`    "${provider.label}\\0"`);
  }
  out.line("     ;");
  out.line();
  out.line("static const uint16_t enum_string_offsets[] = {");
  out.line(`    -1, /* ${target}_provider_terminator, unused */`);
  for (const provider of providers) {
    out.line(
      `    ${context.labels.offsets.get(provider.label) ?? 0}, /* ${provider.label} */`
    );
  }
  out.line("};");
  out.line();
};

const writeEntryPointStrings = (
  out: CodeWriter,
  context: SourceContext
): void => {
  out.line("static const char entrypoint_strings[] = {");
  for (const name of context.entryPoints.offsets.keys()) {
    for (const char of name) {
      out.line(`   '${char}',`);
    }
    out.line(`   0, // ${name}`);
  }
  out.line("    0 };");
  out.line();
};

const writeProviderResolver = (
  out: CodeWriter,
  context: SourceContext
): void => {
  const { target, providers } = context.model;
  const { symbolPrefix } = context.options;

  out.line(`static void *${target}_provider_resolver(const char *name,`);
  out.line(
    `                                   const enum ${target}_provider *providers,`
  );
  out.line("                                   const uint32_t *entrypoints)");
  out.line("{");
  out.line("    int i;");
  out.line(
    `    for (i = 0; providers[i] != ${target}_provider_terminator; i++) {`
  );
  out.line(
    "        const char *provider_name = enum_string + enum_string_offsets[providers[i]];"
  );
  out.line("        switch (providers[i]) {");
  out.line();
  for (const provider of providers) {
    out.line(`        case ${provider.id}:`);
    out.line(`            if (${provider.condition})`);
    const load = provider.loader.replaceAll(
      "{0}",
      "entrypoint_strings + entrypoints[i]"
    );
    out.line(`                return ${load};`);
    out.line("            break;");
  }
  out.line(`        case ${target}_provider_terminator:`);
  out.line("            abort(); /* Not reached */");
  out.line("        }");
  out.line("    }");
  out.line();
  out.line(`    if (${symbolPrefix}resolver_failure_handler)`);
  out.line(`        return ${symbolPrefix}resolver_failure_handler(name);`);
  out.line();
  // Nothing provides the function: name every candidate before aborting,
  // instead of handing the caller a stub that crashes later.
  out.line(
    '    fprintf(stderr, "No provider of %s found.  Requires one of:\\n", name);'
  );
  out.line(
    `    for (i = 0; providers[i] != ${target}_provider_terminator; i++) {`
  );
  out.line(
    '        fprintf(stderr, "    %s\\n", enum_string + enum_string_offsets[providers[i]]);'
  );
  out.line("    }");
  out.line(`    if (providers[0] == ${target}_provider_terminator) {`);
  out.line(
    '        fprintf(stderr, "    No known providers.  This is likely a bug "'
  );
  out.line('                        "in dispatch code generation\\n");');
  out.line("    }");
  out.line("    abort();");
  out.line("}");
  out.line();

  const singleProto =
    `${target}_single_resolver(enum ${target}_provider provider, ` +
    "uint32_t entrypoint_offset)";
  out.line("EPOXY_NOINLINE static void *");
  out.line(`${singleProto};`);
  out.line();
  out.line("static void *");
  out.line(singleProto);
  out.line("{");
  out.line(`    enum ${target}_provider providers[] = {`);
  out.line("        provider,");
  out.line(`        ${target}_provider_terminator`);
  out.line("    };");
  out.line(
    `    return ${target}_provider_resolver(entrypoint_strings + entrypoint_offset,`
  );
  out.line("                                providers, &entrypoint_offset);");
  out.line("}");
  out.line();
};

const writeFunctionResolver = (
  out: CodeWriter,
  context: SourceContext,
  fn: ApiFunction,
  plan: ResolutionPlan
): void => {
  const { target } = context.model;
  const { symbolPrefix } = context.options;

  out.line(`static ${pointerTypeName(fn)}`);
  out.line(`${symbolPrefix}${dispatchSymbolName(fn)}_resolver(void)`);
  out.line("{");

  const ownOffset = entryPointOffset(context, fn.name);
  if (plan.kind === "single") {
    const { id } = plan.candidate.provider;
    out.line(
      `    return ${target}_single_resolver(${id}, ${ownOffset} /* ${fn.name} */);`
    );
  } else {
    out.line(`    static const enum ${target}_provider providers[] = {`);
    for (const candidate of plan.candidates) {
      out.line(`        ${candidate.provider.id},`);
    }
    out.line(`        ${target}_provider_terminator`);
    out.line("    };");
    out.line("    static const uint32_t entrypoints[] = {");
    if (plan.candidates.length > 0) {
      for (const { entryPoint } of plan.candidates) {
        const offset = entryPointOffset(context, entryPoint);
        out.line(`        ${offset} /* "${entryPoint}" */,`);
      }
    } else {
      out.line("        0 /* None */,");
    }
    out.line("    };");
    out.line(
      `    return ${target}_provider_resolver(entrypoint_strings + ` +
        `${ownOffset} /* "${fn.name}" */,`
    );
    out.line("                                providers, entrypoints);");
  }

  out.line("}");
  out.line();
};

/**
 * Thunk line: the macro expands to the resolver-calling stubs for the
 * process-wide pointer and for the per-thread table.
 */
const writeThunk = (
  out: CodeWriter,
  context: SourceContext,
  fn: ApiFunction
): void => {
  const args = forwardedArguments(fn);
  if (!args.ok) {
    context.diagnostics.push(
      createDiagnostic(
        "DGN6002",
        "error",
        `GLhandleARB argument ${args.error + 1} of ${fn.name} is beyond the 6th register position`,
        {
          file: `${context.model.target}_generated_dispatch.c`,
          element: `command ${fn.name}`,
        }
      )
    );
    return;
  }
  const symbol = dispatchSymbolName(fn);
  const decl = paramDeclarations(fn);
  if (fn.returnType === "void") {
    out.line(`GEN_THUNKS(${symbol}, (${decl}), (${args.value}))`);
  } else {
    out.line(
      `GEN_THUNKS_RET(${fn.returnType}, ${symbol}, (${decl}), (${args.value}))`
    );
  }
};

const writeDispatchTablePlumbing = (
  out: CodeWriter,
  context: SourceContext
): void => {
  const { target, functions } = context.model;
  const { symbolPrefix } = context.options;

  out.line("#if USING_DISPATCH_TABLE");
  out.line("static struct dispatch_table resolver_table = {");
  for (const fn of functions) {
    const symbol = dispatchSymbolName(fn);
    out.line(
      `    ${symbolPrefix}${symbol}_dispatch_table_rewrite_ptr, /* ${symbol} */`
    );
  }
  out.line("};");
  out.line();
  out.line(`uint32_t ${target}_tls_index;`);
  out.line(`uint32_t ${target}_tls_size = sizeof(struct dispatch_table);`);
  out.line();
  out.line("static inline struct dispatch_table *");
  out.line("get_dispatch_table(void)");
  out.line("{");
  out.line(`\treturn TlsGetValue(${target}_tls_index);`);
  out.line("}");
  out.line();
  out.line("void");
  out.line(`${target}_init_dispatch_table(void)`);
  out.line("{");
  out.line("    struct dispatch_table *dispatch_table = get_dispatch_table();");
  out.line(
    "    memcpy(dispatch_table, &resolver_table, sizeof(resolver_table));"
  );
  out.line("}");
  out.line();
  out.line("void");
  out.line(`${target}_switch_to_dispatch_table(void)`);
  out.line("{");
  for (const fn of functions) {
    const symbol = dispatchSymbolName(fn);
    out.line(
      `    ${symbolPrefix}${symbol} = ${symbolPrefix}${symbol}_dispatch_table_thunk;`
    );
  }
  out.line("}");
  out.line();
  out.line("#endif /* !USING_DISPATCH_TABLE */");
};

/**
 * Emit `<target>_generated_dispatch.c`
 */
export const emitDispatchSource = (
  model: DispatchModel,
  options: Partial<EmitterOptions> = {}
): Result<string, readonly Diagnostic[]> => {
  const labels = labelTable(model.providers);
  if (labels.size >= MAX_LABEL_TABLE_SIZE) {
    return error([
      createDiagnostic(
        "DGN6001",
        "error",
        `Provider label table is ${labels.size} bytes; 16-bit offsets allow at most ${MAX_LABEL_TABLE_SIZE - 1}`,
        { file: `${model.target}_generated_dispatch.c` }
      ),
    ]);
  }

  const context: SourceContext = {
    model,
    options: resolveOptions(options),
    labels,
    entryPoints: entryPointTable(model.functions),
    diagnostics: [],
  };
  const { target, functions, plans } = model;
  const { symbolPrefix, headerDirectory } = context.options;
  const out = new CodeWriter();

  out
    .append(generatedFileComment("GL dispatch code.", model.comment))
    .line()
    .line('#include "config.h"')
    .line()
    .line("#include <stdlib.h>")
    .line("#include <string.h>")
    .line("#include <stdio.h>")
    .line()
    .line('#include "dispatch_common.h"')
    .line(`#include "${headerDirectory}/${target}.h"`)
    .line()
    .line("#ifdef __GNUC__")
    .line("#define EPOXY_NOINLINE __attribute__((noinline))")
    .line("#elif defined (_MSC_VER)")
    .line("#define EPOXY_NOINLINE __declspec(noinline)")
    .line("#endif");

  out.line("struct dispatch_table {");
  for (const fn of functions) {
    out.line(
      `    ${pointerTypeName(fn)} ${symbolPrefix}${dispatchSymbolName(fn)};`
    );
  }
  out.line("};");
  out.line();

  // Forward declaration keeps the resolvers, the interesting part, near
  // the top of the file.
  out.line("#if USING_DISPATCH_TABLE");
  out.line("static inline struct dispatch_table *");
  out.line("get_dispatch_table(void);");
  out.line();
  out.line("#endif");

  writeProviderEnum(out, context);
  writeLabelStrings(out, context);
  writeEntryPointStrings(out, context);
  writeProviderResolver(out, context);

  for (const fn of functions) {
    const plan = plans[fn.index];
    if (plan) {
      writeFunctionResolver(out, context, fn, plan);
    }
  }

  for (const fn of functions) {
    writeThunk(out, context, fn);
  }
  out.line();

  writeDispatchTablePlumbing(out, context);

  for (const fn of functions) {
    const symbol = dispatchSymbolName(fn);
    out.line(
      `${pointerTypeName(fn)} ${symbolPrefix}${symbol} = ${symbolPrefix}${symbol}_global_rewrite_ptr;`
    );
    out.line();
  }

  return context.diagnostics.length > 0
    ? error(context.diagnostics)
    : ok(out.toString());
};
