/**
 * C text helpers shared by the emitters
 */

import {
  type ApiFunction,
  type Result,
  ok,
  error,
} from "@dispatchgen/frontend";

/**
 * Line-oriented output buffer
 */
export class CodeWriter {
  private readonly lines: string[] = [];

  line(text = ""): this {
    this.lines.push(text);
    return this;
  }

  append(texts: readonly string[]): this {
    this.lines.push(...texts);
    return this;
  }

  /** Raw text that already carries its own newlines */
  raw(text: string): this {
    if (text === "") return this;
    const parts = text.split("\n");
    // A trailing newline terminates the last line instead of opening one.
    if (parts[parts.length - 1] === "") parts.pop();
    this.lines.push(...parts);
    return this;
  }

  toString(): string {
    return this.lines.join("\n") + "\n";
  }
}

/**
 * Copyright block lines from the registry comment, stopping at the first
 * separator line.
 */
export const copyrightCommentLines = (comment: string): readonly string[] => {
  const lines: string[] = [];
  for (const line of comment.split(/\r?\n/)) {
    if (line.includes("-----")) break;
    lines.push(` * ${line}`);
  }
  return lines;
};

/**
 * Opening comment of a generated file
 */
export const generatedFileComment = (
  title: string,
  comment: string
): readonly string[] => [
  `/* ${title}`,
  " * This is code-generated from the GL API XML files from Khronos.",
  ...copyrightCommentLines(comment),
  " */",
];

/**
 * C parameter declaration list, `void` when empty
 */
export const paramDeclarations = (fn: ApiFunction): string =>
  fn.params.length > 0
    ? fn.params.map((param) => `${param.type} ${param.name}`).join(", ")
    : "void";

/** Register-passed argument slots in the x86_64 calling convention */
const REGISTER_ARGUMENTS = 6;

/**
 * Argument list forwarded by a thunk.
 *
 * GLhandleARB is `void *` on Apple and 32-bit elsewhere while the registry
 * aliases functions across both spellings; forwarding through `uintptr_t`
 * keeps the call compatible as long as the argument travels in a register.
 * Fails with the position of the first handle argument that does not.
 */
export const forwardedArguments = (fn: ApiFunction): Result<string, number> => {
  const names: string[] = [];
  for (const [position, param] of fn.params.entries()) {
    if (param.type === "GLhandleARB") {
      if (position >= REGISTER_ARGUMENTS) {
        return error(position);
      }
      names.push(`(uintptr_t)${param.name}`);
    } else {
      names.push(param.name);
    }
  }
  return ok(names.join(", "));
};

/**
 * Length in bytes of a C string literal body, ignoring escape backslashes
 */
export const literalLength = (text: string): number =>
  Buffer.byteLength(text.replaceAll("\\", ""), "utf-8");

export const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;
