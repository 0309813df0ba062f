/**
 * Registry loader - reads a Khronos API registry XML document into raw
 * entities.
 *
 * No policy is applied here beyond dropping typedefs that only exist for a
 * specific API profile; building the function model is the job of
 * model/builder.ts.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { createDiagnostic, fault } from "../types/diagnostic.js";
import type {
  RawCommand,
  RawEnum,
  RawExtension,
  RawFeature,
  RawParam,
  RawTypedef,
  Registry,
} from "./types.js";
import {
  type XmlElement,
  attribute,
  childElements,
  elementsAt,
  firstChild,
  isElement,
  parseXml,
  textBefore,
  textContent,
} from "./xml.js";

/**
 * Typedefs that carry a `name` attribute are normally redundant with the
 * platform headers; this one is not.
 */
const NAMED_TYPEDEFS_KEPT: ReadonlySet<string> = new Set(["GLhandleARB"]);

const requireAttribute = (
  element: XmlElement,
  name: string,
  location: SourceLocation,
  diagnostics: Diagnostic[]
): string => {
  const value = attribute(element, name);
  if (value === undefined) {
    diagnostics.push(
      createDiagnostic(
        "DGN1004",
        "error",
        `<${element.name}> is missing the '${name}' attribute`,
        location
      )
    );
    return "";
  }
  return value;
};

/**
 * Text nodes directly following `child` inside `parent`, up to the next
 * element.
 */
const tailOf = (parent: XmlElement, child: XmlElement): string => {
  const index = parent.children.indexOf(child);
  let tail = "";
  for (const node of parent.children.slice(index + 1)) {
    if (node.kind === "element") break;
    tail += node.text;
  }
  return tail;
};

const parseTypedef = (element: XmlElement): RawTypedef => {
  const nameElement = firstChild(element, "name");
  const firstElement = element.children.find(isElement);
  return {
    prefix: firstElement
      ? textBefore(element, firstElement.name)
      : textContent(element),
    name: nameElement ? textContent(nameElement) : "",
    postfix: nameElement ? tailOf(element, nameElement) : "",
    isApiEntry: firstChild(element, "apientry") !== undefined,
  };
};

const parseTypedefs = (registry: XmlElement): readonly RawTypedef[] =>
  elementsAt(registry, "types/type")
    .filter((type) => {
      const name = attribute(type, "name");
      if (name !== undefined && !NAMED_TYPEDEFS_KEPT.has(name)) return false;
      // gles1/gles2 variants redeclare desktop types with different widths
      return attribute(type, "api") === undefined;
    })
    .map(parseTypedef);

const parseEnums = (
  registry: XmlElement,
  file: string,
  diagnostics: Diagnostic[]
): readonly RawEnum[] =>
  elementsAt(registry, "enums/enum").map((element) => {
    const location = { file, element: "enum" };
    const name = requireAttribute(element, "name", location, diagnostics);
    const value = requireAttribute(
      element,
      "value",
      { file, element: `enum ${name}` },
      diagnostics
    );
    const groups = (attribute(element, "group") ?? "")
      .split(",")
      .filter((group) => group !== "");
    return { name, value, groups };
  });

const parseParam = (element: XmlElement, name: string): RawParam => {
  const group = attribute(element, "group");
  return {
    type: textBefore(element, "name").trim(),
    name,
    ...(group !== undefined ? { group } : {}),
  };
};

const parseCommand = (
  element: XmlElement,
  file: string,
  diagnostics: Diagnostic[]
): RawCommand | undefined => {
  const proto = firstChild(element, "proto");
  const protoName = proto ? firstChild(proto, "name") : undefined;
  if (!proto || !protoName) {
    diagnostics.push(
      createDiagnostic(
        "DGN1004",
        "error",
        "<command> is missing <proto><name>",
        { file, element: "command" }
      )
    );
    return undefined;
  }

  const name = textContent(protoName);
  const params: RawParam[] = [];
  for (const param of childElements(element, "param")) {
    const paramName = firstChild(param, "name");
    if (!paramName) {
      diagnostics.push(
        createDiagnostic("DGN1004", "error", "<param> is missing <name>", {
          file,
          element: `command ${name}`,
        })
      );
      continue;
    }
    params.push(parseParam(param, textContent(paramName)));
  }

  // Alias targets may be declared later in the document
  // (glAttachObjectARB -> glAttachShader), so only the name is recorded.
  const aliasElement = firstChild(element, "alias");
  const alias = aliasElement ? attribute(aliasElement, "name") : undefined;

  return {
    name,
    returnType: textBefore(proto, "name").trim(),
    params,
    ...(alias !== undefined ? { alias } : {}),
  };
};

const requiredCommands = (element: XmlElement): readonly string[] =>
  elementsAt(element, "require/command").flatMap((command) => {
    const name = attribute(command, "name");
    return name === undefined ? [] : [name];
  });

const parseFeatures = (
  registry: XmlElement,
  file: string,
  diagnostics: Diagnostic[]
): readonly RawFeature[] =>
  childElements(registry, "feature").map((feature) => {
    const name = requireAttribute(
      feature,
      "name",
      { file, element: "feature" },
      diagnostics
    );
    const location = { file, element: `feature ${name}` };
    return {
      api: requireAttribute(feature, "api", location, diagnostics),
      name,
      number: requireAttribute(feature, "number", location, diagnostics),
      commands: requiredCommands(feature),
    };
  });

const parseExtensions = (
  registry: XmlElement,
  file: string,
  diagnostics: Diagnostic[]
): readonly RawExtension[] =>
  elementsAt(registry, "extensions/extension").map((extension) => {
    const name = requireAttribute(
      extension,
      "name",
      { file, element: "extension" },
      diagnostics
    );
    const supported = requireAttribute(
      extension,
      "supported",
      { file, element: `extension ${name}` },
      diagnostics
    );
    return {
      name,
      supported: supported.split("|").filter((api) => api !== ""),
      commands: requiredCommands(extension),
    };
  });

/**
 * Parse registry XML text.
 *
 * @param fileName - Used for diagnostics and recorded on the registry
 */
export const parseRegistry = (
  text: string,
  fileName: string
): Result<Registry, readonly Diagnostic[]> => {
  const parsed = parseXml(text);
  if (!parsed.ok) {
    const { line, column } = parsed.error;
    const position =
      line !== undefined ? ` at line ${line}, column ${column ?? 0}` : "";
    return error(
      fault(
        "DGN1003",
        `Malformed registry XML${position}: ${parsed.error.message}`,
        { file: fileName }
      )
    );
  }

  const registry = parsed.value.find(
    (node): node is XmlElement => isElement(node) && node.name === "registry"
  );
  if (!registry) {
    return error(
      fault("DGN1004", "Document has no <registry> root element", {
        file: fileName,
      })
    );
  }

  const diagnostics: Diagnostic[] = [];
  const commentElement = firstChild(registry, "comment");
  const commands = elementsAt(registry, "commands/command").flatMap(
    (command) => {
      const parsedCommand = parseCommand(command, fileName, diagnostics);
      return parsedCommand ? [parsedCommand] : [];
    }
  );

  const result: Registry = {
    fileName,
    comment: commentElement ? textContent(commentElement) : "",
    typedefs: parseTypedefs(registry),
    enums: parseEnums(registry, fileName, diagnostics),
    commands,
    features: parseFeatures(registry, fileName, diagnostics),
    extensions: parseExtensions(registry, fileName, diagnostics),
  };

  return diagnostics.length > 0 ? error(diagnostics) : ok(result);
};

/**
 * Load and parse a registry XML file.
 */
export const loadRegistryFile = (
  filePath: string
): Result<Registry, readonly Diagnostic[]> => {
  const fileName = path.basename(filePath);

  if (!fs.existsSync(filePath)) {
    return error(
      fault("DGN1001", `Registry file not found: ${filePath}`, {
        file: fileName,
      })
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error(
      fault(
        "DGN1002",
        `Failed to read registry file: ${err instanceof Error ? err.message : String(err)}`,
        { file: fileName }
      )
    );
  }

  return parseRegistry(content, fileName);
};

/**
 * Target name of a registry file: `gl.xml` -> `gl`
 */
export const targetNameOf = (filePath: string): string =>
  path.basename(filePath).split(".xml")[0] ?? path.basename(filePath);
