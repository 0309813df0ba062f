/**
 * Ordered XML document tree.
 *
 * Registry markup mixes text and elements inside one element
 * (`<param>const <ptype>GLchar</ptype> *<name>source</name></param>`), so the
 * document is parsed in order-preserving mode and converted into a small
 * typed tree that keeps text runs in place.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";

export type XmlText = {
  readonly kind: "text";
  readonly text: string;
};

export type XmlElement = {
  readonly kind: "element";
  readonly name: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly XmlNode[];
};

export type XmlNode = XmlText | XmlElement;

export type XmlSyntaxError = {
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
};

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const scalarText = (value: unknown): string =>
  typeof value === "string" ? value : String(value);

const convertAttributes = (raw: unknown): ReadonlyMap<string, string> => {
  const attributes = new Map<string, string>();
  if (!isRecord(raw)) return attributes;
  for (const [name, value] of Object.entries(raw)) {
    attributes.set(name, scalarText(value));
  }
  return attributes;
};

const convertNodes = (raw: unknown): XmlNode[] => {
  if (!Array.isArray(raw)) return [];
  const entries: readonly unknown[] = raw;
  const nodes: XmlNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ kind: "text", text: scalarText(value) });
        continue;
      }
      nodes.push({
        kind: "element",
        name: key,
        attributes: convertAttributes(entry[ATTRIBUTES_KEY]),
        children: convertNodes(value),
      });
    }
  }

  return nodes;
};

/**
 * Parse an XML document into its top-level nodes.
 */
export const parseXml = (
  text: string
): Result<readonly XmlNode[], XmlSyntaxError> => {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return error({
      message: validation.err.msg,
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const parsed: unknown = parser.parse(text);
  return ok(convertNodes(parsed));
};

export const isElement = (node: XmlNode): node is XmlElement =>
  node.kind === "element";

/**
 * Direct child elements, optionally filtered by tag name
 */
export const childElements = (
  element: XmlElement,
  name?: string
): readonly XmlElement[] =>
  element.children.filter(
    (child): child is XmlElement =>
      isElement(child) && (name === undefined || child.name === name)
  );

export const firstChild = (
  element: XmlElement,
  name: string
): XmlElement | undefined =>
  element.children.find(
    (child): child is XmlElement => isElement(child) && child.name === name
  );

/**
 * All elements reached by a slash-separated path of tag names,
 * e.g. `commands/command` or `require/command`.
 */
export const elementsAt = (
  element: XmlElement,
  path: string
): readonly XmlElement[] =>
  path
    .split("/")
    .reduce<readonly XmlElement[]>(
      (current, segment) =>
        current.flatMap((parent) => childElements(parent, segment)),
      [element]
    );

export const attribute = (
  element: XmlElement,
  name: string
): string | undefined => element.attributes.get(name);

/**
 * Concatenated text of an element and all of its descendants
 */
export const textContent = (node: XmlNode): string =>
  node.kind === "text" ? node.text : node.children.map(textContent).join("");

/**
 * Text of an element up to (not including) its first child element named
 * `stop`. Used to read C declarations such as a return type in front of
 * `<name>`.
 */
export const textBefore = (element: XmlElement, stop: string): string => {
  let text = "";
  for (const child of element.children) {
    if (child.kind === "element" && child.name === stop) break;
    text += textContent(child);
  }
  return text;
};
