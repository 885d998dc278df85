import { XMLParser } from "fast-xml-parser";

export interface XmlElement {
  tag: string;
  attrs: Record<string, string>;
  children: XmlElement[];
  /** Concatenated direct text content. */
  text: string;
}

const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";
const ATTR_PREFIX = "@_";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarToString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function readAttrs(value: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(value)) return attrs;
  for (const [key, raw] of Object.entries(value)) {
    const name = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
    attrs[name] = scalarToString(raw);
  }
  return attrs;
}

function toElements(nodes: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  let text = "";
  if (!Array.isArray(nodes)) return { elements, text };

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRS_KEY) continue;
      if (key === TEXT_KEY) {
        text += scalarToString(value);
        continue;
      }
      if (key.startsWith("?") || key.startsWith("!")) continue;

      const nested = toElements(value);
      elements.push({
        tag: key,
        attrs: readAttrs(node[ATTRS_KEY]),
        children: nested.elements,
        text: nested.text,
      });
    }
  }
  return { elements, text };
}

export function parseXml(xml: string): XmlElement[] {
  return toElements(parser.parse(xml)).elements;
}

export function child(element: XmlElement | undefined, tag: string): XmlElement | undefined {
  return element?.children.find((entry) => entry.tag === tag);
}

export function children(element: XmlElement | undefined, tag: string): XmlElement[] {
  return element ? element.children.filter((entry) => entry.tag === tag) : [];
}

/** Follows a chain of first-match child tags. */
export function path(element: XmlElement | undefined, ...tags: string[]): XmlElement | undefined {
  let current = element;
  for (const tag of tags) {
    current = child(current, tag);
    if (!current) return undefined;
  }
  return current;
}

/** All descendants with the given tag, depth-first in document order. */
export function descendants(element: XmlElement | undefined, tag: string): XmlElement[] {
  const out: XmlElement[] = [];
  const walk = (node: XmlElement): void => {
    for (const entry of node.children) {
      if (entry.tag === tag) out.push(entry);
      walk(entry);
    }
  };
  if (element) walk(element);
  return out;
}
