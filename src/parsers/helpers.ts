import { XMLParser } from "fast-xml-parser";
import { asArray } from "../utils/xml";

export type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  trimValues: true,
  parseTagValue: true,
  parseAttributeValue: false,
  allowBooleanAttributes: true
});

export function parseXml(xml: string): unknown {
  return parser.parse(xml);
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function localName(name: string): string {
  const index = name.indexOf(":");
  return index >= 0 ? name.slice(index + 1) : name;
}

export function getNodeByLocalName(root: unknown, expected: string): XmlNode | undefined {
  if (!root || typeof root !== "object") {
    return undefined;
  }

  for (const [key, value] of Object.entries(root)) {
    if (localName(key) === expected && isXmlNode(value)) {
      return value;
    }

    if (value && typeof value === "object") {
      const nested = getNodeByLocalName(value, expected);
      if (nested) {
        return nested;
      }
    }
  }

  return undefined;
}

export function collectNodesByLocalName(
  root: unknown,
  expected: string,
  out: XmlNode[] = []
): XmlNode[] {
  if (!root || typeof root !== "object") {
    return out;
  }

  for (const [key, value] of Object.entries(root)) {
    if (localName(key) === expected) {
      for (const item of asArray<unknown>(value)) {
        if (isXmlNode(item)) {
          out.push(item);
        }
      }
    }

    if (value && typeof value === "object") {
      collectNodesByLocalName(value, expected, out);
    }
  }

  return out;
}

export function collectTextValuesByLocalName(
  root: unknown,
  expected: string,
  out: string[] = []
): string[] {
  if (!root || typeof root !== "object") {
    return out;
  }

  for (const [key, value] of Object.entries(root)) {
    if (localName(key) === expected) {
      for (const item of asArray<unknown>(value)) {
        const text = valueText(item);
        if (text !== undefined) {
          out.push(text);
        }
      }
    }

    if (value && typeof value === "object") {
      collectTextValuesByLocalName(value, expected, out);
    }
  }

  return out;
}

export function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return value === undefined || value === null ? undefined : String(value);
}

export function valueText(node: unknown): string | undefined {
  if (node === null || node === undefined) {
    return undefined;
  }

  if (typeof node === "string" || typeof node === "number" || typeof node === "boolean") {
    return String(node);
  }

  if (isXmlNode(node)) {
    const direct = node["#text"];
    if (direct !== undefined && direct !== null) {
      return String(direct);
    }

    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith("@_")) {
        continue;
      }
      const nested = valueText(value);
      if (nested !== undefined) {
        return nested;
      }
    }
  }

  return undefined;
}
