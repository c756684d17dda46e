import { GmlError } from "../errors";

export type XmlAttributes = Record<string, string | number | null | undefined>;

export function escapeXml(value: unknown): string {
  const str = String(value ?? "");
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function xmlAttr(name: string, value: unknown): string {
  if (value === undefined || value === null || value === "") {
    return "";
  }
  return ` ${name}="${escapeXml(value)}"`;
}

export function xmlAttrs(attrs: XmlAttributes): string {
  return Object.entries(attrs)
    .map(([name, value]) => xmlAttr(name, value))
    .join("");
}

export function xmlTag(
  prefix: string | undefined,
  name: string,
  attrs: XmlAttributes,
  inner: string
): string {
  if (!name) {
    throw new GmlError(`No tag name supplied for prefix "${prefix ?? ""}"`, { prefix, attrs });
  }
  const qualified = prefix ? `${prefix}:${name}` : name;
  return `<${qualified}${xmlAttrs(attrs)}>${inner}</${qualified}>`;
}

export function asArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

// skips null, undefined and ""
export function pickFirst<T>(...values: Array<T | undefined | null>): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null && value !== "") {
      return value;
    }
  }
  return undefined;
}

export function literalToXml(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return escapeXml(value);
  }

  return escapeXml(JSON.stringify(value));
}
