/**
 * XML encoding of a job state: one element per field, field names as tags,
 * nested records as nested elements, under a `<job>` root.
 *
 * Maps become lists of `<entry><key/><value/></entry>`; arrays repeat the
 * field's element once per item, and an empty array leaves one empty element.
 */

import { XMLBuilder } from "fast-xml-parser";

export const XML_ROOT = "job";

type XmlNode = string | number | boolean | null | XmlNode[] | { [tag: string]: XmlNode };

const builder = new XMLBuilder({
  format: true,
  indentBy: "  ",
  ignoreAttributes: true,
  processEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toXmlNode(value: unknown): XmlNode {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot encode non-finite number ${value}`);
    }
    return value;
  }
  // An empty list still gets its (empty) element.
  if (Array.isArray(value)) return value.length === 0 ? "" : value.map(toXmlNode);
  if (value instanceof Map) {
    const entries: XmlNode[] = [];
    for (const [key, entry] of value) {
      if (entry !== undefined) entries.push({ key: String(key), value: toXmlNode(entry) });
    }
    return { entry: entries };
  }
  if (value instanceof Date) return value.toISOString();
  if (isRecord(value)) {
    const out: { [tag: string]: XmlNode } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) out[key] = toXmlNode(field);
    }
    return out;
  }
  throw new TypeError(`Cannot encode value of type ${typeof value}`);
}

export function encodeXml(value: unknown): string {
  const xml: unknown = builder.build({ [XML_ROOT]: toXmlNode(value) });
  if (typeof xml !== "string") {
    throw new TypeError("XML builder returned no document");
  }
  return xml;
}
