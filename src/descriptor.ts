// src/descriptor.ts
//
// ComicInfo.xml to MetadataMap.

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "./errors.js";
import {
  coerceValue,
  fieldFor,
  isFieldKey,
  normalizeIssueNumber,
  type MetadataMap,
} from "./metadata.js";

const ROOT_ELEMENT = "ComicInfo";

// nested structures we do not index
const SKIPPED_ELEMENTS = new Set(["Pages"]);

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
});

export interface ParseDescriptorOptions {
  /** archive path, for error reporting */
  path?: string;
  /** page count from the archive listing; used when the descriptor has none */
  pageCount?: number | null;
}

function decodeText(input: Buffer | string): string {
  const text = typeof input === "string" ? input : input.toString("utf8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function scalarText(v: unknown): string | null {
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return null;
}

// repeated elements come back as arrays; list fields keep every value
function elementText(raw: unknown, joinAll: boolean): string | null {
  if (!Array.isArray(raw)) return scalarText(raw);
  const parts = raw
    .map(scalarText)
    .filter((s): s is string => s !== null && s.trim() !== "");
  if (!parts.length) return null;
  return joinAll ? parts.join(",") : parts[parts.length - 1];
}

function findRoot(doc: unknown, path?: string): Record<string, unknown> {
  if (isRecord(doc)) {
    const key = Object.keys(doc).find(
      (k) => k.toLowerCase() === ROOT_ELEMENT.toLowerCase(),
    );
    if (key !== undefined) {
      const root = doc[key];
      if (isRecord(root)) return root;
      // <ComicInfo/> or <ComicInfo></ComicInfo>
      if (root === "" || root === null || root === undefined) return {};
    }
  }
  throw new ParseError(`missing <${ROOT_ELEMENT}> root element`, path);
}

/**
 * Parse descriptor bytes into a metadata map. Elements are matched by name;
 * unknown elements are kept as strings and empty ones are dropped.
 */
export function parseDescriptor(
  input: Buffer | string,
  opts: ParseDescriptorOptions = {},
): MetadataMap {
  const text = decodeText(input);
  if (!text.trim()) {
    throw new ParseError("descriptor is empty", opts.path);
  }
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    const { msg, line, col } = valid.err;
    throw new ParseError(
      `malformed descriptor at ${line}:${col}: ${msg}`,
      opts.path,
    );
  }
  let doc: unknown;
  try {
    doc = parser.parse(text);
  } catch (err) {
    throw new ParseError("malformed descriptor", opts.path, { cause: err });
  }

  const out: MetadataMap = {};
  for (const [element, raw] of Object.entries(findRoot(doc, opts.path))) {
    if (SKIPPED_ELEMENTS.has(element)) continue;
    const spec = fieldFor(element);
    if (!isFieldKey(spec.key)) continue;
    const textValue = elementText(raw, spec.type === "list");
    if (textValue === null) continue;
    const value = coerceValue(spec.type, textValue);
    if (!value) continue;
    if (spec.key === "number" && value.type === "string") {
      value.value = normalizeIssueNumber(value.value);
    }
    out[spec.key] = value;
  }

  if (!out.pageCount && opts.pageCount) {
    out.pageCount = { type: "int", value: opts.pageCount };
  }
  return out;
}

/** Metadata for an archive without a descriptor. */
export function emptyDescriptor(pageCount: number | null): MetadataMap {
  return pageCount ? { pageCount: { type: "int", value: pageCount } } : {};
}
