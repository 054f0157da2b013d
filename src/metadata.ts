// src/metadata.ts
//
// Metadata is an open mapping from field name to a tagged value. Known
// ComicInfo elements have a declared type; anything else is kept as a string
// so newer descriptors never fail to load.

export type MetadataValue =
  | { type: "string"; value: string }
  | { type: "int"; value: number }
  | { type: "list"; value: string[] };

export type MetadataType = MetadataValue["type"];

export type MetadataMap = Record<string, MetadataValue>;

export interface FieldSpec {
  key: string;
  type: MetadataType;
}

const INT_FIELDS = [
  "Count",
  "Volume",
  "AlternateCount",
  "Year",
  "Month",
  "Day",
  "PageCount",
];

const LIST_FIELDS = [
  "Writer",
  "Penciller",
  "Inker",
  "Colorist",
  "Letterer",
  "CoverArtist",
  "Editor",
  "Translator",
  "Genre",
  "Tags",
  "Characters",
  "Teams",
  "Locations",
  "StoryArc",
  "SeriesGroup",
];

const STRING_FIELDS = [
  "Title",
  "Series",
  "Number",
  "AlternateSeries",
  "AlternateNumber",
  "Summary",
  "Notes",
  "Publisher",
  "Imprint",
  "Web",
  "LanguageISO",
  "Format",
  "BlackAndWhite",
  "Manga",
  "AgeRating",
  "ScanInformation",
  "GTIN",
];

// assigning these on a plain object would touch the prototype chain
const RESERVED_KEYS = new Set(["__proto__", "constructor", "prototype"]);

export function isFieldKey(key: string): boolean {
  return key !== "" && !RESERVED_KEYS.has(key);
}

function keyFor(element: string): string {
  return element.charAt(0).toLowerCase() + element.slice(1);
}

function specs(elements: string[], type: MetadataType): [string, FieldSpec][] {
  return elements.map((e): [string, FieldSpec] => [e, { key: keyFor(e), type }]);
}

export const COMICINFO_FIELDS: ReadonlyMap<string, FieldSpec> = new Map([
  ...specs(INT_FIELDS, "int"),
  ...specs(LIST_FIELDS, "list"),
  ...specs(STRING_FIELDS, "string"),
]);

export function fieldFor(element: string): FieldSpec {
  return (
    COMICINFO_FIELDS.get(element) ?? { key: keyFor(element), type: "string" }
  );
}

/**
 * Build a tagged value from descriptor text. Returns null for empty input.
 * An int field whose text is not an integer keeps the raw text as a string.
 */
export function coerceValue(
  type: MetadataType,
  raw: string,
): MetadataValue | null {
  const text = raw.trim();
  if (!text) return null;
  switch (type) {
    case "int": {
      if (/^[+-]?\d+$/.test(text)) {
        return { type: "int", value: Number.parseInt(text, 10) };
      }
      return { type: "string", value: text };
    }
    case "list": {
      const items = splitList(text);
      return items.length ? { type: "list", value: items } : null;
    }
    case "string":
      return { type: "string", value: text };
  }
}

export function splitList(text: string): string[] {
  const out: string[] = [];
  for (const part of text.split(/[,;]/)) {
    const item = part.trim();
    if (item && !out.includes(item)) out.push(item);
  }
  return out;
}

/**
 * "12.0" -> "12", "012.0" -> "012"; other values ("12.1", "012.1", "12.HU")
 * pass through unchanged.
 */
export function normalizeIssueNumber(raw: string): string {
  const text = raw.trim();
  const m = /^(\d+)\.0+$/.exec(text);
  return m ? m[1] : text;
}

export function getString(map: MetadataMap, key: string): string | null {
  const v = map[key];
  if (!v) return null;
  if (v.type === "string") return v.value;
  if (v.type === "int") return String(v.value);
  return v.value.join(", ");
}

export function getInt(map: MetadataMap, key: string): number | null {
  const v = map[key];
  return v?.type === "int" ? v.value : null;
}

export function getList(map: MetadataMap, key: string): string[] {
  const v = map[key];
  if (!v) return [];
  if (v.type === "list") return [...v.value];
  return [String(v.value)];
}

// ---------- persistence ----------

export function encodeMetadata(map: MetadataMap): string {
  const sorted: MetadataMap = {};
  for (const key of Object.keys(map).sort()) {
    sorted[key] = map[key];
  }
  return JSON.stringify(sorted);
}

/**
 * Decode stored metadata. Missing or unreadable input decodes to an empty map,
 * and entries with unknown tags are dropped, so rows written by other schema
 * versions still load.
 */
export function decodeMetadata(raw: string | null | undefined): MetadataMap {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (!isObject(parsed)) return {};
  const out: MetadataMap = {};
  for (const [key, entry] of Object.entries(parsed)) {
    const value = decodeValue(entry);
    if (value && isFieldKey(key)) out[key] = value;
  }
  return out;
}

function decodeValue(entry: unknown): MetadataValue | null {
  if (!isObject(entry)) return null;
  const { type, value } = entry;
  if (type === "string" && typeof value === "string") {
    return { type: "string", value };
  }
  if (type === "int" && typeof value === "number" && Number.isInteger(value)) {
    return { type: "int", value };
  }
  if (
    type === "list" &&
    Array.isArray(value) &&
    value.every((v): v is string => typeof v === "string")
  ) {
    return { type: "list", value: [...value] };
  }
  return null;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
