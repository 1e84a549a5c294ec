// src/frontmatter.ts

import YAML from "yaml";
import { MalformedRecordError } from "./errors.js";
import type { Metadata, MetadataValue, ParsedRecord, RecordFormat, Scalar } from "./types.js";

const BOM = "\uFEFF";
const OPEN = /^---(\r?\n)/;
const CLOSE = /(?:^|\r?\n)---(?:\r?\n|$)/;

/** Keys written back as canonical `yes` / `no`. */
export const FLAG_KEYS = ["sent-to-kindle", "liked"] as const;

interface Edit {
  start: number;
  end: number;
  text: string;
}

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function toMetadataValue(key: string, value: unknown, id?: string): MetadataValue {
  if (isScalar(value)) return value;
  if (Array.isArray(value) && value.every(isScalar)) return value;
  throw new MalformedRecordError(`Front matter key "${key}" is not a scalar or a list of scalars`, id);
}

function parseHeader(header: string, id?: string): Metadata {
  const doc = YAML.parseDocument(header);
  if (doc.errors.length > 0) {
    throw new MalformedRecordError(`Front matter is not valid YAML: ${doc.errors[0].message}`, id);
  }

  const data: unknown = doc.toJS();
  if (data === null || data === undefined) return {};
  if (typeof data !== "object" || Array.isArray(data)) {
    throw new MalformedRecordError("Front matter is not a key/value mapping", id);
  }

  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(data)) {
    metadata[key] = toMetadataValue(key, value, id);
  }
  return metadata;
}

/**
 * Splits a record into its front matter and body. A file without a leading
 * `---` line has no front matter and its whole text is the body. A leading
 * byte order mark and CRLF delimiters are accepted and remembered in
 * `format`, so that writing the record back keeps them.
 */
export function parseRecord(raw: string, id?: string): ParsedRecord {
  const bom = raw.startsWith(BOM);
  const text = bom ? raw.slice(BOM.length) : raw;
  const open = OPEN.exec(text);

  if (!open) {
    const eol: RecordFormat["eol"] = text.includes("\r\n") ? "\r\n" : "\n";
    if (!bom && eol === "\n") return { metadata: {}, body: text };
    return { metadata: {}, body: text, format: { bom, eol } };
  }

  const eol: RecordFormat["eol"] = open[1] === "\r\n" ? "\r\n" : "\n";
  const rest = text.slice(open[0].length);
  const close = CLOSE.exec(rest);
  if (!close) {
    throw new MalformedRecordError("Front matter is not terminated", id);
  }

  const header = rest.slice(0, close.index).replace(/\r\n/g, "\n");
  return {
    metadata: parseHeader(header, id),
    body: rest.slice(close.index + close[0].length),
    format: { bom, eol, header },
  };
}

export function isYes(value: MetadataValue | undefined): boolean {
  if (value === true) return true;
  if (typeof value !== "string") return false;
  return ["yes", "y", "true", "on"].includes(value.trim().toLowerCase());
}

function isNo(value: MetadataValue | undefined): boolean {
  if (value === false) return true;
  if (typeof value !== "string") return false;
  return ["no", "n", "false", "off"].includes(value.trim().toLowerCase());
}

function canonical(key: string, value: MetadataValue): MetadataValue {
  if (!FLAG_KEYS.some((flag) => flag === key)) return value;
  if (isYes(value)) return "yes";
  if (isNo(value)) return "no";
  return value;
}

function sameValue(a: MetadataValue, b: MetadataValue | undefined): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => Object.is(v, b[i]));
  }
  return Object.is(a, b);
}

/** Block collections end after their last line break; edits stop before it. */
function trimEnd(text: string, end: number): number {
  while (end > 0 && /\s/.test(text[end - 1])) end--;
  return end;
}

/** One `key: value` entry; lists are written in flow style when `flow` is set. */
function renderEntry(key: string, value: MetadataValue, flow: boolean): string {
  const doc = new YAML.Document({ [key]: value });
  if (flow) {
    YAML.visit(doc, {
      Seq(_, seq) {
        seq.flow = true;
      },
    });
  }
  return doc.toString({ lineWidth: 0, nullStr: "", flowCollectionPadding: false }).replace(/\n$/, "").replace(/: $/, ":");
}

function renderHeader(metadata: Metadata): string {
  const normalized: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) normalized[key] = canonical(key, value);
  return YAML.stringify(normalized, { lineWidth: 0, nullStr: "" }).replace(/\n$/, "");
}

/**
 * Rewrites only the entries of `header` whose value differs from `next`.
 * Comments, quoting, number spelling and key order of everything else stay
 * as they were; new keys go at the end, removed keys lose their line.
 */
function editHeader(header: string, next: Metadata): string {
  const doc = YAML.parseDocument(header);
  const map = doc.contents;
  const pairs = YAML.isMap(map) && !map.flow ? map.items : map === null ? [] : undefined;
  if (!pairs) return renderHeader(next);

  const previous = parseHeader(header);
  const edits: Edit[] = [];
  const seen = new Set<string>();
  let indent = "";

  for (const pair of pairs) {
    const range = YAML.isNode(pair.key) ? pair.key.range : undefined;
    if (!range) return renderHeader(next);

    const key = String(YAML.isScalar(pair.key) ? pair.key.value : pair.key);
    seen.add(key);
    indent = header.slice(header.lastIndexOf("\n", range[0] - 1) + 1, range[0]);

    const valueRange = YAML.isNode(pair.value) ? pair.value.range : undefined;
    const valueEnd = valueRange && valueRange[1] > valueRange[0] ? trimEnd(header, valueRange[1]) : undefined;

    if (!Object.hasOwn(next, key)) {
      const lineEnd = header.indexOf("\n", valueEnd ?? range[1]);
      const lineStart = range[0] - indent.length;
      edits.push(
        lineEnd < 0
          ? { start: Math.max(lineStart - 1, 0), end: header.length, text: "" }
          : { start: lineStart, end: lineEnd + 1, text: "" }
      );
      continue;
    }

    const value = canonical(key, next[key]);
    if (sameValue(value, previous[key])) continue;

    const colon = header.indexOf(":", range[1]);
    const flow = YAML.isCollection(pair.value) && pair.value.flow === true;
    const text = renderEntry("v", value, flow).slice("v:".length);
    edits.push({ start: colon + 1, end: valueEnd ?? colon + 1, text: text.replace(/\n/g, `\n${indent}`) });
  }

  let out = header;
  for (const edit of edits.sort((a, b) => b.start - a.start)) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }

  const added = Object.keys(next)
    .filter((key) => !seen.has(key))
    .map((key) => indent + renderEntry(key, canonical(key, next[key]), false).replace(/\n/g, `\n${indent}`));
  if (added.length === 0) return out;
  return out === "" ? added.join("\n") : `${out.replace(/\n$/, "")}\n${added.join("\n")}`;
}

/**
 * Writes a record back. With the `format` it was read with, the front matter
 * is edited in place and the byte order mark and line endings are kept;
 * without one, a fresh header is written. Flags are always written as
 * `yes` / `no`. The body is never touched.
 */
export function serializeRecord(metadata: Metadata, body: string, format?: RecordFormat): string {
  const bom = format?.bom ? BOM : "";
  const eol = format?.eol ?? "\n";

  let header: string;
  if (format?.header !== undefined) header = editHeader(format.header, metadata);
  else if (Object.keys(metadata).length > 0) header = renderHeader(metadata);
  else return bom + body;

  const block = header === "" ? "---\n---\n" : `---\n${header}\n---\n`;
  return bom + block.replace(/\n/g, eol) + body;
}

export function wordCount(body: string): number {
  return body.split(/\s+/).filter((w) => w.length > 0).length;
}

/** String form of a metadata value for display and date handling. */
export function metaString(value: MetadataValue | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) {
    const parts = value.filter((v): v is string | number | boolean => v !== null).map(String);
    return parts.length ? parts.join(", ") : undefined;
  }
  const s = String(value).trim();
  return s === "" ? undefined : s;
}

export function titleOf(record: { id: string; metadata: Metadata }): string {
  return metaString(record.metadata.title) ?? record.id.replace(/\.md$/, "");
}

/** Author for display; wiki links such as `[[Jane Doe]]` lose their brackets. */
export function authorOf(metadata: Metadata): string | undefined {
  const value = metadata.author;
  const values: Array<Scalar | undefined> = Array.isArray(value) ? value : [value];
  const names = values
    .map((v) => metaString(v ?? undefined)?.replace(/^\[+|\]+$/g, ""))
    .filter((v): v is string => Boolean(v));
  return names.length ? names.join(", ") : undefined;
}

/** `created`, else `published`; the date shown next to an article. */
export function dateOf(metadata: Metadata): string | undefined {
  return metaString(metadata.created) ?? metaString(metadata.published);
}
