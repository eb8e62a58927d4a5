/**
 * Field-Code Locator
 *
 * AAMVA-compliant cards print a short code before each data element:
 *   "1 DOE"            family name
 *   "2 JOHN"           given names
 *   "3 DOB 01/15/1990" date of birth
 *   "4d DLN A1234567"  license number
 * Older cards use labels instead ("LN", "FN", "DATE OF BIRTH",
 * "LICENSE NUMBER"). Both kinds are markers here; a document without
 * markers simply yields no fields.
 */

import type { Logger } from "./logger.js";
import type { RawDocument } from "./types.js";

export type LogicalField = "familyName" | "givenName" | "dateOfBirth" | "documentNumber";

export const LOGICAL_FIELDS: readonly LogicalField[] = ["familyName", "givenName", "dateOfBirth", "documentNumber"];

/** Markers per logical field. Matching is case-insensitive. */
export type FieldCodeSet = Readonly<Partial<Record<LogicalField, readonly string[]>>>;

export const DEFAULT_FIELD_CODES: FieldCodeSet = Object.freeze({
  familyName:     Object.freeze(["1", "LN"]),
  givenName:      Object.freeze(["2", "FN"]),
  dateOfBirth:    Object.freeze(["3", "DOB", "D.O.B.", "DATE OF BIRTH", "BIRTH", "BORN"]),
  documentNumber: Object.freeze([
    "4d", "DLN", "DL", "LIC", "LIC#", "LICENSE#", "LICENSE NO", "LICENSE NUMBER",
    "DRIVER LICENSE#", "NUMBER#", "ID",
  ]),
});

export interface FieldCodeMatch {
  /** Captured value, marker stripped, whitespace collapsed, case preserved */
  value:     string;
  /** Line carrying the marker */
  lineIndex: number;
  /** Marker as written in the code set */
  marker:    string;
}

export type FieldCodeMatches = Partial<Record<LogicalField, FieldCodeMatch>>;

export interface DuplicateFieldCode {
  field:     LogicalField;
  kept:      FieldCodeMatch;
  ignored:   FieldCodeMatch;
}

export interface LocateOptions {
  logger?:      Logger;
  /** Called for every repeated field code after the first. */
  onDuplicate?: (dup: DuplicateFieldCode) => void;
}

// ── Marker matching ───────────────────────────────────────────────────────────

interface FlatMarker { field: LogicalField; marker: string }

const LEADING_SEPARATORS = /^[\s:#.]+/;
const SEPARATOR = /^[\s:#.]$/;

const isLetter = (ch: string) => /^[A-Za-z]$/.test(ch);
const isDigit  = (ch: string) => /^[0-9]$/.test(ch);

/**
 * What may follow a marker: a separator, or a character of the other class
 * ("1DOE", "DOB01/15/1990"). So "1" never matches "123 MAIN ST" or "1/15/1990".
 */
function endsMarker(last: string, next: string): boolean {
  if (!next || SEPARATOR.test(next)) return true;
  if (isDigit(last))  return isLetter(next);
  if (isLetter(last)) return isDigit(next);
  return true;
}

function flatten(codeSet: FieldCodeSet): FlatMarker[] {
  const flat: FlatMarker[] = [];
  for (const field of LOGICAL_FIELDS) {
    for (const marker of codeSet[field] ?? []) {
      if (marker.trim()) flat.push({ field, marker: marker.trim() });
    }
  }
  // longest first so "DLN" wins over "DL"
  return flat.sort((a, b) => b.marker.length - a.marker.length);
}

function stripMarker(text: string, marker: string): string | undefined {
  if (text.length < marker.length) return undefined;
  if (text.slice(0, marker.length).toUpperCase() !== marker.toUpperCase()) return undefined;
  const next = text.charAt(marker.length);
  if (!endsMarker(marker.charAt(marker.length - 1), next)) return undefined;
  return text.slice(marker.length).replace(LEADING_SEPARATORS, "");
}

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export interface LineFieldCode {
  field:  LogicalField;
  marker: string;
  /** Empty when the marker stands alone on its line */
  value:  string;
}

/**
 * Read the field code at the start of a single line, if any.
 * Stacked markers of the same field are stripped too ("3 DOB 01/15/1990").
 */
export function matchFieldCode(line: string, codeSet: FieldCodeSet = DEFAULT_FIELD_CODES): LineFieldCode | undefined {
  return matchFlat(line.trim(), flatten(codeSet));
}

function matchFlat(text: string, flat: readonly FlatMarker[]): LineFieldCode | undefined {
  for (const { field, marker } of flat) {
    const first = stripMarker(text, marker);
    if (first === undefined) continue;

    const sameField = flat.filter(m => m.field === field);
    let rest = first;
    for (let depth = 0; depth < 2; depth++) {
      const current = rest;
      const stacked = sameField
        .map(m => stripMarker(current, m.marker))
        .find((r): r is string => r !== undefined);
      if (stacked === undefined) break;
      rest = stacked;
    }
    return { field, marker, value: normalizeWhitespace(rest) };
  }
  return undefined;
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Find the value behind each field code in the document.
 *
 * First occurrence wins; repeats are logged and reported via onDuplicate.
 * A marker alone on its line takes the next non-empty line as its value,
 * unless that line starts with a marker itself.
 */
export function locate(
  document: RawDocument,
  codeSet:  FieldCodeSet = DEFAULT_FIELD_CODES,
  opts:     LocateOptions = {},
): FieldCodeMatches {
  const flat = flatten(codeSet);
  const found: FieldCodeMatches = {};

  document.forEach((line, lineIndex) => {
    const hit = matchFlat(line.trim(), flat);
    if (!hit) return;

    let value = hit.value;
    if (!value) {
      const next = document.slice(lineIndex + 1).map(l => l.trim()).find(l => l.length > 0);
      if (next === undefined || matchFlat(next, flat)) return;
      value = normalizeWhitespace(next);
    }

    const match: FieldCodeMatch = { value, lineIndex, marker: hit.marker };
    const kept = found[hit.field];
    if (kept) {
      opts.logger?.warn(
        `Duplicate field code "${hit.marker}" (${hit.field}) on line ${lineIndex + 1}; keeping line ${kept.lineIndex + 1}`,
      );
      opts.onDuplicate?.({ field: hit.field, kept, ignored: match });
      return;
    }
    found[hit.field] = match;
  });

  return found;
}
