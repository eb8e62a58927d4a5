/**
 * idscan Field Extractor
 * ======================
 * Raw OCR lines in, ExtractedFields out. Four steps, no loops back:
 *
 *   1. RegionResolution         hint → header line → name mention → number shape
 *   2. NumberExtraction         first candidate fitting the region's rule
 *   3. PersonalFieldExtraction  names and date of birth from field codes only
 *   4. Assembly                 scoring + result
 *
 * Synchronous and stateless: no I/O, no clock, the input is never mutated.
 * Missing fields are reported as absent, never thrown.
 */

import { getConfig } from "./config.js";
import { scoreConfidence } from "./confidence.js";
import { parseDateOfBirth } from "./dates.js";
import { MalformedInputError, UnknownRegionError } from "./errors.js";
import { LIMITS } from "./extraction-constants.js";
import {
  DEFAULT_FIELD_CODES, locate, matchFieldCode,
  type FieldCodeMatch, type FieldCodeSet,
} from "./field-code-locator.js";
import { createLogger, type Logger } from "./logger.js";
import { collectCandidates, describeRule, findNumber, inferRegions, matchesRule } from "./pattern-matcher.js";
import { allRegions, lookup } from "./region/catalog.js";
import type { RegionRule } from "./region/region.interface.js";
import type { ExtractedFields, RawDocument, RegionSource } from "./types.js";

export interface ExtractOptions {
  /** Default: IDSCAN_MAX_LINES (200) */
  maxLines?: number;
  /** Field-code markers. Default: DEFAULT_FIELD_CODES */
  codeSet?:  FieldCodeSet;
  /** Default: stderr logger at IDSCAN_LOG_LEVEL */
  logger?:   Logger;
}

let engineLogger: Logger | undefined;

function defaultLogger(): Logger {
  engineLogger ??= createLogger("extract");
  return engineLogger;
}

// ── Text helpers ────────────────────────────────────────────────────────────────

const norm = (s: string) => s.trim().replace(/\s+/g, " ").toUpperCase();

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Lines that may name a region. Names read through a family- or given-name
 * field code ("2 GEORGIA", or "1" followed by "GEORGIA") do not count.
 */
function regionTextLines(document: RawDocument, codeSet: FieldCodeSet): string[] {
  const skip = new Set<number>();
  document.forEach((line, i) => {
    const code = matchFieldCode(line, codeSet);
    if (!code || (code.field !== "familyName" && code.field !== "givenName")) return;
    skip.add(i);
    if (code.value) return;
    const next = document.findIndex((l, j) => j > i && l.trim().length > 0);
    if (next !== -1 && !matchFieldCode(document[next], codeSet)) skip.add(next);
  });
  return document.filter((_, i) => !skip.has(i));
}

function headerIn(region: RegionRule, lines: readonly string[]): boolean {
  const name = norm(region.name);
  return lines.some(line => norm(line) === name);
}

function mentions(region: RegionRule, line: string): boolean {
  const name = escapeRegExp(region.name.trim()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?:^|[^A-Za-z])${name}(?:$|[^A-Za-z])`, "i").test(line);
}

/** The region's name is printed as a line of its own: the card header. */
export function hasHeaderLine(
  region:   RegionRule,
  document: RawDocument,
  codeSet:  FieldCodeSet = DEFAULT_FIELD_CODES,
): boolean {
  return headerIn(region, regionTextLines(document, codeSet));
}

// ── 1. RegionResolution ─────────────────────────────────────────────────────────

interface Resolution {
  region?:   RegionRule;
  source?:   RegionSource;
  ambiguous: boolean;
}

function resolveRegion(
  document:   RawDocument,
  regionHint: string | undefined,
  codeSet:    FieldCodeSet,
  warnings:   string[],
  log:        Logger,
): Resolution {
  if (regionHint !== undefined && regionHint.trim() !== "") {
    try {
      const region = lookup(regionHint);
      log.debug(`Region ${region.code} from hint`);
      return { region, source: "hint", ambiguous: false };
    } catch (err) {
      if (!(err instanceof UnknownRegionError)) throw err;
      warnings.push(`Unknown region hint "${regionHint}"; region inferred from text`);
      log.warn(`${err.message}; falling back to inference`);
    }
  }

  const catalog = allRegions();
  const lines   = regionTextLines(document, codeSet);

  for (const line of lines) {
    const header = catalog.find(r => norm(r.name) === norm(line));
    if (header) {
      log.debug(`Region ${header.code} from header line "${line.trim()}"`);
      return { region: header, source: "header", ambiguous: false };
    }
  }

  // First line naming a region wins; within it "WEST VIRGINIA" beats "VIRGINIA"
  for (const line of lines) {
    const mentioned = catalog
      .filter(r => mentions(r, line))
      .reduce<RegionRule | undefined>((best, r) => (!best || r.name.length > best.name.length ? r : best), undefined);
    if (mentioned) {
      log.debug(`Region ${mentioned.code} from name mention "${line.trim()}"`);
      return { region: mentioned, source: "mention", ambiguous: false };
    }
  }

  // A header line would have resolved above, so shared shapes fall to catalog order
  const first = inferRegions(document, codeSet)[0];
  if (first) {
    const region    = first.regions[0];
    const ambiguous = first.regions.length > 1;
    if (ambiguous) {
      const codes = first.regions.map(r => r.code).join(", ");
      warnings.push(`Number "${first.candidate.value}" fits ${codes}; chose ${region.code}`);
      log.warn(`Ambiguous region inference (${codes}) on line ${first.candidate.lineIndex + 1}; chose ${region.code}`);
    } else {
      log.debug(`Region ${region.code} inferred from number shape`);
    }
    return { region, source: "pattern", ambiguous };
  }

  log.debug("Region unresolved");
  return { ambiguous: false };
}

// ── 2. NumberExtraction ─────────────────────────────────────────────────────────

interface NumberResult {
  value?:    string;
  validated: boolean;
}

function looksLikeIdentifier(value: string): boolean {
  return value.length >= LIMITS.UNVALIDATED_NUMBER_MIN
    && value.length <= LIMITS.UNVALIDATED_NUMBER_MAX
    && /^[A-Z0-9]+$/.test(value)
    && /\d/.test(value);
}

function extractNumber(
  document: RawDocument,
  region:   RegionRule | undefined,
  codeSet:  FieldCodeSet,
  warnings: string[],
): NumberResult {
  const candidates = collectCandidates(document, codeSet);

  if (region) {
    const hit = findNumber(region.rule, candidates);
    if (hit) return { value: hit.value.trim().toUpperCase(), validated: true };
  }

  // Nothing fits a rule: fall back to whatever follows a number field code.
  const labelled = candidates
    .filter(c => c.source === "field-code")
    .map(c => c.value.replace(/[\s-]/g, "").toUpperCase())
    .find(looksLikeIdentifier);
  if (!labelled) return { validated: false };
  // "DL A123-4567" fits once the separators are gone
  if (region && matchesRule(region.rule, labelled)) return { value: labelled, validated: true };

  warnings.push(region
    ? `Document number ${labelled} does not match the ${region.code} format (${describeRule(region.rule)})`
    : `Document number ${labelled} could not be validated: region unresolved`);
  return { value: labelled, validated: false };
}

// ── 3. PersonalFieldExtraction ──────────────────────────────────────────────────

interface PersonalFields {
  familyName?:  string;
  givenName?:   string;
  dateOfBirth?: string;
}

function acceptName(label: string, match: FieldCodeMatch | undefined, warnings: string[]): string | undefined {
  if (!match) return undefined;
  if (/\d/.test(match.value) || !/\p{L}/u.test(match.value)) {
    warnings.push(`Rejected ${label} "${match.value}" on line ${match.lineIndex + 1}`);
    return undefined;
  }
  return match.value;
}

function extractPersonalFields(
  document: RawDocument,
  codeSet:  FieldCodeSet,
  warnings: string[],
  log:      Logger,
): PersonalFields {
  const located = locate(document, codeSet, {
    logger:      log,
    onDuplicate: dup => warnings.push(
      `Duplicate field code "${dup.ignored.marker}" on line ${dup.ignored.lineIndex + 1} ignored; kept line ${dup.kept.lineIndex + 1}`,
    ),
  });

  const fields: PersonalFields = {
    familyName: acceptName("family name", located.familyName, warnings),
    givenName:  acceptName("given name",  located.givenName,  warnings),
  };

  const dob = located.dateOfBirth;
  if (dob) {
    fields.dateOfBirth = parseDateOfBirth(dob.value);
    if (!fields.dateOfBirth) warnings.push(`Unreadable date of birth "${dob.value}" on line ${dob.lineIndex + 1}`);
  }
  return fields;
}

// ── Public API ──────────────────────────────────────────────────────────────────

function assertWellFormed(document: RawDocument, maxLines: number): void {
  if (document.length === 0) {
    throw new MalformedInputError("Document has no lines", 0);
  }
  if (document.length > maxLines) {
    throw new MalformedInputError(`Document has ${document.length} lines; the limit is ${maxLines}`, document.length);
  }
}

/**
 * Extract structured fields from OCR lines.
 *
 * @param regionHint two-letter code the caller already knows; unknown codes
 *                   are reported in `warnings` and the region is inferred
 * @throws MalformedInputError for an empty document or one over maxLines
 */
export function extract(
  document:   RawDocument,
  regionHint?: string,
  opts:       ExtractOptions = {},
): ExtractedFields {
  const log      = opts.logger   ?? defaultLogger();
  const codeSet  = opts.codeSet  ?? DEFAULT_FIELD_CODES;
  const maxLines = opts.maxLines ?? getConfig().maxLines;

  assertWellFormed(document, maxLines);
  const warnings: string[] = [];

  const resolution = resolveRegion(document, regionHint, codeSet, warnings, log);
  const number     = extractNumber(document, resolution.region, codeSet, warnings);
  const personal   = extractPersonalFields(document, codeSet, warnings, log);

  const region    = resolution.region;
  const confirmed = region ? hasHeaderLine(region, document, codeSet) : false;
  const personalCount = [personal.familyName, personal.givenName, personal.dateOfBirth]
    .filter(v => v !== undefined).length;

  const confidence = scoreConfidence({
    regionResolved:  region !== undefined,
    regionAmbiguous: resolution.ambiguous,
    regionConfirmed: confirmed,
    numberFound:     number.value !== undefined,
    numberValidated: number.validated,
    personalFields:  personalCount,
  });

  return {
    ...(number.value !== undefined        ? { documentNumber: number.value } : {}),
    ...(region && resolution.source       ? { region: region.code, regionSource: resolution.source } : {}),
    ...(resolution.source === "pattern"   ? { ambiguous: resolution.ambiguous } : {}),
    ...(personal.givenName !== undefined   ? { givenName: personal.givenName } : {}),
    ...(personal.familyName !== undefined  ? { familyName: personal.familyName } : {}),
    ...(personal.dateOfBirth !== undefined ? { dateOfBirth: personal.dateOfBirth } : {}),
    confidence,
    numberValidated: number.validated,
    warnings,
  };
}
