/**
 * Pattern Matcher
 *
 * Structural rules are letter/digit segments with exact counts, matched
 * against whole trimmed strings only. Substrings are never searched: dates,
 * ZIP codes and street numbers share lines with too many digit runs.
 */

import { allRegions, lookup } from "./region/catalog.js";
import type { CharClass, RegionRule, StructuralRule } from "./region/region.interface.js";
import { DEFAULT_FIELD_CODES, matchFieldCode, type FieldCodeSet } from "./field-code-locator.js";
import type { MatchCandidate, RawDocument } from "./types.js";

const CLASS_TESTS: Record<CharClass, (ch: string) => boolean> = {
  letter: ch => /^[A-Za-z]$/.test(ch),
  digit:  ch => /^[0-9]$/.test(ch),
};

export function ruleLength(rule: StructuralRule): number {
  return rule.reduce((n, s) => n + s.count, 0);
}

/** Compact form for comparing rule shapes: "L1D7". */
export function ruleSignature(rule: StructuralRule): string {
  return rule.map(s => `${s.charClass === "letter" ? "L" : "D"}${s.count}`).join("");
}

/** Human-readable form: "1 letter, 7 digits". */
export function describeRule(rule: StructuralRule): string {
  return rule
    .map(s => `${s.count} ${s.charClass}${s.count === 1 ? "" : "s"}`)
    .join(", ");
}

/**
 * True iff the trimmed candidate has exactly the rule's length and every
 * character belongs to its segment's class.
 */
export function matchesRule(rule: StructuralRule, candidate: string): boolean {
  const value = candidate.trim();
  if (value.length !== ruleLength(rule)) return false;

  let pos = 0;
  for (const segment of rule) {
    const test = CLASS_TESTS[segment.charClass];
    for (let i = 0; i < segment.count; i++, pos++) {
      if (!test(value.charAt(pos))) return false;
    }
  }
  return true;
}

/**
 * Check a number against one region's rule.
 * Throws UnknownRegionError for codes outside the catalog.
 */
export function validateNumber(regionCode: string, candidate: string): boolean {
  return matchesRule(lookup(regionCode).rule, candidate);
}

/**
 * Document-number candidates in document order: each non-blank trimmed line,
 * then (same line) the value after a document-number field code.
 */
export function collectCandidates(
  document: RawDocument,
  codeSet:  FieldCodeSet = DEFAULT_FIELD_CODES,
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [];
  document.forEach((line, lineIndex) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    candidates.push({ value: trimmed, lineIndex, source: "line" });

    const code = matchFieldCode(trimmed, codeSet);
    if (code?.field === "documentNumber" && code.value) {
      candidates.push({ value: code.value, lineIndex, source: "field-code" });
    }
  });
  return candidates;
}

/** First candidate satisfying the rule. */
export function findNumber(rule: StructuralRule, candidates: readonly MatchCandidate[]): MatchCandidate | undefined {
  return candidates.find(c => matchesRule(rule, c.value));
}

export interface RegionInference {
  candidate: MatchCandidate;
  /** Every region whose rule matched the candidate, in catalog order */
  regions:   readonly RegionRule[];
}

/**
 * Scan every candidate against every rule. One entry per matching candidate,
 * in document order; more than one region in an entry means the shapes tie.
 */
export function inferRegions(
  document: RawDocument,
  codeSet:  FieldCodeSet = DEFAULT_FIELD_CODES,
): RegionInference[] {
  const catalog = allRegions();
  const inferences: RegionInference[] = [];
  for (const candidate of collectCandidates(document, codeSet)) {
    const regions = catalog.filter(r => matchesRule(r.rule, candidate.value));
    if (regions.length > 0) inferences.push({ candidate, regions });
  }
  return inferences;
}
