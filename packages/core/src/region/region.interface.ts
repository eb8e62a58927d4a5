/**
 * Region Rule Types
 * =================
 * Every supported issuing region is one entry in regions.json.
 *
 * To add a region:
 *   1. Add { code, name, rule } to regions.json (any order; the catalog sorts by code)
 *   2. Describe the document number as letter/digit segments with exact counts
 *   3. Run the tests: the catalog checks that codes and names stay unique
 */

// ── Structural rules ───────────────────────────────────────────────────────────

export type CharClass = "letter" | "digit";

export interface Segment {
  /** "letter" = A-Z (either case), "digit" = 0-9 */
  readonly charClass: CharClass;

  /** Exact number of consecutive characters of this class */
  readonly count: number;
}

/** Ordered segments, e.g. California: 1 letter then 7 digits. */
export type StructuralRule = readonly Segment[];

// ── Catalog entry ──────────────────────────────────────────────────────────────

export interface RegionRule {
  /** Two-letter uppercase region code (e.g. "CA", "NY") */
  readonly code: string;

  /** Human-readable name as printed on the card header ("California") */
  readonly name: string;

  /** Shape of a valid document number for this region */
  readonly rule: StructuralRule;
}
