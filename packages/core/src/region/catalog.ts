/**
 * idscan Region Catalog
 * =====================
 * Loads regions.json once at import, validates it and freezes it.
 * Adding a region = adding one JSON entry; no code changes needed.
 *
 * Usage:
 *   import { lookup, findRegion, allRegions } from "./catalog.js";
 *   const ca = lookup("CA");         // throws UnknownRegionError if absent
 *   const maybe = findRegion("zz");  // undefined if absent
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { UnknownRegionError } from "../errors.js";
import type { RegionRule, Segment } from "./region.interface.js";

// ── Schema ──────────────────────────────────────────────────────────────────────

const SegmentSchema = z.object({
  charClass: z.enum(["letter", "digit"]),
  count:     z.number().int().positive(),
});

const RegionSchema = z.object({
  code: z.string().regex(/^[A-Z]{2}$/, "must be two uppercase letters"),
  name: z.string().trim().min(1),
  rule: z.array(SegmentSchema).min(1),
});

const CatalogSchema = z.array(RegionSchema).min(1).superRefine((regions, ctx) => {
  const codes = new Set<string>();
  const names = new Set<string>();
  regions.forEach((r, i) => {
    if (codes.has(r.code)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "code"], message: `duplicate code ${r.code}` });
    const name = r.name.toUpperCase();
    if (names.has(name))   ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "name"], message: `duplicate name ${r.name}` });
    codes.add(r.code);
    names.add(name);
  });
});

/**
 * Validate raw catalog data and return it sorted by code, deep-frozen.
 * Throws a ZodError when the data is malformed.
 */
export function parseCatalog(raw: unknown): readonly RegionRule[] {
  const regions = CatalogSchema.parse(raw);
  const frozen = regions
    .map((r): RegionRule => Object.freeze({
      code: r.code,
      name: r.name,
      rule: Object.freeze(r.rule.map((s): Segment => Object.freeze({ charClass: s.charClass, count: s.count }))),
    }))
    .sort((a, b) => a.code.localeCompare(b.code));
  return Object.freeze(frozen);
}

// ── Static catalog (loaded once, shared read-only) ───────────────────────────────

const RAW_CATALOG: unknown = JSON.parse(
  readFileSync(new URL("./regions.json", import.meta.url), "utf8"),
);

const REGIONS = parseCatalog(RAW_CATALOG);

const BY_CODE = new Map<string, RegionRule>();
for (const r of REGIONS) {
  BY_CODE.set(r.code, r);
}

// ── Public API ───────────────────────────────────────────────────────────────────

/**
 * Get a region by its two-letter code (case-insensitive).
 * Throws UnknownRegionError when the code is not in the catalog.
 */
export function lookup(code: string): RegionRule {
  const region = findRegion(code);
  if (!region) throw new UnknownRegionError(code);
  return region;
}

/** Non-throwing lookup. */
export function findRegion(code: string): RegionRule | undefined {
  return BY_CODE.get(code.trim().toUpperCase());
}

/** All regions, alphabetical by code. */
export function allRegions(): readonly RegionRule[] {
  return REGIONS;
}

export function regionCount(): number {
  return REGIONS.length;
}
