// ── Types ─────────────────────────────────────────────────────────────────────

export type { RawDocument, RegionSource, ExtractedFields, MatchCandidate } from "./types.js";
export type { CharClass, Segment, StructuralRule, RegionRule } from "./region/region.interface.js";

// ── Ambient ───────────────────────────────────────────────────────────────────

export {
  IdscanError, MalformedInputError, UnknownRegionError, ConfigError, errorMessage,
} from "./errors.js";
export { LOG_LEVELS, loadConfig, getConfig } from "./config.js";
export type { LogLevel, IdscanConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { SCORING, HEADER_CONFIRMED_THRESHOLD, LIMITS } from "./extraction-constants.js";

// ── Engine ────────────────────────────────────────────────────────────────────

export { lookup, findRegion, allRegions, regionCount, parseCatalog } from "./region/catalog.js";
export {
  LOGICAL_FIELDS, DEFAULT_FIELD_CODES, locate, matchFieldCode,
} from "./field-code-locator.js";
export type {
  LogicalField, FieldCodeSet, FieldCodeMatch, FieldCodeMatches,
  DuplicateFieldCode, LocateOptions, LineFieldCode,
} from "./field-code-locator.js";
export {
  matchesRule, validateNumber, inferRegions, collectCandidates, findNumber,
  ruleLength, ruleSignature, describeRule,
} from "./pattern-matcher.js";
export type { RegionInference } from "./pattern-matcher.js";
export { scoreConfidence } from "./confidence.js";
export type { ConfidenceSignals } from "./confidence.js";
export { parseDateOfBirth, isCalendarDate } from "./dates.js";
export { extract, hasHeaderLine } from "./extractor.js";
export type { ExtractOptions } from "./extractor.js";
