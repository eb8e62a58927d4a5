/**
 * idscan Extraction Constants
 *
 * Scoring weights and input limits shared by the extractor, the scorer and
 * the tests. Object.freeze() keeps them constant at runtime.
 */

export const SCORING = Object.freeze({
  /** Every result starts here, even when nothing was found. */
  BASE: 0.1,

  /** Region resolved by hint, header, mention or unambiguous inference. */
  REGION_RESOLVED: 0.1,

  /** A document number was found (validated or not). */
  NUMBER_FOUND: 0.1,

  /** The number satisfies the resolved region's structural rule. */
  NUMBER_VALIDATED: 0.2,

  /** The resolved region's name is printed in the document. */
  REGION_CONFIRMED: 0.2,

  /** Per personal field (family name, given name, date of birth) read from a field code. */
  PERSONAL_FIELD: 0.1,
});

/**
 * Score reached by a document whose region header and number both check out,
 * before any personal field is counted.
 */
export const HEADER_CONFIRMED_THRESHOLD = 0.7;

export const LIMITS = Object.freeze({
  /** Default maximum lines per RawDocument (IDSCAN_MAX_LINES overrides). */
  DEFAULT_MAX_LINES: 200,

  /** Earliest accepted year for a date of birth. */
  MIN_BIRTH_YEAR: 1900,

  /** Length bounds for a number accepted without structural validation. */
  UNVALIDATED_NUMBER_MIN: 4,
  UNVALIDATED_NUMBER_MAX: 20,
});
