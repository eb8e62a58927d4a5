/**
 * OCR input: one string per recognized line, top to bottom.
 * Order feeds field-code proximity and "first line wins"; OCR may still
 * misorder skewed text.
 */
export type RawDocument = readonly string[];

/** How the issuing region was resolved. */
export type RegionSource =
  | "hint"      // caller-supplied code found in the catalog
  | "header"    // a line equal to the region name
  | "mention"   // a line containing the region name as a whole word
  | "pattern";  // inferred from the document-number shape

export interface ExtractedFields {
  /** Uppercase document number */
  documentNumber?: string;

  /** Two-letter region code */
  region?:         string;

  givenName?:      string;
  familyName?:     string;

  /** Calendar date, ISO 8601: YYYY-MM-DD */
  dateOfBirth?:    string;

  /** 0..1, two decimals */
  confidence:      number;

  regionSource?:   RegionSource;

  /** Set for pattern inference when several regions' rules fit the same line */
  ambiguous?:      boolean;

  /** documentNumber satisfies the reported region's structural rule */
  numberValidated: boolean;

  /** Non-fatal notes: unknown hint, duplicate field codes, rejected values */
  warnings:        string[];
}

/**
 * A candidate document number. Transient: produced by the pattern matcher,
 * consumed by the extractor, never returned.
 */
export interface MatchCandidate {
  value:     string;
  lineIndex: number;
  /** "line" = whole trimmed line, "field-code" = value after a number marker */
  source:    "line" | "field-code";
}
