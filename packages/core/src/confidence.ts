import { SCORING } from "./extraction-constants.js";

export interface ConfidenceSignals {
  regionResolved:  boolean;
  /** Inference picked one of several equally shaped regions */
  regionAmbiguous: boolean;
  /** The resolved region's name is printed in the document */
  regionConfirmed: boolean;
  numberFound:     boolean;
  numberValidated: boolean;
  /** Personal fields read from field codes (0-3) */
  personalFields:  number;
}

/**
 * Pure, deterministic score in [0, 1], rounded to two decimals.
 * Each signal only ever adds, so more evidence never lowers the score.
 */
export function scoreConfidence(s: ConfidenceSignals): number {
  let score = SCORING.BASE;

  if (s.regionResolved && !s.regionAmbiguous) score += SCORING.REGION_RESOLVED;
  if (s.regionResolved && s.regionConfirmed)  score += SCORING.REGION_CONFIRMED;
  if (s.numberFound) {
    score += SCORING.NUMBER_FOUND;
    if (s.numberValidated) score += SCORING.NUMBER_VALIDATED;
  }
  score += SCORING.PERSONAL_FIELD * Math.max(0, s.personalFields);

  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 100) / 100;
}
