import { IdscanError } from "idscan-core";

export type OcrErrorCode =
  | "INVALID_IMAGE"       // unreadable, too small or wrongly shaped
  | "UNSUPPORTED_FORMAT"
  | "OCR_FAILED"          // the OCR library threw
  | "NO_TEXT";            // OCR ran but every line was blank

/** Image or OCR failure. Raised before anything reaches the extractor. */
export class OcrError extends IdscanError {
  constructor(code: OcrErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "OcrError";
  }
}
