import {
  createLogger, errorMessage, extract, getConfig,
  type ExtractOptions, type ExtractedFields,
} from "idscan-core";
import { OcrError } from "./errors.js";
import { quickValidateImage, type ImageCheckOptions } from "./image-check.js";
import { TesseractEngine, type ImageInput, type OcrEngine, type OcrLine } from "./ocr.js";

export interface ScanOptions extends ExtractOptions {
  regionHint?: string;
  /** Default: TesseractEngine */
  engine?:     OcrEngine;
  /** Default minimums come from IDSCAN_MIN_IMAGE_WIDTH / IDSCAN_MIN_IMAGE_HEIGHT */
  imageCheck?: ImageCheckOptions;
}

export interface ScanResult extends ExtractedFields {
  /** Non-blank OCR lines handed to the extractor */
  lines:             string[];
  /** Mean OCR confidence of those lines, 0..1, two decimals */
  meanOcrConfidence: number;
}

/**
 * Image → OCR → extract.
 *
 * Image and OCR failures throw OcrError; the extractor only ever sees
 * non-blank lines.
 */
export async function scanImage(image: ImageInput, opts: ScanOptions = {}): Promise<ScanResult> {
  const { regionHint, engine, imageCheck, ...extractOpts } = opts;
  const log    = opts.logger ?? createLogger("scan");
  const config = getConfig();

  const check = await quickValidateImage(image, {
    minWidth:  config.minImageWidth,
    minHeight: config.minImageHeight,
    ...imageCheck,
  });
  if (!check.valid) throw new OcrError(check.code, check.error);

  const ocr = engine ?? new TesseractEngine({ logger: log });
  let recognized: OcrLine[];
  try {
    recognized = await ocr.recognize(image);
  } catch (err) {
    throw new OcrError("OCR_FAILED", `OCR failed: ${errorMessage(err)}`, { cause: err });
  }

  const kept = recognized
    .map(l => ({ text: l.text.trim(), confidence: l.confidence }))
    .filter(l => l.text.length > 0);
  if (kept.length === 0) throw new OcrError("NO_TEXT", "OCR found no text in the image");

  const lines = kept.map(l => l.text);
  const mean  = Math.round(kept.reduce((sum, l) => sum + l.confidence, 0) / kept.length * 100) / 100;
  log.info(`OCR read ${lines.length} lines (mean confidence ${mean})`);

  const fields = extract(lines, regionHint, extractOpts);
  return { ...fields, lines, meanOcrConfidence: mean };
}
