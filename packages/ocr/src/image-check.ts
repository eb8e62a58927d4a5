import { errorMessage } from "idscan-core";
import type { OcrErrorCode } from "./errors.js";
import type { ImageInput } from "./ocr.js";

export const SUPPORTED_FORMATS: readonly string[] = ["jpeg", "png", "webp", "tiff"];

export interface ImageCheckOptions {
  /** Reject portrait photos and odd aspect ratios. Default false */
  requireLandscape?: boolean;
  /** Default 400 */
  minWidth?:  number;
  /** Default 250 */
  minHeight?: number;
}

export type ImageValidation =
  | { valid: true }
  | { valid: false; code: OcrErrorCode; error: string };

export interface ImageMetadata {
  format?: string;
  width?:  number;
  height?: number;
}

/**
 * Decide from image metadata alone whether OCR is worth running.
 * ID-1 cards are 85.6mm × 53.98mm (~1.59:1); photos of them land in 1.2–2.2.
 */
export function checkImageMetadata(meta: ImageMetadata, opts: ImageCheckOptions = {}): ImageValidation {
  const minWidth  = opts.minWidth  ?? 400;
  const minHeight = opts.minHeight ?? 250;

  if (!meta.format || !SUPPORTED_FORMATS.includes(meta.format)) {
    return {
      valid: false,
      code:  "UNSUPPORTED_FORMAT",
      error: `Unsupported image format "${meta.format ?? "unknown"}"; use jpeg, png, webp or tiff`,
    };
  }

  if (!meta.width || !meta.height) {
    return { valid: false, code: "INVALID_IMAGE", error: "Could not read image dimensions" };
  }

  if (meta.width < minWidth || meta.height < minHeight) {
    return {
      valid: false,
      code:  "INVALID_IMAGE",
      error: `Image too small: ${meta.width}×${meta.height}; need at least ${minWidth}×${minHeight}`,
    };
  }

  if (opts.requireLandscape) {
    if (meta.width <= meta.height) {
      return { valid: false, code: "INVALID_IMAGE", error: "Image must be landscape: ID cards are wider than tall" };
    }
    const ratio = meta.width / meta.height;
    if (ratio < 1.2 || ratio > 2.2) {
      return {
        valid: false,
        code:  "INVALID_IMAGE",
        error: `Unusual aspect ratio (${ratio.toFixed(2)}); photograph the whole card`,
      };
    }
  }

  return { valid: true };
}

/**
 * Surface check of format and dimensions before full OCR.
 * Reads metadata only; never loads tesseract.
 */
export async function quickValidateImage(image: ImageInput, opts: ImageCheckOptions = {}): Promise<ImageValidation> {
  try {
    // sharp is native; load it only when an image is actually checked
    const sharp = (await import("sharp")).default;
    const meta  = await sharp(image).metadata();
    return checkImageMetadata(meta, opts);
  } catch (e) {
    return { valid: false, code: "INVALID_IMAGE", error: `Error reading image: ${errorMessage(e)}` };
  }
}
