export { OcrError } from "./errors.js";
export type { OcrErrorCode } from "./errors.js";
export { TesseractEngine, toOcrLines } from "./ocr.js";
export type { ImageInput, OcrLine, OcrEngine, TesseractOptions } from "./ocr.js";
export { quickValidateImage, checkImageMetadata, SUPPORTED_FORMATS } from "./image-check.js";
export type { ImageCheckOptions, ImageValidation, ImageMetadata } from "./image-check.js";
export { scanImage } from "./scan.js";
export type { ScanOptions, ScanResult } from "./scan.js";
