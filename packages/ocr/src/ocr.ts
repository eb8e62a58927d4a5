import Tesseract from "tesseract.js";
import { createLogger, getConfig, type Logger } from "idscan-core";

/** File path or encoded image bytes. */
export type ImageInput = string | Buffer;

export interface OcrLine {
  text:       string;
  /** 0..1 */
  confidence: number;
}

/** Anything that turns an image into text lines, top to bottom. */
export interface OcrEngine {
  recognize(image: ImageInput): Promise<OcrLine[]>;
}

export interface TesseractOptions {
  /** Default: IDSCAN_OCR_LANG ("eng") */
  lang?:   string;
  logger?: Logger;
}

/**
 * Convert tesseract lines (confidence 0..100) into OcrLines,
 * trimming text and dropping blank lines.
 */
export function toOcrLines(lines: readonly { text: string; confidence: number }[]): OcrLine[] {
  return lines
    .map(l => ({ text: l.text.trim(), confidence: Math.min(1, Math.max(0, l.confidence / 100)) }))
    .filter(l => l.text.length > 0);
}

/**
 * tesseract.js engine.
 *
 * On-demand: Tesseract.recognize() starts a worker per call and terminates
 * it when done. No persistent process.
 */
export class TesseractEngine implements OcrEngine {
  private readonly lang: string;
  private readonly log:  Logger;

  constructor(opts: TesseractOptions = {}) {
    this.lang = opts.lang   ?? getConfig().ocrLang;
    this.log  = opts.logger ?? createLogger("ocr");
  }

  async recognize(image: ImageInput): Promise<OcrLine[]> {
    const { data } = await Tesseract.recognize(image, this.lang, {
      logger: m => this.log.debug(`${m.status} ${Math.round(m.progress * 100)}%`),
    });
    return toOcrLines(data.lines);
  }
}
