/**
 * idscan CLI commands
 *   idscan scan --image <file> [--region XX] [--json] [--verbose]
 *   idscan extract --text <file> [--region XX] [--json]
 *   idscan regions
 *   idscan help
 */

import { readFileSync } from "node:fs";
import {
  IdscanError, allRegions, createLogger, describeRule, errorMessage, extract, getConfig,
  type ExtractedFields, type Logger,
} from "idscan-core";
import { scanImage, type OcrEngine } from "idscan-ocr";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  /** Default: TesseractEngine */
  engine?: OcrEngine;
  /** Default: stderr logger at IDSCAN_LOG_LEVEL, or debug with --verbose */
  logger?: Logger;
}

export const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

const USAGE = {
  scan:    "Usage: idscan scan --image <file> [--region XX] [--json] [--verbose]",
  extract: "Usage: idscan extract --text <file> [--region XX] [--json]",
} as const;

/** Run one command. Resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = consoleIo, deps: CliDeps = {}): Promise<number> {
  const cmd  = argv.at(0);
  const args = argv.slice(1);
  try {
    switch (cmd) {
      case "scan":    return await cmdScan(args, io, deps);
      case "extract": return cmdExtract(args, io, deps);
      case "regions": return cmdRegions(io);
      case undefined:
      case "help":    return cmdHelp(io);
      default:
        io.err(`Unknown command "${cmd}"`);
        cmdHelp(io);
        return 1;
    }
  } catch (err) {
    io.err(err instanceof IdscanError ? `Error [${err.code}]: ${err.message}` : `Error: ${errorMessage(err)}`);
    return 1;
  }
}

// ── scan ──────────────────────────────────────────────────────────────────────

async function cmdScan(args: readonly string[], io: CliIo, deps: CliDeps): Promise<number> {
  const image   = getArg(args, "--image");
  const region  = getArg(args, "--region");
  const json    = args.includes("--json");
  const verbose = args.includes("--verbose");

  if (!image) {
    io.err(USAGE.scan);
    return 1;
  }

  const logger = deps.logger ?? createLogger("cli", verbose ? "debug" : getConfig().logLevel);
  const result = await scanImage(image, { regionHint: region, engine: deps.engine, logger });

  if (json) {
    io.out(JSON.stringify(result, null, 2));
    return 0;
  }
  printFields(io, result);
  row(io, "OCR lines",      String(result.lines.length));
  row(io, "OCR confidence", result.meanOcrConfidence.toFixed(2));
  return 0;
}

// ── extract ───────────────────────────────────────────────────────────────────

function cmdExtract(args: readonly string[], io: CliIo, deps: CliDeps): number {
  const file   = getArg(args, "--text");
  const region = getArg(args, "--region");
  const json   = args.includes("--json");

  if (!file) {
    io.err(USAGE.extract);
    return 1;
  }

  const lines = readFileSync(file, "utf8").split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();

  const result = extract(lines, region, { logger: deps.logger ?? createLogger("cli") });
  if (json) {
    io.out(JSON.stringify(result, null, 2));
    return 0;
  }
  printFields(io, result);
  return 0;
}

// ── regions ───────────────────────────────────────────────────────────────────

function cmdRegions(io: CliIo): number {
  io.out(`  ${"CODE".padEnd(6)}${"NAME".padEnd(16)}NUMBER FORMAT`);
  for (const r of allRegions()) {
    io.out(`  ${r.code.padEnd(6)}${r.name.padEnd(16)}${describeRule(r.rule)}`);
  }
  io.out(`${allRegions().length} regions`);
  return 0;
}

// ── help ──────────────────────────────────────────────────────────────────────

function cmdHelp(io: CliIo): number {
  io.out(`
idscan: fields from US driver's license OCR text

COMMANDS:

  scan                   OCR an image of the card, then extract fields
    --image <file>       Photo or scan (jpeg, png, webp, tiff)
    --region <XX>        Two-letter region code, if known
    --json               Print the result as JSON
    --verbose            Show OCR progress

  extract                Extract fields from OCR text, one line per line
    --text <file>        Text file
    --region <XX>        Two-letter region code, if known
    --json               Print the result as JSON

  regions                List supported regions and their number formats

EXAMPLES:

  idscan scan --image license.jpg
  idscan extract --text lines.txt --region CA --json
`);
  return 0;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function getArg(args: readonly string[], name: string): string | undefined {
  const idx   = args.indexOf(name);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value !== undefined && !value.startsWith("--") ? value : undefined;
}

function row(io: CliIo, label: string, value: string): void {
  io.out(`  ${`${label}:`.padEnd(16)}${value}`);
}

function printFields(io: CliIo, r: ExtractedFields): void {
  const source = `${r.regionSource ?? "unknown"}${r.ambiguous ? ", ambiguous" : ""}`;
  row(io, "Region",        r.region ? `${r.region} (${source})` : "unresolved");
  row(io, "Number",        r.documentNumber
    ? `${r.documentNumber} (${r.numberValidated ? "validated" : "unvalidated"})`
    : "not found");
  row(io, "Family name",   r.familyName  ?? "not found");
  row(io, "Given name",    r.givenName   ?? "not found");
  row(io, "Date of birth", r.dateOfBirth ?? "not found");
  row(io, "Confidence",    r.confidence.toFixed(2));
  for (const w of r.warnings) io.out(`  ! ${w}`);
}
