/**
 * Error types for idscan.
 *
 * Missing fields are never errors: extract() reports them as absent.
 * These classes cover input that cannot be processed at all.
 */

export class IdscanError extends Error {
  /** Machine-readable code, stable across releases */
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IdscanError";
    this.code = code;
  }
}

/** The RawDocument is empty or longer than the configured line limit. */
export class MalformedInputError extends IdscanError {
  readonly lineCount: number;

  constructor(message: string, lineCount: number) {
    super("MALFORMED_INPUT", message);
    this.name = "MalformedInputError";
    this.lineCount = lineCount;
  }
}

/** A region code that is not in the catalog. Recoverable inside extract(). */
export class UnknownRegionError extends IdscanError {
  readonly regionCode: string;

  constructor(regionCode: string) {
    super("UNKNOWN_REGION", `Unknown region code: "${regionCode}"`);
    this.name = "UnknownRegionError";
    this.regionCode = regionCode;
  }
}

/** Environment configuration failed validation. */
export class ConfigError extends IdscanError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
