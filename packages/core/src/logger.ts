import { getConfig, type LogLevel } from "./config.js";

export interface Logger {
  debug(msg: string): void;
  info(msg:  string): void;
  warn(msg:  string): void;
  error(msg: string): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10, info: 20, warn: 30, error: 40, silent: 100,
};

const toStderr = (line: string) => { process.stderr.write(line); };

/**
 * Tagged stderr logger: `[idscan:<scope>] message`.
 * Messages below `level` (default: IDSCAN_LOG_LEVEL) are dropped.
 */
export function createLogger(
  scope: string,
  level: LogLevel = getConfig().logLevel,
  write: (line: string) => void = toStderr,
): Logger {
  const emit = (at: LogLevel, msg: string) => {
    if (RANK[at] < RANK[level]) return;
    const tag = at === "warn" || at === "error" ? ` ${at.toUpperCase()}` : "";
    write(`[idscan:${scope}]${tag} ${msg}\n`);
  };
  return {
    debug: msg => emit("debug", msg),
    info:  msg => emit("info",  msg),
    warn:  msg => emit("warn",  msg),
    error: msg => emit("error", msg),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info:  () => {},
  warn:  () => {},
  error: () => {},
};
