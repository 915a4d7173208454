/**
 * Tagged console logging for the discovery engine.
 *
 * Callers inject their own `DiscoveryLogger` to route messages elsewhere;
 * the default writes `[tag] message` through `console`.
 */

export type LogLevel = "debug" | "info" | "warn" | "silent";

export interface DiscoveryLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  silent: 100,
};

export const DEFAULT_LOG_TAG = "plugscan:discovery";

/**
 * Create a console-backed logger that drops messages below `level`.
 */
export function createConsoleLogger(
  tag: string = DEFAULT_LOG_TAG,
  level: LogLevel = "warn",
): DiscoveryLogger {
  const threshold = LEVEL_ORDER[level];
  return {
    debug(message) {
      if (threshold <= LEVEL_ORDER.debug) console.debug(`[${tag}] ${message}`);
    },
    info(message) {
      if (threshold <= LEVEL_ORDER.info) console.info(`[${tag}] ${message}`);
    },
    warn(message) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(`[${tag}] ${message}`);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: DiscoveryLogger = {
  debug() {},
  info() {},
  warn() {},
};
