/**
 * Tagged console logging: "[Tag] message", details as a second argument.
 *
 * Everything goes to stderr; stdout belongs to the practice display.
 * Debug and info lines print only when enabled with setVerboseLogging() or SCALE_TRAINER_DEBUG=1.
 */

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

let verbose = process.env.SCALE_TRAINER_DEBUG === '1';

export function setVerboseLogging(enabled: boolean): void {
  verbose = enabled;
}

export function isVerboseLogging(): boolean {
  return verbose;
}

function withDetails(line: string, details: unknown): unknown[] {
  return details === undefined ? [line] : [line, details];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, details) {
      if (!verbose) return;
      console.error(...withDetails(`${prefix} ${message}`, details));
    },
    info(message, details) {
      if (!verbose) return;
      console.error(...withDetails(`${prefix} ${message}`, details));
    },
    warn(message, details) {
      console.warn(...withDetails(`${prefix} ${message}`, details));
    },
    error(message, details) {
      console.error(...withDetails(`${prefix} ${message}`, details));
    },
  };
}
