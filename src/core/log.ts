export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Send debug and info lines to stderr, keeping stdout for report output. */
  stderr?: boolean;
}

export function createConsoleLogger({ verbose = false, stderr = false }: ConsoleLoggerOptions = {}): Logger {
  const out = stderr ? console.error : console.log;
  return {
    debug(message) {
      if (verbose) {
        out(`[DEBUG] ${message}`);
      }
    },
    info(message) {
      out(`[INFO] ${message}`);
    },
    warn(message, error) {
      if (error !== undefined && verbose) {
        console.warn(`[WARN] ${message}`, error);
      } else {
        console.warn(`[WARN] ${message}`);
      }
    },
    error(message, error) {
      if (error !== undefined && verbose) {
        console.error(`[ERROR] ${message}`, error);
      } else {
        console.error(`[ERROR] ${message}`);
      }
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};
