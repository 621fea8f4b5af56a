export interface TraceLogger {
  /** Logs when the configured trace level is at least `level`. */
  trace(level: number, message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createTraceLogger(tag: string, level: number): TraceLogger {
  const prefix = `[${tag}]`;
  return {
    trace(messageLevel, message) {
      if (level >= messageLevel) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      if (level > 0) {
        console.warn(`${prefix} ${message}`);
      }
    },
    error(message, error) {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}
