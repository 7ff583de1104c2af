/**
 * Structured logging utility
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, error?: unknown) => void;
}

/**
 * Create a logger whose messages carry a `[scope]` prefix
 */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : "";

  return {
    debug: (msg, meta) => {
      if (process.env.DEBUG) {
        console.log(`[DEBUG] ${prefix}${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },

    info: (msg, meta) => {
      console.log(`[INFO] ${prefix}${msg}`, meta ? JSON.stringify(meta) : "");
    },

    warn: (msg, meta) => {
      console.warn(`[WARN] ${prefix}${msg}`, meta ? JSON.stringify(meta) : "");
    },

    error: (msg, error) => {
      console.error(`[ERROR] ${prefix}${msg}`, error ?? "");
    },
  };
}

export const logger = createLogger();
