/**
 * Structured logging utility
 *
 * Messages are prefixed with their level and, for scoped loggers, the
 * component name: `[INFO] [email] Composed digest email {"items":3}`.
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, error?: unknown) => void;
  child: (scope: string) => Logger;
}

function formatMeta(meta?: LogMeta): string {
  return meta ? JSON.stringify(meta) : "";
}

function createLogger(scope?: string): Logger {
  const prefix = scope ? ` [${scope}]` : "";

  return {
    debug: (msg, meta) => {
      if (process.env.DEBUG) {
        console.log(`[DEBUG]${prefix} ${msg}`, formatMeta(meta));
      }
    },

    info: (msg, meta) => {
      console.log(`[INFO]${prefix} ${msg}`, formatMeta(meta));
    },

    warn: (msg, meta) => {
      console.warn(`[WARN]${prefix} ${msg}`, formatMeta(meta));
    },

    error: (msg, error) => {
      console.error(`[ERROR]${prefix} ${msg}`, error);
    },

    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger = createLogger();
