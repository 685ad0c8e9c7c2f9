type LogFn = (msg: string, ...meta: [meta?: unknown]) => void;

export interface TaggedLogger {
  info: LogFn;
  success: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const Logger = {
  info: (msg: string, meta?: unknown) => {
    console.log(`[INFO] ${new Date().toISOString()}: ${msg}`, meta ?? '');
  },
  success: (msg: string, meta?: unknown) => {
    console.log(`[SUCCESS] ${new Date().toISOString()}: ${msg}`, meta ?? '');
  },
  warn: (msg: string, meta?: unknown) => {
    console.warn(`[WARN] ${new Date().toISOString()}: ${msg}`, meta ?? '');
  },
  error: (msg: string, err?: unknown) => {
    console.error(`[ERROR] ${new Date().toISOString()}: ${msg}`, err ?? '');
  }
};

/**
 * Logger for one component: every message goes out through Logger with a
 * `[TAG]` prefix, e.g. `[ACCOUNT] User tradingbot created`.
 */
export function taggedLogger(tag: string): TaggedLogger {
  const prefix = `[${tag}]`;
  return {
    info: (msg, ...rest) => Logger.info(`${prefix} ${msg}`, ...rest),
    success: (msg, ...rest) => Logger.success(`${prefix} ${msg}`, ...rest),
    warn: (msg, ...rest) => Logger.warn(`${prefix} ${msg}`, ...rest),
    error: (msg, ...rest) => Logger.error(`${prefix} ${msg}`, ...rest),
  };
}
