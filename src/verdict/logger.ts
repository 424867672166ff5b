export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message, context) => console.log(prefix, message, context ?? ''),
    warn: (message, context) => console.warn(prefix, message, context ?? ''),
    error: (message, context) => console.error(prefix, message, context ?? ''),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
