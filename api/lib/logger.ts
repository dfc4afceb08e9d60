/**
 * Lightweight structured logger.
 * Format: [Component] message {context}
 * Wraps console methods with consistent formatting; debug lines only print
 * when LOG_LEVEL=debug.
 */

export type LogContext = Record<string, unknown>;

function formatContext(ctx?: LogContext): string {
  if (!ctx || Object.keys(ctx).length === 0) return '';
  return ' ' + JSON.stringify(ctx);
}

export function formatMessage(component: string, message: string, ctx?: LogContext): string {
  return `[${component}] ${message}${formatContext(ctx)}`;
}

export interface Logger {
  debug(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  error(message: string, ctx?: LogContext): void;
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === 'debug';
}

/**
 * Create a logger for a component. `base` is merged into every line's
 * context (e.g. the simulator id of a worker process).
 */
export function createLogger(component: string, base?: LogContext): Logger {
  const withBase = (ctx?: LogContext): LogContext | undefined =>
    base ? { ...base, ...ctx } : ctx;
  return {
    debug(message: string, ctx?: LogContext) {
      if (debugEnabled()) console.debug(formatMessage(component, message, withBase(ctx)));
    },
    info(message: string, ctx?: LogContext) {
      console.log(formatMessage(component, message, withBase(ctx)));
    },
    warn(message: string, ctx?: LogContext) {
      console.warn(formatMessage(component, message, withBase(ctx)));
    },
    error(message: string, ctx?: LogContext) {
      console.error(formatMessage(component, message, withBase(ctx)));
    },
  };
}
