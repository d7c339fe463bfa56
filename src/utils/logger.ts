/**
 * Console logger with a component prefix.
 *
 * - error / warn: always printed
 * - info / debug / caught: printed only when debug is enabled
 *   (STRUCTURAL_DEBUG=true, or `debug: true` passed to createLogger)
 */
import { loadConfig } from "./config";

export interface LogContext {
  /** Component name, e.g. 'Translator' */
  component: string;
  /** Operation being performed, e.g. 'translateLoads' */
  operation?: string;
  /** Model key of the entity involved */
  entity?: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  /** A handled error; the caller recovered from it. */
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.entity !== undefined) {
    prefix += ` '${ctx.entity}'`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function createLogger(component: string, options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? loadConfig().debug;
  const print = (write: (...args: unknown[]) => void, line: string, data?: unknown) => {
    if (data !== undefined) write(line, data);
    else write(line);
  };

  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const line = error !== undefined ? `${prefix} ${message}: ${formatError(error)}` : `${prefix} ${message}`;
      print(console.error, line, ctx?.data);
    },

    warn(message, ctx) {
      print(console.warn, `${formatContext({ component, ...ctx })} ${message}`, ctx?.data);
    },

    info(message, ctx) {
      if (!debugEnabled) return;
      print(console.log, `${formatContext({ component, ...ctx })} ${message}`, ctx?.data);
    },

    debug(message, data, ctx) {
      if (!debugEnabled) return;
      print(console.debug, `${formatContext({ component, ...ctx })} ${message}`, data);
    },

    caught(message, error, ctx) {
      if (!debugEnabled) return;
      const prefix = formatContext({ component, ...ctx });
      print(console.debug, `${prefix} ${message} (recovered): ${formatError(error)}`, ctx?.data);
    },
  };
}
