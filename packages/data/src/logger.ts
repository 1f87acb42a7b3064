/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Console logging shared by the p21kit packages.
 *
 * Lines read `[Component] operation #id (TYPE) message`. Errors and warnings
 * are always written; info and debug lines only when P21_DEBUG=true.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Prefix fields; only `component` is required */
export interface LogContext {
  component: string;
  operation?: string;
  entityId?: number;
  entityType?: string;
  /** Passed to the console as a second argument */
  data?: Record<string, unknown>;
}

export const DEBUG_ENV_VAR = 'P21_DEBUG';

export function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.entityId !== undefined) {
    prefix += ` #${ctx.entityId}`;
  }
  if (ctx.entityType) {
    prefix += ` (${ctx.entityType})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.log(...args),
  debug: (...args) => console.debug(...args),
};

function emit(level: LogLevel, line: string, extra: unknown): void {
  if (extra !== undefined) {
    sinks[level](line, extra);
  } else {
    sinks[level](line);
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(component: string) {
  const prefix = (ctx?: Partial<LogContext>) => formatContext({ component, ...ctx });

  return {
    /** `error` is appended as `Name: message`; its stack follows in debug mode */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const head = `${prefix(ctx)} ${message}`;
      emit('error', error === undefined ? head : `${head}: ${formatError(error)}`, ctx?.data);
      if (error instanceof Error && error.stack && isDebugEnabled()) {
        emit('debug', error.stack, undefined);
      }
    },

    warn(message: string, ctx?: Partial<LogContext>) {
      emit('warn', `${prefix(ctx)} ${message}`, ctx?.data);
    },

    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      emit('info', `${prefix(ctx)} ${message}`, ctx?.data);
    },

    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      emit('debug', `${prefix(ctx)} ${message}`, data);
    },
  };
}
