/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Component loggers for the preview packages.
 *
 * Warnings and errors always reach the console. Admission, completion and
 * per-tick scheduling detail stay quiet unless `PREVIEW_DEBUG` is `'true'`,
 * read from localStorage in a browser and from the environment under Node.
 * Messages carry a `[Component] operation scene=<id> slot=<n>` prefix.
 */

import type { SceneId } from './types.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Prefix tag, e.g. 'Scheduler' */
  component: string;
  /** e.g. 'admit', 'release' */
  operation?: string;
  /** Scene the message is about */
  sceneId?: SceneId;
  /** Slot index the message is about */
  slot?: number;
  /** Printed after the message */
  data?: Record<string, unknown>;
}

export type Logger = ReturnType<typeof createLogger>;

export function isDebugEnabled(): boolean {
  if (typeof localStorage !== 'undefined') {
    try {
      return localStorage.getItem('PREVIEW_DEBUG') === 'true';
    } catch {
      // Blocked storage; use the environment
    }
  }
  if (typeof process !== 'undefined' && process.env) {
    return process.env.PREVIEW_DEBUG === 'true';
  }
  return false;
}

export function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.sceneId !== undefined) {
    prefix += ` scene=${ctx.sceneId}`;
  }
  if (ctx.slot !== undefined) {
    prefix += ` slot=${ctx.slot}`;
  }
  return prefix;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/** Logger whose messages are prefixed with `[component]` */
export function createLogger(component: string) {
  return {
    /**
     * Failure that loses a preview or leaks a render resource
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      const args: unknown[] = [error !== undefined ? `${prefix} ${message}:` : `${prefix} ${message}`];
      if (error !== undefined) args.push(formatError(error));
      if (ctx?.data !== undefined) args.push(ctx.data);
      console.error(...args);
    },

    /**
     * Tolerated bookkeeping violation or a dropped result
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Preview lifecycle: admitted, generated, cancelled
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Scheduling detail, one line per busy tick
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}
