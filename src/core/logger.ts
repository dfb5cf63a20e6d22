/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('protocol/client');
 *
 * Scoped loggers resolve lazily, so a module that grabbed its logger at import
 * time still follows a later initLogger() call (level, categories, sink).
 */

import pino from 'pino';
import { SessionConfig } from './types';

let instance: pino.Logger | null = null;
let debugCategories: ReadonlySet<string> = new Set();

/**
 * Anything pino can write lines to. The control API's log stream is one;
 * tests can pass an in-memory collector.
 */
export type LogSink = pino.DestinationStream;

export function initLogger(config: Pick<SessionConfig, 'logLevel' | 'debugCategories'>, sink?: LogSink): pino.Logger {
  const level = config.logLevel ?? 'info';
  debugCategories = new Set(config.debugCategories ?? []);

  instance = sink
    ? pino({ level }, pino.multistream([
        { level: 'trace', stream: process.stdout },
        { level: 'trace', stream: sink }
      ]))
    : pino({ level });
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.LOG_LEVEL ?? 'info' });
  }
  return instance;
}

function isDebugCategory(moduleName: string): boolean {
  return debugCategories.has('*') || debugCategories.has(moduleName);
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('controller/input_controller');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  let bound: { root: pino.Logger; child: pino.Logger } | null = null;

  const resolve = (): pino.Logger => {
    const root = getLogger();
    if (!bound || bound.root !== root) {
      const child = isDebugCategory(moduleName) && !root.isLevelEnabled('debug')
        ? root.child({ module: moduleName }, { level: 'debug' })
        : root.child({ module: moduleName });
      bound = { root, child };
    }
    return bound.child;
  };

  return new Proxy({} as pino.Logger, {
    get(_target, prop) {
      const child = resolve();
      const value: unknown = Reflect.get(child, prop, child);
      return typeof value === 'function' ? value.bind(child) : value;
    }
  });
}
