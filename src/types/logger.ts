/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const client = await newClient({ apiKey: 'test-key', logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const client = await newClient({ apiKey: 'test-key', logger: consoleLogger });
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  const minLevelNum = levels[minLevel];

  return {
    debug: gate(levels.debug >= minLevelNum, baseLogger.debug.bind(baseLogger)),
    info: gate(levels.info >= minLevelNum, baseLogger.info.bind(baseLogger)),
    warn: gate(levels.warn >= minLevelNum, baseLogger.warn.bind(baseLogger)),
    error: gate(levels.error >= minLevelNum, baseLogger.error.bind(baseLogger)),
  };
}

function gate(enabled: boolean, fn: Logger['debug']): Logger['debug'] {
  return (msgOrObj: string | object, ...args: unknown[]) => {
    if (!enabled) return;
    if (typeof msgOrObj === 'string') {
      fn(msgOrObj, ...args);
      return;
    }
    const [message, ...rest] = args;
    fn(msgOrObj, typeof message === 'string' ? message : undefined, ...rest);
  };
}
