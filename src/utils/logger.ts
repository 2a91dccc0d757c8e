import { Logger, consoleLogger, createLevelLogger, silentLogger } from '../types/logger.js';

const DEBUG_NAMESPACE = 'cloudauth';

/**
 * Debug output is opt-in through the DEBUG environment variable,
 * e.g. `DEBUG=cloudauth` or `DEBUG=*`.
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.DEBUG || '';
  return value.split(',').some((part) => {
    const namespace = part.trim();
    return namespace === '*' || namespace.startsWith(DEBUG_NAMESPACE);
  });
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = isDebugEnabled() ? createLevelLogger(consoleLogger, 'debug') : silentLogger;
  }
  return globalLogger;
}

export function setLogger(logger: Logger | null) {
  globalLogger = logger;
}
