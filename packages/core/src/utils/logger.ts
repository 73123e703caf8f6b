import { pino, type Logger as PinoLogger } from 'pino';

/**
 * Logging surface used by the scan core. Hosts pass their own
 * implementation (the editor extension writes to an output channel).
 */
export interface ScanLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: Error): void;
  error(message: string, error?: Error): void;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function logLevel(): LogLevel {
  const value = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'info';
}

/**
 * Create a pino logger for a core component
 */
export function createLogger(component: string): PinoLogger {
  return pino({ name: 'mypy-sentinel', level: logLevel() }).child({ component });
}

/**
 * Adapt a pino logger to ScanLogger
 */
export function pinoScanLogger(logger: PinoLogger): ScanLogger {
  return {
    debug: (message) => logger.debug(message),
    info: (message) => logger.info(message),
    warn: (message, error) =>
      error ? logger.warn({ err: error }, message) : logger.warn(message),
    error: (message, error) =>
      error ? logger.error({ err: error }, message) : logger.error(message),
  };
}

let defaultLogger: ScanLogger | undefined;

export function getDefaultLogger(): ScanLogger {
  defaultLogger ??= pinoScanLogger(createLogger('scanner'));
  return defaultLogger;
}
