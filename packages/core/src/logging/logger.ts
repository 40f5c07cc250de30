/**
 * Leveled logging for the build and signing pipeline.
 *
 * @packageDocumentation
 */

/**
 * - `silent`: nothing
 * - `minimal`: failures only
 * - `verbose`: failures and every pipeline stage
 */
export type LogLevel = 'silent' | 'minimal' | 'verbose';

/**
 * Custom logger function.
 */
export type Logger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Default logger (console).
 */
export function defaultLogger(message: string, data?: Record<string, unknown>): void {
  if (data) {
    console.log(`[txnkit] ${message}`, data);
  } else {
    console.log(`[txnkit] ${message}`);
  }
}

export interface PipelineLogger {
  stage(message: string, data?: Record<string, unknown>): void;
  failure(message: string, data?: Record<string, unknown>): void;
}

/**
 * Bind a logger to a level.
 */
export function createLogger(level: LogLevel = 'minimal', logger: Logger = defaultLogger): PipelineLogger {
  return {
    stage(message, data) {
      if (level === 'verbose') logger(message, data);
    },
    failure(message, data) {
      if (level !== 'silent') logger(message, data);
    },
  };
}
