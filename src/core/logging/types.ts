/**
 * Structured logger used across the deployer
 */
export interface DeployerLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log an error; an Error's name, message and stack are attached under `error`,
   * any other thrown value as its string form
   */
  error(msg: string, error?: unknown, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: unknown, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): DeployerLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerConfig {
  level: LogLevel;

  /**
   * Pretty print through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output file; stdout when unset
   */
  destination?: string;

  options?: {
    timestamp?: boolean;
    hostname?: boolean;
    pid?: boolean;
  };
}

/**
 * Context bound onto child loggers
 */
export interface LoggerContext {
  component?: string;
  deploymentId?: string;
  namespace?: string;
  [key: string]: unknown;
}
