import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { DeployerLogger, LoggerConfig, LoggerContext } from './types.js';

function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Pino-backed implementation of DeployerLogger
 */
class PinoLogger implements DeployerLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: unknown, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error !== undefined) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.error(logData, msg);
  }

  fatal(msg: string, error?: unknown, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error !== undefined) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.fatal(logData, msg);
  }

  child(bindings: Record<string, unknown>): DeployerLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

export function createLogger(config?: Partial<LoggerConfig>): DeployerLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const base: Record<string, unknown> = {};
  if (finalConfig.options?.pid !== false) {
    base.pid = process.pid;
  }
  if (finalConfig.options?.hostname !== false) {
    base.hostname = process.env.HOSTNAME;
  }

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    base,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
        mkdir: true,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): DeployerLogger {
  return createLogger(config).child(context);
}

/**
 * Process-wide logger configured from the environment
 */
export const logger: DeployerLogger = createLogger();

export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): DeployerLogger {
  return logger.child({ component, ...additionalContext });
}

export function getDeploymentLogger(
  deploymentId: string,
  namespace?: string,
  additionalContext?: Record<string, unknown>
): DeployerLogger {
  return logger.child({ deploymentId, namespace, ...additionalContext });
}
