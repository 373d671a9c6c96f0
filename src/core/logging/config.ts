import { LOG_LEVELS, type LogLevel, type LoggerConfig } from './types.js';

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
    hostname: true,
    pid: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read logger configuration from KUBELAUNCH_LOG_* environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.KUBELAUNCH_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  if (env.NODE_ENV === 'development' || env.KUBELAUNCH_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (env.KUBELAUNCH_LOG_DESTINATION) {
    config.destination = env.KUBELAUNCH_LOG_DESTINATION;
  }

  if (env.KUBELAUNCH_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  if (env.KUBELAUNCH_LOG_HOSTNAME === 'false') {
    config.options = { ...config.options, hostname: false };
  }

  if (env.KUBELAUNCH_LOG_PID === 'false') {
    config.options = { ...config.options, pid: false };
  }

  return config;
}

export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(`Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }
}
