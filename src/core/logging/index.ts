export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getDeploymentLogger,
  logger,
} from './logger.js';
export type { DeployerLogger, LogLevel, LoggerConfig, LoggerContext } from './types.js';
export { LOG_LEVELS } from './types.js';
