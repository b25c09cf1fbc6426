export * from './memory/index.js';
export * from './mcp/index.js';
export * from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export {
  ConfigSchema,
  CONFIG_FILE,
  ENV_PREFIX,
  resolveConfig,
  loadConfigFile,
  getConfigValue,
} from './config/index.js';
export type { Config, ConfigOverrides, ResolveConfigOptions, Transport } from './config/index.js';
