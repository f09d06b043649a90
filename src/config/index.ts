/**
 * Config module exports.
 */

export type { AppConfigFile, LogLevel, MergedConfig } from './config-schema.js';
export { appConfigFileSchema, DEFAULT_CONFIG, CONFIG_FILE_VERSION } from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
