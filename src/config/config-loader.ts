import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AppConfigFile, LogLevel, MergedConfig } from './config-schema.js';
import { isFileNotFound } from '../utils/fs.js';
import { appConfigFileSchema, CONFIG_FILE_VERSION, DEFAULT_CONFIG } from './config-schema.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/app.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: AppConfigFile | null = null;

  /**
   * @param configPath Directory holding app.json (default: $DATA_DIR/config or data/config)
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    const dataDir = env['DATA_DIR'];
    this.configPath =
      configPath ?? (dataDir ? join(dataDir, 'config') : DEFAULT_CONFIG.paths.config);
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): AppConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<AppConfigFile | null> {
    const filePath = join(this.configPath, 'app.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse config file ${filePath}: ${message}`);
    }

    const result = appConfigFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file ${filePath}: ${issues}`);
    }

    const file = result.data;
    if (file.version !== undefined && file.version > CONFIG_FILE_VERSION) {
      throw new Error(
        `Config file version (${String(file.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return file;
  }

  private mergeConfigFile(config: MergedConfig, file: AppConfigFile): void {
    if (file.telegram) {
      config.telegram = { ...config.telegram, ...file.telegram };
    }

    if (file.frontendDomain !== undefined) {
      config.frontendDomain = file.frontendDomain;
    }

    if (file.scheduler) {
      config.scheduler = { ...config.scheduler, ...file.scheduler };
    }

    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const botToken = this.env['BOT_TOKEN'];
    if (botToken) {
      config.telegram.botToken = botToken;
    }

    const frontendDomain = this.env['FRONTEND_DOMAIN'];
    if (frontendDomain) {
      config.frontendDomain = frontendDomain;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const logPretty = this.env['LOG_PRETTY'];
    if (logPretty === 'true' || logPretty === 'false') {
      config.logging.pretty = logPretty === 'true';
    }

    const dataDir = this.env['DATA_DIR'];
    if (dataDir) {
      config.paths.data = dataDir;
      config.logging.logDir = join(dataDir, 'logs');
    }
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
