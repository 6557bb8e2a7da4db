import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

type RawSection = Record<string, unknown>;
type RawConfig = Record<string, RawSection>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private raw: RawConfig;
  private config: Config;
  private configDir: string;

  constructor(configDir: string = join(process.cwd(), 'config')) {
    this.configDir = configDir;

    // Load .env file if it exists
    loadEnv();

    // Start with defaults
    this.raw = this.deepClone(defaultConfig);

    // Load from config file if exists
    this.loadFromFile();

    // Override with environment variables
    this.loadFromEnv();

    // Validate final configuration
    this.config = this.validate();
  }

  /**
   * Deep clone configuration into a mutable raw tree
   */
  private deepClone(obj: Config): RawConfig {
    const clone: RawConfig = {};
    for (const [section, values] of Object.entries(obj)) {
      clone[section] = { ...values };
    }
    return clone;
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = join(this.configDir, 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(`Failed to load config file ${configPath}: ${cause.message}`, { configPath }, cause);
    }

    if (!isRecord(fileConfig)) {
      throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, { configPath });
    }
    this.mergeConfig(fileConfig);
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;
    const set = (section: string, key: string, value: unknown): void => {
      const target = this.raw[section] ?? (this.raw[section] = {});
      target[key] = value;
    };

    // Server configuration
    if (env['NODE_ENV']) {
      set('server', 'nodeEnv', env['NODE_ENV']);
    }

    // Logging configuration
    if (env['TOPO_MCP_LOG_LEVEL']) {
      set('logging', 'level', env['TOPO_MCP_LOG_LEVEL']);
    }
    if (env['TOPO_MCP_LOG_FORMAT']) {
      set('logging', 'format', env['TOPO_MCP_LOG_FORMAT']);
    }
    if (env['TOPO_MCP_LOG_DIR']) {
      set('logging', 'dir', env['TOPO_MCP_LOG_DIR']);
    }
    if (env['TOPO_MCP_LOG_MAX_FILES']) {
      set('logging', 'maxFiles', parseInt(env['TOPO_MCP_LOG_MAX_FILES'], 10));
    }
    if (env['TOPO_MCP_LOG_MAX_SIZE']) {
      set('logging', 'maxSize', env['TOPO_MCP_LOG_MAX_SIZE']);
    }
    if (env['TOPO_MCP_LOG_FILE_OUTPUT']) {
      set('logging', 'fileOutput', env['TOPO_MCP_LOG_FILE_OUTPUT'] === 'true');
    }

    // MCP configuration
    if (env['TOPO_MCP_SERVER_NAME'] !== undefined) {
      set('mcp', 'serverName', env['TOPO_MCP_SERVER_NAME']);
    }
    if (env['TOPO_MCP_SERVER_VERSION']) {
      set('mcp', 'serverVersion', env['TOPO_MCP_SERVER_VERSION']);
    }
    if (env['TOPO_MCP_TRANSPORT']) {
      set('mcp', 'transport', env['TOPO_MCP_TRANSPORT']);
    }

    // Pricing configuration
    if (env['TOPO_MCP_PRICE_TABLE']) {
      set('pricing', 'priceTablePath', env['TOPO_MCP_PRICE_TABLE']);
    }
    if (env['TOPO_MCP_REGION']) {
      set('pricing', 'region', env['TOPO_MCP_REGION']);
    }

    // Analysis configuration
    if (env['TOPO_MCP_OVERHEAD_CPU']) {
      set('analysis', 'overheadCpuPerNode', parseFloat(env['TOPO_MCP_OVERHEAD_CPU']));
    }
    if (env['TOPO_MCP_OVERHEAD_MEMORY_GB']) {
      set('analysis', 'overheadMemoryGBPerNode', parseFloat(env['TOPO_MCP_OVERHEAD_MEMORY_GB']));
    }
    if (env['TOPO_MCP_WRITE_REPAIRED_FILES']) {
      set('analysis', 'writeRepairedFiles', env['TOPO_MCP_WRITE_REPAIRED_FILES'] === 'true');
    }

    // Performance configuration
    if (env['TOPO_MCP_ENABLE_HEALTH_CHECKS']) {
      set('performance', 'enableHealthChecks', env['TOPO_MCP_ENABLE_HEALTH_CHECKS'] === 'true');
    }
    if (env['TOPO_MCP_HEALTH_CHECK_INTERVAL']) {
      set('performance', 'healthCheckInterval', parseInt(env['TOPO_MCP_HEALTH_CHECK_INTERVAL'], 10));
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): Config {
    const result = ConfigSchema.safeParse(this.raw);
    if (!result.success) {
      const issues = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, { issues });
    }
    return result.data;
  }

  /**
   * Deep merge a parsed config file into the raw tree, one level of sections
   */
  private mergeConfig(source: Record<string, unknown>): void {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (isRecord(sourceValue)) {
        this.raw[key] = { ...(this.raw[key] ?? {}), ...sourceValue };
      } else if (sourceValue !== undefined) {
        throw new ConfigurationError(`Config section "${key}" must be an object`, { section: key });
      }
    }
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
