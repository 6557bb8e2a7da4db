import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  server: {
    nodeEnv: 'development',
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
    fileOutput: true,
  },
  mcp: {
    serverName: 'topology-cost-mcp',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
  pricing: {
    priceTablePath: undefined,
    region: undefined,
  },
  analysis: {
    overheadCpuPerNode: 0,
    overheadMemoryGBPerNode: 0,
    writeRepairedFiles: true,
  },
  performance: {
    enableHealthChecks: true,
    healthCheckInterval: 30000,
  },
};
