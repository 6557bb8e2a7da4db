import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Ensures type safety and validation of all configuration values
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['stdio']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema.default('development'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
  fileOutput: z.boolean().default(true),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('topology-cost-mcp'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const PricingConfigSchema = z.object({
  // Resolved against the working directory; unset means the bundled table
  priceTablePath: z.string().optional(),
  region: z.string().optional(),
});

export const AnalysisConfigSchema = z.object({
  overheadCpuPerNode: z.number().min(0).default(0),
  overheadMemoryGBPerNode: z.number().min(0).default(0),
  writeRepairedFiles: z.boolean().default(true),
});

export const PerformanceConfigSchema = z.object({
  enableHealthChecks: z.boolean().default(true),
  healthCheckInterval: z.number().int().min(1000).default(30000),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  pricing: PricingConfigSchema,
  analysis: AnalysisConfigSchema,
  performance: PerformanceConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
