/**
 * Shared dependencies handed to every tool call
 */

import { DeploymentOptimizer } from '../optimizers/deployment.js';
import type { PriceTable } from '../pricing/price-table.js';
import type { Config } from '../config/index.js';
import type { Logger } from '../logger/index.js';
import type { DemandOptions } from '../types/pricing.js';

export interface ToolContext {
  priceTable: PriceTable;
  optimizer: DeploymentOptimizer;
  analysis: Config['analysis'];
  logger: Logger;
}

export function createToolContext(priceTable: PriceTable, config: Config, logger: Logger): ToolContext {
  return {
    priceTable,
    optimizer: new DeploymentOptimizer(priceTable),
    analysis: config.analysis,
    logger: logger.child({ component: 'tools' }),
  };
}

/**
 * Configured per-node overheads, optionally overridden per call
 */
export function demandOptions(context: ToolContext, overrides: DemandOptions = {}): DemandOptions {
  return {
    overheadCpuPerNode: overrides.overheadCpuPerNode ?? context.analysis.overheadCpuPerNode,
    overheadMemoryGBPerNode: overrides.overheadMemoryGBPerNode ?? context.analysis.overheadMemoryGBPerNode,
  };
}
