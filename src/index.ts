#!/usr/bin/env node

/**
 * Topology Cost MCP Server - Entry Point
 * Model Context Protocol server for ContainerLab topology validation and cloud cost optimization
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { loadPriceTable } from './pricing/price-table.js';
import { TopologyCostMCPServer } from './server.js';
import { ConfigurationError, PricingError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = getLogger(config.logging);

    logger.info('Starting Topology Cost MCP Server', {
      version: config.mcp.serverVersion,
      nodeEnv: config.server.nodeEnv,
    });

    const priceTable = await loadPriceTable(config.pricing.priceTablePath, { region: config.pricing.region });

    const server = new TopologyCostMCPServer(config, logger, priceTable);
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }
    if (error instanceof PricingError) {
      console.error('Price table error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
