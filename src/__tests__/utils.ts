/**
 * Test utilities and helper functions
 */

import { readFileSync } from 'fs';
import { BUNDLED_PRICE_TABLE_PATH, PriceTable, type PriceTableData } from '../pricing/price-table.js';
import { parseTopology } from '../topology/document.js';
import { defaultConfig } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { Logger } from '../logger/index.js';
import { createToolContext, type ToolContext } from '../tools/context.js';
import type { TopologyDocument } from '../types/topology.js';
import type { ToolCallResponse } from '../types/tools.js';

/**
 * A small valid lab: two SR Linux routers and a client
 */
export const VALID_TOPOLOGY_YAML = `name: lab
topology:
  nodes:
    srl1:
      kind: nokia_srlinux
      image: ghcr.io/nokia/srlinux
    srl2:
      kind: nokia_srlinux
      image: ghcr.io/nokia/srlinux
    client:
      kind: linux
      image: ghcr.io/hellt/network-multitool
  links:
    - endpoints: ["srl1:e1-1", "srl2:e1-1"]
    - endpoints: ["client:eth1", "srl1:e1-2"]
`;

/**
 * Nodes and links at the top level and one node without an image
 */
export const BROKEN_TOPOLOGY_YAML = `name: broken
nodes:
  r1:
    kind: nokia_srlinux
    image: ghcr.io/nokia/srlinux
  r2:
    kind: linux
links:
  - endpoints: ["r1:e1-1", "r2:eth1"]
`;

/**
 * Explicit resources adding up to 16 vCPUs and 32GB
 */
export const SIXTEEN_BY_THIRTY_TWO_YAML = `name: sized
topology:
  nodes:
    core:
      kind: nokia_sros
      image: ghcr.io/nokia/sros
      resources:
        cpu: 10
        memory: 20GB
    edge:
      kind: linux
      image: ghcr.io/hellt/network-multitool
      cpu: 6
      memory: 12GB
  links:
    - endpoints: ["core:1/1/1", "edge:eth1"]
`;

export function topology(yaml: string): TopologyDocument {
  return parseTopology(yaml, 'test');
}

/**
 * The price table shipped in data/
 */
export function bundledPriceTable(): PriceTable {
  const data: unknown = JSON.parse(readFileSync(BUNDLED_PRICE_TABLE_PATH, 'utf-8'));
  return PriceTable.fromData(data);
}

/**
 * A hand-made price table for tie-break and capacity tests
 */
export function createTestPriceTable(
  offers: Array<{ name: string; vcpus: number; memoryGB: number; monthlyPrice: number }>,
  discountRate = 0.5
): PriceTable {
  const data: PriceTableData = {
    metadata: { provider: 'test', region: 'test-region1', version: 'test', currency: 'USD', discountRate },
    offers: offers.map(offer => ({
      ...offer,
      family: offer.name.split('-')[0] ?? offer.name,
      hourlyPrice: offer.monthlyPrice / 730,
    })),
  };
  return PriceTable.fromData(data);
}

/**
 * Configuration for tests: quiet logging, no log files
 */
export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    ...defaultConfig,
    logging: { ...defaultConfig.logging, level: 'error', fileOutput: false },
    performance: { ...defaultConfig.performance, enableHealthChecks: false },
    ...overrides,
  };
}

/**
 * Tool context over the bundled price table with quiet logging
 */
export function createTestContext(overrides: Partial<Config> = {}): ToolContext {
  const config = createTestConfig(overrides);
  return createToolContext(bundledPriceTable(), config, new Logger(config.logging));
}

/**
 * Text of the first content block of a tool response
 */
export function responseText(response: ToolCallResponse): string {
  const [first] = response.content;
  if (first?.type !== 'text') {
    throw new Error('Expected a text content block');
  }
  return first.text;
}

/**
 * Parsed JSON payload of a tool response
 */
export function responsePayload(response: ToolCallResponse) {
  return JSON.parse(responseText(response));
}
