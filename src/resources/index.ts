/**
 * Resource registry and handlers
 * Central module for all MCP resources
 */

import { ResourceURIs, type ResourceContent, type ResourceDescriptor, type ResourceURI } from '../types/resources.js';
import { TOOL_NAMES } from '../types/tools.js';
import { ErrorCode, ResourceError } from '../errors/index.js';
import {
  DEFAULT_KIND,
  GENERIC_LINUX_IMAGE,
  UNKNOWN_COMPONENT_PROFILE,
  UNKNOWN_KIND_PROFILE,
  listComponentProfiles,
  listNodeKinds,
} from '../topology/catalog.js';
import { summarizeHealth, type HealthManager } from '../health/index.js';
import type { PriceTable } from '../pricing/price-table.js';
import type { Config } from '../config/schema.js';

export interface ResourceContext {
  priceTable: PriceTable;
  config: Config;
  health: HealthManager;
}

const RESOURCES: ReadonlyArray<ResourceDescriptor & { uri: ResourceURI }> = [
  {
    uri: ResourceURIs.SERVER_INFO,
    name: 'Server Information',
    description: 'Basic server information and capabilities',
    mimeType: 'application/json',
  },
  {
    uri: ResourceURIs.PRICE_TABLE,
    name: 'Price Table',
    description: 'Machine offers with on-demand and discounted prices used for cost optimization',
    mimeType: 'application/json',
  },
  {
    uri: ResourceURIs.NODE_KINDS,
    name: 'Node Kind Catalog',
    description: 'Known node kinds with default images and resource profiles, plus component profiles',
    mimeType: 'application/json',
  },
];

/**
 * Get all available MCP resources
 */
export function listAllResources(): ResourceDescriptor[] {
  return RESOURCES.map(resource => ({ ...resource }));
}

function json(uri: string, payload: unknown): ResourceContent[] {
  return [{ uri, mimeType: 'application/json', text: JSON.stringify(payload, null, 2) }];
}

/**
 * Read a resource by URI
 */
export async function readResource(uri: string, context: ResourceContext): Promise<ResourceContent[]> {
  if (!isValidResourceURI(uri)) {
    throw new ResourceError(`Unknown resource URI: ${uri}`, ErrorCode.RESOURCE_NOT_FOUND, { uri });
  }

  switch (uri) {
    case ResourceURIs.SERVER_INFO:
      return json(uri, {
        name: context.config.mcp.serverName,
        version: context.config.mcp.serverVersion,
        description: 'Model Context Protocol server for ContainerLab topology validation and cloud cost optimization',
        capabilities: {
          resources: true,
          tools: true,
        },
        tools: [...TOOL_NAMES],
        priceTable: {
          provider: context.priceTable.metadata.provider,
          region: context.priceTable.metadata.region,
          offers: context.priceTable.size,
        },
        health: summarizeHealth(await context.health.check()),
      });

    case ResourceURIs.PRICE_TABLE:
      return json(uri, { metadata: context.priceTable.metadata, offers: context.priceTable.list() });

    case ResourceURIs.NODE_KINDS:
      return json(uri, {
        defaultKind: DEFAULT_KIND,
        defaultImage: GENERIC_LINUX_IMAGE,
        unknownKindProfile: UNKNOWN_KIND_PROFILE,
        unknownComponentProfile: UNKNOWN_COMPONENT_PROFILE,
        kinds: listNodeKinds(),
        components: listComponentProfiles(),
      });
  }
}

/**
 * Check if a URI is a valid resource
 */
export function isValidResourceURI(uri: string): uri is ResourceURI {
  return RESOURCES.some(resource => resource.uri === uri);
}
