/**
 * MCP Resource type definitions
 */

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

/**
 * Resource URIs served by the topology cost server
 */
export const ResourceURIs = {
  SERVER_INFO: 'topology://server/info',
  PRICE_TABLE: 'topology://pricing/table',
  NODE_KINDS: 'topology://catalog/node-kinds',
} as const;

export type ResourceURI = (typeof ResourceURIs)[keyof typeof ResourceURIs];
