/**
 * MCP (Model Context Protocol) type definitions
 */

/**
 * Capabilities advertised by the topology cost server
 */
export interface TopologyServerCapabilities {
  resources: {
    listChanged: boolean;
  };
  tools: {
    listChanged?: boolean;
  };
}

/**
 * Name and version reported during MCP initialization
 */
export interface ServerIdentity {
  name: string;
  version: string;
}
