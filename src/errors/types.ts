/**
 * Error types and error codes for the topology cost MCP server
 * Provides structured error handling with proper categorization
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,
  INITIALIZATION_ERROR = 1003,

  // MCP Protocol errors (2000-2999)
  MCP_PROTOCOL_ERROR = 2000,
  MCP_INVALID_REQUEST = 2001,
  MCP_METHOD_NOT_FOUND = 2002,
  MCP_INVALID_PARAMS = 2003,
  MCP_INTERNAL_ERROR = 2004,

  // Topology errors (3000-3999)
  TOPOLOGY_PARSE_ERROR = 3000,
  TOPOLOGY_READ_ERROR = 3001,
  TOPOLOGY_WRITE_ERROR = 3002,

  // Pricing and capacity errors (4000-4999)
  CAPACITY_EXCEEDED = 4000,
  UNKNOWN_MACHINE_TYPE = 4001,
  PRICE_TABLE_INVALID = 4002,
  BUDGET_EXCEEDED = 4003,

  // Resource errors (5000-5999)
  RESOURCE_NOT_FOUND = 5000,
  RESOURCE_ACCESS_DENIED = 5001,

  // Tool errors (6000-6999)
  TOOL_EXECUTION_ERROR = 6000,
  TOOL_INVALID_INPUT = 6001,
  TOOL_NOT_FOUND = 6002,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  name: string;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}

/**
 * Resource dimensions the optimizer matches on
 */
export type CapacityDimension = 'cpu' | 'memory';

export interface CapacityShortfall {
  dimension: CapacityDimension;
  required: number;
  available: number;
  shortfall: number;
}
