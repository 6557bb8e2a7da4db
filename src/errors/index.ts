import {
  ErrorCode,
  ErrorSeverity,
  type CapacityDimension,
  type CapacityShortfall,
  type ErrorContext,
  type ErrorDetails,
} from './types.js';

/**
 * Base error class for the topology cost MCP server
 * Extends native Error with additional metadata
 */
export class ServiceError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ServiceError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * MCP Protocol errors
 */
export class MCPError extends ServiceError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'MCPError';
  }
}

/**
 * A topology document could not be read or interpreted as YAML.
 * Fatal for the current request.
 */
export class ParseError extends ServiceError {
  constructor(
    message: string,
    context?: ErrorContext,
    originalError?: Error,
    code: ErrorCode = ErrorCode.TOPOLOGY_PARSE_ERROR
  ) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ParseError';
  }
}

/**
 * No machine offer in the price table satisfies the requested demand
 */
export class CapacityError extends ServiceError {
  /** First unmet dimension, CPU before memory */
  public readonly dimension: CapacityDimension;
  public readonly shortfall: number;
  public readonly unmet: CapacityShortfall[];

  constructor(unmet: [CapacityShortfall, ...CapacityShortfall[]]) {
    const [first] = unmet;
    const detail = unmet
      .map(u => `${u.dimension} short by ${u.shortfall}${u.dimension === 'memory' ? 'GB' : ' vCPU'} (need ${u.required}, largest fitting offer has ${u.available})`)
      .join('; ');

    super(
      `No machine offer satisfies the demand: ${detail}`,
      ErrorCode.CAPACITY_EXCEEDED,
      ErrorSeverity.HIGH,
      { dimension: first.dimension, shortfall: first.shortfall, unmet }
    );
    this.name = 'CapacityError';
    this.dimension = first.dimension;
    this.shortfall = first.shortfall;
    this.unmet = unmet;
  }
}

/**
 * Price table errors (unknown machine type, malformed table data)
 */
export class PricingError extends ServiceError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'PricingError';
  }
}

/**
 * No deployment option fits the caller's monthly budget
 */
export class BudgetError extends ServiceError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.BUDGET_EXCEEDED, ErrorSeverity.MEDIUM, context);
    this.name = 'BudgetError';
  }
}

/**
 * Resource errors
 */
export class ResourceError extends ServiceError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ResourceError';
  }
}

/**
 * Tool execution errors
 */
export class ToolError extends ServiceError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ToolError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends ServiceError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

// Export types
export {
  ErrorCode,
  ErrorSeverity,
  type CapacityDimension,
  type CapacityShortfall,
  type ErrorContext,
  type ErrorDetails,
} from './types.js';
