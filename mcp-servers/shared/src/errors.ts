/**
 * Shared error handling utilities for the review tracker servers
 * Every failure the servers raise on purpose is a ReviewTrackerError with a stable code
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

/**
 * Base error class for review tracker operations
 */
export class ReviewTrackerError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ReviewTrackerError';
  }

  /**
   * Convert to MCP SDK error format
   */
  toMcpError(): McpError {
    return new McpError(ErrorCode.InternalError, this.message);
  }
}

/**
 * Error for invalid input (tool arguments, malformed records)
 */
export class ValidationError extends ReviewTrackerError {
  constructor(message: string, cause?: Error, code: string = 'VALIDATION_ERROR') {
    super(message, code, cause);
    this.name = 'ValidationError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.InvalidParams, this.message);
  }
}

/**
 * A timestamp that cannot be normalized into a calendar date, time of day and offset.
 * Fails the whole ticket analysis: ordering cannot be trusted without it.
 */
export class MalformedTimestampError extends ValidationError {
  constructor(public readonly input: string) {
    super(`Malformed timestamp: "${input}"`, undefined, 'MALFORMED_TIMESTAMP');
    this.name = 'MalformedTimestampError';
  }
}

/**
 * Error for API communication failures
 */
export class ApiError extends ReviewTrackerError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseData?: unknown,
    cause?: Error
  ) {
    super(message, 'API_ERROR', cause);
    this.name = 'ApiError';
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends ReviewTrackerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for tool names the server does not know
 */
export class MethodNotFoundError extends ReviewTrackerError {
  constructor(methodName: string) {
    super(`Unknown tool: ${methodName}`, 'METHOD_NOT_FOUND');
    this.name = 'MethodNotFoundError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.MethodNotFound, this.message);
  }
}

// ============================================
// Error Handling Utilities
// ============================================

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

interface JiraErrorBody {
  message?: string;
  errorMessages?: string[];
}

function isJiraErrorBody(data: unknown): data is JiraErrorBody {
  return typeof data === 'object' && data !== null;
}

/**
 * Extract API error details from axios-like error responses
 */
export function extractApiErrorDetails(error: unknown): {
  message: string;
  statusCode?: number;
  data?: unknown;
} {
  const baseMessage = getErrorMessage(error);

  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object') {
      const status = 'status' in response && typeof response.status === 'number' ? response.status : undefined;
      const data = 'data' in response ? response.data : undefined;
      const body = isJiraErrorBody(data) ? data : {};
      const errorMessages = Array.isArray(body.errorMessages) && body.errorMessages.length > 0
        ? body.errorMessages.join(', ')
        : undefined;
      const apiMessage = (typeof body.message === 'string' && body.message) || errorMessages || baseMessage;

      return {
        message: apiMessage,
        statusCode: status,
        data,
      };
    }
  }

  return { message: baseMessage };
}

/**
 * Create an API error from an axios-like error
 */
export function createApiError(error: unknown, context: string): ApiError {
  const details = extractApiErrorDetails(error);
  return new ApiError(
    `${context}: ${details.message}`,
    details.statusCode,
    details.data,
    error instanceof Error ? error : undefined
  );
}

/**
 * Convert any thrown value into an McpError, keeping MCP errors as they are
 */
export function toMcpError(error: unknown, operation: string): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof ValidationError || error instanceof MethodNotFoundError) {
    return error.toMcpError();
  }
  return new McpError(ErrorCode.InternalError, `Failed to ${operation}: ${getErrorMessage(error)}`);
}
