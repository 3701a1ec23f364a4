/**
 * @review-tracker/shared
 * Shared utilities and types for the review tracker servers
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  getEnvList,
  type EnvLoaderOptions,
} from './env-loader.js';

// Types
export {
  type AtlassianApiConfig,
  type JiraConfig,
  type MCPTextContent,
  type MCPResponse,
  createTextResponse,
  createSuccessResponse,
  createErrorResponse,
  type PaginatedResult,
  type ApiUser,
} from './types.js';

// Error handling
export {
  ReviewTrackerError,
  ValidationError,
  MalformedTimestampError,
  ApiError,
  ConfigurationError,
  MethodNotFoundError,
  getErrorMessage,
  extractApiErrorDetails,
  createApiError,
  toMcpError,
} from './errors.js';
