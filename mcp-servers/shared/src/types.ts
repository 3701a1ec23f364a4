/**
 * Shared type definitions for the review tracker servers
 */

// ============================================
// API Configuration Types
// ============================================

/**
 * Base configuration for Atlassian APIs
 */
export interface AtlassianApiConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
}

/**
 * Jira-specific API configuration
 */
export interface JiraConfig extends AtlassianApiConfig {}

// ============================================
// MCP Response Types
// ============================================

/**
 * Standard MCP text content item
 */
export type MCPTextContent = {
  type: 'text';
  text: string;
};

/**
 * Standard MCP response structure
 * (type alias: must stay assignable to the SDK's index-signature result types)
 */
export type MCPResponse = {
  content: MCPTextContent[];
};

// ============================================
// Common Response Formatting Utilities
// ============================================

/**
 * Create a standard MCP text response
 */
export function createTextResponse(text: string): MCPResponse {
  return {
    content: [{ type: 'text', text }]
  };
}

/**
 * Create a success response with optional content
 */
export function createSuccessResponse(message: string, content?: string): MCPResponse {
  const text = content ? `⚡ ${message}:\n\n${content}` : `✅ ${message}`;
  return createTextResponse(text);
}

/**
 * Create an error response
 */
export function createErrorResponse(message: string): MCPResponse {
  return createTextResponse(`❌ ${message}`);
}

// ============================================
// Generic Utility Types
// ============================================

/**
 * One page of an offset-paginated Atlassian collection
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  maxResults: number;
  startAt: number;
}

/**
 * Generic API user structure
 */
export interface ApiUser {
  displayName: string;
  emailAddress?: string;
  accountId?: string;
}
