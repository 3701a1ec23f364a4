/**
 * Base Handler for Common MCP Tool Operations
 */

import type { z } from 'zod';
import { createTextResponse, toMcpError, ValidationError, type MCPResponse } from '@review-tracker/shared';

export abstract class BaseHandler {

  /**
   * Validate tool arguments against a schema; failures become InvalidParams
   */
  protected parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid arguments - ${details}`).toMcpError();
    }
    return result.data;
  }

  /**
   * Handle errors consistently
   */
  protected handleError(error: unknown, operation: string): never {
    throw toMcpError(error, operation);
  }

  /**
   * Format success response
   */
  protected formatResponse(text: string): MCPResponse {
    return createTextResponse(text);
  }
}
