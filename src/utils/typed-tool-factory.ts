/**
 * Type-safe tool factory
 *
 * Converts the generic Record<string, unknown> arguments an MCP tool call carries into
 * strongly-typed parameters using runtime validation with Zod.
 */

import * as z from 'zod';
import type { ToolResponse } from '../types/common.ts';
import { createErrorResponse } from './responses/index.ts';

export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResponse>;

export type ToolAnnotations = {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  schema: Record<string, z.ZodType>;
  annotations?: ToolAnnotations;
  handler: ToolHandler;
};

/**
 * Validates `args` against `schema` and runs the typed logic function with a context
 * obtained lazily from `getContext`. Validation failures become error responses; any
 * other error is re-thrown.
 */
export function createTypedToolWithContext<TParams, TContext>(
  schema: z.ZodType<TParams, unknown>,
  logicFunction: (params: TParams, context: TContext) => Promise<ToolResponse>,
  getContext: () => TContext,
): ToolHandler {
  return async (args: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const validatedParams = schema.parse(args);
      return await logicFunction(validatedParams, getContext());
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = `Invalid parameters:\n${formatZodIssues(error)}`;
        return createErrorResponse('Parameter validation failed', details);
      }

      throw error;
    }
  };
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('\n');
}
