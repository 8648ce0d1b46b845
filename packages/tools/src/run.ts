import { z } from 'zod';
import { envelopeFor, isNewsdeskError } from '@newsdesk/core';
import type { ToolBody, ToolContext, ToolDefinition, ToolResult } from './types.js';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function toFailure(err: unknown): ToolResult {
  if (isNewsdeskError(err)) {
    return { success: false, data: null, error: err.message, code: err.code };
  }
  return {
    success: false,
    data: null,
    error: err instanceof Error ? err.message : String(err),
    code: 'INTERNAL',
  };
}

interface QueryToolOptions<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: S;
  run: (args: z.output<S>, context: ToolContext) => Omit<ToolBody, 'tool'>;
}

/**
 * Wraps a query as a tool: validate the arguments, run against one pinned
 * snapshot, then sign the canonical body. Every failure comes back as a
 * result with a code; nothing throws out of `execute`.
 */
export function defineQueryTool<S extends z.ZodTypeAny>(definition: QueryToolOptions<S>): ToolDefinition {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    async execute(params: unknown, context: ToolContext): Promise<ToolResult> {
      const parsed = definition.parameters.safeParse(params ?? {});
      if (!parsed.success) {
        return {
          success: false,
          data: null,
          error: `Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`,
          code: 'INVALID_ARGUMENT',
        };
      }
      try {
        const body: ToolBody = { tool: definition.name, ...definition.run(parsed.data, context) };
        return {
          success: true,
          data: envelopeFor(body, context.signer, context.unsignedPolicy),
        };
      } catch (err) {
        return toFailure(err);
      }
    },
  };
}
