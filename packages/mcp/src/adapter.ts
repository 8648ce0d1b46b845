import { z } from 'zod';
import type { ToolDefinition, ToolResult } from '@newsdesk/tools';
import type { MCPTool, MCPToolResult, JsonSchema } from './types.js';

// ---------------------------------------------------------------------------
// Zod → JSON Schema conversion
// ---------------------------------------------------------------------------

function withDescription(schema: z.ZodTypeAny, json: JsonSchema): JsonSchema {
  return schema.description ? { ...json, description: schema.description } : json;
}

/**
 * Converts a Zod schema to a JSON Schema property.
 * Handles the types tool parameters use; anything else becomes `{}`.
 */
export function zodToJsonSchemaProperty(schema: z.ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return withDescription(schema, zodToJsonSchemaProperty(schema.unwrap()));
  }
  if (schema instanceof z.ZodDefault) {
    const inner = zodToJsonSchemaProperty(schema.removeDefault());
    return withDescription(schema, { ...inner, default: schema._def.defaultValue() });
  }

  if (schema instanceof z.ZodString) {
    const json: JsonSchema = { type: 'string' };
    for (const check of schema._def.checks) {
      if (check.kind === 'min') json.minLength = check.value;
      if (check.kind === 'max') json.maxLength = check.value;
      if (check.kind === 'regex') json.pattern = check.regex.source;
    }
    return withDescription(schema, json);
  }

  if (schema instanceof z.ZodNumber) {
    const json: JsonSchema = { type: 'number' };
    for (const check of schema._def.checks) {
      if (check.kind === 'int') json.type = 'integer';
      if (check.kind === 'min') json.minimum = check.value;
      if (check.kind === 'max') json.maximum = check.value;
    }
    return withDescription(schema, json);
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription(schema, { type: 'boolean' });
  }

  if (schema instanceof z.ZodEnum) {
    const values: string[] = schema.options;
    return withDescription(schema, { type: 'string', enum: values });
  }

  if (schema instanceof z.ZodArray) {
    return withDescription(schema, { type: 'array', items: zodToJsonSchemaProperty(schema.element) });
  }

  if (schema instanceof z.ZodObject) {
    return withDescription(schema, zodToJsonSchema(schema));
  }

  return withDescription(schema, {});
}

/**
 * Converts a Zod object schema to the JSON Schema object MCP expects as a
 * tool `inputSchema`. Non-object schemas yield an empty object schema.
 */
export function zodToJsonSchema(schema: z.ZodSchema): MCPTool['inputSchema'] {
  if (!(schema instanceof z.ZodObject)) {
    return { type: 'object', properties: {} };
  }

  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];
  const shape: z.ZodRawShape = schema.shape;
  for (const [key, property] of Object.entries(shape)) {
    properties[key] = zodToJsonSchemaProperty(property);
    if (!property.isOptional()) {
      required.push(key);
    }
  }

  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

// ---------------------------------------------------------------------------
// ToolDefinition → MCP adapter
// ---------------------------------------------------------------------------

export function toMCPTool(tool: ToolDefinition): MCPTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: zodToJsonSchema(tool.parameters),
  };
}

/**
 * A success carries the signed envelope both as JSON text and as structured
 * content. A failure carries `{ error, code }` with `isError` set.
 */
export function toMCPToolResult(result: ToolResult): MCPToolResult {
  if (result.success && result.data) {
    const envelope = { ...result.data };
    return {
      content: [{ type: 'text', text: JSON.stringify(envelope) }],
      structuredContent: envelope,
    };
  }

  const failure = {
    error: result.error ?? 'Tool execution failed',
    code: result.code ?? 'INTERNAL',
  };
  return {
    content: [{ type: 'text', text: JSON.stringify(failure) }],
    structuredContent: failure,
    isError: true,
  };
}
