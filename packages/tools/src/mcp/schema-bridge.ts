import { z, type ZodType } from 'zod';
import type { ToolDefinition } from '@costwise/shared';

type JsonSchema = Record<string, unknown>;

function isJsonSchema(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(schema: JsonSchema, key: string): number | undefined {
  const value = schema[key];
  return typeof value === 'number' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Converts a JSON Schema object to a Zod schema.
 * Handles the common types used by MCP tools; anything else accepts any value.
 */
export function jsonSchemaToZod(schema: JsonSchema): ZodType {
  switch (schema.type) {
    case 'string': {
      const [first, ...rest] = stringList(schema.enum);
      if (first !== undefined) {
        return z.enum([first, ...rest]);
      }
      let s = z.string();
      const minLength = numberField(schema, 'minLength');
      const maxLength = numberField(schema, 'maxLength');
      if (minLength !== undefined) s = s.min(minLength);
      if (maxLength !== undefined) s = s.max(maxLength);
      return s;
    }
    case 'number':
    case 'integer': {
      let n = schema.type === 'integer' ? z.number().int() : z.number();
      const minimum = numberField(schema, 'minimum');
      const maximum = numberField(schema, 'maximum');
      if (minimum !== undefined) n = n.min(minimum);
      if (maximum !== undefined) n = n.max(maximum);
      return n;
    }
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(isJsonSchema(schema.items) ? jsonSchemaToZod(schema.items) : z.unknown());
    case 'object': {
      if (!isJsonSchema(schema.properties)) {
        return z.record(z.unknown());
      }

      const required = stringList(schema.required);
      const shape: Record<string, ZodType> = {};
      for (const [key, propSchema] of Object.entries(schema.properties)) {
        const fieldSchema = isJsonSchema(propSchema) ? jsonSchemaToZod(propSchema) : z.unknown();
        shape[key] = required.includes(key) ? fieldSchema : fieldSchema.optional();
      }

      return z.object(shape).passthrough();
    }
    default:
      return z.unknown();
  }
}

/**
 * Converts an MCP tool listing entry to a ToolDefinition that calls back
 * into the owning client.
 */
export function mcpToolToToolDefinition(
  mcpTool: {
    name: string;
    description?: string;
    inputSchema?: JsonSchema;
  },
  callTool: (args: Record<string, unknown>) => Promise<unknown>,
): ToolDefinition {
  const inputSchema = mcpTool.inputSchema
    ? jsonSchemaToZod(mcpTool.inputSchema)
    : z.object({}).passthrough();

  return {
    name: mcpTool.name,
    description: mcpTool.description ?? `MCP tool: ${mcpTool.name}`,
    inputSchema,
    tags: ['mcp'],
    execute: async (input: unknown) => callTool(isJsonSchema(input) ? input : {}),
  };
}
