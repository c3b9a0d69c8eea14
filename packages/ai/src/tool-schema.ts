import { z } from 'zod';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';

/**
 * Duck-typed registry interface accepted by toolDefinitionsToOpenAI.
 * Keeps @cartpilot/ai independent from @cartpilot/tools.
 */
export interface ToolRegistryLike {
  list(): Array<{ name: string; description: string }>;
  get(name: string): { inputSchema: z.ZodTypeAny } | undefined;
}

/**
 * Convert a Zod type to a JSON Schema object compatible with OpenAI tool definitions.
 *
 * Handles the Zod types the tools use:
 * - ZodObject     → { type: 'object', properties: {...}, required: [...] }
 * - ZodString     → { type: 'string' }
 * - ZodNumber     → { type: 'number' }
 * - ZodBoolean    → { type: 'boolean' }
 * - ZodEnum       → { type: 'string', enum: [...] }
 * - ZodArray      → { type: 'array', items: {...} }
 * - ZodOptional   → unwrap inner type
 * - ZodDefault    → unwrap inner type
 * - ZodLiteral    → { type: string/number/boolean, const: value }
 *
 * `.describe()` text becomes the schema's `description`.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const result = convert(schema);
  if (schema.description !== undefined && result.description === undefined) {
    result.description = schema.description;
  }
  return result;
}

function convert(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodOptional) {
    return zodToJsonSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return zodToJsonSchema(schema.removeDefault());
  }
  if (schema instanceof z.ZodNullable) {
    return { ...zodToJsonSchema(schema.unwrap()), nullable: true };
  }

  if (schema instanceof z.ZodString) {
    const result: Record<string, unknown> = { type: 'string' };
    for (const check of schema._def.checks) {
      if (check.kind === 'min') result.minLength = check.value;
      if (check.kind === 'max') result.maxLength = check.value;
    }
    return result;
  }

  if (schema instanceof z.ZodNumber) {
    const result: Record<string, unknown> = { type: 'number' };
    for (const check of schema._def.checks) {
      if (check.kind === 'int') result.type = 'integer';
      if (check.kind === 'min') result.minimum = check.value;
      if (check.kind === 'max') result.maximum = check.value;
    }
    return result;
  }

  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }

  if (schema instanceof z.ZodLiteral) {
    const val: unknown = schema.value;
    return { type: typeof val, const: val };
  }

  if (schema instanceof z.ZodEnum) {
    return { type: 'string', enum: schema.options };
  }

  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element) };
  }

  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, field] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(field);
      // Required unless optional or defaulted
      if (!(field instanceof z.ZodOptional) && !(field instanceof z.ZodDefault)) {
        required.push(key);
      }
    }

    const result: Record<string, unknown> = { type: 'object', properties };
    if (required.length > 0) {
      result.required = required;
    }
    return result;
  }

  // ZodUnknown, ZodAny and anything unhandled: accept any value
  return {};
}

/**
 * Convert all tools in a registry to OpenAI ChatCompletionTool format.
 *
 * @example
 * const tools = toolDefinitionsToOpenAI(registry);
 * await router.completeWithTools(messages, 'searcher', tools);
 */
export function toolDefinitionsToOpenAI(registry: ToolRegistryLike): ChatCompletionTool[] {
  return registry.list().map(({ name, description }) => {
    const toolDef = registry.get(name);
    if (!toolDef) {
      throw new Error(`toolDefinitionsToOpenAI: tool "${name}" was listed but not found`);
    }

    return {
      type: 'function' as const,
      function: {
        name,
        description,
        parameters: zodToJsonSchema(toolDef.inputSchema),
      },
    };
  });
}
