// Tool Registry - lookup and dispatch for catalog operations
// Unknown operation names are reported, never thrown: a model may invent one

import type { ProviderTool, JsonSchemaProperty, ToolCall } from '../../providers/types.js';
import { MalformedToolArguments, ProviderFailure, ToolDispatchFailure } from '../../utils/errors.js';
import {
  IMAGE_SEARCH,
  TEXT_SEARCH,
  isOperationName,
  type AnyToolDefinition,
  type DispatchResult,
  type OperationName,
  type ToolDefinition,
  type ToolParameter,
} from './types.js';

/**
 * Parse the JSON argument payload of a tool call into a plain object.
 * An empty payload counts as `{}`.
 */
export function parseToolArguments(call: ToolCall): Record<string, unknown> {
  const raw = call.arguments.trim();
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedToolArguments(call.name, `Arguments for "${call.name}" are not valid JSON`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedToolArguments(call.name, `Arguments for "${call.name}" must be a JSON object`);
  }

  return { ...parsed };
}

async function invoke<K extends OperationName>(
  tool: ToolDefinition<K>,
  args: unknown,
): Promise<DispatchResult> {
  const startTime = Date.now();

  const parsed = tool.schema.safeParse(args);
  if (!parsed.success) {
    return {
      status: 'failed',
      operation: tool.name,
      error: new MalformedToolArguments(
        tool.name,
        `Arguments for "${tool.name}" do not match its schema`,
        parsed.error.flatten(),
      ),
      durationMs: Date.now() - startTime,
    };
  }

  try {
    const items = await tool.execute(parsed.data);
    return { status: 'ok', operation: tool.name, items, durationMs: Date.now() - startTime };
  } catch (error) {
    // Embedding and store outages are not empty results
    if (error instanceof ProviderFailure) throw error;

    const message = error instanceof Error ? error.message : String(error);
    return {
      status: 'failed',
      operation: tool.name,
      error: new ToolDispatchFailure(tool.name, `Tool "${tool.name}" failed: ${message}`, { cause: error }),
      durationMs: Date.now() - startTime,
    };
  }
}

export class ToolRegistry {
  private tools: Map<OperationName, AnyToolDefinition> = new Map();

  register(tool: AnyToolDefinition): void {
    if (this.tools.has(tool.name)) {
      console.warn(`Tool "${tool.name}" already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): AnyToolDefinition | undefined {
    return isOperationName(name) ? this.tools.get(name) : undefined;
  }

  getAll(): AnyToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Look up the operation and run it with validated arguments.
   * No caching: every call reaches the tool.
   */
  async dispatch(name: string, args: unknown): Promise<DispatchResult> {
    const tool = this.get(name);
    if (!tool) {
      return { status: 'unknown', name };
    }

    switch (tool.name) {
      case TEXT_SEARCH:
        return invoke(tool, args);
      case IMAGE_SEARCH:
        return invoke(tool, args);
    }
  }

  toProviderTools(): ProviderTool[] {
    return this.getAll().map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: this.parametersToJsonSchema(tool.parameters),
          required: tool.parameters.filter(p => p.required).map(p => p.name),
        },
      },
    }));
  }

  private parametersToJsonSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
