/**
 * Tool Registry / Dispatcher
 *
 * Holds the static tool descriptors and routes tools/call by name. Every
 * failure, including an unknown tool name, comes back as a single text
 * content item; nothing thrown here reaches the transport.
 *
 * @module tools/registry
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { unknownToolError } from '../server/errors.js';
import type { ServerContext } from '../server/context.js';
import { createNeighborhoodTools } from './neighborhoods.js';
import { handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { createWebsiteTools } from './websites.js';

/** JSON Schema advertised for a tool's arguments */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required: string[];
  [key: string]: unknown;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function propertySchemas(value: unknown): Record<string, object> {
  const schemas: Record<string, object> = {};
  if (!isRecord(value)) return schemas;
  for (const [key, schema] of Object.entries(value)) {
    if (typeof schema === 'object' && schema !== null) {
      schemas[key] = schema;
    }
  }
  return schemas;
}

/**
 * Convert a tool's zod shape into the JSON Schema object MCP clients expect.
 */
export function toInputSchema(shape: Record<string, z.ZodTypeAny>): ToolInputSchema {
  const converted: Record<string, unknown> = {
    ...zodToJsonSchema(z.object(shape), { $refStrategy: 'none' }),
  };
  delete converted.$schema;
  const { properties, required, ...rest } = converted;
  return {
    ...rest,
    type: 'object',
    properties: propertySchemas(properties),
    required: Array.isArray(required)
      ? required.filter((key): key is string => typeof key === 'string')
      : [],
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly descriptors: readonly ToolDescriptor[];

  /**
   * @throws Error on a duplicate tool name
   */
  constructor(toolModules: Record<string, ToolDefinition>[]) {
    for (const toolModule of toolModules) {
      for (const [name, tool] of Object.entries(toolModule)) {
        if (this.tools.has(name)) {
          throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
        }
        this.tools.set(name, tool);
      }
    }

    this.descriptors = Object.freeze(
      [...this.tools.entries()].map(([name, tool]) =>
        Object.freeze({
          name,
          description: tool.description,
          inputSchema: toInputSchema(tool.inputSchema),
        })
      )
    );
  }

  get size(): number {
    return this.tools.size;
  }

  listTools(): ToolDescriptor[] {
    return [...this.descriptors];
  }

  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      return handleError(unknownToolError(name, [...this.tools.keys()]));
    }

    try {
      return await tool.handler(args ?? {});
    } catch (error) {
      return handleError(error);
    }
  }
}

/**
 * Registry with both school data tools, bound to the startup context
 */
export function createToolRegistry(context: Pick<ServerContext, 'relational' | 'search'>): ToolRegistry {
  return new ToolRegistry([
    createNeighborhoodTools(context.relational),
    createWebsiteTools(context.search),
  ]);
}
