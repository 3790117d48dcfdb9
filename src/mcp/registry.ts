// This module holds the immutable declarations of tools, resources, and prompts served by the MCP endpoint.

import type { FastifyBaseLogger } from 'fastify';
import { ZodObject, type ZodTypeAny, type z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { DescriptorCategory, JsonRpcId, McpPrompt, McpPromptArgument, McpResource, McpTool } from '../types/mcp.js';
import { AppError, DuplicateNameError, NotFoundError } from '../utils/errors.js';

export interface HandlerContext {
  signal: AbortSignal;
  sessionId?: string;
  requestId?: JsonRpcId;
  logger: FastifyBaseLogger;
}

export interface MethodDescriptor<TSchema extends ZodTypeAny = ZodTypeAny> {
  readonly name: string;
  readonly category: DescriptorCategory;
  readonly description: string;
  readonly inputSchema: TSchema;
  // Resources only.
  readonly uri?: string;
  readonly mimeType?: string;
  readonly handler: (args: z.output<TSchema>, context: HandlerContext) => unknown;
}

type DescriptorDefinition<TSchema extends ZodTypeAny> = Omit<MethodDescriptor<TSchema>, 'category'>;

export function defineTool<TSchema extends ZodTypeAny>(definition: DescriptorDefinition<TSchema>): MethodDescriptor<TSchema> {
  return { ...definition, category: 'tool' };
}

export function defineResource<TSchema extends ZodTypeAny>(
  definition: DescriptorDefinition<TSchema> & { uri: string; mimeType: string }
): MethodDescriptor<TSchema> {
  return { ...definition, category: 'resource' };
}

export function definePrompt<TSchema extends ZodTypeAny>(definition: DescriptorDefinition<TSchema>): MethodDescriptor<TSchema> {
  return { ...definition, category: 'prompt' };
}

// This class stores descriptors per category in registration order and rejects duplicates.
export class Registry {
  private readonly entries: Record<DescriptorCategory, Map<string, MethodDescriptor>> = {
    tool: new Map(),
    resource: new Map(),
    prompt: new Map()
  };
  private readonly resourcesByUri = new Map<string, MethodDescriptor>();
  private sealed = false;

  public register(descriptor: MethodDescriptor): this {
    if (this.sealed) {
      throw new AppError(500, 'registry_sealed', `Cannot register ${descriptor.category} "${descriptor.name}" after startup.`);
    }

    if (descriptor.name.trim().length === 0) {
      throw new AppError(500, 'invalid_descriptor', `A ${descriptor.category} descriptor requires a non-empty name.`);
    }

    const bucket = this.entries[descriptor.category];
    if (bucket.has(descriptor.name)) {
      throw new DuplicateNameError(descriptor.category, descriptor.name);
    }

    if (descriptor.category === 'resource') {
      if (!descriptor.uri) {
        throw new AppError(500, 'invalid_descriptor', `Resource "${descriptor.name}" requires a uri.`);
      }
      if (this.resourcesByUri.has(descriptor.uri)) {
        throw new DuplicateNameError('resource', descriptor.uri);
      }
      this.resourcesByUri.set(descriptor.uri, Object.freeze(descriptor));
    }

    bucket.set(descriptor.name, Object.freeze(descriptor));
    return this;
  }

  public lookup(category: DescriptorCategory, name: string): MethodDescriptor {
    const descriptor = this.entries[category].get(name);
    if (!descriptor) {
      throw new NotFoundError(category, name);
    }
    return descriptor;
  }

  public lookupResource(uri: string): MethodDescriptor {
    const descriptor = this.resourcesByUri.get(uri);
    if (!descriptor) {
      throw new NotFoundError('resource', uri);
    }
    return descriptor;
  }

  // Every iteration starts a fresh pass over the live map, so the sequence is restartable.
  public list(category: DescriptorCategory): Iterable<MethodDescriptor> {
    const bucket = this.entries[category];
    return {
      [Symbol.iterator]: () => bucket.values()
    };
  }

  public count(category: DescriptorCategory): number {
    return this.entries[category].size;
  }

  public seal(): this {
    this.sealed = true;
    return this;
  }

  public isSealed(): boolean {
    return this.sealed;
  }
}

// This helper renders a zod input schema as the JSON Schema object advertised to clients.
export function toJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
  delete jsonSchema.$schema;
  return jsonSchema;
}

function promptArguments(schema: ZodTypeAny): McpPromptArgument[] {
  if (!(schema instanceof ZodObject)) {
    return [];
  }

  const shape: Record<string, ZodTypeAny> = schema.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    ...(field.description ? { description: field.description } : {}),
    required: !field.isOptional()
  }));
}

export function projectTool(descriptor: MethodDescriptor): McpTool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: toJsonSchema(descriptor.inputSchema)
  };
}

export function projectResource(descriptor: MethodDescriptor): McpResource {
  return {
    ...projectTool(descriptor),
    uri: descriptor.uri ?? descriptor.name,
    mimeType: descriptor.mimeType ?? 'text/plain'
  };
}

export function projectPrompt(descriptor: MethodDescriptor): McpPrompt {
  return {
    ...projectTool(descriptor),
    arguments: promptArguments(descriptor.inputSchema)
  };
}
