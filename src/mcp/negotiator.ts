// This module runs the initialize handshake and advertises the server's fixed capability set.

import { z } from 'zod';
import type { DescriptorCategory, InitializeResult } from '../types/mcp.js';
import { InvalidParamsError } from '../utils/errors.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from '../version.js';
import type { Registry } from './registry.js';
import { CapabilitySet, type Session } from './session.js';

export const initializeParamsSchema = z
  .object({
    protocolVersion: z.string().trim().min(1).optional(),
    capabilities: z.record(z.unknown()).default({}),
    clientInfo: z
      .object({
        name: z.string(),
        version: z.string()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

const CATEGORIES: readonly DescriptorCategory[] = ['tool', 'resource', 'prompt'];

const FEATURE_BY_CATEGORY: Record<DescriptorCategory, string> = {
  tool: 'tools',
  resource: 'resources',
  prompt: 'prompts'
};

export interface NegotiatorOptions {
  instructions?: string;
}

export class CapabilityNegotiator {
  private readonly registry: Registry;
  private readonly instructions?: string;

  public constructor(registry: Registry, options: NegotiatorOptions = {}) {
    this.registry = registry;
    this.instructions = options.instructions;
  }

  // The server set depends only on which registry categories are populated, never on the client.
  public serverCapabilities(): CapabilitySet {
    const features: string[] = [];
    for (const category of CATEGORIES) {
      if (this.registry.count(category) > 0) {
        features.push(FEATURE_BY_CATEGORY[category]);
      }
    }
    return new CapabilitySet(features);
  }

  public selectProtocolVersion(requested: string | undefined): string {
    if (requested && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)) {
      return requested;
    }
    return MCP_PROTOCOL_VERSION;
  }

  // uninitialized -> negotiating, answering with the server capability payload.
  public initialize(session: Session, rawParams: unknown): InitializeResult {
    const parsed = initializeParamsSchema.safeParse(rawParams ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'params';
      throw new InvalidParamsError(field, `Invalid initialize params: ${field}: ${issue?.message ?? 'invalid value'}`, parsed.error.flatten());
    }

    const server = this.serverCapabilities();
    const protocolVersion = this.selectProtocolVersion(parsed.data.protocolVersion);

    // Trusted stateless sessions answer the handshake without moving state.
    if (!session.negotiatedOutOfBand) {
      session.beginNegotiation({
        protocolVersion,
        client: new CapabilitySet(Object.keys(parsed.data.capabilities)),
        server,
        clientInfo: parsed.data.clientInfo
          ? { name: parsed.data.clientInfo.name, version: parsed.data.clientInfo.version }
          : undefined
      });
    }

    return {
      protocolVersion,
      capabilities: this.capabilityPayload(server),
      serverInfo: {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION
      },
      ...(this.instructions ? { instructions: this.instructions } : {})
    };
  }

  // negotiating -> ready, on the client's initialized notification.
  public confirm(session: Session): void {
    if (session.negotiatedOutOfBand) {
      return;
    }
    session.markReady();
  }

  // Completes negotiation out of band for stateless deployments that trust their clients.
  public establishTrusted(session: Session): void {
    session.establishOutOfBand({
      protocolVersion: MCP_PROTOCOL_VERSION,
      client: new CapabilitySet([]),
      server: this.serverCapabilities()
    });
  }

  private capabilityPayload(server: CapabilitySet): Record<string, Record<string, unknown>> {
    const payload: Record<string, Record<string, unknown>> = {};

    if (server.has('tools')) {
      payload.tools = { listChanged: false };
    }
    if (server.has('resources')) {
      payload.resources = { subscribe: false, listChanged: false };
    }
    if (server.has('prompts')) {
      payload.prompts = { listChanged: false };
    }

    return payload;
  }
}
