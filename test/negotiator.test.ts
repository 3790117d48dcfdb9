// This test suite verifies the initialize handshake and the advertised capability payload.

import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { CapabilityNegotiator } from '../src/mcp/negotiator.js';
import { Registry, defineTool } from '../src/mcp/registry.js';
import { Session } from '../src/mcp/session.js';
import { InvalidParamsError, InvalidRequestError } from '../src/utils/errors.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../src/version.js';

function toolsOnlyRegistry(): Registry {
  const registry = new Registry();
  registry.register(
    defineTool({
      name: 'echo',
      description: 'Echo the value back.',
      inputSchema: z.object({ value: z.string() }),
      handler: ({ value }) => value
    })
  );
  return registry.seal();
}

describe('capability negotiator', () => {
  it('advertises only populated categories', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry());

    expect(negotiator.serverCapabilities().toArray()).toEqual(['tools']);
    expect(new CapabilityNegotiator(new Registry()).serverCapabilities().toArray()).toEqual([]);
  });

  it('answers initialize and moves the session to negotiating', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry(), { instructions: 'Use echo.' });
    const session = new Session('s-1');

    const result = negotiator.initialize(session, {
      protocolVersion: '2024-11-05',
      capabilities: { sampling: {}, roots: { listChanged: true } },
      clientInfo: { name: 'test-client', version: '0.0.1' }
    });

    expect(result).toEqual({
      protocolVersion: '2024-11-05',
      capabilities: { tools: { listChanged: false } },
      serverInfo: { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
      instructions: 'Use echo.'
    });
    expect(session.state).toBe('negotiating');
    expect(session.negotiatedCapabilities?.client.toArray()).toEqual(['sampling', 'roots']);
    expect(session.negotiatedCapabilities?.clientInfo).toEqual({ name: 'test-client', version: '0.0.1' });

    negotiator.confirm(session);
    expect(session.state).toBe('ready');
  });

  it('falls back to the latest protocol revision for unknown versions', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry());

    expect(negotiator.initialize(new Session(), { protocolVersion: '1999-01-01' }).protocolVersion).toBe(
      MCP_PROTOCOL_VERSION
    );
    expect(negotiator.initialize(new Session(), undefined).protocolVersion).toBe(MCP_PROTOCOL_VERSION);
  });

  it('rejects malformed initialize params with the offending field', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry());
    const session = new Session();

    try {
      negotiator.initialize(session, { capabilities: 'all' });
      expect.unreachable('initialize should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParamsError);
      expect(error).toMatchObject({ field: 'capabilities' });
    }
    expect(session.state).toBe('uninitialized');
  });

  it('refuses a second initialize on the same session', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry());
    const session = new Session();
    negotiator.initialize(session, {});

    expect(() => negotiator.initialize(session, {})).toThrow(InvalidRequestError);
  });

  it('answers initialize on trusted sessions without changing state', () => {
    const negotiator = new CapabilityNegotiator(toolsOnlyRegistry());
    const session = new Session();
    negotiator.establishTrusted(session);

    const result = negotiator.initialize(session, { protocolVersion: '2025-03-26' });
    negotiator.confirm(session);

    expect(result.protocolVersion).toBe('2025-03-26');
    expect(session.state).toBe('ready');
    expect(session.negotiatedCapabilities?.server.toArray()).toEqual(['tools']);
  });
});
