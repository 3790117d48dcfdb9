// This module models per-connection MCP session state and the lifecycle policy that creates sessions.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcId } from '../types/mcp.js';
import { InvalidRequestError } from '../utils/errors.js';

export type SessionState = 'uninitialized' | 'negotiating' | 'ready' | 'closed';

export type SessionPolicy = 'stateless' | 'persistent';

// One immutable feature set per side of the handshake.
export class CapabilitySet {
  public readonly supportedFeatures: ReadonlySet<string>;

  public constructor(features: Iterable<string>) {
    this.supportedFeatures = new Set(features);
    Object.freeze(this);
  }

  public has(feature: string): boolean {
    return this.supportedFeatures.has(feature);
  }

  public toArray(): string[] {
    return [...this.supportedFeatures];
  }
}

export interface NegotiatedCapabilities {
  readonly protocolVersion: string;
  readonly client: CapabilitySet;
  readonly server: CapabilitySet;
  readonly clientInfo?: { readonly name: string; readonly version: string };
}

export interface TrackedRequest {
  signal: AbortSignal;
  release: () => void;
}

export class Session {
  public readonly id: string | undefined;
  public readonly createdAt: number;
  private currentState: SessionState = 'uninitialized';
  private negotiated: NegotiatedCapabilities | null = null;
  private readonly inFlight = new Map<JsonRpcId, AbortController>();
  private lastActivity: number;
  private trusted = false;

  public constructor(id?: string, now = Date.now()) {
    this.id = id;
    this.createdAt = now;
    this.lastActivity = now;
  }

  public get state(): SessionState {
    return this.currentState;
  }

  public get negotiatedCapabilities(): NegotiatedCapabilities | null {
    return this.negotiated;
  }

  public get lastActivityAt(): number {
    return this.lastActivity;
  }

  // True when negotiation was completed by configuration rather than by the client.
  public get negotiatedOutOfBand(): boolean {
    return this.trusted;
  }

  public get pendingCount(): number {
    return this.inFlight.size;
  }

  public touch(now = Date.now()): void {
    this.lastActivity = now;
  }

  // uninitialized -> negotiating
  public beginNegotiation(negotiated: NegotiatedCapabilities): void {
    if (this.currentState !== 'uninitialized') {
      throw new InvalidRequestError(`Session cannot start negotiation from state "${this.currentState}".`);
    }

    this.negotiated = Object.freeze({ ...negotiated });
    this.currentState = 'negotiating';
  }

  // uninitialized -> ready without a client handshake.
  public establishOutOfBand(negotiated: NegotiatedCapabilities): void {
    this.beginNegotiation(negotiated);
    this.currentState = 'ready';
    this.trusted = true;
  }

  // negotiating -> ready
  public markReady(): void {
    if (this.currentState !== 'negotiating') {
      throw new InvalidRequestError(`Session cannot become ready from state "${this.currentState}".`);
    }

    this.currentState = 'ready';
  }

  // This method registers one in-flight request so its id stays unique and its handler can be cancelled.
  public track(requestId: JsonRpcId | undefined, parentSignal?: AbortSignal): TrackedRequest {
    if (requestId !== undefined && this.inFlight.has(requestId)) {
      throw new InvalidRequestError(`Request id ${JSON.stringify(requestId)} is already in flight for this session.`);
    }

    const controller = new AbortController();
    const onParentAbort = (): void => {
      controller.abort(parentSignal?.reason);
    };

    if (parentSignal?.aborted) {
      controller.abort(parentSignal.reason);
    } else {
      parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    if (requestId !== undefined) {
      this.inFlight.set(requestId, controller);
    }

    return {
      signal: controller.signal,
      release: () => {
        parentSignal?.removeEventListener('abort', onParentAbort);
        if (requestId !== undefined && this.inFlight.get(requestId) === controller) {
          this.inFlight.delete(requestId);
        }
      }
    };
  }

  public cancel(requestId: JsonRpcId, reason?: string): boolean {
    const controller = this.inFlight.get(requestId);
    if (!controller) {
      return false;
    }

    controller.abort(new Error(reason ?? 'cancelled'));
    this.inFlight.delete(requestId);
    return true;
  }

  // Terminal from any state; aborts every in-flight handler and drops the correlation map.
  public close(reason = 'session_closed'): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.currentState = 'closed';
    for (const controller of this.inFlight.values()) {
      controller.abort(new Error(reason));
    }
    this.inFlight.clear();
  }
}

export interface SessionManagerOptions {
  policy: SessionPolicy;
  // Stateless sessions skip the handshake and are treated as already negotiated.
  trustStatelessClients: boolean;
  idleTtlMs: number;
  establishTrusted: (session: Session) => void;
  logger: FastifyBaseLogger;
}

// This class creates sessions according to the configured lifecycle policy and evicts idle persistent ones.
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly options: SessionManagerOptions;

  public constructor(options: SessionManagerOptions) {
    this.options = options;
  }

  public get policy(): SessionPolicy {
    return this.options.policy;
  }

  public get size(): number {
    return this.sessions.size;
  }

  // New persistent sessions stay unstored until retain() sees them past uninitialized.
  public create(): Session {
    if (this.options.policy === 'stateless') {
      const session = new Session();
      if (this.options.trustStatelessClients) {
        this.options.establishTrusted(session);
      }
      return session;
    }

    return new Session(randomUUID());
  }

  public getOrCreate(token: string | undefined): Session {
    if (this.options.policy === 'stateless' || !token) {
      return this.create();
    }

    const existing = this.sessions.get(token);
    if (existing) {
      existing.touch();
      return existing;
    }

    return new Session(token);
  }

  // This method keeps a persistent session once it has handled initialize and reports whether it is stored.
  public retain(session: Session): boolean {
    if (this.options.policy === 'stateless' || !session.id) {
      return false;
    }

    if (this.sessions.get(session.id) === session) {
      return true;
    }

    if (session.state === 'uninitialized' || session.state === 'closed' || this.sessions.has(session.id)) {
      return false;
    }

    this.sessions.set(session.id, session);
    this.options.logger.debug({ event: 'mcp_session_created', sessionId: session.id }, 'mcp_session_created');
    return true;
  }

  public get(token: string): Session | undefined {
    return this.sessions.get(token);
  }

  public close(token: string): boolean {
    const session = this.sessions.get(token);
    if (!session || session.state === 'closed') {
      return false;
    }

    session.close('session_deleted');
    this.options.logger.info({ event: 'mcp_session_closed', sessionId: token }, 'mcp_session_closed');
    return true;
  }

  // This method closes idle sessions and evicts them; closed sessions linger until they go idle too.
  public sweep(now = Date.now()): number {
    let evicted = 0;

    for (const [token, session] of this.sessions) {
      if (now - session.lastActivityAt < this.options.idleTtlMs) {
        continue;
      }

      session.close('session_idle_timeout');
      this.sessions.delete(token);
      evicted += 1;
    }

    if (evicted > 0) {
      this.options.logger.info({ event: 'mcp_session_sweep', evicted, remaining: this.sessions.size }, 'mcp_session_sweep');
    }

    return evicted;
  }

  public closeAll(): void {
    for (const session of this.sessions.values()) {
      session.close('server_shutdown');
    }
    this.sessions.clear();
  }
}
