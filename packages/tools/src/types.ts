import type { ToolDefinition, ToolHandler } from '@parley/core';
import type { ToolRegistry } from './registry.js';

/** Circuit breaker states. */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/** Configuration for a circuit breaker instance. */
export interface CircuitBreakerOptions {
  /** Number of failures before opening the circuit. Default: 5 */
  failureThreshold: number;
  /** Time window in ms to count failures. Default: 60_000 */
  failureWindowMs: number;
  /** Cooldown in ms before transitioning OPEN → HALF_OPEN. Default: 30_000 */
  cooldownMs: number;
  onStateChange?: (state: CircuitState) => void;
}

/** A tool that runs in-process. */
export interface LocalTool {
  definition: ToolDefinition;
  handler: ToolHandler;
}

/**
 * A server that lists and runs tools on the caller's behalf. Every
 * operation takes the caller's credential; failures to reach the server
 * reject with `ToolServerUnreachableError`, flagged `credentialRejected`
 * when the server refused this caller only.
 */
export interface RemoteToolServer {
  readonly name: string;
  discover(credential: string, signal: AbortSignal): Promise<ToolDefinition[]>;
  invoke(
    credential: string,
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown>;
}

/** Tools available to one turn. */
export interface ResolvedToolset {
  registry: ToolRegistry;
  /** True when remote tools were expected but could not be loaded. */
  degraded: boolean;
  /** User-facing explanation when `degraded`. */
  notice?: string;
}
