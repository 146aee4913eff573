import { setTimeout as sleep } from 'node:timers/promises';
import type { ToolDefinition } from '@parley/core';
import { ToolServerUnreachableError } from '@parley/core';
import type { RemoteToolServer } from '../types.js';

export interface StubRemoteTool {
  definition: ToolDefinition;
  run: (args: Record<string, unknown>) => unknown;
}

export interface StubRemoteToolServerOptions {
  /** Every call fails as if the server were down. */
  unreachable?: boolean;
  /** Credentials for which calls fail as if the server returned 401. */
  rejectCredential?: (credential: string) => boolean;
  /** Latency added before each call; honors the call's signal. */
  delayMs?: number;
}

/** In-process RemoteToolServer with scripted tools and failure switches. */
export class StubRemoteToolServer implements RemoteToolServer {
  unreachable: boolean;
  delayMs: number;
  readonly discoverCalls: string[] = [];
  readonly invocations: Array<{ credential: string; toolName: string; args: Record<string, unknown> }> = [];

  private readonly tools = new Map<string, StubRemoteTool>();
  private readonly rejectCredential: (credential: string) => boolean;

  constructor(
    readonly name: string,
    tools: StubRemoteTool[],
    options: StubRemoteToolServerOptions = {},
  ) {
    for (const tool of tools) this.tools.set(tool.definition.name, tool);
    this.unreachable = options.unreachable ?? false;
    this.delayMs = options.delayMs ?? 0;
    this.rejectCredential = options.rejectCredential ?? (() => false);
  }

  async discover(credential: string, signal: AbortSignal): Promise<ToolDefinition[]> {
    this.discoverCalls.push(credential);
    await this.gate(credential, signal);
    return [...this.tools.values()].map((t) => t.definition);
  }

  async invoke(
    credential: string,
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    this.invocations.push({ credential, toolName, args });
    await this.gate(credential, signal);
    const tool = this.tools.get(toolName);
    if (!tool) throw new Error(`Unknown tool: ${toolName}`);
    return tool.run(args);
  }

  private async gate(credential: string, signal: AbortSignal): Promise<void> {
    if (this.delayMs > 0) await sleep(this.delayMs, undefined, { signal });
    if (this.unreachable) throw new ToolServerUnreachableError(this.name, 'connection refused');
    if (this.rejectCredential(credential)) {
      throw new ToolServerUnreachableError(this.name, 'credential rejected (401)', { credentialRejected: true });
    }
  }
}
