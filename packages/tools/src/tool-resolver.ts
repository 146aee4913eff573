import type { Logger, RemoteToolServerConfig, ToolDefinition } from '@parley/core';
import { ToolServerUnreachableError, errorMessage } from '@parley/core';
import type { LocalTool, RemoteToolServer, ResolvedToolset } from './types.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { DiscoveryCache } from './discovery-cache.js';
import { ToolRegistry } from './registry.js';

/** Separator between server name and tool name in remote tool names. */
export const NAMESPACE_SEP = '__';

export interface ToolResolverOptions {
  localTools: LocalTool[];
  remote?: {
    server: RemoteToolServer;
    config: Pick<RemoteToolServerConfig, 'discoveryTimeoutMs' | 'cacheTtlMs' | 'circuitBreaker'>;
  };
  logger: Logger;
}

export function remoteToolName(serverName: string, toolName: string): string {
  return `${serverName}${NAMESPACE_SEP}${toolName}`;
}

/**
 * Assembles the toolset for one turn: every local tool plus whatever the
 * remote server lists for the caller. Remote trouble degrades the toolset
 * instead of failing the turn.
 */
export class ToolResolver {
  private readonly log: Logger;
  private readonly cache: DiscoveryCache<ToolDefinition[]> | undefined;
  private readonly breaker: CircuitBreaker | undefined;

  constructor(private readonly options: ToolResolverOptions) {
    this.log = options.logger.child({ component: 'tool-resolver' });
    const remote = options.remote;
    if (remote) {
      this.cache = new DiscoveryCache(remote.config.cacheTtlMs);
      this.breaker = new CircuitBreaker({
        ...remote.config.circuitBreaker,
        onStateChange: (state) => this.log.warn({ server: remote.server.name, state }, 'tool server circuit changed'),
      });
    }
  }

  /**
   * Throws ToolConflictError when two local tools share a name, and the
   * abort reason when `signal` aborts. Remote tools that collide are skipped.
   * Never throws because the remote server is unreachable.
   */
  async resolve(credential: string, signal: AbortSignal): Promise<ResolvedToolset> {
    const registry = new ToolRegistry();
    for (const tool of this.options.localTools) {
      registry.register(tool.definition, tool.handler, 'local');
    }

    const remote = this.options.remote;
    if (!remote) return { registry, degraded: false };

    const { server } = remote;
    const tools = await this.discover(server, credential, signal);
    if (!tools) {
      return {
        registry,
        degraded: true,
        notice: `Some tools (${server.name}) are unavailable right now. Answering without them.`,
      };
    }

    for (const tool of tools) {
      const name = remoteToolName(server.name, tool.name);
      if (registry.has(name)) {
        this.log.warn({ server: server.name, tool: name }, 'remote tool shadows a local tool, skipping');
        continue;
      }
      registry.register(
        { ...tool, name },
        (args, ctx) => server.invoke(credential, tool.name, args, ctx.signal),
        'remote',
        server.name,
      );
    }
    return { registry, degraded: false };
  }

  /** Cached or fresh tool list, or undefined when the server cannot be used. */
  private async discover(
    server: RemoteToolServer,
    credential: string,
    signal: AbortSignal,
  ): Promise<ToolDefinition[] | undefined> {
    const cached = this.cache?.get(credential);
    if (cached) return cached;

    if (this.breaker && !this.breaker.isAllowed()) {
      this.log.info({ server: server.name }, 'skipping discovery while circuit is open');
      return undefined;
    }

    const timeoutMs = this.options.remote?.config.discoveryTimeoutMs ?? 8_000;
    try {
      const listed = await server.discover(credential, AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]));
      const tools = this.withoutDuplicates(server.name, listed);
      this.breaker?.recordSuccess();
      this.cache?.set(credential, tools);
      return tools;
    } catch (err) {
      signal.throwIfAborted();
      if (err instanceof ToolServerUnreachableError && err.credentialRejected) {
        // Only this caller is affected; the server itself is healthy.
        this.log.info({ server: server.name }, 'tool server rejected the credential');
        return undefined;
      }
      this.breaker?.recordFailure();
      this.log.warn({ server: server.name, err: errorMessage(err) }, 'tool discovery failed');
      return undefined;
    }
  }

  /** Keeps the first tool of each name; a server listing a name twice is not a local conflict. */
  private withoutDuplicates(serverName: string, tools: ToolDefinition[]): ToolDefinition[] {
    const seen = new Set<string>();
    return tools.filter((tool) => {
      if (seen.has(tool.name)) {
        this.log.warn({ server: serverName, tool: tool.name }, 'skipping duplicate remote tool');
        return false;
      }
      seen.add(tool.name);
      return true;
    });
  }
}
