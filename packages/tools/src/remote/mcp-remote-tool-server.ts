import type { Logger, ToolDefinition } from '@parley/core';
import { errorMessage } from '@parley/core';
import type { RemoteToolServer } from '../types.js';
import { McpClientConnection } from '../mcp/mcp-client-connection.js';

export interface McpRemoteToolServerOptions {
  name: string;
  url: string;
  requestTimeoutMs?: number;
  logger: Logger;
}

/**
 * RemoteToolServer speaking MCP over streamable HTTP. Each operation opens
 * its own connection with the caller's credential and closes it afterwards.
 */
export class McpRemoteToolServer implements RemoteToolServer {
  readonly name: string;
  private readonly log: Logger;

  constructor(private readonly options: McpRemoteToolServerOptions) {
    this.name = options.name;
    this.log = options.logger.child({ component: 'mcp-remote', server: options.name });
  }

  discover(credential: string, signal: AbortSignal): Promise<ToolDefinition[]> {
    return this.withConnection(credential, signal, (conn) => conn.listTools(signal));
  }

  invoke(
    credential: string,
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    return this.withConnection(credential, signal, (conn) => conn.callTool(toolName, args, signal));
  }

  private async withConnection<T>(
    credential: string,
    signal: AbortSignal,
    fn: (conn: McpClientConnection) => Promise<T>,
  ): Promise<T> {
    const conn = new McpClientConnection({
      name: this.name,
      url: this.options.url,
      credential,
      requestTimeoutMs: this.options.requestTimeoutMs,
    });
    await conn.connect(signal);
    try {
      return await fn(conn);
    } finally {
      await conn.disconnect().catch((err: unknown) => {
        this.log.debug({ err: errorMessage(err) }, 'failed to close MCP connection');
      });
    }
  }
}
