import type { ToolDefinition } from '@parley/core';
import { errorMessage } from '@parley/core';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport, StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { UnauthorizedError } from '@modelcontextprotocol/sdk/client/auth.js';
import { McpConnectionError } from '../errors.js';

export interface McpConnectionConfig {
  /** Server name, used in errors and as the tool namespace. */
  name: string;
  url: string;
  /** Forwarded as `Authorization: Bearer <credential>`. */
  credential: string;
  /** Per-request timeout passed to the SDK. */
  requestTimeoutMs?: number;
}

/** True when the server refused the caller's credential rather than failing. */
export function isCredentialRejection(error: unknown): boolean {
  if (error instanceof UnauthorizedError) return true;
  return error instanceof StreamableHTTPError && (error.code === 401 || error.code === 403);
}

/**
 * Wraps a single MCP connection over streamable HTTP using the official SDK.
 * Exposes tool discovery and invocation on behalf of one caller.
 */
export class McpClientConnection {
  private client: Client | null = null;

  constructor(private readonly config: McpConnectionConfig) {}

  async connect(signal?: AbortSignal): Promise<void> {
    try {
      const transport = new StreamableHTTPClientTransport(new URL(this.config.url), {
        requestInit: { headers: { Authorization: `Bearer ${this.config.credential}` } },
      });
      const client = new Client({ name: 'parley', version: '0.1.0' }, { capabilities: {} });
      await client.connect(transport, { signal, timeout: this.config.requestTimeoutMs });
      this.client = client;
    } catch (error) {
      signal?.throwIfAborted();
      throw this.connectionError(error);
    }
  }

  async listTools(signal?: AbortSignal): Promise<ToolDefinition[]> {
    const client = this.requireClient();
    try {
      const result = await client.listTools(undefined, { signal, timeout: this.config.requestTimeoutMs });
      return result.tools.map((t) => ({
        name: t.name,
        description: t.description ?? '',
        inputSchema: { ...t.inputSchema },
      }));
    } catch (error) {
      signal?.throwIfAborted();
      throw this.connectionError(error);
    }
  }

  /** Invoke a tool. A result flagged `isError` rejects with its content. */
  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const client = this.requireClient();
    const result = await client.callTool({ name, arguments: args }, undefined, {
      signal,
      timeout: this.config.requestTimeoutMs,
    });

    if ('isError' in result && result.isError) {
      const content = 'content' in result ? result.content : result;
      throw new Error(`MCP tool error: ${JSON.stringify(content)}`);
    }

    // The SDK can return either { content: [...] } or { toolResult: unknown }
    if ('content' in result) {
      return result.content;
    }
    if ('toolResult' in result) {
      return result.toolResult;
    }

    return result;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    await client?.close();
  }

  private connectionError(error: unknown): McpConnectionError {
    return new McpConnectionError(this.config.name, errorMessage(error), {
      cause: error,
      credentialRejected: isCredentialRejection(error),
    });
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new McpConnectionError(this.config.name, 'Not connected');
    }
    return this.client;
  }
}
