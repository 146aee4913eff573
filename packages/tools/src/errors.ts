import { ConfigurationError, ToolServerUnreachableError } from '@parley/core';

/** Thrown when registering a tool with a name that already exists. */
export class ToolConflictError extends ConfigurationError {
  constructor(name: string) {
    super(`Tool already registered: ${name}`);
  }
}

/** Thrown when an MCP server connection or request fails. */
export class McpConnectionError extends ToolServerUnreachableError {
  constructor(serverName: string, cause: string, options?: { cause?: unknown; credentialRejected?: boolean }) {
    super(serverName, `MCP connection failed: ${cause}`, options);
  }
}
