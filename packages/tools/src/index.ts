export type {
  CircuitState,
  CircuitBreakerOptions,
  LocalTool,
  RemoteToolServer,
  ResolvedToolset,
} from './types.js';
export { ToolConflictError, McpConnectionError } from './errors.js';
export { ToolRegistry } from './registry.js';
export { CircuitBreaker } from './circuit-breaker.js';
export { DiscoveryCache, credentialKey } from './discovery-cache.js';
export { ToolResolver, NAMESPACE_SEP, remoteToolName } from './tool-resolver.js';
export type { ToolResolverOptions } from './tool-resolver.js';
export { createWebSearchTool, createLocalTools, WEB_SEARCH_TOOL_NAME } from './web-search.js';
export type { WebSearchToolOptions, WebSearchResult } from './web-search.js';
export { McpClientConnection } from './mcp/mcp-client-connection.js';
export type { McpConnectionConfig } from './mcp/mcp-client-connection.js';
export { McpRemoteToolServer } from './remote/mcp-remote-tool-server.js';
export type { McpRemoteToolServerOptions } from './remote/mcp-remote-tool-server.js';
export { StubRemoteToolServer } from './remote/stub-remote-tool-server.js';
export type { StubRemoteTool, StubRemoteToolServerOptions } from './remote/stub-remote-tool-server.js';
