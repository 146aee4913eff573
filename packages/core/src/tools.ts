/** JSON Schema type for tool input definitions. */
export type JSONSchema = Record<string, unknown>;

/** MCP-compatible tool definition. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

/** Result of executing a tool. */
export interface ToolResult {
  success: boolean;
  output: unknown;
  error?: string;
  durationMs: number;
}

/** Per-call context handed to a tool handler. */
export interface ToolCallContext {
  signal: AbortSignal;
}

/** A function that handles a tool invocation. */
export type ToolHandler = (
  args: Record<string, unknown>,
  ctx: ToolCallContext,
) => Promise<unknown>;

/** Map from tool name to its handler function. */
export type ToolHandlerMap = Map<string, ToolHandler>;

/** Origin of a tool registration. */
export type ToolSource = 'local' | 'remote';

/** Entry in the tool registry combining definition + handler + metadata. */
export interface ToolRegistryEntry {
  definition: ToolDefinition;
  handler: ToolHandler;
  source: ToolSource;
  remoteServer?: string;
}
