// Messages
export type {
  MessageRole,
  Message,
  ToolCall,
  StoredRole,
  StoredMessage,
  ConversationSummary,
} from './messages.js';

// Agent loop events
export { LoopState, isTerminalEvent } from './agent.js';
export type {
  AgentEvent,
  AgentEventKind,
  TerminalAgentEvent,
  AgentLoopOptions,
  TokenUsage,
  StreamResponse,
} from './agent.js';

// Tool definitions
export type {
  JSONSchema,
  ToolDefinition,
  ToolResult,
  ToolCallContext,
  ToolHandler,
  ToolHandlerMap,
  ToolSource,
  ToolRegistryEntry,
} from './tools.js';

// LLM provider abstraction
export type {
  StreamChunk,
  CompletionOptions,
  LLMProvider,
} from './llm.js';

// Principal
export type { Principal } from './principal.js';

// Errors
export {
  ParleyError,
  UnauthenticatedError,
  ToolUnavailableError,
  ToolServerUnreachableError,
  ModelProviderError,
  ValidationError,
  StorageError,
  ConfigurationError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Logging
export { createLogger, REDACTED_PATHS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';

// Configuration
export type {
  ParleyConfig,
  ServerConfig,
  AuthConfig,
  ModelsConfig,
  ModelRef,
  AgentConfig,
  ToolsConfig,
  WebSearchConfig,
  RemoteToolServerConfig,
  StorageConfig,
  LoggingConfig,
  Secrets,
} from './config.js';
export { DEFAULT_CONFIG, DEFAULT_REMOTE_TOOL_SERVER, mergeConfig } from './config-defaults.js';
export { applyEnvOverrides } from './config-env-overlay.js';
export { validateConfig, loadConfig, resolveSecrets } from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';

// Utilities
export { generateId, now, isRecord, errorMessage, deepFreeze } from './utils.js';
