import type { LogLevel } from './logger.js';

/** Top-level configuration schema. Loaded once at startup and frozen. */
export interface ParleyConfig {
  server: ServerConfig;
  auth: AuthConfig;
  models: ModelsConfig;
  agent: AgentConfig;
  tools: ToolsConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  host: string;
  port: number;
  /** Origins echoed back in CORS responses. */
  corsOrigins: string[];
  maxBodyBytes: number;
  /** Interval between SSE keep-alive comments. */
  heartbeatMs: number;
}

/** External auth provider that validates bearer credentials. */
export interface AuthConfig {
  url: string;
  /** Environment variable holding the provider's public (anon) key. */
  apiKeyEnv: string;
  timeoutMs: number;
}

export interface ModelsConfig {
  primary: ModelRef;
  fallbacks: ModelRef[];
  temperature: number;
  maxTokens: number;
}

export interface ModelRef {
  /** pi-ai provider id, e.g. "openai" or "anthropic". */
  provider: string;
  model: string;
  apiKeyEnv: string;
}

export interface AgentConfig {
  maxIterations: number;
  toolTimeoutMs: number;
  turnTimeoutMs: number;
  maxToolOutputChars: number;
  /** Number of prior user/assistant exchanges replayed to the model. */
  maxHistoryExchanges: number;
}

export interface ToolsConfig {
  webSearch: WebSearchConfig;
  remote?: RemoteToolServerConfig;
}

export interface WebSearchConfig {
  endpoint: string;
  apiKeyEnv: string;
  maxResults: number;
}

export interface RemoteToolServerConfig {
  name: string;
  /** Streamable HTTP endpoint of the MCP server. */
  url: string;
  discoveryTimeoutMs: number;
  cacheTtlMs: number;
  circuitBreaker: {
    failureThreshold: number;
    failureWindowMs: number;
    cooldownMs: number;
  };
}

export interface StorageConfig {
  dbPath: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** Secrets resolved from the environment at startup. Absent keys stay undefined. */
export interface Secrets {
  authApiKey?: string;
  webSearchApiKey?: string;
  /** Keyed by `apiKeyEnv` of each configured model. */
  modelApiKeys: Record<string, string>;
}
