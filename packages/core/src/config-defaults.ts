import type { ParleyConfig, RemoteToolServerConfig } from './config.js';

export const DEFAULT_CONFIG: ParleyConfig = {
  server: {
    host: '0.0.0.0',
    port: 8000,
    corsOrigins: ['http://localhost:5173', 'http://localhost:3000'],
    maxBodyBytes: 64 * 1024,
    heartbeatMs: 15_000,
  },
  auth: {
    url: 'http://localhost:54321',
    apiKeyEnv: 'AUTH_ANON_KEY',
    timeoutMs: 5_000,
  },
  models: {
    primary: { provider: 'openai', model: 'gpt-4o-mini', apiKeyEnv: 'OPENAI_API_KEY' },
    fallbacks: [],
    temperature: 0,
    maxTokens: 2_048,
  },
  agent: {
    maxIterations: 5,
    toolTimeoutMs: 20_000,
    turnTimeoutMs: 120_000,
    maxToolOutputChars: 20_000,
    maxHistoryExchanges: 20,
  },
  tools: {
    webSearch: {
      endpoint: 'https://api.tavily.com/search',
      apiKeyEnv: 'TAVILY_API_KEY',
      maxResults: 5,
    },
  },
  storage: {
    dbPath: 'data/parley.sqlite',
  },
  logging: {
    level: 'info',
  },
};

export const DEFAULT_REMOTE_TOOL_SERVER: Omit<RemoteToolServerConfig, 'name' | 'url'> = {
  discoveryTimeoutMs: 8_000,
  cacheTtlMs: 30_000,
  circuitBreaker: {
    failureThreshold: 3,
    failureWindowMs: 60_000,
    cooldownMs: 30_000,
  },
};

type PartialSections = { [K in keyof ParleyConfig]?: Partial<ParleyConfig[K]> };

/** Deep-merge a partial config with defaults. */
export function mergeConfig(partial: PartialSections = {}): ParleyConfig {
  // Defaults are cloned so freezing the result never reaches DEFAULT_CONFIG
  const defaults = structuredClone(DEFAULT_CONFIG);
  const remote = partial.tools?.remote;

  return {
    server: { ...defaults.server, ...partial.server },
    auth: { ...defaults.auth, ...partial.auth },
    models: { ...defaults.models, ...partial.models },
    agent: { ...defaults.agent, ...partial.agent },
    tools: {
      webSearch: { ...defaults.tools.webSearch, ...partial.tools?.webSearch },
      remote: remote
        ? {
            ...DEFAULT_REMOTE_TOOL_SERVER,
            ...remote,
            circuitBreaker: {
              ...DEFAULT_REMOTE_TOOL_SERVER.circuitBreaker,
              ...remote.circuitBreaker,
            },
          }
        : undefined,
    },
    storage: { ...defaults.storage, ...partial.storage },
    logging: { ...defaults.logging, ...partial.logging },
  };
}
