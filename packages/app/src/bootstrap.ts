import type { LLMProvider, Logger, ModelRef, ModelsConfig, ParleyConfig, Secrets } from '@parley/core';
import { ConfigurationError } from '@parley/core';
import { LLMService, PiMonoProvider, getModel } from '@parley/agent-runtime';
import { SqliteConversationStore } from '@parley/conversations';
import type { AuthProvider } from '@parley/gateway';
import { CredentialGate, GatewayServer, HttpAuthProvider } from '@parley/gateway';
import type { RemoteToolServer } from '@parley/tools';
import { McpRemoteToolServer, ToolResolver, createLocalTools } from '@parley/tools';
import { SessionOrchestrator } from './session-orchestrator.js';

export interface BootstrapOptions {
  config: Readonly<ParleyConfig>;
  secrets: Readonly<Secrets>;
  logger: Logger;
  /** Override LLM providers (e.g. for testing with a scripted model). */
  llmProviders?: LLMProvider[];
  /** Override the remote tool server built from `tools.remote`. */
  remoteToolServer?: RemoteToolServer;
  /** Override the HTTP identity provider. */
  authProvider?: AuthProvider;
}

export interface AppServer {
  gateway: GatewayServer;
  store: SqliteConversationStore;
  orchestrator: SessionOrchestrator;
  /** Port the gateway bound. */
  port: number;
  shutdown: () => Promise<void>;
}

function createModelProvider(ref: ModelRef, secrets: Readonly<Secrets>): LLMProvider {
  const model = getModel(
    ref.provider as Parameters<typeof getModel>[0],
    ref.model as Parameters<typeof getModel>[1],
  );
  if (!model) {
    throw new ConfigurationError(`Unknown model "${ref.model}" for provider "${ref.provider}"`);
  }
  return new PiMonoProvider({ model, apiKey: secrets.modelApiKeys[ref.apiKeyEnv] });
}

/** Primary model first, then each fallback in configured order. */
export function createModelProviders(models: ModelsConfig, secrets: Readonly<Secrets>): LLMProvider[] {
  return [models.primary, ...models.fallbacks].map((ref) => createModelProvider(ref, secrets));
}

/**
 * Bootstrap the whole service:
 * 1. Open the conversation store
 * 2. Build the model chain and the tool resolver
 * 3. Start the HTTP gateway
 * 4. Return an AppServer handle for lifecycle management
 */
export async function bootstrap(options: BootstrapOptions): Promise<AppServer> {
  const { config, secrets, logger } = options;

  // 1. Storage
  const store = new SqliteConversationStore(config.storage.dbPath);
  store.open();
  logger.info({ dbPath: config.storage.dbPath }, 'conversation store opened');

  try {
    // 2. Model and tools
    const llm = new LLMService({ providers: options.llmProviders ?? createModelProviders(config.models, secrets) });
    logger.info({ providers: llm.providerIds }, 'model chain ready');

    const remoteConfig = config.tools.remote;
    const remoteServer =
      options.remoteToolServer ??
      (remoteConfig
        ? new McpRemoteToolServer({
            name: remoteConfig.name,
            url: remoteConfig.url,
            requestTimeoutMs: config.agent.toolTimeoutMs,
            logger,
          })
        : undefined);
    const tools = new ToolResolver({
      localTools: createLocalTools(config.tools.webSearch, secrets),
      remote:
        remoteServer && remoteConfig ? { server: remoteServer, config: remoteConfig } : undefined,
      logger,
    });
    if (!secrets.webSearchApiKey) {
      logger.warn({ env: config.tools.webSearch.apiKeyEnv }, 'web search disabled: API key not set');
    }

    const orchestrator = new SessionOrchestrator({
      store,
      llm,
      tools,
      agent: config.agent,
      models: config.models,
      logger,
    });

    // 3. Gateway
    const gate = new CredentialGate({
      provider: options.authProvider ?? new HttpAuthProvider({ url: config.auth.url, apiKey: secrets.authApiKey }),
      timeoutMs: config.auth.timeoutMs,
      logger,
    });
    const gateway = new GatewayServer({
      server: config.server,
      gate,
      chat: orchestrator,
      isStorageReady: () => store.ping(),
      logger,
    });
    const port = await gateway.start();

    let stopping: Promise<void> | null = null;
    const shutdown = (): Promise<void> => {
      stopping ??= (async () => {
        logger.info('shutting down');
        try {
          await gateway.stop();
        } finally {
          store.close();
        }
      })();
      return stopping;
    };

    return { gateway, store, orchestrator, port, shutdown };
  } catch (err) {
    store.close();
    throw err;
  }
}
