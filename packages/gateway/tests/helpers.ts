import type { AgentEvent, ConversationSummary, Principal, ServerConfig, StoredMessage } from '@parley/core';
import { createLogger } from '@parley/core';
import { CredentialGate } from '../src/credential-gate.js';
import { GatewayServer } from '../src/gateway-server.js';
import type { AuthProvider, ChatService, TurnContext, TurnRequest } from '../src/types.js';

export const silentLogger = createLogger({ level: 'silent' });

/** Accepts `token-<id>` as principal `<id>`; anything else is rejected. */
export class FakeAuthProvider implements AuthProvider {
  failing = false;
  calls = 0;

  async verify(token: string): Promise<{ principalId: string } | null> {
    this.calls++;
    if (this.failing) throw new Error('identity provider down');
    return token.startsWith('token-') ? { principalId: token.slice('token-'.length) } : null;
  }
}

export interface RecordedTurn {
  principal: Principal;
  request: TurnRequest;
  ctx: TurnContext;
}

/** ChatService whose turns replay a fixed event script. */
export class FakeChatService implements ChatService {
  script: AgentEvent[] = [
    { kind: 'token', text: 'Hello' },
    { kind: 'done', conversationId: 'conv-1', finalText: 'Hello' },
  ];
  /** When set, the turn waits on the signal after the script. */
  hang = false;
  throwAfterScript: Error | null = null;
  listingError: Error | null = null;
  conversations: ConversationSummary[] = [];
  messages: StoredMessage[] = [];
  readonly turns: RecordedTurn[] = [];
  readonly aborted: boolean[] = [];

  async *handleTurn(principal: Principal, request: TurnRequest, ctx: TurnContext): AsyncGenerator<AgentEvent> {
    this.turns.push({ principal, request, ctx });
    for (const event of this.script) {
      yield event;
    }
    if (this.throwAfterScript) throw this.throwAfterScript;
    if (this.hang) {
      await new Promise<void>((resolve) => ctx.signal.addEventListener('abort', () => resolve(), { once: true }));
      this.aborted.push(ctx.signal.aborted);
    }
  }

  async listConversations(): Promise<ConversationSummary[]> {
    if (this.listingError) throw this.listingError;
    return this.conversations;
  }

  async listMessages(_principal: Principal, conversationId: string): Promise<StoredMessage[]> {
    if (this.listingError) throw this.listingError;
    return this.messages.filter((m) => m.conversationId === conversationId);
  }
}

export const testServerConfig: ServerConfig = {
  host: '127.0.0.1',
  port: 0,
  corsOrigins: ['http://app.test'],
  maxBodyBytes: 1024,
  heartbeatMs: 0,
};

export interface GatewayHarness {
  server: GatewayServer;
  auth: FakeAuthProvider;
  chat: FakeChatService;
  baseUrl: string;
  storage: { ready: boolean };
}

export async function startGateway(overrides: Partial<ServerConfig> = {}): Promise<GatewayHarness> {
  const auth = new FakeAuthProvider();
  const chat = new FakeChatService();
  const storage = { ready: true };
  const server = new GatewayServer({
    server: { ...testServerConfig, ...overrides },
    gate: new CredentialGate({ provider: auth, timeoutMs: 1000, logger: silentLogger }),
    chat,
    isStorageReady: async () => storage.ready,
    logger: silentLogger,
  });
  const port = await server.start();
  return { server, auth, chat, storage, baseUrl: `http://127.0.0.1:${port}` };
}

export interface SseFrame {
  event: string;
  data: unknown;
}

/** Splits an SSE body into named frames, skipping comments. */
export function parseSse(body: string): SseFrame[] {
  const frames: SseFrame[] = [];
  for (const block of body.split('\n\n')) {
    let event = '';
    let data = '';
    for (const line of block.split('\n')) {
      if (line.startsWith('event: ')) event = line.slice('event: '.length);
      else if (line.startsWith('data: ')) data = line.slice('data: '.length);
    }
    if (event) frames.push({ event, data: JSON.parse(data) });
  }
  return frames;
}
