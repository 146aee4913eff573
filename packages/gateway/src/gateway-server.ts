import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { ConversationSummary, Logger, Principal, StoredMessage } from '@parley/core';
import { UnauthenticatedError, ValidationError, errorMessage, generateId } from '@parley/core';
import { PayloadTooLargeError, CONVERSATION_ID_PATTERN, parseTurnRequest, readBody } from './request-body.js';
import { SseStream } from './sse-stream.js';
import type { GatewayOptions, HealthStatus, TurnRequest } from './types.js';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;
const STOP_GRACE_MS = 1_000;
const MESSAGES_ROUTE = /^\/chat\/conversations\/([^/]+)\/messages$/;

/** Malformed escapes stay raw so the id check rejects them. */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Sent when a turn ends without a terminal event while the client is still there. */
export const INTERNAL_ERROR_MESSAGE = 'Something went wrong. Please try again.';

type RouteHandler = (req: IncomingMessage, res: ServerResponse, ctx: RequestContext) => Promise<void>;

interface RequestContext {
  requestId: string;
  log: Logger;
  params: string[];
}

interface Route {
  method: 'GET' | 'POST';
  match: (path: string) => string[] | null;
  auth: boolean;
  handler: RouteHandler;
}

function exact(path: string): (candidate: string) => string[] | null {
  return (candidate) => (candidate === path ? [] : null);
}

function writeJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

export function toConversationJson(c: ConversationSummary) {
  return { id: c.id, title: c.title, created_at: c.createdAt, updated_at: c.updatedAt };
}

export function toMessageJson(m: StoredMessage) {
  return {
    id: m.id,
    conversation_id: m.conversationId,
    user_id: m.ownerId,
    role: m.role,
    content: m.content,
    created_at: m.createdAt,
  };
}

/**
 * HTTP front door: health probes, the streaming chat endpoint and the
 * history listings. Everything under /chat requires a bearer credential.
 */
export class GatewayServer {
  private httpServer: Server | null = null;
  private startTime = Date.now();
  private readonly log: Logger;
  private readonly routes: Route[];
  private readonly turns = new Map<AbortController, Promise<void>>();

  constructor(private readonly options: GatewayOptions) {
    this.log = options.logger.child({ component: 'gateway' });
    this.routes = [
      { method: 'GET', match: exact('/health'), auth: false, handler: async (_req, res) => this.handleHealth(res) },
      { method: 'GET', match: exact('/ready'), auth: false, handler: async (_req, res) => this.handleReady(res) },
      { method: 'POST', match: exact('/chat/send'), auth: true, handler: (req, res, ctx) => this.handleSend(req, res, ctx) },
      {
        method: 'GET',
        match: exact('/chat/conversations'),
        auth: true,
        handler: (req, res, ctx) => this.handleListConversations(req, res, ctx),
      },
      {
        method: 'GET',
        match: (path) => {
          const m = MESSAGES_ROUTE.exec(path);
          return m?.[1] === undefined ? null : [decodeSegment(m[1])];
        },
        auth: true,
        handler: (req, res, ctx) => this.handleListMessages(req, res, ctx),
      },
    ];
  }

  async start(): Promise<number> {
    this.startTime = Date.now();
    const server = createServer((req, res) => this.handleHttpRequest(req, res));
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.server.port, this.options.server.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const port = this.port;
    this.log.info({ host: this.options.server.host, port }, 'gateway listening');
    return port;
  }

  /** Port actually bound; differs from the configured one when that is 0. */
  get port(): number {
    const address = this.httpServer?.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.server.port;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;

    const turns = [...this.turns];
    for (const [controller] of turns) {
      controller.abort(new Error('server shutting down'));
    }
    await Promise.allSettled(turns.map(([, run]) => run));

    // Keep-alive sockets that go idle after close() are not reaped by it.
    const force = setTimeout(() => server.closeAllConnections(), STOP_GRACE_MS);
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    } finally {
      clearTimeout(force);
    }
    this.log.info('gateway stopped');
  }

  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && REQUEST_ID_PATTERN.test(incoming) ? incoming : generateId();
    const log = this.log.child({ requestId });
    res.setHeader('X-Request-Id', requestId);
    this.applyCors(req, res);

    this.route(req, res, requestId, log).catch((err: unknown) => {
      log.error({ err: errorMessage(err), method: req.method, url: req.url }, 'unhandled request error');
      if (!res.headersSent) {
        writeJson(res, 500, { detail: 'Internal server error' });
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse, requestId: string, log: Logger): Promise<void> {
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const candidates = this.routes
      .map((route) => ({ route, params: route.match(path) }))
      .filter((c): c is { route: Route; params: string[] } => c.params !== null);

    if (candidates.length === 0) {
      writeJson(res, 404, { detail: 'Not found' });
      return;
    }

    const hit = candidates.find((c) => c.route.method === req.method);
    if (!hit) {
      writeJson(res, 405, { detail: 'Method not allowed' }, { Allow: candidates.map((c) => c.route.method).join(', ') });
      return;
    }

    await hit.route.handler(req, res, { requestId, log, params: hit.params });
  }

  private async authenticate(req: IncomingMessage, res: ServerResponse, log: Logger): Promise<Principal | null> {
    try {
      const principal = await this.options.gate.authenticate(req.headers);
      log.debug({ principalId: principal.principalId }, 'authenticated');
      return principal;
    } catch (err) {
      if (!(err instanceof UnauthenticatedError)) throw err;
      log.info({ reason: err.message }, 'rejected unauthenticated request');
      writeJson(res, 401, { detail: 'Not authenticated' }, { 'WWW-Authenticate': 'Bearer' });
      return null;
    }
  }

  private handleHealth(res: ServerResponse): void {
    writeJson(res, 200, { status: 'ok' });
  }

  private async handleReady(res: ServerResponse): Promise<void> {
    const storage = await this.options.isStorageReady();
    const status: HealthStatus = {
      status: storage ? 'ok' : 'degraded',
      storage,
      uptime: Date.now() - this.startTime,
    };
    writeJson(res, storage ? 200 : 503, status);
  }

  private async handleSend(req: IncomingMessage, res: ServerResponse, ctx: RequestContext): Promise<void> {
    const principal = await this.authenticate(req, res, ctx.log);
    if (!principal) return;

    let turn: TurnRequest;
    try {
      turn = parseTurnRequest(await readBody(req, this.options.server.maxBodyBytes));
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        writeJson(res, 413, { detail: err.message });
        return;
      }
      if (err instanceof ValidationError) {
        ctx.log.info({ detail: err.message }, 'rejected invalid turn request');
        writeJson(res, 422, { detail: err.message, issues: err.issues });
        return;
      }
      throw err;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('client disconnected'));
    });

    const run = this.streamTurn(principal, turn, res, ctx, controller.signal);
    this.turns.set(controller, run);
    try {
      await run;
    } finally {
      this.turns.delete(controller);
    }
  }

  private async streamTurn(
    principal: Principal,
    turn: TurnRequest,
    res: ServerResponse,
    ctx: RequestContext,
    signal: AbortSignal,
  ): Promise<void> {
    const stream = new SseStream(res, this.options.server.heartbeatMs);
    stream.open();
    try {
      const events = this.options.chat.handleTurn(principal, turn, { requestId: ctx.requestId, signal });
      for await (const event of events) {
        await stream.send(event);
        if (stream.closed) break;
      }
      if (!stream.sentTerminal && !signal.aborted) {
        ctx.log.error('turn ended without a terminal event');
        await stream.send({ kind: 'error', message: INTERNAL_ERROR_MESSAGE });
      }
    } catch (err) {
      ctx.log.error({ err: errorMessage(err) }, 'turn failed');
      await stream.send({ kind: 'error', message: INTERNAL_ERROR_MESSAGE });
    } finally {
      stream.end();
    }
  }

  private async handleListConversations(req: IncomingMessage, res: ServerResponse, ctx: RequestContext): Promise<void> {
    const principal = await this.authenticate(req, res, ctx.log);
    if (!principal) return;

    await this.listing(res, ctx, async () =>
      (await this.options.chat.listConversations(principal, ctx.requestId)).map(toConversationJson),
    );
  }

  private async handleListMessages(req: IncomingMessage, res: ServerResponse, ctx: RequestContext): Promise<void> {
    const principal = await this.authenticate(req, res, ctx.log);
    if (!principal) return;

    const conversationId = ctx.params[0] ?? '';
    if (!CONVERSATION_ID_PATTERN.test(conversationId)) {
      writeJson(res, 422, { detail: 'conversation_id: must be 1-128 URL-safe characters' });
      return;
    }

    await this.listing(res, ctx, async () =>
      (await this.options.chat.listMessages(principal, conversationId, ctx.requestId)).map(toMessageJson),
    );
  }

  private async listing(res: ServerResponse, ctx: RequestContext, load: () => Promise<unknown[]>): Promise<void> {
    try {
      writeJson(res, 200, await load());
    } catch (err) {
      ctx.log.error({ err: errorMessage(err) }, 'listing failed');
      writeJson(res, 503, { detail: 'Storage unavailable' });
    }
  }

  private applyCors(req: IncomingMessage, res: ServerResponse): void {
    const origin = req.headers.origin;
    const allowed = this.options.server.corsOrigins;
    if (!origin) return;

    if (allowed.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Vary', 'Origin');
    } else if (allowed.includes('*')) {
      // A wildcard never grants credentialed access.
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      return;
    }
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type, X-Request-Id');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-Id');
  }
}
