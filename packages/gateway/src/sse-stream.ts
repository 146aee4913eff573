import type { ServerResponse } from 'node:http';
import type { AgentEvent } from '@parley/core';
import { isTerminalEvent } from '@parley/core';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

export const HEARTBEAT_FRAME = ': ping\n\n';

/** Wire name and payload for an agent event. */
export function toWireEvent(event: AgentEvent): { name: string; data: Record<string, unknown> } {
  switch (event.kind) {
    case 'token':
      return { name: 'token', data: { content: event.text } };
    case 'tool_start':
      return { name: 'tool_start', data: { tool: event.toolName } };
    case 'tool_end':
      return { name: 'tool_end', data: { tool: event.toolName, ok: event.ok } };
    case 'status':
      return { name: 'status', data: { message: event.message } };
    case 'done':
      return { name: 'done', data: { conversation_id: event.conversationId } };
    case 'error':
      return { name: 'error', data: { message: event.message } };
  }
}

export function formatFrame(event: AgentEvent): string {
  const { name, data } = toWireEvent(event);
  return `event: ${name}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * One Server-Sent Events response. Frames go out in order, waiting on
 * `drain` when the socket is full. The stream ends after its first
 * terminal frame; anything sent later is dropped.
 */
export class SseStream {
  private heartbeat: NodeJS.Timeout | null = null;
  private terminalSent = false;
  private ended = false;

  constructor(
    private readonly res: ServerResponse,
    private readonly heartbeatMs: number,
  ) {}

  open(): void {
    this.res.writeHead(200, SSE_HEADERS);
    this.res.flushHeaders();
    if (this.heartbeatMs > 0) {
      this.heartbeat = setInterval(() => {
        if (!this.closed) this.res.write(HEARTBEAT_FRAME);
      }, this.heartbeatMs);
      this.heartbeat.unref();
    }
  }

  /** True once the stream ended or the client went away. */
  get closed(): boolean {
    return this.ended || this.res.destroyed || this.res.writableEnded;
  }

  get sentTerminal(): boolean {
    return this.terminalSent;
  }

  async send(event: AgentEvent): Promise<void> {
    if (this.closed || this.terminalSent) return;
    if (isTerminalEvent(event)) this.terminalSent = true;
    await this.write(formatFrame(event));
    if (this.terminalSent) this.end();
  }

  end(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    if (!this.ended) {
      this.ended = true;
      if (!this.res.writableEnded) this.res.end();
    }
  }

  private write(chunk: string): Promise<void> {
    if (this.res.write(chunk)) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const settle = (): void => {
        this.res.off('drain', settle);
        this.res.off('close', settle);
        resolve();
      };
      this.res.once('drain', settle);
      this.res.once('close', settle);
    });
  }
}
