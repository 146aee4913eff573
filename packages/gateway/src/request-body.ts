import type { IncomingMessage } from 'node:http';
import { ValidationError } from '@parley/core';
import { z } from 'zod';
import type { TurnRequest } from './types.js';

/** Conversation ids appear in URLs, so they are kept to a URL-safe alphabet. */
export const CONVERSATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const SendMessageSchema = z.object({
  message: z.string().refine((s) => s.trim().length > 0, 'must not be empty'),
  conversation_id: z.string().regex(CONVERSATION_ID_PATTERN, 'must be 1-128 URL-safe characters').nullish(),
});

/** The body exceeded the configured size limit. */
export class PayloadTooLargeError extends ValidationError {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
  }
}

/**
 * Reads the request body as UTF-8, rejecting past `limit` bytes. A rejected
 * body keeps draining so the connection can still carry the response.
 */
export function readBody(req: IncomingMessage, limit: number): Promise<string> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    req.resume();
    return Promise.reject(new PayloadTooLargeError(limit));
  }

  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > limit) {
        req.off('data', onData);
        req.off('end', onEnd);
        req.resume();
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = (): void => resolve(Buffer.concat(chunks).toString('utf8'));

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', reject);
  });
}

/** Parses and validates a `POST /chat/send` body. Throws ValidationError. */
export function parseTurnRequest(raw: string): TurnRequest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  const result = SendMessageSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(body)',
      message: issue.message,
    }));
    throw new ValidationError(issues.map((i) => `${i.path}: ${i.message}`).join('; '), issues);
  }

  return {
    conversationId: result.data.conversation_id ?? null,
    message: result.data.message,
  };
}
