import type { ToolCall, ToolHandlerMap, ToolResult } from '@parley/core';
import { errorMessage, isRecord } from '@parley/core';
import type { ToolExecutionOptions } from './types.js';

/**
 * Runs one tool call under a timeout. Tool failures (unknown tool, bad
 * arguments, handler error, timeout) come back as an unsuccessful result.
 * Only cancellation of `options.signal` escapes as a thrown error.
 */
export async function executeToolCall(
  call: ToolCall,
  handlers: ToolHandlerMap,
  options: ToolExecutionOptions,
): Promise<ToolResult> {
  const start = performance.now();
  const fail = (error: string): ToolResult => ({
    success: false,
    output: null,
    error,
    durationMs: Math.round(performance.now() - start),
  });

  const handler = handlers.get(call.name);
  if (!handler) {
    return fail(`Unknown tool: ${call.name}`);
  }

  let args: Record<string, unknown>;
  try {
    const parsed: unknown = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
    if (!isRecord(parsed)) return fail(`Invalid JSON arguments: ${call.arguments}`);
    args = parsed;
  } catch {
    return fail(`Invalid JSON arguments: ${call.arguments}`);
  }

  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  try {
    const output = await raceAbort(handler(args, { signal }), signal);
    return {
      success: true,
      output,
      durationMs: Math.round(performance.now() - start),
    };
  } catch (err) {
    options.signal?.throwIfAborted();
    if (timeout.aborted) return fail(`timed out after ${options.timeoutMs}ms`);
    return fail(errorMessage(err));
  }
}

/** Settles with `promise`, or rejects with the abort reason if `signal` fires first. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Serializes tool output for the model, truncating past `maxChars`. */
export function formatToolOutput(output: unknown, maxChars: number): string {
  const text = typeof output === 'string' ? output : JSON.stringify(output) ?? 'null';
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n[truncated ${text.length - maxChars} chars]`;
}
