import type {
  AgentEvent,
  StreamResponse,
  ToolCall,
  ToolDefinition,
  ToolHandlerMap,
  ToolResult,
} from '@parley/core';
import { LoopState, ToolUnavailableError, errorMessage } from '@parley/core';
import type { ConversationContext } from './conversation-context.js';
import type { LLMService } from './llm-service.js';
import type { AgentRunOptions } from './types.js';
import { executeToolCall, formatToolOutput } from './tool-executor.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_TOOL_TIMEOUT_MS = 20_000;
export const DEFAULT_MAX_TOOL_OUTPUT_CHARS = 20_000;

export const INCOMPLETE_NOTE =
  '_Response may be incomplete: the tool-call limit for this turn was reached._';
export const MODEL_UNAVAILABLE_MESSAGE =
  'The assistant is unavailable right now. Please try again.';

interface Observation {
  call: ToolCall;
  result: ToolResult;
}

/**
 * Reasoning loop for one turn. Streams the model's text as `token` events,
 * brackets every tool call with `tool_start`/`tool_end`, and finishes with
 * exactly one `done` or `error`. When `options.signal` aborts, the generator
 * returns without a terminal event.
 */
export async function* agentLoop(
  llm: LLMService,
  context: ConversationContext,
  tools: ToolDefinition[],
  toolHandlers: ToolHandlerMap,
  options: AgentRunOptions,
): AsyncGenerator<AgentEvent> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  const maxToolOutputChars = options.maxToolOutputChars ?? DEFAULT_MAX_TOOL_OUTPUT_CHARS;
  const log = options.logger.child({ component: 'agent-loop', conversationId: options.conversationId });

  const deadline = options.turnTimeoutMs === undefined ? undefined : AbortSignal.timeout(options.turnTimeoutMs);
  const signals = [options.signal, deadline].filter((s): s is AbortSignal => s !== undefined);
  const runSignal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

  let state = LoopState.THINKING;
  let iterations = 0;
  let finalText = '';
  let stopReason: string | undefined;
  let pending: ToolCall[] = [];
  let observations: Observation[] = [];

  try {
    while (state !== LoopState.DONE) {
      runSignal.throwIfAborted();

      switch (state) {
        case LoopState.THINKING: {
          const completion = llm.stream(context.getMessages(), tools, {
            ...options.completion,
            signal: runSignal,
          });
          let response: StreamResponse;
          for (;;) {
            const step = await completion.next();
            if (step.done) {
              response = step.value;
              break;
            }
            finalText += step.value;
            yield { kind: 'token', text: step.value };
          }

          context.addAssistantMessage(response.text, response.toolCalls);
          if (!response.toolCalls?.length) {
            state = LoopState.DONE;
          } else if (iterations >= maxIterations) {
            log.warn({ iterations }, 'tool-call ceiling reached');
            stopReason = `Stopped after ${iterations} tool-call rounds.`;
            state = LoopState.DONE;
          } else {
            pending = response.toolCalls;
            state = LoopState.INVOKING;
          }
          break;
        }

        case LoopState.INVOKING: {
          iterations++;
          observations = [];
          for (const call of pending) {
            if (runSignal.aborted) break;
            yield { kind: 'tool_start', toolName: call.name };
            let result: ToolResult;
            try {
              result = await executeToolCall(call, toolHandlers, {
                timeoutMs: toolTimeoutMs,
                signal: runSignal,
              });
            } catch (err) {
              if (options.signal?.aborted) throw err;
              // Turn deadline: close the bracket, then stop at the next state check.
              result = { success: false, output: null, error: 'turn time limit reached', durationMs: 0 };
            }
            if (!result.success) {
              log.warn({ tool: call.name, error: result.error, durationMs: result.durationMs }, 'tool call failed');
            } else {
              log.debug({ tool: call.name, durationMs: result.durationMs }, 'tool call finished');
            }
            yield { kind: 'tool_end', toolName: call.name, ok: result.success };
            observations.push({ call, result });
          }
          state = LoopState.OBSERVING;
          break;
        }

        case LoopState.OBSERVING: {
          for (const { call, result } of observations) {
            if (result.success) {
              context.addToolResult(call.id, formatToolOutput(result.output, maxToolOutputChars));
            } else {
              const failure = new ToolUnavailableError(call.name, result.error ?? 'unknown error');
              context.addToolResult(call.id, JSON.stringify({ error: failure.message }), true);
            }
          }
          state = LoopState.THINKING;
          break;
        }
      }
    }
  } catch (err) {
    if (options.signal?.aborted) {
      state = LoopState.ABORTED;
      log.info('turn aborted by client');
      return;
    }
    if (deadline?.aborted) {
      log.warn({ turnTimeoutMs: options.turnTimeoutMs }, 'turn deadline reached');
      stopReason = 'Stopped: the time limit for this turn was reached.';
    } else {
      log.error({ err: errorMessage(err) }, 'model provider failure');
      yield { kind: 'error', message: MODEL_UNAVAILABLE_MESSAGE };
      return;
    }
  }

  if (stopReason) {
    yield { kind: 'status', message: stopReason };
    const note = finalText ? `\n\n${INCOMPLETE_NOTE}` : INCOMPLETE_NOTE;
    finalText += note;
    yield { kind: 'token', text: note };
  }

  yield { kind: 'done', conversationId: options.conversationId, finalText };
}
