// Types
export type { LLMServiceOptions, AgentRunOptions, ToolExecutionOptions } from './types.js';

// Errors
export { LLMProviderUnavailableError } from './errors.js';

// LLM service
export { LLMService } from './llm-service.js';

// Tool executor
export { executeToolCall, formatToolOutput } from './tool-executor.js';

// Conversation context
export { ConversationContext, lastExchanges } from './conversation-context.js';

// Agent loop
export {
  agentLoop,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_MAX_TOOL_OUTPUT_CHARS,
  INCOMPLETE_NOTE,
  MODEL_UNAVAILABLE_MESSAGE,
} from './agent-loop.js';

// PiMono provider
export { PiMonoProvider } from './pi-mono-provider.js';
export type { PiMonoProviderOptions } from './pi-mono-provider.js';

// Re-export pi-ai utilities needed by consumers
export { getModel } from '@mariozechner/pi-ai';

// System prompt
export {
  section,
  formatToolsSummary,
  buildSystemPrompt,
  TOOL_USE_POLICY,
} from './prompt-section-builder.js';
