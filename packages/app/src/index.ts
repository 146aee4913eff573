export { bootstrap, createModelProviders } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';

export { SessionOrchestrator, SAVE_FAILED_MESSAGE, CONVERSATION_NOT_FOUND_MESSAGE } from './session-orchestrator.js';
export type { SessionOrchestratorOptions } from './session-orchestrator.js';
