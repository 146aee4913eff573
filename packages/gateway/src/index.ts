export type {
  AuthProvider,
  ChatService,
  GatewayOptions,
  HealthStatus,
  TurnContext,
  TurnRequest,
} from './types.js';
export { GatewayServer, INTERNAL_ERROR_MESSAGE, toConversationJson, toMessageJson } from './gateway-server.js';
export { CredentialGate, extractBearerToken } from './credential-gate.js';
export type { CredentialGateOptions } from './credential-gate.js';
export { HttpAuthProvider } from './auth-provider.js';
export type { HttpAuthProviderOptions } from './auth-provider.js';
export { SseStream, formatFrame, toWireEvent, HEARTBEAT_FRAME, SSE_HEADERS } from './sse-stream.js';
export {
  SendMessageSchema,
  CONVERSATION_ID_PATTERN,
  PayloadTooLargeError,
  parseTurnRequest,
  readBody,
} from './request-body.js';
