/**
 * Authenticated identity of a request.
 * `credential` is the raw bearer token, kept only to re-present it to the
 * remote tool server. It is never persisted or logged.
 */
export interface Principal {
  principalId: string;
  credential: string;
}
