import type { IncomingHttpHeaders } from 'node:http';
import type { Logger, Principal } from '@parley/core';
import { UnauthenticatedError, errorMessage } from '@parley/core';
import type { AuthProvider } from './types.js';

const BEARER = /^bearer\s+(\S+)\s*$/i;

/** Token from an `Authorization: Bearer <token>` header, or null. */
export function extractBearerToken(header: string | string[] | undefined): string | null {
  if (typeof header !== 'string') return null;
  const match = BEARER.exec(header.trim());
  return match?.[1] ?? null;
}

export interface CredentialGateOptions {
  provider: AuthProvider;
  timeoutMs: number;
  logger: Logger;
}

/** Turns request headers into a Principal or an UnauthenticatedError. */
export class CredentialGate {
  private readonly log: Logger;

  constructor(private readonly options: CredentialGateOptions) {
    this.log = options.logger.child({ component: 'credential-gate' });
  }

  async authenticate(headers: IncomingHttpHeaders, signal?: AbortSignal): Promise<Principal> {
    const token = extractBearerToken(headers.authorization);
    if (!token) {
      throw new UnauthenticatedError('Missing bearer credential');
    }

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    let verified: { principalId: string } | null;
    try {
      verified = await this.options.provider.verify(token, signal ? AbortSignal.any([signal, timeout]) : timeout);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'credential verification failed');
      throw new UnauthenticatedError('Credential could not be verified', { cause: err });
    }

    if (!verified) {
      throw new UnauthenticatedError('Invalid or expired credential');
    }
    return { principalId: verified.principalId, credential: token };
  }
}
