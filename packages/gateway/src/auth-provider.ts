import { z } from 'zod';
import type { AuthProvider } from './types.js';

const UserSchema = z.object({ id: z.string().min(1) });

export interface HttpAuthProviderOptions {
  /** Base URL of the identity provider. */
  url: string;
  /** Project key sent as the `apikey` header, when the provider wants one. */
  apiKey?: string;
}

/**
 * Verifies tokens against the identity provider's user endpoint
 * (`GET {url}/auth/v1/user`). The user's `id` becomes the principal id.
 */
export class HttpAuthProvider implements AuthProvider {
  private readonly endpoint: string;

  constructor(private readonly options: HttpAuthProviderOptions) {
    this.endpoint = new URL('/auth/v1/user', options.url).toString();
  }

  async verify(token: string, signal: AbortSignal): Promise<{ principalId: string } | null> {
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (this.options.apiKey) headers['apikey'] = this.options.apiKey;

    const res = await fetch(this.endpoint, { headers, signal });
    if (res.status === 401 || res.status === 403) return null;
    if (!res.ok) {
      throw new Error(`identity provider answered HTTP ${res.status}`);
    }

    const user = UserSchema.safeParse(await res.json());
    return user.success ? { principalId: user.data.id } : null;
  }
}
