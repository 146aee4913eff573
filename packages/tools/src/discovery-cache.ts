import { createHash } from 'node:crypto';

/** SHA-256 hex digest of a credential. The cache never holds raw credentials. */
export function credentialKey(credential: string): string {
  return createHash('sha256').update(credential).digest('hex');
}

/** Short-lived per-credential cache of discovery results. */
export class DiscoveryCache<T> {
  private readonly entries = new Map<string, { value: T; expiresAt: number }>();

  constructor(private readonly ttlMs: number) {}

  get(credential: string): T | undefined {
    const key = credentialKey(credential);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(credential: string, value: T): void {
    if (this.ttlMs <= 0) return;
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
    this.entries.set(credentialKey(credential), { value, expiresAt: now + this.ttlMs });
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
