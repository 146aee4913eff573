import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DiscoveryCache, credentialKey } from '../src/discovery-cache.js';

describe('credentialKey', () => {
  it('is the sha-256 hex digest of the credential', () => {
    expect(credentialKey('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('DiscoveryCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a value until its ttl elapses', () => {
    const cache = new DiscoveryCache<string[]>(1_000);
    cache.set('token-a', ['x']);

    vi.advanceTimersByTime(999);
    expect(cache.get('token-a')).toEqual(['x']);

    vi.advanceTimersByTime(1);
    expect(cache.get('token-a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('keeps entries per credential', () => {
    const cache = new DiscoveryCache<number>(1_000);
    cache.set('token-a', 1);
    cache.set('token-b', 2);

    expect(cache.get('token-a')).toBe(1);
    expect(cache.get('token-b')).toBe(2);
    expect(cache.get('token-c')).toBeUndefined();
  });

  it('never keys entries by the raw credential', () => {
    const cache = new DiscoveryCache<number>(1_000);
    cache.set('test-secret', 1);

    expect(cache.keys()).toEqual([credentialKey('test-secret')]);
    expect(cache.keys()).not.toContain('test-secret');
  });

  it('drops expired entries when storing new ones', () => {
    const cache = new DiscoveryCache<number>(1_000);
    cache.set('token-a', 1);
    vi.advanceTimersByTime(1_000);
    cache.set('token-b', 2);

    expect(cache.size).toBe(1);
  });

  it('stores nothing with a zero ttl', () => {
    const cache = new DiscoveryCache<number>(0);
    cache.set('token-a', 1);
    expect(cache.get('token-a')).toBeUndefined();
  });
});
