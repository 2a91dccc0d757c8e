import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CachedTokenProvider,
  DEFAULT_EXPIRE_EARLY,
  newCachedTokenProvider,
} from '../../src/auth/cached-token-provider.js';
import type { Token, TokenProvider } from '../../src/auth/token.js';

class CountingProvider implements TokenProvider {
  calls = 0;

  constructor(private readonly lifetimeMs?: number) {}

  async token(): Promise<Token> {
    this.calls++;
    return {
      value: `token-${this.calls}`,
      expiry: this.lifetimeMs === undefined ? undefined : new Date(Date.now() + this.lifetimeMs),
    };
  }
}

describe('CachedTokenProvider', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should use a 225 second early expiry by default', () => {
    expect(DEFAULT_EXPIRE_EARLY).toBe(225_000);
  });

  it('should return the cached token while it is valid', async () => {
    const base = new CountingProvider();
    const cached = newCachedTokenProvider(base);

    expect((await cached.token()).value).toBe('token-1');
    expect((await cached.token()).value).toBe('token-1');
    expect(base.calls).toBe(1);
  });

  it('should refresh once inside the early expiry window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const base = new CountingProvider(10 * 60 * 1000);
    const cached = newCachedTokenProvider(base);

    expect((await cached.token()).value).toBe('token-1');

    // 4 minutes left: outside the 3m45s window
    vi.setSystemTime(new Date('2024-01-01T00:06:00Z'));
    expect((await cached.token()).value).toBe('token-1');

    // 3 minutes left: inside
    vi.setSystemTime(new Date('2024-01-01T00:07:00Z'));
    expect((await cached.token()).value).toBe('token-2');
    expect(base.calls).toBe(2);
  });

  it('should honor a custom expireEarly', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const base = new CountingProvider(60 * 1000);
    const cached = newCachedTokenProvider(base, { expireEarly: 10 * 1000 });

    await cached.token();
    vi.setSystemTime(new Date('2024-01-01T00:00:45Z'));
    expect((await cached.token()).value).toBe('token-1');
    vi.setSystemTime(new Date('2024-01-01T00:00:51Z'));
    expect((await cached.token()).value).toBe('token-2');
  });

  it('should only refresh expired tokens when auto refresh is disabled', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const base = new CountingProvider(10 * 60 * 1000);
    const cached = newCachedTokenProvider(base, { disableAutoRefresh: true, expireEarly: 5 * 60 * 1000 });

    await cached.token();
    vi.setSystemTime(new Date('2024-01-01T00:09:59Z'));
    expect((await cached.token()).value).toBe('token-1');
    vi.setSystemTime(new Date('2024-01-01T00:10:00Z'));
    expect((await cached.token()).value).toBe('token-2');
  });

  it('should share one refresh between concurrent callers', async () => {
    let resolve: (token: Token) => void = () => {};
    const base: TokenProvider = {
      token: vi.fn(() => new Promise<Token>((r) => { resolve = r; })),
    };
    const cached = newCachedTokenProvider(base);

    const first = cached.token();
    const second = cached.token();
    resolve({ value: 'shared' });

    expect((await first).value).toBe('shared');
    expect((await second).value).toBe('shared');
    expect(base.token).toHaveBeenCalledTimes(1);
  });

  it('should reject every waiter with the provider error and retry on the next call', async () => {
    const base: TokenProvider = {
      token: vi
        .fn<() => Promise<Token>>()
        .mockRejectedValueOnce(new Error('token endpoint down'))
        .mockResolvedValueOnce({ value: 'recovered' }),
    };
    const cached = newCachedTokenProvider(base);

    const results = await Promise.allSettled([cached.token(), cached.token()]);
    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
    await expect(cached.token()).resolves.toEqual({ value: 'recovered' });
    expect(base.token).toHaveBeenCalledTimes(2);
  });

  it('should not wrap a provider that is already cached', () => {
    const cached = new CachedTokenProvider(new CountingProvider());
    expect(newCachedTokenProvider(cached)).toBe(cached);
  });
});
