import { Token, TokenProvider, isTokenValid } from './token.js';

/**
 * Tokens are refreshed this long before they actually expire (3m45s)
 */
export const DEFAULT_EXPIRE_EARLY = 225 * 1000;

export interface CachedTokenProviderOptions {
  /**
   * How long before expiry a token is considered stale, in ms
   * @default 225000
   */
  expireEarly?: number;

  /**
   * Only refresh once the token is actually expired, ignoring expireEarly
   * @default false
   */
  disableAutoRefresh?: boolean;
}

/**
 * Caches the token of the wrapped provider until it goes stale.
 * Concurrent callers that find the cache stale share a single refresh.
 */
export class CachedTokenProvider implements TokenProvider {
  private cached: Token | null = null;
  private pending: Promise<Token> | null = null;
  private readonly expireEarly: number;

  constructor(
    private readonly provider: TokenProvider,
    options: CachedTokenProviderOptions = {}
  ) {
    this.expireEarly = options.disableAutoRefresh ? 0 : (options.expireEarly ?? DEFAULT_EXPIRE_EARLY);
  }

  async token(): Promise<Token> {
    if (isTokenValid(this.cached, this.expireEarly)) {
      return this.cached;
    }

    if (!this.pending) {
      this.pending = this.provider
        .token()
        .then((token) => {
          this.cached = token;
          return token;
        })
        .finally(() => {
          this.pending = null;
        });
    }

    return this.pending;
  }
}

/**
 * Wraps a provider with a cache. A provider that is already cached is
 * returned as is.
 */
export function newCachedTokenProvider(
  provider: TokenProvider,
  options?: CachedTokenProviderOptions
): CachedTokenProvider {
  if (provider instanceof CachedTokenProvider) {
    return provider;
  }
  return new CachedTokenProvider(provider, options);
}
