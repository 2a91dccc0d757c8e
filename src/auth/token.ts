export const TOKEN_TYPE_BEARER = 'Bearer';

/**
 * A credential used to authorize a request. Treat as immutable.
 */
export interface Token {
  /** The token string placed in the Authorization header */
  readonly value: string;

  /** Token type, e.g. 'Bearer'. Empty or absent means Bearer. */
  readonly type?: string;

  /** When the token stops being valid. Absent means it never expires. */
  readonly expiry?: Date;

  /** Extra fields returned by the issuer */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Source of tokens. Implementations may hit the network on every call;
 * wrap them with newCachedTokenProvider to reuse valid tokens.
 */
export interface TokenProvider {
  token(): Promise<Token>;
}

/**
 * A token is valid when it has a value and does not expire within
 * `expireEarlyMs` from now.
 */
export function isTokenValid(token: Token | null | undefined, expireEarlyMs = 0): token is Token {
  if (!token || !token.value) return false;
  if (!token.expiry) return true;
  return Date.now() < token.expiry.getTime() - expireEarlyMs;
}

/**
 * Value for the Authorization header: `<type> <value>`, type defaulting to Bearer
 */
export function authorizationValue(token: Token): string {
  const type = token.type || TOKEN_TYPE_BEARER;
  return `${type} ${token.value}`;
}
