/**
 * Service account and user credentials
 *
 * JWT-based authentication for server-to-server communication, and the
 * refresh-token grant for user credentials
 */

import { createSign, createPrivateKey } from 'node:crypto';
import type { Transport } from '../types/index.js';
import { TOKEN_TYPE_BEARER, type Token, type TokenProvider } from '../auth/token.js';
import { exchangeToken } from './token-exchange.js';
import { DEFAULT_TOKEN_URL, type AuthorizedUserFile, type ServiceAccountFile } from './credentials-file.js';

const JWT_LIFETIME_SECONDS = 3600;

/**
 * Sign a JWT with the service account's private key (RS256)
 */
export function signJWT(credentials: ServiceAccountFile, payload: Record<string, unknown>): string {
  const header: Record<string, string> = {
    alg: 'RS256',
    typ: 'JWT',
  };
  if (credentials.private_key_id) {
    header.kid = credentials.private_key_id;
  }

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  const signatureInput = `${encodedHeader}.${encodedPayload}`;

  const privateKey = createPrivateKey(credentials.private_key);
  const sign = createSign('RSA-SHA256');
  sign.update(signatureInput);
  const signature = sign.sign(privateKey, 'base64url');

  return `${signatureInput}.${signature}`;
}

export interface SelfSignedJWTOptions {
  audience?: string;
  scopes?: string[];
}

/**
 * Issues tokens locally: the signed JWT itself is the bearer token,
 * no token endpoint round trip.
 */
export class SelfSignedJWTProvider implements TokenProvider {
  constructor(
    private readonly credentials: ServiceAccountFile,
    private readonly options: SelfSignedJWTOptions
  ) {}

  async token(): Promise<Token> {
    const now = Math.floor(Date.now() / 1000);
    const exp = now + JWT_LIFETIME_SECONDS;

    const payload: Record<string, unknown> = {
      iss: this.credentials.client_email,
      sub: this.credentials.client_email,
      iat: now,
      exp,
    };

    if (this.options.audience) {
      payload.aud = this.options.audience;
    } else {
      payload.scope = (this.options.scopes || []).join(' ');
    }

    return {
      value: signJWT(this.credentials, payload),
      type: TOKEN_TYPE_BEARER,
      expiry: new Date(exp * 1000),
    };
  }
}

export interface JWTBearerOptions {
  scopes?: string[];
  subject?: string;
  tokenURL?: string;
}

/**
 * Two-legged OAuth: exchanges a signed assertion for an access token
 */
export class JWTBearerProvider implements TokenProvider {
  constructor(
    private readonly credentials: ServiceAccountFile,
    private readonly options: JWTBearerOptions,
    private readonly transport: Transport
  ) {}

  private get tokenURL(): string {
    return this.options.tokenURL || this.credentials.token_uri || DEFAULT_TOKEN_URL;
  }

  async token(): Promise<Token> {
    const now = Math.floor(Date.now() / 1000);

    const payload: Record<string, unknown> = {
      iss: this.credentials.client_email,
      aud: this.tokenURL,
      iat: now,
      exp: now + JWT_LIFETIME_SECONDS,
      scope: (this.options.scopes || []).join(' '),
    };

    // For domain-wide delegation (impersonating a user)
    if (this.options.subject) {
      payload.sub = this.options.subject;
    }

    return exchangeToken(
      this.transport,
      this.tokenURL,
      {
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion: signJWT(this.credentials, payload),
      },
      'service_account'
    );
  }
}

/**
 * User credentials: trades the stored refresh token for access tokens
 */
export class RefreshTokenProvider implements TokenProvider {
  constructor(
    private readonly credentials: AuthorizedUserFile,
    private readonly tokenURL: string | undefined,
    private readonly transport: Transport
  ) {}

  async token(): Promise<Token> {
    return exchangeToken(
      this.transport,
      this.tokenURL || this.credentials.token_uri || DEFAULT_TOKEN_URL,
      {
        grant_type: 'refresh_token',
        client_id: this.credentials.client_id,
        client_secret: this.credentials.client_secret,
        refresh_token: this.credentials.refresh_token,
      },
      'authorized_user'
    );
  }
}
