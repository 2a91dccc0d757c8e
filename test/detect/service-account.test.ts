import { describe, it, expect, vi, afterEach } from 'vitest';
import { createVerify } from 'node:crypto';
import {
  JWTBearerProvider,
  RefreshTokenProvider,
  SelfSignedJWTProvider,
  signJWT,
} from '../../src/detect/service-account.js';
import { parseCredentialsFile, type AuthorizedUserFile, type ServiceAccountFile } from '../../src/detect/credentials-file.js';
import { AuthenticationError } from '../../src/core/errors.js';
import type { CloudRequest } from '../../src/types/index.js';
import { MockTransport } from '../helpers/mock-transport.js';
import {
  authorizedUserJSON,
  decodeJWT,
  serviceAccountJSON,
  testPublicKey,
  TEST_TOKEN_URL,
} from '../helpers/credentials.js';

function serviceAccount(overrides: Record<string, unknown> = {}): ServiceAccountFile {
  const file = parseCredentialsFile(serviceAccountJSON(overrides));
  if (file.type !== 'service_account') throw new Error('expected a service account');
  return file;
}

function authorizedUser(overrides: Record<string, unknown> = {}): AuthorizedUserFile {
  const file = parseCredentialsFile(authorizedUserJSON(overrides));
  if (file.type !== 'authorized_user') throw new Error('expected an authorized user');
  return file;
}

function formOf(req: CloudRequest | undefined): URLSearchParams {
  return new URLSearchParams(typeof req?.body === 'string' ? req.body : '');
}

describe('Service account credentials', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('signJWT', () => {
    it('should produce an RS256 JWT verifiable with the public key', () => {
      const jwt = signJWT(serviceAccount(), { iss: 'someone', iat: 1 });
      const [header, payload, signature] = jwt.split('.');

      const verifier = createVerify('RSA-SHA256');
      verifier.update(`${header}.${payload}`);
      expect(verifier.verify(testPublicKey, signature, 'base64url')).toBe(true);

      expect(decodeJWT(jwt)).toEqual({
        header: { alg: 'RS256', typ: 'JWT', kid: 'test-key-id' },
        payload: { iss: 'someone', iat: 1 },
      });
    });

    it('should leave out kid without a private key id', () => {
      const jwt = signJWT(serviceAccount({ private_key_id: undefined }), {});
      expect(decodeJWT(jwt).header).toEqual({ alg: 'RS256', typ: 'JWT' });
    });
  });

  describe('SelfSignedJWTProvider', () => {
    it('should sign a one hour token for the audience', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const iat = Date.parse('2024-01-01T00:00:00Z') / 1000;

      const token = await new SelfSignedJWTProvider(serviceAccount(), {
        audience: 'https://storage.example.test/',
      }).token();

      expect(token.type).toBe('Bearer');
      expect(token.expiry).toEqual(new Date('2024-01-01T01:00:00Z'));
      expect(decodeJWT(token.value).payload).toEqual({
        iss: 'robot@test-project.iam.example.test',
        sub: 'robot@test-project.iam.example.test',
        iat,
        exp: iat + 3600,
        aud: 'https://storage.example.test/',
      });
    });

    it('should carry scopes when there is no audience', async () => {
      const token = await new SelfSignedJWTProvider(serviceAccount(), {
        scopes: ['scope-a', 'scope-b'],
      }).token();

      const { payload } = decodeJWT(token.value);
      expect(payload.scope).toBe('scope-a scope-b');
      expect(payload.aud).toBeUndefined();
    });
  });

  describe('JWTBearerProvider', () => {
    it('should exchange a signed assertion for an access token', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 200, {
        access_token: 'access-1',
        token_type: 'Bearer',
        expires_in: 3600,
        scope: 'scope-a',
      });

      const provider = new JWTBearerProvider(
        serviceAccount(),
        { scopes: ['scope-a'], subject: 'user@example.test' },
        transport
      );
      const token = await provider.token();

      expect(token.value).toBe('access-1');
      expect(token.type).toBe('Bearer');
      expect(token.metadata).toEqual({ scope: 'scope-a' });

      const req = transport.lastRequest;
      expect(req?.method).toBe('POST');
      expect(req?.headers.get('content-type')).toBe('application/x-www-form-urlencoded');

      const form = formOf(req);
      expect(form.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');

      const { payload } = decodeJWT(form.get('assertion') ?? '');
      expect(payload.iss).toBe('robot@test-project.iam.example.test');
      expect(payload.aud).toBe(TEST_TOKEN_URL);
      expect(payload.scope).toBe('scope-a');
      expect(payload.sub).toBe('user@example.test');
    });

    it('should set expiry from expires_in', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 200, { access_token: 'access-1', expires_in: 60 });

      const token = await new JWTBearerProvider(serviceAccount(), {}, transport).token();

      expect(token.expiry).toEqual(new Date('2024-01-01T00:01:00Z'));
      expect(token.type).toBe('Bearer');
    });

    it('should prefer an explicit token URL', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', 'https://sts.example.test/token', 200, { access_token: 'access-2' });

      await new JWTBearerProvider(serviceAccount(), { tokenURL: 'https://sts.example.test/token' }, transport).token();

      expect(transport.getCallCount('POST', 'https://sts.example.test/token')).toBe(1);
    });

    it('should report the token endpoint error description', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 400, {
        error: 'invalid_grant',
        error_description: 'Invalid JWT Signature.',
      });

      const error = await new JWTBearerProvider(serviceAccount(), {}, transport).token().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({
        message: 'Failed to get access token: Invalid JWT Signature.',
        authType: 'service_account',
      });
    });

    it('should fall back to the status for non-JSON errors', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 500, 'upstream failure');

      await expect(new JWTBearerProvider(serviceAccount(), {}, transport).token()).rejects.toThrow(
        'Failed to get access token: status 500'
      );
    });

    it('should reject a success response without access_token', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 200, { token_type: 'Bearer' });

      await expect(new JWTBearerProvider(serviceAccount(), {}, transport).token()).rejects.toThrow(
        'Failed to get access token: malformed token response'
      );
    });
  });

  describe('RefreshTokenProvider', () => {
    it('should trade the refresh token for an access token', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 200, { access_token: 'user-access', token_type: 'Bearer' });

      const token = await new RefreshTokenProvider(authorizedUser(), undefined, transport).token();

      expect(token.value).toBe('user-access');
      const form = formOf(transport.lastRequest);
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(form.get('client_id')).toBe('test-client-id');
      expect(form.get('client_secret')).toBe('test-secret');
      expect(form.get('refresh_token')).toBe('test-refresh-token');
    });

    it('should tag failures with the authorized_user auth type', async () => {
      const transport = new MockTransport();
      transport.setMockResponse('POST', TEST_TOKEN_URL, 401, { error: 'unauthorized_client' });

      const error = await new RefreshTokenProvider(authorizedUser(), undefined, transport).token().catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: 'Failed to get access token: unauthorized_client',
        authType: 'authorized_user',
      });
    });
  });
});
