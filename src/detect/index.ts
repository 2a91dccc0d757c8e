/**
 * Credential detection
 *
 * Resolves credentials from explicit JSON, a credentials file, the
 * GOOGLE_APPLICATION_CREDENTIALS variable or the well-known user file,
 * and turns them into a cached TokenProvider.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Transport } from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';
import type { TokenProvider } from '../auth/token.js';
import { CachedTokenProvider, type CachedTokenProviderOptions } from '../auth/cached-token-provider.js';
import { defaultTransport } from '../transport/undici.js';
import { parseCredentialsFile, type CredentialsFile, type ServiceAccountFile } from './credentials-file.js';
import { JWTBearerProvider, RefreshTokenProvider, SelfSignedJWTProvider } from './service-account.js';

export const CREDENTIALS_ENV_VAR = 'GOOGLE_APPLICATION_CREDENTIALS';
export const QUOTA_PROJECT_ENV_VAR = 'GOOGLE_CLOUD_QUOTA_PROJECT';

const DEFAULT_UNIVERSE_DOMAIN = 'googleapis.com';

export interface DetectOptions {
  /**
   * OAuth2 scopes to request
   * @example ['https://www.googleapis.com/auth/cloud-platform']
   */
  scopes?: string[];

  /**
   * Audience for self-signed JWTs. Mutually exclusive with scopes.
   */
  audience?: string;

  /**
   * Subject for domain-wide delegation (impersonation)
   */
  subject?: string;

  /**
   * Sign tokens locally instead of exchanging them (service accounts only)
   */
  useSelfSignedJWT?: boolean;

  /**
   * Overrides the token endpoint of the credentials
   */
  tokenURL?: string;

  /**
   * Credentials file contents. Takes precedence over every other source.
   */
  credentialsJSON?: string;

  /**
   * Path to a credentials file
   */
  credentialsFile?: string;

  /**
   * How long before expiry tokens are refreshed, in ms
   */
  earlyTokenRefresh?: number;

  /**
   * Sender used for token endpoint calls
   */
  transport?: Transport;
}

export interface CredentialsMetadata {
  projectId?: string;
  quotaProjectId?: string;
  universeDomain?: string;
}

/**
 * Detected credentials: a cached token provider plus what the file says
 * about the project it belongs to
 */
export class Credentials extends CachedTokenProvider {
  readonly projectId?: string;
  readonly quotaProjectId?: string;
  readonly universeDomain: string;

  constructor(
    provider: TokenProvider,
    metadata: CredentialsMetadata = {},
    cacheOptions?: CachedTokenProviderOptions
  ) {
    super(provider, cacheOptions);
    this.projectId = metadata.projectId;
    this.quotaProjectId = metadata.quotaProjectId;
    this.universeDomain = metadata.universeDomain || DEFAULT_UNIVERSE_DOMAIN;
  }
}

/**
 * Location of the file written by `gcloud auth application-default login`
 */
export function wellKnownCredentialsFile(env: NodeJS.ProcessEnv = process.env): string {
  if (process.platform === 'win32' && env.APPDATA) {
    return join(env.APPDATA, 'gcloud', 'application_default_credentials.json');
  }
  return join(homedir(), '.config', 'gcloud', 'application_default_credentials.json');
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function loadCredentials(opts: DetectOptions, env: NodeJS.ProcessEnv): Promise<CredentialsFile> {
  if (opts.credentialsJSON) {
    return parseCredentialsFile(opts.credentialsJSON);
  }

  if (opts.credentialsFile) {
    return parseCredentialsFile(await readFile(opts.credentialsFile, 'utf-8'));
  }

  const envPath = env[CREDENTIALS_ENV_VAR];
  if (envPath) {
    return parseCredentialsFile(await readFile(envPath, 'utf-8'));
  }

  const wellKnown = await readIfExists(wellKnownCredentialsFile(env));
  if (wellKnown !== null) {
    return parseCredentialsFile(wellKnown);
  }

  throw new ConfigurationError(
    `detect: could not find default credentials. Set credentialsJSON, credentialsFile or the ${CREDENTIALS_ENV_VAR} environment variable.`,
    { configKey: CREDENTIALS_ENV_VAR }
  );
}

function serviceAccountProvider(file: ServiceAccountFile, opts: DetectOptions, transport: Transport): TokenProvider {
  if (opts.useSelfSignedJWT) {
    if (!opts.scopes?.length && !opts.audience) {
      throw new ConfigurationError('detect: could not configure a self-signed JWT without scopes or audience', {
        configKey: 'scopes',
      });
    }
    return new SelfSignedJWTProvider(file, { audience: opts.audience, scopes: opts.scopes });
  }

  return new JWTBearerProvider(
    file,
    { scopes: opts.scopes, subject: opts.subject, tokenURL: opts.tokenURL },
    transport
  );
}

/**
 * Find credentials and build a cached token provider from them
 *
 * @example
 * ```typescript
 * const creds = await defaultCredentials({
 *   scopes: ['https://www.googleapis.com/auth/cloud-platform'],
 * });
 * const token = await creds.token();
 * ```
 */
export async function defaultCredentials(
  opts: DetectOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<Credentials> {
  if (opts.scopes?.length && opts.audience) {
    throw new ConfigurationError('detect: both scopes and audience were provided', { configKey: 'audience' });
  }

  const file = await loadCredentials(opts, env);
  const transport = opts.transport ?? defaultTransport();

  const provider = file.type === 'service_account'
    ? serviceAccountProvider(file, opts, transport)
    : new RefreshTokenProvider(file, opts.tokenURL, transport);

  return new Credentials(
    provider,
    {
      projectId: file.type === 'service_account' ? file.project_id : undefined,
      quotaProjectId: env[QUOTA_PROJECT_ENV_VAR] || file.quota_project_id,
      universeDomain: file.universe_domain,
    },
    { expireEarly: opts.earlyTokenRefresh }
  );
}
