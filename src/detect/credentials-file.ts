import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../core/errors.js';

export const DEFAULT_TOKEN_URL = 'https://oauth2.googleapis.com/token';

const serviceAccountSchema = z.object({
  type: z.literal('service_account'),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  private_key: z.string().min(1),
  client_email: z.string().min(1),
  client_id: z.string().optional(),
  token_uri: z.string().url().optional(),
  quota_project_id: z.string().optional(),
  universe_domain: z.string().optional(),
});

const authorizedUserSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token_uri: z.string().url().optional(),
  quota_project_id: z.string().optional(),
  universe_domain: z.string().optional(),
});

export const credentialsFileSchema = z.discriminatedUnion('type', [
  serviceAccountSchema,
  authorizedUserSchema,
]);

export type ServiceAccountFile = z.infer<typeof serviceAccountSchema>;
export type AuthorizedUserFile = z.infer<typeof authorizedUserSchema>;
export type CredentialsFile = z.infer<typeof credentialsFileSchema>;

const SUPPORTED_TYPES: ReadonlyArray<string> = ['service_account', 'authorized_user'];

/**
 * Parse and validate the JSON of a credentials file
 */
export function parseCredentialsFile(raw: string): CredentialsFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `detect: credentials are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const typeResult = z.object({ type: z.string() }).safeParse(json);
  if (typeResult.success && !SUPPORTED_TYPES.includes(typeResult.data.type)) {
    throw new ConfigurationError(`detect: unsupported credential type "${typeResult.data.type}"`, {
      configKey: 'type',
    });
  }

  const result = credentialsFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`detect: invalid credentials: ${field ? `${field}: ` : ''}${issue.message}`, {
      field: field || undefined,
    });
  }

  return result.data;
}
