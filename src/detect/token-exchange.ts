import { z } from 'zod';
import { HttpRequest } from '../core/request.js';
import { AuthenticationError } from '../core/errors.js';
import type { Transport } from '../types/index.js';
import { TOKEN_TYPE_BEARER, type Token } from '../auth/token.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * POST a form to an OAuth2 token endpoint and turn the answer into a Token
 */
export async function exchangeToken(
  transport: Transport,
  tokenURL: string,
  form: Record<string, string>,
  authType: string
): Promise<Token> {
  const req = new HttpRequest(tokenURL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    },
    body: new URLSearchParams(form).toString(),
    throwHttpErrors: false,
  });

  const response = await transport.dispatch(req);
  const text = await response.text();

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    payload = undefined;
  }

  if (!response.ok) {
    const parsedError = tokenErrorSchema.safeParse(payload);
    const detail = parsedError.success
      ? parsedError.data.error_description || parsedError.data.error
      : `status ${response.status}`;
    throw new AuthenticationError(`Failed to get access token: ${detail}`, {
      authType,
      request: req,
      response,
    });
  }

  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new AuthenticationError('Failed to get access token: malformed token response', {
      authType,
      request: req,
      response,
    });
  }

  const data = parsed.data;
  return {
    value: data.access_token,
    type: data.token_type || TOKEN_TYPE_BEARER,
    expiry: data.expires_in !== undefined ? new Date(Date.now() + data.expires_in * 1000) : undefined,
    metadata: data.scope ? { scope: data.scope } : undefined,
  };
}
