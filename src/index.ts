export * from './types/index.js';
export * from './types/logger.js';
export * from './core/client.js';
export * from './core/request.js';
export * from './core/response.js';
export * from './core/errors.js';
export * from './auth/token.js';
export * from './auth/cached-token-provider.js';
export * from './transport/undici.js';
export * from './detect/index.js';
export { parseCredentialsFile, credentialsFileSchema, DEFAULT_TOKEN_URL } from './detect/credentials-file.js';
export type { ServiceAccountFile, AuthorizedUserFile, CredentialsFile } from './detect/credentials-file.js';
export { signJWT, SelfSignedJWTProvider, JWTBearerProvider, RefreshTokenProvider } from './detect/service-account.js';
export * from './httptransport/index.js';
export { isDebugEnabled, getLogger, setLogger } from './utils/logger.js';
