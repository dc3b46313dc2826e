// src/index.ts
// Oeffentliche API des Credential-Kerns

export { buildApp, type AppOptions } from "./app.js";
export {
  default as credentialsPlugin,
  type Credentials,
  type CredentialsPluginOptions,
} from "./plugins/credentials.js";

export {
  createServiceConfig,
  hoursToSeconds,
  isDevelopment,
  loadServiceConfig,
  minutesToSeconds,
  type AuthConfig,
  type ServiceConfig,
} from "./libs/auth-config.js";
export { logEnvSummary, parseEnv, type Env } from "./libs/env.js";
export * from "./libs/errors.js";
export { apiError, mapCredentialError, type ApiErrorBody, type MappedError } from "./libs/error-map.js";

export { DEFAULT_HASH_POOL_SIZE, HashPool } from "./libs/hash-pool.js";
export { isArgon2Hash, PasswordHasher, PHC_ARGON2_PATTERN } from "./libs/crypto.js";
export { signClaims, verifyToken, type Claims, type ClaimsType } from "./libs/jwt.js";

export { generateTokens, isTokenKind } from "./modules/tokens/service.js";
export type { TokenKind, TokenSet, UserProjection } from "./modules/tokens/types.js";
export { buildAuthCookieOptions, deployAuthCookie, deriveAuthCookie } from "./modules/cookies/service.js";
export {
  AUTH_COOKIE_DELIMITER,
  AUTH_COOKIE_NAME,
  AUTH_COOKIE_PREFIX,
  type AuthCookieOptions,
} from "./modules/cookies/types.js";
export { checkPassword, checkPasswordDetailed, createDummyHashProvider } from "./modules/password/service.js";
export type { PasswordCheckOutcome } from "./modules/password/types.js";
