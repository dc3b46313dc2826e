// src/libs/errors.ts
// ============================================================================
// Fehler-Taxonomie des Credential-Kerns
// ----------------------------------------------------------------------------
// - Jede Klasse traegt einen stabilen `code` (Logs / API-Mapping in error-map.ts)
// - Ursache des Primitivs (argon2/jose) haengt an `cause`, nie in der Message
// - Kein Fehler hier ist transient → es wird nirgends retried
// ============================================================================

export type CredentialErrorCode =
  | "CONFIGURATION_INVALID"
  | "HASHING_FAILED"
  | "INVALID_HASH_FORMAT"
  | "INVALID_TOKEN_KIND"
  | "SIGNING_FAILED"
  | "TOKEN_INVALID"
  | "COOKIE_UNAVAILABLE";

export abstract class CredentialError extends Error {
  abstract readonly code: CredentialErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Auth-Konfiguration fehlt oder ist ungueltig (fatal beim Start). */
export class ConfigurationError extends CredentialError {
  readonly code = "CONFIGURATION_INVALID";
}

export class HashingError extends CredentialError {
  readonly code = "HASHING_FAILED";

  constructor(message = "hashing_failed", options?: ErrorOptions) {
    super(message, options);
  }
}

/** Gespeicherter Hash ist kein gueltiger argon2-PHC-String (Datenintegritaet). */
export class InvalidHashFormatError extends CredentialError {
  readonly code = "INVALID_HASH_FORMAT";

  constructor(options?: ErrorOptions) {
    super("invalid_hash_format", options);
  }
}

export class InvalidTokenKindError extends CredentialError {
  readonly code = "INVALID_TOKEN_KIND";

  constructor(readonly kind: string) {
    super(`Invalid token type: ${kind}`);
  }
}

export class SigningError extends CredentialError {
  readonly code = "SIGNING_FAILED";

  constructor(message = "signing_failed", options?: ErrorOptions) {
    super(message, options);
  }
}

export class TokenVerificationError extends CredentialError {
  readonly code = "TOKEN_INVALID";

  constructor(message = "token_invalid", options?: ErrorOptions) {
    super(message, options);
  }
}

export class CookieUnavailableError extends CredentialError {
  readonly code = "COOKIE_UNAVAILABLE";

  constructor() {
    super("cookie_support_missing: @fastify/cookie is not registered on this instance");
  }
}

export function isCredentialError(err: unknown): err is CredentialError {
  return err instanceof CredentialError;
}
