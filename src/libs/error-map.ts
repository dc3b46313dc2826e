// src/libs/error-map.ts
// ============================================================================
// Credential-Fehler → HTTP-Vertrag (Status / Code / Message)
// Einheitlicher Fehler-Body: { status, error: { code, message }, details? }
// ----------------------------------------------------------------------------
// Serverfehler bekommen eine generische Message; Interna (argon2/jose)
// bleiben im Log und gehen nie an den Client.
// ============================================================================

import { isCredentialError } from "./errors.js";

export type MappedError = {
  status: number;
  code: string;
  message: string;
};

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  return {
    status,
    error: { code, message },
    ...(details !== undefined ? { details } : {}),
  };
}

const INTERNAL: MappedError = {
  status: 500,
  code: "INTERNAL",
  message: "Internal server error.",
};

export function mapCredentialError(err: unknown): MappedError {
  if (!isCredentialError(err)) return INTERNAL;

  switch (err.code) {
    case "INVALID_HASH_FORMAT":
      // fuer den User ein normaler Login-Fehlschlag
      return {
        status: 401,
        code: "INVALID_CREDENTIALS",
        message: "Invalid credentials.",
      };
    case "TOKEN_INVALID":
      return {
        status: 401,
        code: "UNAUTHORIZED",
        message: "Invalid or expired token.",
      };
    case "CONFIGURATION_INVALID":
    case "HASHING_FAILED":
    case "INVALID_TOKEN_KIND":
    case "SIGNING_FAILED":
    case "COOKIE_UNAVAILABLE":
      return { ...INTERNAL, code: err.code };
  }
}
