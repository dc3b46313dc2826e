// src/modules/tokens/service.ts
// ============================================================================
// Token-Ausgabe (access / refresh / one-time-password)
// ----------------------------------------------------------------------------
// - "auth": Access + Refresh (je eigene Claims, gleiche iat) + Auth-Cookie
// - "one_time_password": nur OTP-Token
// - alles andere: InvalidTokenKindError – nie ein leeres TokenSet
//
// Zeitrechnung in ganzen UTC-Sekunden. Ueberlauf ist bereits beim Start
// geprueft (auth-config.ts), hier wird nur addiert.
// ============================================================================

import { hoursToSeconds, minutesToSeconds, type ServiceConfig } from "../../libs/auth-config.js";
import type { PasswordHasher } from "../../libs/crypto.js";
import { InvalidTokenKindError, SigningError } from "../../libs/errors.js";
import { signClaims, type Claims, type ClaimsType } from "../../libs/jwt.js";
import { deriveAuthCookie } from "../cookies/service.js";
import {
  TOKEN_KINDS,
  UserProjectionSchema,
  type TokenKind,
  type TokenSet,
  type UserProjection,
} from "./types.js";

export interface TokenIssuerDeps {
  hasher: PasswordHasher;
  /** Millisekunden seit Epoch (Default: Date.now) */
  now?: () => number;
}

export function isTokenKind(value: string): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

function buildClaims(
  user: UserProjection,
  typ: ClaimsType,
  iat: number,
  ttlSec: number,
): Claims {
  return { id: user.id, email: user.email, typ, iat, exp: iat + ttlSec };
}

export async function generateTokens(
  kind: string,
  user: UserProjection,
  config: ServiceConfig,
  deps: TokenIssuerDeps,
): Promise<TokenSet> {
  if (!isTokenKind(kind)) {
    throw new InvalidTokenKindError(kind);
  }

  const parsedUser = UserProjectionSchema.safeParse(user);
  if (!parsedUser.success) {
    throw new SigningError("user_projection_invalid", { cause: parsedUser.error });
  }

  const { secret, accessExpiryHours, refreshExpiryHours, otpExpiryMinutes } = config.auth;
  const now = Math.floor((deps.now ?? Date.now)() / 1000);

  switch (kind) {
    case "auth": {
      const [accessToken, refreshToken, authCookie] = await Promise.all([
        signClaims(
          buildClaims(parsedUser.data, "access", now, hoursToSeconds(accessExpiryHours)),
          secret,
        ),
        signClaims(
          buildClaims(parsedUser.data, "refresh", now, hoursToSeconds(refreshExpiryHours)),
          secret,
        ),
        deriveAuthCookie(parsedUser.data.email, secret, deps.hasher),
      ]);

      return { accessToken, refreshToken, authCookie };
    }

    case "one_time_password": {
      const otpToken = await signClaims(
        buildClaims(parsedUser.data, "otp", now, minutesToSeconds(otpExpiryMinutes)),
        secret,
      );

      return { otpToken };
    }
  }
}
