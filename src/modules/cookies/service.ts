// src/modules/cookies/service.ts
// ============================================================================
// Auth-Cookie: Ableitung + Auslieferung
// ----------------------------------------------------------------------------
// deriveAuthCookie():
//   chat_auth____<argon2(email)>____<argon2(secret)>
//   Beide Haelften frisch gesalzen → der Wert ist bei jedem Login anders und
//   kann spaeter weder neu berechnet noch geprueft werden. Er wird nur vom
//   Client zurueckgeschickt; Session-Gueltigkeit haengt an den signierten JWTs.
//
// deployAuthCookie():
//   Path=/, HttpOnly, SameSite=Lax, Max-Age = Refresh-Laufzeit,
//   Secure ausser bei environment === "development".
// ============================================================================

import type { FastifyReply } from "fastify";
import { hoursToSeconds, isDevelopment, type ServiceConfig } from "../../libs/auth-config.js";
import type { PasswordHasher } from "../../libs/crypto.js";
import { CookieUnavailableError } from "../../libs/errors.js";
import {
  AUTH_COOKIE_DELIMITER,
  AUTH_COOKIE_NAME,
  AUTH_COOKIE_PREFIX,
  type AuthCookieOptions,
} from "./types.js";

export async function deriveAuthCookie(
  email: string,
  secret: string,
  hasher: PasswordHasher,
): Promise<string> {
  const [emailPart, secretPart] = await Promise.all([
    hasher.hash(email),
    hasher.hash(secret),
  ]);

  return [AUTH_COOKIE_PREFIX, emailPart, secretPart].join(AUTH_COOKIE_DELIMITER);
}

export function buildAuthCookieOptions(config: ServiceConfig): AuthCookieOptions {
  return {
    path: "/",
    httpOnly: true,
    secure: !isDevelopment(config),
    sameSite: "lax",
    maxAge: hoursToSeconds(config.auth.refreshExpiryHours),
  };
}

export function deployAuthCookie(
  reply: FastifyReply,
  cookieValue: string,
  config: ServiceConfig,
): void {
  // ohne @fastify/cookie fehlt setCookie → Verdrahtungsfehler des Aufrufers
  if (typeof reply.setCookie !== "function") {
    throw new CookieUnavailableError();
  }

  reply.setCookie(AUTH_COOKIE_NAME, cookieValue, buildAuthCookieOptions(config));
}
