// src/modules/cookies/types.ts
// ============================================================================
// Typen fuer das Auth-Cookie
// ============================================================================

import type { CookieSerializeOptions } from "@fastify/cookie";

export const AUTH_COOKIE_NAME = "chat_auth_cookie";
export const AUTH_COOKIE_PREFIX = "chat_auth";
export const AUTH_COOKIE_DELIMITER = "____";

/** Die Attribute, die deployAuthCookie() immer setzt. */
export type AuthCookieOptions = Required<
  Pick<CookieSerializeOptions, "path" | "httpOnly" | "secure" | "maxAge">
> & {
  sameSite: "lax";
};
