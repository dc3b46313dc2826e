// src/modules/tokens/types.ts
// ============================================================================
// Typen fuer die Token-Ausgabe (access / refresh / one-time-password)
// ============================================================================

import { z } from "zod";

export const TOKEN_KINDS = ["auth", "one_time_password"] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];

/**
 * Minimale Identitaet fuer die Token-Ausgabe (kein vollstaendiger User-Record).
 * id ist ein int64 aus der DB; im JWT nur als sichere JS-Ganzzahl darstellbar.
 */
export const UserProjectionSchema = z.object({
  id: z.number().int().refine(Number.isSafeInteger, "id is not a safe integer"),
  email: z.string().min(1),
});

export type UserProjection = z.infer<typeof UserProjectionSchema>;

/**
 * Ergebnis von generateTokens(): pro Aufruf ist genau ein "Track" befuellt.
 * - auth: accessToken + refreshToken + authCookie
 * - one_time_password: otpToken
 */
export interface TokenSet {
  accessToken?: string;
  refreshToken?: string;
  otpToken?: string;
  authCookie?: string;
}
