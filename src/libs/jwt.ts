// src/libs/jwt.ts
// ============================================================================
// JWT-Hilfen (JOSE)
// ----------------------------------------------------------------------------
// Design:
// - HS256 Symmetric Key (AuthConfig.secret)
// - Compact JWS: header.payload.signature, header { alg: "HS256", typ: "JWT" }
// - Payload: { id, email, typ, iat, exp } mit ganzzahligen Sekunden
// - typ im Payload trennt access / refresh / otp
// ============================================================================

import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { SigningError, TokenVerificationError } from "./errors.js";

export const JWT_ALGORITHM = "HS256";

export type ClaimsType = "access" | "refresh" | "otp";

export interface Claims {
  id: number;
  email: string;
  typ: ClaimsType;
  iat: number; // Issued-at (Unix-Sekunden)
  exp: number; // Ablauf (Unix-Sekunden)
}

const encoder = new TextEncoder();

function secretKey(secret: string): Uint8Array {
  return encoder.encode(secret);
}

// ---------------------------------------------------------------------------
// Signieren
// ---------------------------------------------------------------------------

export async function signClaims(claims: Claims, secret: string): Promise<string> {
  try {
    return await new SignJWT({
      id: claims.id,
      email: claims.email,
      typ: claims.typ,
    })
      .setProtectedHeader({ alg: JWT_ALGORITHM, typ: "JWT" })
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .sign(secretKey(secret));
  } catch (err) {
    throw new SigningError("signing_failed", { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Verifizieren + Claims erzwingen
// ---------------------------------------------------------------------------

function isClaimsType(value: unknown): value is ClaimsType {
  return value === "access" || value === "refresh" || value === "otp";
}

function toClaims(payload: JWTPayload): Claims {
  const { id, email, typ, iat, exp } = payload;

  if (typeof id !== "number" || !Number.isSafeInteger(id)) {
    throw new TokenVerificationError("id_missing");
  }
  if (typeof email !== "string" || email.length === 0) {
    throw new TokenVerificationError("email_missing");
  }
  if (!isClaimsType(typ)) {
    throw new TokenVerificationError("invalid_token_type");
  }
  if (typeof iat !== "number" || typeof exp !== "number") {
    throw new TokenVerificationError("timestamps_missing");
  }

  return { id, email, typ, iat, exp };
}

export async function verifyToken(
  token: string,
  secret: string,
  expectedType?: ClaimsType,
  opts: { currentDate?: Date; clockToleranceSec?: number } = {},
): Promise<Claims> {
  let payload: JWTPayload;
  try {
    const verified = await jwtVerify(token, secretKey(secret), {
      algorithms: [JWT_ALGORITHM],
      currentDate: opts.currentDate,
      clockTolerance: opts.clockToleranceSec ?? 0,
      requiredClaims: ["iat", "exp"],
    });
    payload = verified.payload;
  } catch (err) {
    throw new TokenVerificationError("token_invalid", { cause: err });
  }

  const claims = toClaims(payload);
  if (expectedType && claims.typ !== expectedType) {
    throw new TokenVerificationError("invalid_token_type");
  }

  return claims;
}
