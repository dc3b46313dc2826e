// src/modules/password/service.ts
// ============================================================================
// Passwort-Pruefung am Login (Timing-Hardening)
// ----------------------------------------------------------------------------
// - Unbekannter User (kein gespeicherter Hash): trotzdem eine volle argon2-
//   Verifikation gegen einen Dummy-Hash → Latenz verraet keine Account-Existenz
// - Kaputter gespeicherter Hash: fuer den User ein normaler Fehlschlag,
//   fuer Operatoren ein eigenes Warn-Event (Datenintegritaet)
// ============================================================================

import { randomUUID } from "node:crypto";
import type { PasswordHasher } from "../../libs/crypto.js";
import { InvalidHashFormatError } from "../../libs/errors.js";
import type { PasswordCheckDeps, PasswordCheckOutcome } from "./types.js";

/**
 * Erzeugt den Dummy-Hash beim ersten Bedarf und merkt ihn sich.
 * Schlaegt das Hashing fehl, wird beim naechsten Aufruf neu versucht.
 */
export function createDummyHashProvider(hasher: PasswordHasher): () => Promise<string> {
  let cached: Promise<string> | undefined;

  return () => {
    if (!cached) {
      cached = hasher.hash(randomUUID()).catch((err: unknown) => {
        cached = undefined;
        throw err;
      });
    }
    return cached;
  };
}

export async function checkPasswordDetailed(
  plain: string,
  storedHash: string | null | undefined,
  deps: PasswordCheckDeps,
): Promise<PasswordCheckOutcome> {
  if (!storedHash) {
    const dummy = await deps.dummyHash();
    await deps.hasher.verify(plain, dummy);
    return "unknown_user";
  }

  try {
    return (await deps.hasher.verify(plain, storedHash)) ? "match" : "mismatch";
  } catch (err) {
    if (err instanceof InvalidHashFormatError) {
      deps.log.warn({ err }, "password_hash_invalid_format");
      return "invalid_hash";
    }
    throw err;
  }
}

export async function checkPassword(
  plain: string,
  storedHash: string | null | undefined,
  deps: PasswordCheckDeps,
): Promise<boolean> {
  return (await checkPasswordDetailed(plain, storedHash, deps)) === "match";
}
