// src/modules/password/types.ts
// ============================================================================
// Typen fuer die Passwort-Pruefung am Login
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import type { PasswordHasher } from "../../libs/crypto.js";

export interface PasswordCheckDeps {
  hasher: PasswordHasher;
  /** Liefert einen Hash mit denselben Kostenparametern wie echte Hashes. */
  dummyHash: () => Promise<string>;
  log: FastifyBaseLogger;
}

export type PasswordCheckOutcome = "match" | "mismatch" | "unknown_user" | "invalid_hash";
