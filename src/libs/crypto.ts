// src/libs/crypto.ts
// ============================================================================
// Passwort-Hashing & -Verifikation (argon2id)
// ----------------------------------------------------------------------------
// - argon2id, 16 Byte Zufalls-Salt pro Aufruf (argon2-Default)
// - Ergebnis: selbstbeschreibender PHC-String
//     $argon2id$v=19$m=65536,t=3,p=1$<salt>$<digest>
// - Alle Aufrufe laufen ueber den HashPool (begrenzte Parallelitaet)
// - verify(): kaputter Hash → InvalidHashFormatError, Nicht-Treffer → false
// ============================================================================

import argon2 from "argon2";
import { HashingError, InvalidHashFormatError } from "./errors.js";
import type { HashPool } from "./hash-pool.js";

export const PHC_ARGON2_PATTERN =
  /^\$argon2(?:id|i|d)\$(?:v=\d+\$)?m=\d+,t=\d+,p=\d+(?:,[a-z]+=[A-Za-z0-9+/]*)*\$[A-Za-z0-9+/]+\$[A-Za-z0-9+/]+$/;

export function isArgon2Hash(value: string): boolean {
  return PHC_ARGON2_PATTERN.test(value);
}

export interface PasswordHasherOptions {
  pool: HashPool;
  /** KiB */
  memoryCost?: number;
  timeCost?: number;
  parallelism?: number;
}

export class PasswordHasher {
  private readonly pool: HashPool;
  private readonly hashOptions: {
    type: typeof argon2.argon2id;
    memoryCost: number;
    timeCost: number;
    parallelism: number;
  };

  constructor(opts: PasswordHasherOptions) {
    this.pool = opts.pool;
    this.hashOptions = {
      type: argon2.argon2id,
      memoryCost: opts.memoryCost ?? 2 ** 16, // 64 MiB
      timeCost: opts.timeCost ?? 3,
      parallelism: opts.parallelism ?? 1,
    };
  }

  async hash(plain: string): Promise<string> {
    try {
      return await this.pool.run(() => argon2.hash(plain, this.hashOptions));
    } catch (err) {
      if (err instanceof HashingError) throw err;
      throw new HashingError("hashing_failed", { cause: err });
    }
  }

  async verify(plain: string, storedHash: string): Promise<boolean> {
    if (!isArgon2Hash(storedHash)) {
      throw new InvalidHashFormatError();
    }

    try {
      return await this.pool.run(() => argon2.verify(storedHash, plain));
    } catch (err) {
      if (err instanceof HashingError) throw err;
      // argon2 lehnt Parameter/Encoding ab, die das Muster noch durchlaesst
      throw new InvalidHashFormatError({ cause: err });
    }
  }
}
