// src/tests/helpers.ts
// Gemeinsame Test-Fixtures (guenstige argon2-Parameter, feste Uhr)

import { createServiceConfig, type ServiceConfig } from "../libs/auth-config.js";
import { PasswordHasher } from "../libs/crypto.js";
import { HashPool } from "../libs/hash-pool.js";

export const TEST_HASHING = {
  poolSize: 2,
  memoryCost: 1024,
  timeCost: 2,
  parallelism: 1,
} as const;

// 2023-11-14T22:13:20.000Z
export const FIXED_NOW_MS = 1_700_000_000_000;
export const FIXED_NOW_SEC = 1_700_000_000;

export const TEST_USER = { id: 1, email: "test@example.com" };

export function testConfig(environment = "test"): ServiceConfig {
  return createServiceConfig({
    environment,
    auth: {
      secret: "test_secret",
      accessExpiryHours: 1,
      refreshExpiryHours: 24,
      otpExpiryMinutes: 5,
    },
  });
}

export function testHasher(pool = new HashPool({ size: TEST_HASHING.poolSize })) {
  return new PasswordHasher({
    pool,
    memoryCost: TEST_HASHING.memoryCost,
    timeCost: TEST_HASHING.timeCost,
    parallelism: TEST_HASHING.parallelism,
  });
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Laesst alle anstehenden Microtasks + einen Macrotask durchlaufen. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
