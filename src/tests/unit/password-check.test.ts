// src/tests/unit/password-check.test.ts
import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { HashingError } from "../../libs/errors.js";
import { HashPool } from "../../libs/hash-pool.js";
import {
  checkPassword,
  checkPasswordDetailed,
  createDummyHashProvider,
} from "../../modules/password/service.js";
import type { PasswordCheckDeps } from "../../modules/password/types.js";
import { testHasher } from "../helpers.js";

function makeDeps(hasher = testHasher()): PasswordCheckDeps {
  return {
    hasher,
    dummyHash: createDummyHashProvider(hasher),
    log: Fastify({ logger: false }).log,
  };
}

describe("createDummyHashProvider", () => {
  it("hashes once and reuses the result", async () => {
    const hasher = testHasher();
    const hash = vi.spyOn(hasher, "hash");
    const dummy = createDummyHashProvider(hasher);

    const [a, b] = await Promise.all([dummy(), dummy()]);
    const c = await dummy();

    expect(hash).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(c).toBe(a);
  });

  it("retries after a failed attempt", async () => {
    const hasher = testHasher();
    const hash = vi
      .spyOn(hasher, "hash")
      .mockRejectedValueOnce(new HashingError())
      .mockResolvedValueOnce("$argon2id$v=19$m=1024,t=2,p=1$c2FsdHNhbHRzYWx0$ZGlnZXN0");
    const dummy = createDummyHashProvider(hasher);

    await expect(dummy()).rejects.toBeInstanceOf(HashingError);
    await expect(dummy()).resolves.toBe(
      "$argon2id$v=19$m=1024,t=2,p=1$c2FsdHNhbHRzYWx0$ZGlnZXN0",
    );
    expect(hash).toHaveBeenCalledTimes(2);
  });
});

describe("checkPasswordDetailed", () => {
  it("returns match / mismatch against a stored hash", async () => {
    const deps = makeDeps();
    const stored = await deps.hasher.hash("correct horse");

    await expect(checkPasswordDetailed("correct horse", stored, deps)).resolves.toBe("match");
    await expect(checkPasswordDetailed("wrong", stored, deps)).resolves.toBe("mismatch");
  });

  it("still runs a full verification when the user is unknown", async () => {
    const deps = makeDeps();
    const verify = vi.spyOn(deps.hasher, "verify");

    await expect(checkPasswordDetailed("anything", null, deps)).resolves.toBe("unknown_user");
    await expect(checkPasswordDetailed("anything", "", deps)).resolves.toBe("unknown_user");

    expect(verify).toHaveBeenCalledTimes(2);
    expect(verify.mock.calls[0][0]).toBe("anything");
    expect(verify.mock.calls[0][1]).toBe(await deps.dummyHash());
  });

  it("reports a malformed stored hash and logs a warning", async () => {
    const deps = makeDeps();
    const warn = vi.spyOn(deps.log, "warn");

    await expect(checkPasswordDetailed("pw", "plaintext-password", deps)).resolves.toBe(
      "invalid_hash",
    );
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toBe("password_hash_invalid_format");
  });

  it("propagates hashing infrastructure failures", async () => {
    const pool = new HashPool({ size: 1 });
    const deps = makeDeps(testHasher(pool));
    const stored = await deps.hasher.hash("pw");
    await pool.close();

    await expect(checkPasswordDetailed("pw", stored, deps)).rejects.toBeInstanceOf(HashingError);
  });
});

describe("checkPassword", () => {
  it("is true only for a match", async () => {
    const deps = makeDeps();
    const stored = await deps.hasher.hash("pw");

    await expect(checkPassword("pw", stored, deps)).resolves.toBe(true);
    await expect(checkPassword("nope", stored, deps)).resolves.toBe(false);
    await expect(checkPassword("pw", undefined, deps)).resolves.toBe(false);
    await expect(checkPassword("pw", "broken", deps)).resolves.toBe(false);
  });
});
