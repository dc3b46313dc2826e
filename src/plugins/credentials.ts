// src/plugins/credentials.ts
// ============================================================================
// Credentials-Plugin (Fastify)
// ----------------------------------------------------------------------------
// Verantwortung:
// - @fastify/cookie registrieren (reply.setCookie fuer das Auth-Cookie)
// - HashPool + PasswordHasher einmal pro Instanz bauen
// - app.credentials dekorieren: issue / deployCookie / checkPassword / verify
// - onClose: HashPool leeren (laufende argon2-Jobs duerfen auslaufen)
//
// Nicht in diesem Plugin:
// - Routen (Login/Register/Logout gehoeren dem Controller)
// - User-Lookup / Persistenz
// ============================================================================

import fp from "fastify-plugin";
import cookie from "@fastify/cookie";
import type { FastifyPluginAsync, FastifyReply } from "fastify";

import type { ServiceConfig } from "../libs/auth-config.js";
import { PasswordHasher } from "../libs/crypto.js";
import { ConfigurationError } from "../libs/errors.js";
import { DEFAULT_HASH_POOL_SIZE, HashPool } from "../libs/hash-pool.js";
import { verifyToken, type Claims, type ClaimsType } from "../libs/jwt.js";
import { deployAuthCookie } from "../modules/cookies/service.js";
import { checkPassword, createDummyHashProvider } from "../modules/password/service.js";
import { generateTokens } from "../modules/tokens/service.js";
import type { TokenSet, UserProjection } from "../modules/tokens/types.js";

export interface CredentialsPluginOptions {
  config: ServiceConfig;
  hashing?: {
    poolSize?: number;
    memoryCost?: number;
    timeCost?: number;
    parallelism?: number;
  };
  /** Uhr fuer iat/exp (ms seit Epoch); Tests frieren sie ein. */
  now?: () => number;
}

export interface Credentials {
  readonly config: ServiceConfig;
  readonly hasher: PasswordHasher;
  readonly pool: HashPool;
  issue(kind: string, user: UserProjection): Promise<TokenSet>;
  deployCookie(reply: FastifyReply, cookieValue: string): void;
  checkPassword(plain: string, storedHash: string | null | undefined): Promise<boolean>;
  verify(token: string, expectedType?: ClaimsType): Promise<Claims>;
}

const credentialsPlugin: FastifyPluginAsync<CredentialsPluginOptions> = async (app, opts) => {
  if (!opts.config) {
    // fatal beim Start: ohne Auth-Konfiguration wird nichts ausgegeben
    throw new ConfigurationError("auth section is missing");
  }

  const { config } = opts;
  const pool = new HashPool({ size: opts.hashing?.poolSize ?? DEFAULT_HASH_POOL_SIZE });
  const hasher = new PasswordHasher({
    pool,
    memoryCost: opts.hashing?.memoryCost,
    timeCost: opts.hashing?.timeCost,
    parallelism: opts.hashing?.parallelism,
  });
  const dummyHash = createDummyHashProvider(hasher);

  await app.register(cookie);

  const credentials: Credentials = {
    config,
    hasher,
    pool,
    issue: (kind, user) => generateTokens(kind, user, config, { hasher, now: opts.now }),
    deployCookie: (reply, cookieValue) => deployAuthCookie(reply, cookieValue, config),
    checkPassword: (plain, storedHash) =>
      checkPassword(plain, storedHash, { hasher, dummyHash, log: app.log }),
    verify: (token, expectedType) =>
      verifyToken(token, config.auth.secret, expectedType, {
        currentDate: opts.now ? new Date(opts.now()) : undefined,
      }),
  };

  app.decorate("credentials", credentials);

  app.addHook("onClose", async () => {
    await pool.close();
    app.log.info("hash_pool_closed");
  });
};

export default fp(credentialsPlugin, {
  name: "credentials",
  fastify: "4.x",
});
