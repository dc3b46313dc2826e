// src/app.ts
// ============================================================================
// Credential-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (pino-Logger, Request-IDs, Security-Header)
//  - Credentials-Plugin (Hashing, Token-Ausgabe, Auth-Cookie)
//  - /health mit HashPool-Auslastung
//  - Error-/NotFound-Handler auf Basis von error-map.ts
//
// Kein listen(): der Prozessstart gehoert dem einbettenden Service.
// ============================================================================

import Fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import { randomUUID } from "node:crypto";

import credentialsPlugin, { type CredentialsPluginOptions } from "./plugins/credentials.js";
import { loadServiceConfig, type ServiceConfig } from "./libs/auth-config.js";
import { env, logEnvSummary } from "./libs/env.js";
import { apiError, mapCredentialError } from "./libs/error-map.js";
import { isCredentialError } from "./libs/errors.js";

// Optionale Start-Parameter für Tests / spezielle Umgebungen
export type AppOptions = FastifyServerOptions & {
  config?: ServiceConfig;
  hashing?: CredentialsPluginOptions["hashing"];
  now?: () => number;
};

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

async function registerHealthRoutes(app: FastifyInstance) {
  app.get("/health", async () => ({
    status: "ok",
    env: app.credentials.config.environment,
    hashPool: app.credentials.pool.stats(),
    ts: new Date().toISOString(),
  }));
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    config = loadServiceConfig(),
    hashing = {
      poolSize: env.HASH_POOL_SIZE,
      memoryCost: env.HASH_MEMORY_COST_KIB,
      timeCost: env.HASH_TIME_COST,
      parallelism: env.HASH_PARALLELISM,
    },
    now,
    logger = { level: env.LOG_LEVEL },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    ...rest,
  });

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers for auth endpoints.
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("Cache-Control", "no-store");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationMs = Number(process.hrtime.bigint() - started) / 1_000_000;
    request.log.debug(
      { statusCode: reply.statusCode, durationMs },
      "request_completed",
    );
  });

  logEnvSummary((msg, extra) => app.log.debug({ summary: extra }, msg));

  await app.register(credentialsPlugin, { config, hashing, now });

  await registerHealthRoutes(app);

  // Error-/NotFound-Handler
  app.setErrorHandler((err, req, reply) => {
    if (isCredentialError(err)) {
      const mapped = mapCredentialError(err);
      const level = mapped.status >= 500 ? "error" : "warn";
      req.log[level]({ err, code: err.code }, "credential_error");
      return reply
        .code(mapped.status)
        .type("application/json")
        .send(apiError(mapped.status, mapped.code, mapped.message));
    }

    req.log.error({ err }, "unhandled_error");

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 401
          ? "UNAUTHORIZED"
          : status === 404
            ? "NOT_FOUND"
            : "INTERNAL";
    const message = status >= 500 ? "Internal server error." : err.message;

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, code, message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  return app;
}
