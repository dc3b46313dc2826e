// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - app.credentials: vom credentials-Plugin dekoriert (plugins/credentials.ts)
// - request.requestStartedAtNs: Startzeit fuer das Response-Log (app.ts)
//
// Sollte KEINE Runtime-Imports ausloesen (nur Type-Imports).
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyInstance {
    credentials: import("../plugins/credentials.js").Credentials;
  }

  interface FastifyRequest {
    requestStartedAtNs?: bigint;
  }
}
