// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - JWT-Secret bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
//
// Die fachliche Auth-Konfiguration (AuthConfig) wird NICHT hier gebaut,
// sondern einmalig in auth-config.ts aus diesen Werten abgeleitet.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_HASH_POOL_SIZE } from "./hash-pool.js";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - entfernt trailing newlines + Whitespace
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
export function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch (err) {
    throw new Error(`${label} nicht lesbar: ${filePath}`, { cause: err });
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/** *_FILE gewinnt, ENV ist Fallback (lokale Entwicklung). */
export function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile) return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

export const EnvSchema = z.object({
  // Laufzeit
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  // Umgebungs-Flag fuer das Cookie (Secure nur aus, wenn exakt "development").
  // Bewusst NICHT an NODE_ENV gekoppelt: ohne Flag gilt "production".
  APP_ENV: z.string().min(1).default("production"),
  LOG_LEVEL: z.string().default("info"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),

  // JWT
  JWT_SECRET: z.string().optional(),
  JWT_SECRET_FILE: z.string().optional(),
  JWT_ACCESS_EXPIRY_HOURS: z.coerce.number().int().min(0).default(1),
  JWT_REFRESH_EXPIRY_HOURS: z.coerce.number().int().min(0).default(24),
  OTP_EXPIRY_MINUTES: z.coerce.number().int().min(0).default(5),

  // argon2id + Hash-Pool
  HASH_POOL_SIZE: z.coerce.number().int().min(1).max(64).default(DEFAULT_HASH_POOL_SIZE),
  HASH_MEMORY_COST_KIB: z.coerce.number().int().min(1024).default(2 ** 16),
  HASH_TIME_COST: z.coerce.number().int().min(2).default(3),
  HASH_PARALLELISM: z.coerce.number().int().min(1).max(16).default(1),

  STARTUP_VALIDATE_ENV: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Parst eine ENV-Quelle inkl. Secret-Resolution.
 * Exportiert, damit Tests eigene Quellen durchreichen können.
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  const raw = EnvSchema.parse({
    ...source,
    JWT_SECRET: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET,
      filePath: source.JWT_SECRET_FILE,
      label: "JWT_SECRET_FILE",
    }),
  });

  return {
    ...raw,
    REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
  };
}

export type Env = ReturnType<typeof parseEnv>;

export const env: Env = parseEnv(process.env);

// ----------------------------------------------------------------------------
// Fail-fast: nur auf Anforderung
// ----------------------------------------------------------------------------
//
// Als Bibliothek importiert, darf das Modul nicht crashen: wer buildApp() eine
// eigene ServiceConfig gibt, braucht kein JWT_SECRET. Ohne Config scheitert
// buildApp() an loadServiceConfig(). STARTUP_VALIDATE_ENV=1 erzwingt die
// Pruefung schon beim Import (typisch im Container).
//
if (process.env.STARTUP_VALIDATE_ENV === "1" && !env.JWT_SECRET) {
  throw new Error("JWT Secret fehlt: setze JWT_SECRET oder JWT_SECRET_FILE.");
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

export function logEnvSummary(
  log: (msg: string, extra?: unknown) => void = console.info,
  source: Env = env,
) {
  log("[env] configuration summary", {
    NODE_ENV: source.NODE_ENV,
    APP_ENV: source.APP_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
    REQUEST_ID_HEADER: source.REQUEST_ID_HEADER,

    JWT_SECRET: mask(source.JWT_SECRET),
    JWT_ACCESS_EXPIRY_HOURS: source.JWT_ACCESS_EXPIRY_HOURS,
    JWT_REFRESH_EXPIRY_HOURS: source.JWT_REFRESH_EXPIRY_HOURS,
    OTP_EXPIRY_MINUTES: source.OTP_EXPIRY_MINUTES,

    HASH_POOL_SIZE: source.HASH_POOL_SIZE,
    HASH_MEMORY_COST_KIB: source.HASH_MEMORY_COST_KIB,
    HASH_TIME_COST: source.HASH_TIME_COST,
    HASH_PARALLELISM: source.HASH_PARALLELISM,
  });
}
