// src/libs/auth-config.ts
// ============================================================================
// AuthConfig: einmal beim Start gebaut, danach unveraenderlich
// ----------------------------------------------------------------------------
// - Quelle: normalisierte ENV (env.ts)
// - Ergebnis ist deep-frozen und wird per Referenz an alle Komponenten gereicht
// - Ablauf-Ueberlauf wird HIER geprueft, nie pro Request
// ============================================================================

import { z } from "zod";
import { env as processEnv, type Env } from "./env.js";
import { ConfigurationError } from "./errors.js";

export interface AuthConfig {
  readonly secret: string;
  readonly accessExpiryHours: number;
  readonly refreshExpiryHours: number;
  readonly otpExpiryMinutes: number;
}

export interface ServiceConfig {
  /** Umgebungs-Flag; nur "development" schaltet Secure am Cookie ab. */
  readonly environment: string;
  readonly auth: AuthConfig;
}

export const DEVELOPMENT_ENVIRONMENT = "development";

const SECONDS_PER_HOUR = 60 * 60;
const SECONDS_PER_MINUTE = 60;

// Groesster Zeitpunkt, den ein JS-Date darstellen kann (in Sekunden)
const MAX_DATE_SEC = 8.64e12;

export function hoursToSeconds(hours: number): number {
  return hours * SECONDS_PER_HOUR;
}

export function minutesToSeconds(minutes: number): number {
  return minutes * SECONDS_PER_MINUTE;
}

const expiry = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .nonnegative(`${label} cannot be negative`)
    .refine(Number.isSafeInteger, `${label} is out of range`);

export const AuthConfigSchema = z.object({
  secret: z
    .string({ required_error: "auth.jwt_secret cannot be empty" })
    .refine((value) => value.trim().length > 0, "auth.jwt_secret cannot be empty"),
  accessExpiryHours: expiry("auth.access_expiry_hours"),
  refreshExpiryHours: expiry("auth.refresh_expiry_hours"),
  otpExpiryMinutes: expiry("auth.otp_expiry_minutes"),
});

export const ServiceConfigSchema = z.object({
  // kein trim(): " development " darf nicht stillschweigend Secure abschalten
  environment: z
    .string()
    .refine((value) => value.trim().length > 0, "app.environment cannot be empty")
    .refine(
      (value) => value.trim() === value,
      "app.environment must not have surrounding whitespace",
    ),
  auth: AuthConfigSchema,
});

export type ServiceConfigInput = z.input<typeof ServiceConfigSchema>;

function assertNoTimestampOverflow(auth: AuthConfig, nowMs: number) {
  const nowSec = Math.floor(nowMs / 1000);
  const windows: Array<[string, number]> = [
    ["auth.access_expiry_hours", hoursToSeconds(auth.accessExpiryHours)],
    ["auth.refresh_expiry_hours", hoursToSeconds(auth.refreshExpiryHours)],
    ["auth.otp_expiry_minutes", minutesToSeconds(auth.otpExpiryMinutes)],
  ];

  for (const [label, seconds] of windows) {
    const exp = nowSec + seconds;
    if (!Number.isSafeInteger(exp) || exp > MAX_DATE_SEC) {
      throw new ConfigurationError(`${label} overflows the token timestamp range`);
    }
  }
}

/**
 * Validiert eine Roh-Konfiguration und liefert sie eingefroren zurueck.
 * Wirft ConfigurationError mit der ersten Verletzung.
 */
export function createServiceConfig(
  input: ServiceConfigInput,
  now: () => number = Date.now,
): ServiceConfig {
  const parsed = ServiceConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue?.message ?? "auth configuration is invalid", {
      cause: parsed.error,
    });
  }

  const auth: AuthConfig = Object.freeze({ ...parsed.data.auth });
  assertNoTimestampOverflow(auth, now());

  return Object.freeze({
    environment: parsed.data.environment,
    auth,
  });
}

/** Baut die ServiceConfig aus der (bereits geparsten) ENV. */
export function loadServiceConfig(
  source: Env = processEnv,
  now: () => number = Date.now,
): ServiceConfig {
  if (source.JWT_SECRET === undefined) {
    throw new ConfigurationError("auth section is missing: set JWT_SECRET or JWT_SECRET_FILE");
  }

  return createServiceConfig(
    {
      environment: source.APP_ENV,
      auth: {
        secret: source.JWT_SECRET,
        accessExpiryHours: source.JWT_ACCESS_EXPIRY_HOURS,
        refreshExpiryHours: source.JWT_REFRESH_EXPIRY_HOURS,
        otpExpiryMinutes: source.OTP_EXPIRY_MINUTES,
      },
    },
    now,
  );
}

export function isDevelopment(config: ServiceConfig): boolean {
  return config.environment === DEVELOPMENT_ENVIRONMENT;
}
