// src/tests/unit/error-map.test.ts
import { describe, expect, it } from "vitest";
import { apiError, mapCredentialError } from "../../libs/error-map.js";
import {
  ConfigurationError,
  CookieUnavailableError,
  HashingError,
  InvalidHashFormatError,
  InvalidTokenKindError,
  SigningError,
  TokenVerificationError,
} from "../../libs/errors.js";

describe("apiError", () => {
  it("builds the uniform error body", () => {
    expect(apiError(404, "NOT_FOUND", "missing")).toEqual({
      status: 404,
      error: { code: "NOT_FOUND", message: "missing" },
    });
  });

  it("attaches details only when given", () => {
    expect(apiError(400, "VALIDATION_FAILED", "bad", [{ path: "email" }])).toEqual({
      status: 400,
      error: { code: "VALIDATION_FAILED", message: "bad" },
      details: [{ path: "email" }],
    });
  });
});

describe("mapCredentialError", () => {
  it("maps a broken stored hash to a plain credentials failure", () => {
    expect(mapCredentialError(new InvalidHashFormatError())).toEqual({
      status: 401,
      code: "INVALID_CREDENTIALS",
      message: "Invalid credentials.",
    });
  });

  it("maps verification failures to 401", () => {
    expect(mapCredentialError(new TokenVerificationError())).toEqual({
      status: 401,
      code: "UNAUTHORIZED",
      message: "Invalid or expired token.",
    });
  });

  it("keeps the code but hides the message for server-side failures", () => {
    const cases = [
      [new ConfigurationError("auth.jwt_secret cannot be empty"), "CONFIGURATION_INVALID"],
      [new HashingError(), "HASHING_FAILED"],
      [new InvalidTokenKindError("invalid"), "INVALID_TOKEN_KIND"],
      [new SigningError(), "SIGNING_FAILED"],
      [new CookieUnavailableError(), "COOKIE_UNAVAILABLE"],
    ] as const;

    for (const [err, code] of cases) {
      expect(mapCredentialError(err)).toEqual({
        status: 500,
        code,
        message: "Internal server error.",
      });
    }
  });

  it("treats foreign errors as INTERNAL", () => {
    expect(mapCredentialError(new Error("boom"))).toEqual({
      status: 500,
      code: "INTERNAL",
      message: "Internal server error.",
    });
  });
});

describe("error classes", () => {
  it("carry their class name", () => {
    expect(new SigningError().name).toBe("SigningError");
    expect(new InvalidTokenKindError("x").name).toBe("InvalidTokenKindError");
  });
});
