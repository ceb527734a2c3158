// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Unit tests for server env parsing, defaults and validation error reporting.
 * Scope: serverEnv() against a controlled process.env.
 * Side-effects: process.env (restored after each test)
 * Links: src/shared/env/server.ts
 * @public
 */

import { getAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";

function envError(): EnvValidationError {
  try {
    serverEnv();
  } catch (error) {
    if (error instanceof EnvValidationError) return error;
    throw error;
  }
  throw new Error("expected serverEnv() to throw");
}

describe("shared/env/server", () => {
  let savedEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    savedEnv = { ...process.env };
    resetServerEnv();
  });

  afterEach(() => {
    process.env = savedEnv;
    resetServerEnv();
  });

  it("parses the service activity", () => {
    const lower = `0x${"cd".repeat(20)}`;
    process.env.SERVICE_TOKEN_ADDRESS = lower;
    process.env.SERVICE_ACTION_ID = "7";

    const env = serverEnv();
    expect(env.SERVICE_TOKEN_ADDRESS).toBe(getAddress(lower));
    expect(env.SERVICE_ACTION_ID).toBe(7n);
    expect(env.isTestMode).toBe(true);
    expect(env.isTest).toBe(true);
  });

  it("defaults the recipient limit", () => {
    delete process.env.MAX_RECIPIENTS;
    expect(serverEnv().MAX_RECIPIENTS).toBe(10);
  });

  it("caches until reset", () => {
    const first = serverEnv();
    process.env.MAX_RECIPIENTS = "4";
    expect(serverEnv()).toBe(first);

    resetServerEnv();
    expect(serverEnv().MAX_RECIPIENTS).toBe(4);
  });

  it("reports missing keys", () => {
    delete process.env.APP_ENV;
    delete process.env.SERVICE_TOKEN_ADDRESS;

    expect(envError().meta).toEqual({
      code: "INVALID_ENV",
      missing: ["APP_ENV", "SERVICE_TOKEN_ADDRESS"],
      invalid: [],
    });
  });

  it("reports invalid keys", () => {
    process.env.APP_ENV = "staging";
    process.env.SERVICE_TOKEN_ADDRESS = "not-an-address";
    process.env.MAX_RECIPIENTS = "0";

    expect(envError().meta).toEqual({
      code: "INVALID_ENV",
      missing: [],
      invalid: ["APP_ENV", "SERVICE_TOKEN_ADDRESS", "MAX_RECIPIENTS"],
    });
  });
});
