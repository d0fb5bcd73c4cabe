// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Verifies env defaults, coercion, caching and the EnvValidationError classification.
 * Scope: serverEnv() against a replaced process.env. Does NOT build the container.
 * Invariants: process.env restored after each test; cache reset between tests.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";

describe("serverEnv", () => {
  let saved: NodeJS.ProcessEnv;

  beforeEach(() => {
    saved = process.env;
    process.env = { NODE_ENV: "test" };
    resetServerEnv();
  });

  afterEach(() => {
    process.env = saved;
    resetServerEnv();
  });

  it("applies defaults for everything optional", () => {
    const env = serverEnv();

    expect(env).toMatchObject({
      NODE_ENV: "test",
      SERVICE_NAME: "agent-relay",
      PINO_LOG_LEVEL: "info",
      LLM_BASE_URL: "https://openrouter.ai/api",
      DEFAULT_MODEL: "openai/gpt-4o-mini",
      LLM_CONNECT_TIMEOUT_MS: 15_000,
      AGENT_MAX_ITERATIONS: 10,
      SAMPLING_MAX_ITERATIONS: 10,
      TOOL_CALL_TIMEOUT_MS: 60_000,
      OAUTH_CLIENT_ID: "agent-relay",
      OAUTH_REDIRECT_URI: "http://localhost:8976/oauth/callback",
      isDev: false,
      isTest: true,
      isProd: false,
    });
    expect(env.LLM_API_KEY).toBeUndefined();
  });

  it("coerces numeric settings from strings", () => {
    Object.assign(process.env, { AGENT_MAX_ITERATIONS: "3", TOOL_CALL_TIMEOUT_MS: "2500" });

    const env = serverEnv();

    expect(env.AGENT_MAX_ITERATIONS).toBe(3);
    expect(env.TOOL_CALL_TIMEOUT_MS).toBe(2500);
  });

  it("caches until reset", () => {
    const first = serverEnv();
    process.env.DEFAULT_MODEL = "anthropic/claude-sonnet";

    expect(serverEnv()).toBe(first);
    resetServerEnv();
    expect(serverEnv().DEFAULT_MODEL).toBe("anthropic/claude-sonnet");
  });

  it("reports invalid values by variable name", () => {
    Object.assign(process.env, {
      NODE_ENV: "staging",
      LLM_BASE_URL: "not a url",
      AGENT_MAX_ITERATIONS: "0",
    });

    let caught: unknown;
    try {
      serverEnv();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EnvValidationError);
    expect(caught).toMatchObject({
      meta: {
        code: "INVALID_ENV",
        missing: [],
        invalid: ["NODE_ENV", "LLM_BASE_URL", "AGENT_MAX_ITERATIONS"],
      },
    });
  });
});
