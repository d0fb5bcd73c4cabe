// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup: deterministic env vars and a fetch that refuses the network.
 * Scope: Configures process.env and the global fetch. Does NOT mock specific services or ports.
 * Invariants: Unit tests never reach the network; every HTTP peer is a fake passed in as `fetch`.
 * Side-effects: process.env, global (fetch)
 * Links: vitest.config.mts, tests/_fakes
 * @public
 */

import { afterEach, beforeAll, vi } from "vitest";

import { resetContainer } from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

/**
 * Global test setup for deterministic, isolated testing.
 *
 * - Unit tests: no I/O, no time, no RNG (use _fakes)
 * - HTTP peers (LLM backend, tool servers, OAuth servers) are in-process fake fetch functions
 */

beforeAll(() => {
  Object.assign(process.env, {
    NODE_ENV: "test",
    PINO_LOG_LEVEL: "error",
    LLM_BASE_URL: "https://llm.test",
    LLM_API_KEY: "test-secret",
  });

  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request) => {
      throw new Error(`Network access in unit tests: ${String(input)}`);
    })
  );
});

afterEach(() => {
  resetServerEnv();
  resetContainer();
});
