// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env; provides lazy, cached access. Components receive explicit options; only the container calls serverEnv().
 * Invariants: All env vars validated on first access; fails fast on invalid env with EnvValidationError.
 * Side-effects: process.env
 * Notes: Lazy init keeps module import free of validation. resetServerEnv() exists for tests.
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("agent-relay"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // LLM backend (OpenAI-compatible chat completions)
  LLM_BASE_URL: z.string().url().default("https://openrouter.ai/api"),
  LLM_API_KEY: z.string().min(1).optional(),
  DEFAULT_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  SYSTEM_PROMPT: z
    .string()
    .default(
      "You are a helpful assistant. Use the available tools when they help answer the user."
    ),
  LLM_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Loop bounds
  AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
  SAMPLING_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),

  // Tool servers
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  // OAuth (public client, PKCE)
  OAUTH_CLIENT_ID: z.string().min(1).default("agent-relay"),
  OAUTH_REDIRECT_URI: z
    .string()
    .url()
    .default("http://localhost:8976/oauth/callback"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // invalid_type is what zod reports for an absent required var
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/** Drop the cached env so the next serverEnv() call re-validates. */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
