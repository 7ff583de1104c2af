/**
 * Environment configuration
 * Parsed once from process.env and validated with zod
 */

import { z } from "zod";
import type { SourceKind } from "../lib/model";
import { SOURCE_KINDS } from "../lib/model";
import { DEV_SESSION_SECRET } from "../lib/auth/session";

const DEFAULT_SOURCES: SourceKind[] = ["ai_generated", "web_search", "community_forum", "video"];

const sourceKindSchema = z.enum(SOURCE_KINDS);

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Steam
  STEAM_API_KEY: z.string().optional(),
  STEAM_OPENID_URL: z.string().url().default("https://steamcommunity.com/openid/login"),

  // OpenRouter (OpenAI-compatible chat completions)
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_MODEL: z.string().default("x-ai/grok-beta"),
  OPENROUTER_MAX_TOKENS: intFromEnv(1500),
  OPENROUTER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  // Sessions and storage
  SESSION_SECRET: z.string().min(8).default(DEV_SESSION_SECRET),
  DATABASE_PATH: z.string().default(".data/guides.db"),
  ADMIN_API_TOKEN: z.string().optional(),

  // Source quotas
  AI_REQUESTS_PER_MINUTE: intFromEnv(10),
  AI_REQUESTS_PER_DAY: intFromEnv(200),
  SEARCH_REQUESTS_PER_MINUTE: intFromEnv(5),
  SEARCH_REQUESTS_PER_DAY: intFromEnv(1000),
  SCRAPE_REQUESTS_PER_MINUTE: intFromEnv(20),
  SCRAPE_REQUESTS_PER_DAY: intFromEnv(2000),

  // Aggregation
  GUIDE_SOURCES: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (!value) return DEFAULT_SOURCES;
      const kinds = value
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
      const parsed: SourceKind[] = [];
      for (const kind of kinds) {
        const result = sourceKindSchema.safeParse(kind);
        if (!result.success) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown guide source: ${kind}` });
          return z.NEVER;
        }
        parsed.push(result.data);
      }
      return parsed;
    }),
  GUIDE_FANOUT_DEADLINE_MS: intFromEnv(20_000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }
  return cached;
}

/**
 * Parse an arbitrary env-like record (used by tests and scripts)
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  return EnvSchema.parse(env);
}

export function resetConfigForTests(): void {
  cached = null;
}

export function isProduction(): boolean {
  return getConfig().NODE_ENV === "production";
}

export function requireSteamApiKey(): string {
  const key = getConfig().STEAM_API_KEY;
  if (!key) {
    throw new Error("STEAM_API_KEY must be set to use the Steam Web API");
  }
  return key;
}
