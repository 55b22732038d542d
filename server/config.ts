/**
 * APPLICATION CONFIG
 *
 * Read once from the environment at startup and passed to constructors.
 * Nothing below the server bootstrap reads process.env.
 */

import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v === "1" || v?.toLowerCase() === "true");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .optional()
  .transform((v) => v?.trim());

const envSchema = z.object({
  SEOUL_OPEN_API_KEY: z.string().trim().min(1).default("sample"),
  SEOUL_REALTIME_API_KEY: z.string().trim().min(1).default("sample"),
  SEOUL_OPEN_API_BASE_URL: z.string().url().default("http://openapi.seoul.go.kr:8088"),
  SEOUL_REALTIME_API_BASE_URL: z.string().url().default("http://swopenAPI.seoul.go.kr/api/subway"),
  UPSTREAM_TIMEOUT_MS: positiveInt(10000),
  CACHE_MAX_ENTRIES: positiveInt(500),
  AI_INTEGRATIONS_GEMINI_API_KEY: optionalText,
  AI_INTEGRATIONS_GEMINI_BASE_URL: optionalText,
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
  GEMINI_EMBEDDING_MODEL: z.string().trim().min(1).default("text-embedding-004"),
  NARRATIVE_TIMEOUT_MS: positiveInt(4000),
  RETRIEVAL_TIMEOUT_MS: positiveInt(1500),
  PORT: positiveInt(5000),
  DEBUG: booleanFlag,
});

export interface AppConfig {
  readonly catalog: { readonly baseUrl: string; readonly credential: string };
  readonly realtime: { readonly baseUrl: string; readonly credential: string };
  readonly upstreamTimeoutMs: number;
  readonly cacheMaxEntries: number;
  readonly gemini: {
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly model: string;
    readonly embeddingModel: string;
  };
  readonly narrativeTimeoutMs: number;
  readonly retrievalTimeoutMs: number;
  readonly port: number;
  readonly debug: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank values in .env mean "use the default"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim().length > 0)
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return Object.freeze({
    catalog: Object.freeze({ baseUrl: e.SEOUL_OPEN_API_BASE_URL, credential: e.SEOUL_OPEN_API_KEY }),
    realtime: Object.freeze({ baseUrl: e.SEOUL_REALTIME_API_BASE_URL, credential: e.SEOUL_REALTIME_API_KEY }),
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
    cacheMaxEntries: e.CACHE_MAX_ENTRIES,
    gemini: Object.freeze({
      apiKey: e.AI_INTEGRATIONS_GEMINI_API_KEY,
      baseUrl: e.AI_INTEGRATIONS_GEMINI_BASE_URL,
      model: e.GEMINI_MODEL,
      embeddingModel: e.GEMINI_EMBEDDING_MODEL,
    }),
    narrativeTimeoutMs: e.NARRATIVE_TIMEOUT_MS,
    retrievalTimeoutMs: e.RETRIEVAL_TIMEOUT_MS,
    port: e.PORT,
    debug: e.DEBUG,
  });
}
