import { z } from "zod";
import type { AppConfig } from "@indexflow/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: positiveInt("20"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Storage ----------
    STORAGE_ROOT: z.string().min(1).default("./var/storage"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-large"),
    EMBEDDING_DIMENSION: positiveInt("1536"),
    OPENAI_API_KEY: z.string().optional(),
    COHERE_API_KEY: z.string().optional(),

    // ---------- OCR (Azure Document Intelligence) ----------
    AZURE_DI_ENDPOINT: z.string().url().optional(),
    AZURE_DI_API_KEY: z.string().optional(),
    AZURE_DI_API_VERSION: z.string().default("2024-11-30"),

    // ---------- Chunking ----------
    CHUNK_MAX_TOKENS: positiveInt("400"),
    CHUNK_OVERLAP: nonNegativeInt("60"),

    // ---------- Provider calls ----------
    PROVIDER_MAX_RETRIES: nonNegativeInt("3"),
    PROVIDER_TIMEOUT_MS: positiveInt("60000"),

    // ---------- Credits ----------
    RESERVATION_TTL_MINUTES: positiveInt("30"),

    // ---------- Worker ----------
    WORKER_CONCURRENCY: positiveInt("5"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_MAX_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_MAX_TOKENS",
      });
    }
    if (Boolean(env.AZURE_DI_ENDPOINT) !== Boolean(env.AZURE_DI_API_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AZURE_DI_API_KEY"],
        message: "AZURE_DI_ENDPOINT and AZURE_DI_API_KEY must be set together",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    storage: {
      root: parsed.STORAGE_ROOT,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimension: parsed.EMBEDDING_DIMENSION,
      openaiApiKey: parsed.OPENAI_API_KEY ?? "",
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
    },

    ocr: {
      endpoint: parsed.AZURE_DI_ENDPOINT ?? null,
      apiKey: parsed.AZURE_DI_API_KEY ?? null,
      apiVersion: parsed.AZURE_DI_API_VERSION,
    },

    chunking: {
      maxTokens: parsed.CHUNK_MAX_TOKENS,
      overlap: parsed.CHUNK_OVERLAP,
    },

    providers: {
      maxRetries: parsed.PROVIDER_MAX_RETRIES,
      timeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    },

    credits: {
      reservationTtlMinutes: parsed.RESERVATION_TTL_MINUTES,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
