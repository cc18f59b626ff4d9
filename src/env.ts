import { config as loadEnvFile } from "dotenv";
import { z } from "zod";

const preLoadedKeys = new Set(Object.keys(process.env));

loadEnvFile({ path: ".env" });
const localResult = loadEnvFile({ path: ".env.local" });

if (localResult.parsed) {
  for (const [key, value] of Object.entries(localResult.parsed)) {
    if (preLoadedKeys.has(key)) {
      continue;
    }
    process.env[key] = value;
  }
}

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  return value;
};

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());
const optionalUrl = () => z.preprocess(emptyToUndefined, z.string().url().optional());
const optionalBoolean = () =>
  z.preprocess((value) => {
    const normalized = emptyToUndefined(value);
    if (normalized === undefined) return undefined;
    if (typeof normalized === "boolean") return normalized;
    if (typeof normalized === "string") {
      if (normalized.toLowerCase() === "true") return true;
      if (normalized.toLowerCase() === "false") return false;
    }
    return normalized;
  }, z.boolean().optional());

const numberWithDefault = (name: string, fallback: number, options: { min: number; max?: number }) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }

      const parsed = Number(value);
      if (Number.isNaN(parsed) || parsed < options.min || (options.max !== undefined && parsed > options.max)) {
        const range = options.max === undefined ? `>= ${options.min}` : `between ${options.min} and ${options.max}`;
        throw new Error(`${name} must be a number ${range}`);
      }
      return parsed;
    });

const prefix = (fallback: string) =>
  z.preprocess(
    emptyToUndefined,
    z
      .string()
      .regex(/^[A-Za-z]+$/, "identifier prefixes must be letters only")
      .default(fallback)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: optionalString(),
  PORT: z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value === "") {
        return 3000;
      }

      const parsed = Number(value);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error("PORT must be a positive number");
      }
      return parsed;
    }),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  OPENAI_API_KEY: optionalString(),
  OPENAI_API_BASE: optionalUrl(),
  OPENAI_MODEL: optionalString(),
  TURSO_DATABASE_URL: optionalString(),
  TURSO_AUTH_TOKEN: optionalString(),
  STORE_AUTO_CREATE: optionalBoolean(),
  STORE_TIMEOUT_MS: numberWithDefault("STORE_TIMEOUT_MS", 5_000, { min: 1 }),
  STORE_RETRY_AFTER_MS: numberWithDefault("STORE_RETRY_AFTER_MS", 10_000, { min: 0 }),
  GENERATION_MAX_ATTEMPTS: numberWithDefault("GENERATION_MAX_ATTEMPTS", 3, { min: 1, max: 10 }),
  GENERATION_BACKOFF_MS: numberWithDefault("GENERATION_BACKOFF_MS", 500, { min: 0 }),
  GENERATION_BACKOFF_JITTER: numberWithDefault("GENERATION_BACKOFF_JITTER", 0.5, { min: 0, max: 1 }),
  GENERATION_TIMEOUT_MS: numberWithDefault("GENERATION_TIMEOUT_MS", 20_000, { min: 1 }),
  MAX_STAGE_GENERATION_CALLS: numberWithDefault("MAX_STAGE_GENERATION_CALLS", 8, { min: 1 }),
  QUOTE_PREFIX: prefix("QUOTE"),
  POLICY_PREFIX: prefix("MV"),
  SEQUENCE_INCREMENT: numberWithDefault("SEQUENCE_INCREMENT", 10, { min: 1 }),
  SEQUENCE_START: numberWithDefault("SEQUENCE_START", 100_000, { min: 1 })
});

type ParsedEnv = z.infer<typeof envSchema>;

export type AppEnv = Omit<ParsedEnv, "OPENAI_MODEL" | "TURSO_DATABASE_URL" | "STORE_AUTO_CREATE"> & {
  OPENAI_MODEL: string;
  TURSO_DATABASE_URL: string;
  STORE_AUTO_CREATE: boolean;
};

export const env = loadEnv(process.env);

export function loadEnv(source: NodeJS.ProcessEnv): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }

  if (parsed.data.QUOTE_PREFIX === parsed.data.POLICY_PREFIX) {
    throw new Error("Invalid environment configuration: QUOTE_PREFIX and POLICY_PREFIX must differ");
  }

  return {
    ...parsed.data,
    PORT: parsed.data.PORT ?? 3000,
    OPENAI_MODEL: parsed.data.OPENAI_MODEL ?? "gpt-4o-mini",
    TURSO_DATABASE_URL: parsed.data.TURSO_DATABASE_URL ?? "file:./.tmp/dev.db",
    STORE_AUTO_CREATE: parsed.data.STORE_AUTO_CREATE ?? true,
    HOST: parsed.data.HOST?.trim() || undefined
  };
}
