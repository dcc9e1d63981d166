import { z } from "zod";
import { passwordSchema } from "@shared/schema";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  DATABASE_URL: z.string().trim().min(1, "DATABASE_URL is required"),
  SECRET_KEY: z.string().min(32, "SECRET_KEY must be at least 32 characters"),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24),
  TOKEN_ISSUER: z.string().trim().min(1).default("vitals-api"),
  TOKEN_AUDIENCE: z.string().trim().min(1).default("vitals-clients"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  ASSISTANT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  ASSISTANT_MAX_RETRIES: z.coerce.number().int().min(0).max(1).default(1),
  CORS_ORIGINS: z.string().default(""),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  FIRST_SUPERUSER_EMAIL: optionalString.pipe(z.string().email().optional()),
  FIRST_SUPERUSER_PASSWORD: optionalString.pipe(passwordSchema.optional()),
});

export interface AppConfig {
  readonly env: "development" | "production" | "test";
  readonly port: number;
  readonly databaseUrl: string;
  readonly auth: {
    readonly secretKey: string;
    readonly accessTokenTtlSeconds: number;
    readonly issuer: string;
    readonly audience: string;
    readonly bcryptRounds: number;
  };
  readonly assistant: {
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly model: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
  };
  readonly corsOrigins: readonly string[];
  readonly logLevel: typeof LOG_LEVELS[number];
  readonly firstSuperuser?: {
    readonly email: string;
    readonly password: string;
  };
  readonly version: string;
}

export class ConfigError extends Error {
  constructor(readonly variables: string[]) {
    super(`Invalid configuration: ${variables.join(", ")}`);
    this.name = "ConfigError";
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const entry of Object.values(value)) {
    if (entry && typeof entry === "object" && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}

/**
 * Read and validate settings from the environment once at startup.
 * Error messages name the offending variables, never their values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = Array.from(new Set(parsed.error.issues.map((issue) => String(issue.path[0]))));
    throw new ConfigError(variables);
  }

  const values = parsed.data;
  const superuserEmail = values.FIRST_SUPERUSER_EMAIL;
  const superuserPassword = values.FIRST_SUPERUSER_PASSWORD;

  const config: AppConfig = {
    env: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    auth: {
      secretKey: values.SECRET_KEY,
      accessTokenTtlSeconds: values.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
      issuer: values.TOKEN_ISSUER,
      audience: values.TOKEN_AUDIENCE,
      bcryptRounds: values.BCRYPT_ROUNDS,
    },
    assistant: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.OPENAI_MODEL,
      timeoutMs: values.ASSISTANT_TIMEOUT_MS,
      maxRetries: values.ASSISTANT_MAX_RETRIES,
    },
    corsOrigins: values.CORS_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean),
    logLevel: values.LOG_LEVEL,
    firstSuperuser: superuserEmail && superuserPassword
      ? { email: superuserEmail.toLowerCase(), password: superuserPassword }
      : undefined,
    version: env.npm_package_version ?? "1.0.0",
  };

  return deepFreeze(config);
}
