// 🔐 SECURITY: Centralized, strict validation of environment variables prevents runtime with missing or malformed secrets
// 🛠️ MAINTAINABILITY: Single source of truth for configuration values
// 🧪 TESTABILITY: loadConfig recebe a fonte explicitamente, testes não dependem de process.env

/**
 * @security Ensures LWA credentials, redirect URI, DATABASE_URL and SESSION_SECRET exist before boot
 * @maintainability Strongly typed config passed down to buildApp and adapters
 */

import { z } from "zod";
import { ConfigError } from "../domain/errors/AppError";

// dotenv grava "" para chaves declaradas sem valor
const optionalString = (schema: z.ZodString) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.string().regex(/^\d+$/).default("10000").transform(Number),
  LOG_LEVEL: optionalString(z.string()),

  // Login with Amazon (LWA)
  LWA_APP_ID: z.string().min(1, "LWA_APP_ID is required"),
  LWA_CLIENT_SECRET: z.string().min(1, "LWA_CLIENT_SECRET is required"),
  REDIRECT_URI: z.string().url(),
  LWA_TOKEN_URL: z.string().url().default("https://api.amazon.com/auth/o2/token"),
  TOKEN_EXCHANGE_TIMEOUT_MS: z.string().regex(/^\d+$/).default("15000").transform(Number),

  // Seller Central (consentimento)
  SPAPI_AUTHORIZATION_URL: z
    .string()
    .url()
    .default("https://sellercentral.amazon.com.mx/apps/authorize/consent"),
  SPAPI_APP_VERSION: z.string().min(1).default("beta"),
  OAUTH_STATE_TTL_MINUTES: z.string().regex(/^\d+$/).default("10").transform(Number),

  DATABASE_URL: z.string().url(),
  CREDENTIALS_ENC_KEY: optionalString(
    z.string().min(32, "CREDENTIALS_ENC_KEY must be at least 32 characters")
  ),

  // Sessão / HTTP
  SESSION_SECRET: z.string().min(16, "SESSION_SECRET must be at least 16 characters"),
  SESSION_COOKIE_SECURE: z.string().default("true").transform((v) => v === "true"),
  CORS_ORIGIN: z.string().url().default("http://localhost:3000"),
  RATE_LIMIT_MAX: z.string().regex(/^\d+$/).default("60").transform(Number),
  WEBHOOK_SIGNING_SECRET: optionalString(z.string()),
  EXPOSE_INTERNAL_ERRORS: z.string().default("true").transform((v) => v === "true"),
});

export type Env = z.infer<typeof envSchema>;

export const loadConfig = (source: Record<string, string | undefined> = process.env): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(issues);
  }
  return parsed.data;
};
