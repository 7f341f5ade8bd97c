// src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config and CORS origins array. */
import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  // Data layer
  MONGO_URI: z.string().default("mongodb://localhost:27017/travel_dev"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("travel:dev"),

  // Auth
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(900),
  JWT_ISS: z.string().default("travel-api"),
  JWT_AUD: z.string().default("travel-clients"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

  // Payments. The key stays optional: a missing key fails payment requests, not startup.
  CHAPA_SECRET_KEY: z.string().optional(),
  CHAPA_BASE_URL: z.string().url().default("https://api.chapa.co/v1"),
  PAYMENT_CURRENCY: z.string().length(3).default("ETB"),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:3001"),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Pretty-print Zod issues then exit
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

// parsed CORS allowlist as array
export const corsOrigins = env.CORS_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);

/** Empty strings from .env count as "not configured". */
export function chapaSecretKey(): string | undefined {
  const key = env.CHAPA_SECRET_KEY?.trim();
  return key ? key : undefined;
}
