/**
 * Environment configuration, parsed once at startup.
 */

import { z } from "zod";

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: optionalKey,

  OPENWEATHER_API_KEY: optionalKey,
  TICKETMASTER_API_KEY: optionalKey,
  AMADEUS_API_KEY: optionalKey,
  AMADEUS_API_SECRET: optionalKey,
  GOOGLE_MAPS_API_KEY: optionalKey,
  IPINFO_API_KEY: optionalKey,
  EXCHANGERATE_API_KEY: optionalKey,

  CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(200),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_SECONDS: z.coerce.number().positive().default(1.5),
  RETRY_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export const config: AppConfig = loadConfig();
