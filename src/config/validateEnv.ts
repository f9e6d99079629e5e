import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const booleanFlag = z
  .preprocess(blankToUndefined, z.enum(["true", "false"]).default("false"))
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(["error", "warn", "info", "debug"]).optional()),
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  POSTGRES_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  DATABASE_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  REDIS_URL: z.string().url().default("redis://localhost:6379"),
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanFlag,
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  MAIL_DEFAULT_SENDER: z.string().default("no-reply@localhost"),
  MAIL_PRODUCT_NAME: z.string().default("Notifications"),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  FIREBASE_SERVER_KEY: optionalString,
  WHATSAPP_ACCESS_TOKEN: optionalString,
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  NOTIFICATIONS_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  NOTIFICATIONS_ERROR_BACKOFF_MS: z.coerce.number().int().positive().default(60_000),
  NOTIFICATIONS_BATCH_LIMIT: z.coerce.number().int().positive().default(10),
  NOTIFICATIONS_SCAN_LIMIT: z.coerce.number().int().positive().default(200),
  NOTIFICATIONS_LEASE_MS: z.coerce.number().int().positive().default(300_000),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  QUIET_HOURS_TIMEZONE: z
    .string()
    .trim()
    .default("UTC")
    .refine(isKnownTimeZone, { message: "Expected an IANA time zone such as Europe/Berlin" }),
});

export type EnvSchema = z.infer<typeof envSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvSchema {
  return envSchema.parse(env);
}
