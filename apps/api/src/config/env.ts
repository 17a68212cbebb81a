/**
 * Runtime configuration
 *
 * Read once from the environment at startup. Empty variables count as unset.
 */

import { z } from 'zod';
import { isValidCronExpression } from '../services/cron-parser';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const numberWithDefault = (schema: z.ZodNumber, fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().pipe(schema).default(fallback));

const envSchema = z.object({
  PORT: numberWithDefault(z.number().int().min(1).max(65535), 8080),
  DATABASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(emptyToUndefined, z.string().trim().default('gpt-4o-mini')),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  LOCAL_TIMEZONE: optionalString,
  DISPATCH_CRON: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .trim()
      .default('0 8 * * *')
      .refine(isValidCronExpression, { message: 'must be a 5-field cron expression that fires' })
  ),
  DISPATCH_SPACING_MINUTES: numberWithDefault(z.number().min(0), 60),
  PENDING_TTL_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().pipe(z.number().positive()).optional()
  ),
  SHUTDOWN_TIMEOUT_MS: numberWithDefault(z.number().int().min(0), 10_000),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  openai: {
    apiKey?: string;
    model: string;
  };
  twilio: {
    accountSid?: string;
    authToken?: string;
    whatsAppNumber?: string;
  };
  /** IANA zone name; undefined means the system zone */
  timeZone?: string;
  dispatch: {
    cronExpression: string;
    spacingMs: number;
  };
  pendingTtlMs?: number;
  shutdownTimeoutMs: number;
}

/**
 * Validate the environment and build the app config. Throws listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = result.data;

  let timeZone = vars.LOCAL_TIMEZONE;
  if (timeZone && !isValidTimeZone(timeZone)) {
    console.warn(`[Config] Invalid LOCAL_TIMEZONE "${timeZone}", using the system time zone`);
    timeZone = undefined;
  }

  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
    },
    twilio: {
      accountSid: vars.TWILIO_ACCOUNT_SID,
      authToken: vars.TWILIO_AUTH_TOKEN,
      whatsAppNumber: vars.TWILIO_WHATSAPP_NUMBER,
    },
    timeZone,
    dispatch: {
      cronExpression: vars.DISPATCH_CRON,
      spacingMs: vars.DISPATCH_SPACING_MINUTES * 60_000,
    },
    pendingTtlMs:
      vars.PENDING_TTL_MINUTES === undefined ? undefined : vars.PENDING_TTL_MINUTES * 60_000,
    shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
  };
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
