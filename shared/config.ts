import { z } from 'zod';
import { isValidTimeZone } from './lib/timezone';
import { shouldDryRun } from './lib/fcm';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  SCHEDULE_TABLE_PATH: z.string().min(1).default('data/street_sweeping_schedules.csv'),
  REMINDER_STORE_DIR: z.string().min(1).default('.data/reminders'),
  TIMEZONE: z
    .string()
    .default('America/Los_Angeles')
    .refine(isValidTimeZone, { message: 'Unknown time zone' }),
  MATCH_RADIUS_FEET: z.coerce.number().positive().default(50),
  AFTER_CLEANING_MINUTES: z.coerce.number().int().nonnegative().default(120),
  RECURRENCE_HORIZON_MONTHS: z.coerce.number().int().min(1).max(13).default(3),
  MAX_REMINDER_PREFERENCES: z.coerce.number().int().positive().default(25),
  DELIVERY_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  NOTIFY_CADENCE_MINUTES: z.coerce.number().int().positive().default(15),
  NOTIFY_DRY_RUN: z.string().optional().transform(shouldDryRun),
  NOTIFY_RUN_TOKEN: optionalString,
  FCM_SERVICE_ACCOUNT_JSON: optionalString,
  FCM_PROJECT_ID: optionalString,
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Parse service configuration from environment variables, applying defaults.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}
