import { z } from 'zod';
import { ValidationError } from '../../domain/errors/ValidationError';

const TIME_OF_DAY = /^\d{1,2}:\d{2}$/;

/**
 * Treats empty strings as "not set" so `FOO=` in a .env file falls back to the default
 */
function emptyAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type -- inferred zod schema type
function integer(defaultValue: number, min: number, max: number) {
  return z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(min).max(max).default(defaultValue)
  );
}

/**
 * Environment schema
 *
 * Single source of truth for every setting the service reads from the
 * environment. Unknown variables are ignored; known ones are coerced and
 * range-checked, falling back to the defaults below when unset.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const EnvSchema = z.object({
  NODE_ENV: z.preprocess(
    emptyAsUndefined,
    z.enum(['development', 'production', 'test']).default('development')
  ),
  PORT: integer(3000, 1, 65535),
  HOST: z.preprocess(emptyAsUndefined, z.string().default('0.0.0.0')),
  DATABASE_PATH: z.preprocess(emptyAsUndefined, z.string().default('./data/emotion-diary.db')),

  // Delivery
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_API_BASE_URL: z.preprocess(
    emptyAsUndefined,
    z.string().url().default('https://api.telegram.org')
  ),
  DELIVERY_TIMEOUT_MS: integer(10000, 100, 120000),
  DELIVERY_RETRIES: integer(0, 0, 5),

  // Administration
  ADMIN_API_TOKEN: optionalString,

  // Trial
  TRIAL_DURATION_DAYS: integer(14, 1, 365),

  // Scheduler
  SCHEDULER_TICK_INTERVAL_MS: integer(60000, 1000, 3600000),
  SCHEDULER_SEND_DELAY_MS: integer(500, 0, 10000),
  SLOT_MATCH_WINDOW_MINUTES: integer(1, 1, 59),
  WEEKLY_MOTIVATION_WEEKDAY: integer(7, 1, 7),
  WEEKLY_MOTIVATION_TIME: z.preprocess(
    emptyAsUndefined,
    z.string().regex(TIME_OF_DAY, 'WEEKLY_MOTIVATION_TIME must be in HH:MM format').default('10:00')
  ),
  WEEKLY_REFLECTION_WEEKDAY: integer(7, 1, 7),
  WEEKLY_REFLECTION_TIME: z.preprocess(
    emptyAsUndefined,
    z.string().regex(TIME_OF_DAY, 'WEEKLY_REFLECTION_TIME must be in HH:MM format').default('17:00')
  ),
  ACTIVE_INTERACTION_QUIET_MINUTES: integer(15, 0, 1440),
  NOTIFICATION_SLOTS_FILE: optionalString,
  DEDUP_LEDGER: z.preprocess(emptyAsUndefined, z.enum(['sqlite', 'memory']).default('sqlite')),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Typed application configuration derived from the environment
 */
export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  host: string;
  databasePath: string;
  telegram: {
    botToken: string | undefined;
    apiBaseUrl: string;
  };
  delivery: {
    timeoutMs: number;
    retries: number;
  };
  adminApiToken: string | undefined;
  trialDurationDays: number;
  scheduler: {
    tickIntervalMs: number;
    sendDelayMs: number;
    slotMatchWindowMinutes: number;
    weeklyMotivationWeekday: number;
    weeklyMotivationTime: string;
    weeklyReflectionWeekday: number;
    weeklyReflectionTime: string;
    quietPeriodMinutes: number;
    slotsFile: string | undefined;
    dedupLedger: Env['DEDUP_LEDGER'];
  };
}

/**
 * Parses and validates configuration
 *
 * @param env - Variables to read (defaults to process.env)
 * @returns Typed configuration
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${details.map((d) => d.variable).join(', ')}`,
      details
    );
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    databasePath: parsed.DATABASE_PATH,
    telegram: {
      botToken: parsed.TELEGRAM_BOT_TOKEN,
      apiBaseUrl: parsed.TELEGRAM_API_BASE_URL,
    },
    delivery: {
      timeoutMs: parsed.DELIVERY_TIMEOUT_MS,
      retries: parsed.DELIVERY_RETRIES,
    },
    adminApiToken: parsed.ADMIN_API_TOKEN,
    trialDurationDays: parsed.TRIAL_DURATION_DAYS,
    scheduler: {
      tickIntervalMs: parsed.SCHEDULER_TICK_INTERVAL_MS,
      sendDelayMs: parsed.SCHEDULER_SEND_DELAY_MS,
      slotMatchWindowMinutes: parsed.SLOT_MATCH_WINDOW_MINUTES,
      weeklyMotivationWeekday: parsed.WEEKLY_MOTIVATION_WEEKDAY,
      weeklyMotivationTime: parsed.WEEKLY_MOTIVATION_TIME,
      weeklyReflectionWeekday: parsed.WEEKLY_REFLECTION_WEEKDAY,
      weeklyReflectionTime: parsed.WEEKLY_REFLECTION_TIME,
      quietPeriodMinutes: parsed.ACTIVE_INTERACTION_QUIET_MINUTES,
      slotsFile: parsed.NOTIFICATION_SLOTS_FILE,
      dedupLedger: parsed.DEDUP_LEDGER,
    },
  };
}
