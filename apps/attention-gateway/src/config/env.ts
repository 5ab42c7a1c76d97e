import {
  DEFAULT_AGUI_TIMEOUT_MS,
  DEFAULT_ATTENTION_CONFIG,
  type AttentionConfig,
} from '@attention-gw/core';
import { z } from 'zod';

function integer(name: string, fallback: number, { allowZero = false } = {}) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed < 0 || (!allowZero && parsed === 0)) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

function decimal(name: string, fallback: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseFloat(value);
      if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

/** Comma separated list, trimmed and lower-cased, empties dropped. */
function list() {
  return z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0),
    );
}

const defaults = DEFAULT_ATTENTION_CONFIG;

/**
 * Zod schema describing the environment contract for the gateway: HTTP and
 * store settings, collaborator endpoints and every attention tunable.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: integer('PORT', 8080),
  LOG_LEVEL: z.string().optional(),
  SESSION_STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),
  SESSION_STATE_TTL_SECONDS: integer('SESSION_STATE_TTL_SECONDS', 30 * 24 * 60 * 60),
  AGUI_BASE_URL: z.string().url('AGUI_BASE_URL must be a valid URL').optional(),
  AGUI_API_KEY: z.string().min(1).optional(),
  AGUI_TIMEOUT_MS: integer('AGUI_TIMEOUT_MS', DEFAULT_AGUI_TIMEOUT_MS, { allowZero: true }),
  CLASSIFIER_URL: z.string().url('CLASSIFIER_URL must be a valid URL').optional(),
  CLASSIFIER_API_KEY: z.string().min(1).optional(),
  CLASSIFIER_TIMEOUT_MS: integer('CLASSIFIER_TIMEOUT_MS', defaults.classifierTimeoutMs, {
    allowZero: true,
  }),
  CLASSIFIER_FAILURE_DEFAULT: z
    .string()
    .optional()
    .transform((value) => (value ? value.toUpperCase() : defaults.classifierFailureDefault))
    .pipe(z.enum(['REPLY', 'WAIT', 'IGNORE'])),
  REPLY_CALLBACK_URL: z.string().url('REPLY_CALLBACK_URL must be a valid URL').optional(),
  REPLY_CALLBACK_TIMEOUT_MS: integer('REPLY_CALLBACK_TIMEOUT_MS', 10_000),
  INGEST_SIGNING_SECRET: z.string().min(1).optional(),
  INGEST_RATE_LIMIT_MAX: integer('INGEST_RATE_LIMIT_MAX', 120),
  INGEST_RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
  BOT_ID: z.string().min(1).optional(),
  BOT_NICKNAMES: list(),
  COMMAND_WORDS: list(),
  SHORTCUT_PHRASES: list(),
  ENERGY_FLOOR: decimal('ENERGY_FLOOR', defaults.energyFloor, 0, 1),
  ENERGY_COST_PER_CYCLE: decimal('ENERGY_COST_PER_CYCLE', defaults.energyCostPerCycle, 0, 1),
  ENERGY_DAILY_RECOVERY: decimal('ENERGY_DAILY_RECOVERY', defaults.energyDailyRecovery, 0, 1),
  ENERGY_RECOVERY_SILENCE_MINUTES: integer(
    'ENERGY_RECOVERY_SILENCE_MINUTES',
    defaults.energyRecoverySilenceMinutes,
  ),
  ENERGY_RECOVERY_STEP: decimal('ENERGY_RECOVERY_STEP', defaults.energyRecoveryStep, 0, 1),
  ENERGY_RECOVERY_CEILING: decimal('ENERGY_RECOVERY_CEILING', defaults.energyRecoveryCeiling, 0, 1),
  MOOD_DECAY_INTERVAL_SECONDS: integer(
    'MOOD_DECAY_INTERVAL_SECONDS',
    defaults.moodDecayIntervalSeconds,
  ),
  MOOD_DECAY_STEP: decimal('MOOD_DECAY_STEP', defaults.moodDecayStep, 0, 1),
  DEBOUNCE_QUIET_PERIOD_SECONDS: decimal(
    'DEBOUNCE_QUIET_PERIOD_SECONDS',
    defaults.debounceQuietPeriodSeconds,
    0,
    3600,
  ),
  DEBOUNCE_MAX_WINDOW_SECONDS: decimal(
    'DEBOUNCE_MAX_WINDOW_SECONDS',
    defaults.debounceMaxWindowSeconds,
    0,
    3600,
  ),
  BACKGROUND_POOL_CAPACITY: integer('BACKGROUND_POOL_CAPACITY', defaults.backgroundPoolCapacity),
  AMBIENT_CONTEXT_CAPACITY: integer('AMBIENT_CONTEXT_CAPACITY', defaults.ambientContextCapacity, {
    allowZero: true,
  }),
  EVICTION_TTL_SECONDS: integer('EVICTION_TTL_SECONDS', defaults.evictionTtlSeconds),
  MAINTENANCE_INTERVAL_SECONDS: integer(
    'MAINTENANCE_INTERVAL_SECONDS',
    defaults.maintenanceIntervalSeconds,
  ),
});

export type SessionStoreDriver = z.infer<typeof envSchema>['SESSION_STORE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  session: {
    driver: SessionStoreDriver;
    redisUrl?: string;
    ttlSeconds: number;
  };
  agui: {
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
  };
  classifier: {
    url?: string;
    apiKey?: string;
  };
  replies: {
    callbackUrl?: string;
    timeoutMs: number;
  };
  ingest: {
    signingSecret?: string;
    botId?: string;
    botNicknames: string[];
    commandWords: string[];
  };
  attention: AttentionConfig;
  logLevel?: string;
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a strongly typed settings object or throwing the first problem
 * found.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const env = result.data;

  if (env.DEBOUNCE_MAX_WINDOW_SECONDS < env.DEBOUNCE_QUIET_PERIOD_SECONDS) {
    throw new Error('DEBOUNCE_MAX_WINDOW_SECONDS must not be shorter than the quiet period');
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    rateLimit: {
      max: env.INGEST_RATE_LIMIT_MAX,
      timeWindow: env.INGEST_RATE_LIMIT_WINDOW,
    },
    session: {
      driver: env.SESSION_STORE_DRIVER,
      redisUrl: env.REDIS_URL,
      ttlSeconds: env.SESSION_STATE_TTL_SECONDS,
    },
    agui: {
      baseUrl: env.AGUI_BASE_URL,
      apiKey: env.AGUI_API_KEY,
      timeoutMs: env.AGUI_TIMEOUT_MS,
    },
    classifier: {
      url: env.CLASSIFIER_URL,
      apiKey: env.CLASSIFIER_API_KEY,
    },
    replies: {
      callbackUrl: env.REPLY_CALLBACK_URL,
      timeoutMs: env.REPLY_CALLBACK_TIMEOUT_MS,
    },
    ingest: {
      signingSecret: env.INGEST_SIGNING_SECRET,
      botId: env.BOT_ID,
      botNicknames: env.BOT_NICKNAMES,
      commandWords: env.COMMAND_WORDS,
    },
    attention: {
      energyFloor: env.ENERGY_FLOOR,
      energyCostPerCycle: env.ENERGY_COST_PER_CYCLE,
      energyDailyRecovery: env.ENERGY_DAILY_RECOVERY,
      energyRecoverySilenceMinutes: env.ENERGY_RECOVERY_SILENCE_MINUTES,
      energyRecoveryStep: env.ENERGY_RECOVERY_STEP,
      energyRecoveryCeiling: env.ENERGY_RECOVERY_CEILING,
      moodDecayIntervalSeconds: env.MOOD_DECAY_INTERVAL_SECONDS,
      moodDecayStep: env.MOOD_DECAY_STEP,
      debounceQuietPeriodSeconds: env.DEBOUNCE_QUIET_PERIOD_SECONDS,
      debounceMaxWindowSeconds: env.DEBOUNCE_MAX_WINDOW_SECONDS,
      backgroundPoolCapacity: env.BACKGROUND_POOL_CAPACITY,
      ambientContextCapacity: env.AMBIENT_CONTEXT_CAPACITY,
      evictionTtlSeconds: env.EVICTION_TTL_SECONDS,
      maintenanceIntervalSeconds: env.MAINTENANCE_INTERVAL_SECONDS,
      classifierFailureDefault: env.CLASSIFIER_FAILURE_DEFAULT,
      classifierTimeoutMs: env.CLASSIFIER_TIMEOUT_MS,
      shortcutPhrases: env.SHORTCUT_PHRASES,
    },
    logLevel: env.LOG_LEVEL,
  };
}
