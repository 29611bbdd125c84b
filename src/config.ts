/**
 * Centralized Configuration Module
 *
 * Loads the drill engine's configuration from environment variables and
 * validates it with zod. Every variable is optional; defaults favour a single
 * local process with an SQLite file in the working directory.
 *
 * | Variable                          | Default           |
 * |-----------------------------------|-------------------|
 * | PORT / HOST                       | 3000 / 0.0.0.0    |
 * | NODE_ENV                          | development       |
 * | DATABASE_PATH                     | vocab-drill.db    |
 * | TASKS_DIR                         | ./data/tasks      |
 * | SCHEDULER_COOLDOWN_MINUTES        | 720 (12 hours)    |
 * | SCHEDULER_EXPIRY_MINUTES          | 30                |
 * | SCHEDULER_REDELIVER_OUTSTANDING   | true              |
 * | SCHEDULER_SWEEP_INTERVAL_MINUTES  | 0 (disabled)      |
 * | STORE_RETRY_ATTEMPTS              | 3                 |
 * | STORE_RETRY_BASE_DELAY_MS         | 50                |
 * | STORE_RETRY_MAX_DELAY_MS          | 1000              |
 * | OPERATOR_CHAT_ID                  | unset             |
 * | LOG_LEVEL                         | info              |
 *
 * Usage:
 *   import { getConfig } from './config';
 *
 *   const config = getConfig();
 *   console.log(config.scheduler.cooldownMs);
 *
 * @module config
 */

import { z } from 'zod';
import type { LogLevel } from './logger';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Accepts the usual spellings of a boolean flag.
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Schema over the raw environment. Keys are the variable names so that
 * validation issues can be reported by variable.
 */
const environmentSchema = z.object({
  PORT: z.coerce.number().int().positive().max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).default('vocab-drill.db'),
  TASKS_DIR: z.string().min(1).default('./data/tasks'),
  SCHEDULER_COOLDOWN_MINUTES: z.coerce.number().nonnegative().default(720),
  SCHEDULER_EXPIRY_MINUTES: z.coerce.number().positive().default(30),
  SCHEDULER_REDELIVER_OUTSTANDING: booleanFlag.default('true'),
  SCHEDULER_SWEEP_INTERVAL_MINUTES: z.coerce.number().nonnegative().default(0),
  STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  STORE_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
  STORE_RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  OPERATOR_CHAT_ID: z.coerce.number().int().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

type EnvironmentInput = z.input<typeof environmentSchema>;

const ENVIRONMENT_KEYS = environmentSchema.keyof().options;

/**
 * The validated configuration, grouped by concern.
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
  };
  database: {
    path: string;
  };
  tasks: {
    dir: string;
  };
  scheduler: {
    /** A task answered correctly is not re-selected for this long */
    cooldownMs: number;
    /** An unanswered assignment older than this is treated as abandoned */
    expiryMs: number;
    /** Re-deliver the outstanding exercise instead of failing with ALREADY_AWAITING */
    redeliverOutstanding: boolean;
    /** Background expiry sweep; 0 leaves expiry to the next `next()` call */
    sweepIntervalMs: number;
  };
  store: {
    retry: RetryConfig;
  };
  operator: {
    /** Chat that receives operator notifications, if any */
    chatId: number | null;
  };
  logging: {
    level: LogLevel;
  };
}

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Picks the variables the schema knows about. Empty strings count as unset.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Partial<Record<keyof EnvironmentInput, string>> {
  const raw: Partial<Record<keyof EnvironmentInput, string>> = {};
  for (const key of ENVIRONMENT_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }
  return raw;
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error listing every offending variable.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

const MINUTE_MS = 60_000;

/**
 * Parses and validates configuration from an environment map.
 *
 * @param env - Variables to read, `process.env` by default
 * @throws {ConfigValidationError} If any variable is malformed
 *
 * @example
 * ```typescript
 * const config = loadConfig({ SCHEDULER_EXPIRY_MINUTES: '5' });
 * config.scheduler.expiryMs; // 300000
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = environmentSchema.safeParse(loadFromEnvironment(env));

  if (!parsed.success) {
    const invalidVars = parsed.error.errors.map((issue) => ({
      name: String(issue.path[0] ?? 'environment'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      invalidVars
    );
  }

  const values = parsed.data;

  if (values.STORE_RETRY_MAX_DELAY_MS < values.STORE_RETRY_BASE_DELAY_MS) {
    const reason = 'must not be smaller than STORE_RETRY_BASE_DELAY_MS';
    throw new ConfigValidationError(
      `Invalid configuration: STORE_RETRY_MAX_DELAY_MS: ${reason}`,
      [{ name: 'STORE_RETRY_MAX_DELAY_MS', reason }]
    );
  }

  return {
    server: {
      port: values.PORT,
      host: values.HOST,
      nodeEnv: values.NODE_ENV,
    },
    database: {
      path: values.DATABASE_PATH,
    },
    tasks: {
      dir: values.TASKS_DIR,
    },
    scheduler: {
      cooldownMs: values.SCHEDULER_COOLDOWN_MINUTES * MINUTE_MS,
      expiryMs: values.SCHEDULER_EXPIRY_MINUTES * MINUTE_MS,
      redeliverOutstanding: values.SCHEDULER_REDELIVER_OUTSTANDING,
      sweepIntervalMs: values.SCHEDULER_SWEEP_INTERVAL_MINUTES * MINUTE_MS,
    },
    store: {
      retry: {
        attempts: values.STORE_RETRY_ATTEMPTS,
        baseDelayMs: values.STORE_RETRY_BASE_DELAY_MS,
        maxDelayMs: values.STORE_RETRY_MAX_DELAY_MS,
      },
    },
    operator: {
      chatId: values.OPERATOR_CHAT_ID ?? null,
    },
    logging: {
      level: values.LOG_LEVEL,
    },
  };
}

// =============================================================================
// Configuration Export
// =============================================================================

let cachedConfig: Config | null = null;

/**
 * Returns the process-wide configuration, loading it from `process.env`
 * on first use.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
