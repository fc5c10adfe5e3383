import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  // Basic Configuration
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.coerce.number().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Database Configuration
  MONGODB_URI: z.string().url().default('mongodb://localhost:27017/quest-engine'),

  // Logging Configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Calendar day boundaries (habit resets, duty board, streaks)
  DEFAULT_TIMEZONE: z.string().default('UTC'),

  // Verification
  PHOTO_MAX_AGE_SECONDS: z.coerce.number().min(1).default(300),
  PHOTO_CLOCK_SKEW_SECONDS: z.coerce.number().min(0).default(5),

  // Duty board
  MAX_DUTY_CLAIMS_PER_DAY: z.coerce.number().min(1).default(1),
  DAILY_DUTY_COUNT: z.coerce.number().min(1).max(6).default(4),

  // Scheduled jobs
  SWEEP_INTERVAL_MS: z.coerce.number().min(1000).default(60000),
  PURGE_EXPIRED_TASKS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
});

// Parse and validate environment variables
export const config = envSchema.parse(process.env);

export type AppConfig = z.infer<typeof envSchema>;

// Derived configuration
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';

// Fixed game tables
export const QUEST_CONSTANTS = {
  BASE_TASK_EXP: 20,
  BASE_TASK_GOLD: 10,
  MOTION_WINDOW_SIZE: 5,
  MOTION_MIN_SAMPLES: 3,
  MOTION_VARIANCE_THRESHOLD: 0.001,
  MOTION_MULTIPLIER_BONUS: 0.1,
  OUT_OF_RANGE_CREDIT: 0.5,
  CLASS_AFFINITY_BONUS: 0.15,
  ROUTINE_BUNDLE_BONUS: 0.5,
  ROUTINE_MIN_HABITS: 3,
  ROUTINE_MAX_HABITS: 6,
  COOP_BONUS: 0.5,
  COOP_BOND_EXP: 25,
  CONFIRMATION_BONUS: 0.15,
  PARTNER_BOND_EXP: 15,
  STAT_BONUS_BASE: 10,
  STAT_BONUS_RATE: 0.1,
  STAT_POINTS_PER_LEVEL: 2,
  LOOT_EQUIPMENT_CHANCE: 0.065,
  LOOT_MATERIAL_CHANCE: 0.35,
  LOOT_CONSUMABLE_CHANCE: 0.175,
  LOOT_LUCK_FACTOR: 0.002,
  SHUFFLE_SEED_PRIME: 7919,
  FREE_SHUFFLES_PER_DAY: 1,
  BOND_MAX_LEVEL: 50,
  ANOMALY_RAPID_WINDOW_MS: 10 * 60 * 1000,
  ANOMALY_RAPID_COUNT: 5,
  ANOMALY_DAILY_COUNT: 20,
  ANOMALY_LATE_NIGHT_START: 2,
  ANOMALY_LATE_NIGHT_END: 5,
} as const;

export const VERIFICATION_CONSTANTS = {
  PHOTO_MAX_AGE_MS: config.PHOTO_MAX_AGE_SECONDS * 1000,
  PHOTO_CLOCK_SKEW_MS: config.PHOTO_CLOCK_SKEW_SECONDS * 1000,
} as const;

export const DUTY_CONSTANTS = {
  DAILY_DUTY_COUNT: config.DAILY_DUTY_COUNT,
  MAX_CLAIMS_PER_DAY: config.MAX_DUTY_CLAIMS_PER_DAY,
} as const;
