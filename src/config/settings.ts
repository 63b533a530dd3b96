/**
 * Configuration settings for Harbor Club Manager.
 *
 * This module centralizes all application settings and provides
 * a clean interface for configuration management with Zod validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

const TEST_SESSION_SECRET = 'test-secret';

/**
 * Environment flags arrive as strings; "false" and "0" must stay false.
 */
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform(value =>
    typeof value === 'boolean' ? value : ['1', 'true', 'yes', 'on'].includes(value.toLowerCase()),
  );

/**
 * Environment variable schema validation
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    DATABASE_PATH: z.string().min(1).default('harbor_club.db'),
    MEDIA_ROOT: z.string().min(1).default('media'),
    SERVER_HOST: z.string().min(1).default('0.0.0.0'),
    SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    SESSION_SECRET: z.string().optional(),
    SESSION_MAX_AGE_HOURS: z.coerce.number().positive().default(12),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
    LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']).default('INFO'),
    LOG_TO_FILE: booleanFlag.default(false),
    LOG_COLORS: booleanFlag.optional(),
    FORCE_COLOR: booleanFlag.optional(),
    NO_COLOR: booleanFlag.optional(),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    CORS_ORIGIN: z.string().optional(),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'test' && !env.SESSION_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_SECRET'],
        message: 'SESSION_SECRET is required outside of test mode',
      });
    }
  });

type EnvConfig = z.infer<typeof envSchema>;

function loadEnvironment(): EnvConfig {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Invalid environment configuration:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return result.data;
}

/**
 * Validated environment configuration
 */
const envConfig = loadEnvironment();

/**
 * Application settings class with validation and utility methods
 */
export class Settings {
  // Runtime
  static readonly NODE_ENV = envConfig.NODE_ENV;
  static readonly APP_NAME = 'harbor-club-manager';

  // Server Configuration
  static readonly SERVER_HOST = envConfig.SERVER_HOST;
  static readonly SERVER_PORT = envConfig.SERVER_PORT;
  static readonly RATE_LIMIT_MAX = envConfig.RATE_LIMIT_MAX;
  static readonly CORS_ORIGIN = envConfig.CORS_ORIGIN;

  // Database Configuration
  static readonly DATABASE_PATH = envConfig.DATABASE_PATH;

  // Document storage
  static readonly MEDIA_ROOT = envConfig.MEDIA_ROOT;
  static readonly MAX_UPLOAD_BYTES = Math.round(envConfig.MAX_UPLOAD_MB * 1024 * 1024);

  // Authentication
  static readonly SESSION_SECRET = envConfig.SESSION_SECRET ?? TEST_SESSION_SECRET;
  static readonly SESSION_MAX_AGE_HOURS = envConfig.SESSION_MAX_AGE_HOURS;
  static readonly SESSION_COOKIE_NAME = 'session';
  static readonly BCRYPT_ROUNDS = envConfig.BCRYPT_ROUNDS;

  // Calendar
  static readonly DEFAULT_CATEGORY_COLOR = '#007bff';
  static readonly EVENTS_PER_PAGE = 20;
  static readonly ACTION_LOGS_PER_PAGE = 50;
  static readonly AUTOCOMPLETE_MIN_LENGTH = 2;
  static readonly AUTOCOMPLETE_LIMIT = 20;
  static readonly DASHBOARD_RECENT_LIMIT = 5;

  // Logging Configuration
  static readonly LOG_LEVEL = envConfig.LOG_LEVEL;
  static readonly LOG_TO_FILE = envConfig.LOG_TO_FILE;
  static readonly LOG_COLORS = envConfig.LOG_COLORS;
  static readonly FORCE_COLOR = envConfig.FORCE_COLOR;
  static readonly NO_COLOR = envConfig.NO_COLOR;

  static isProduction(): boolean {
    return this.NODE_ENV === 'production';
  }

  static isTestMode(): boolean {
    return this.NODE_ENV === 'test';
  }

  /**
   * Session lifetime in seconds, as used for both the token and the cookie
   */
  static getSessionMaxAgeSeconds(): number {
    return Math.round(this.SESSION_MAX_AGE_HOURS * 3600);
  }

  /**
   * Log the effective configuration (never the secrets)
   */
  static logConfiguration(logger: { info: (message: string) => void }): void {
    logger.info('=== Harbor Club Manager Configuration ===');
    logger.info(`Environment: ${this.NODE_ENV}`);
    logger.info(`Database: SQLite (${this.DATABASE_PATH})`);
    logger.info(`Media root: ${this.MEDIA_ROOT}`);
    logger.info(`Server: ${this.SERVER_HOST}:${this.SERVER_PORT}`);
    logger.info(`Session lifetime: ${this.SESSION_MAX_AGE_HOURS} hour(s)`);
    logger.info(`Rate limit: ${this.RATE_LIMIT_MAX} requests/minute`);
    logger.info(`Max upload size: ${Math.round(this.MAX_UPLOAD_BYTES / (1024 * 1024))}MB`);
    logger.info(`Log level: ${this.LOG_LEVEL}`);
    logger.info('==========================================');
  }
}

export default Settings;
