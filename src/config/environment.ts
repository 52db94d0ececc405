import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/**
 * Empty values in .env files count as unset
 */
const optionalString = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().optional()
);

const optionalSnowflake = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().regex(/^\d{1,20}$/, 'must be a Discord ID').optional()
);

/**
 * Environment variable schema with validation
 */
const envSchema = z
  .object({
    // Discord
    BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
    CLIENT_ID: z.string().min(1, 'CLIENT_ID is required'),
    DEV_GUILD_ID: optionalString,

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Database
    DATABASE_URL: z.string().url('DATABASE_URL must be a valid URL'),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Backup location
    SNAPSHOT_CHANNEL_ID: optionalSnowflake,
    SNAPSHOT_MESSAGE_ID: optionalSnowflake,
    SNAPSHOT_BLOB_ID: optionalSnowflake,

    // Registry
    LEADERBOARD_SIZE: z.coerce.number().int().min(1).max(25).default(10),
  })
  .superRefine((value, ctx) => {
    const pointer = [value.SNAPSHOT_CHANNEL_ID, value.SNAPSHOT_MESSAGE_ID, value.SNAPSHOT_BLOB_ID];
    const set = pointer.filter(part => part !== undefined).length;
    if (set !== 0 && set !== pointer.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SNAPSHOT_CHANNEL_ID'],
        message: 'SNAPSHOT_CHANNEL_ID, SNAPSHOT_MESSAGE_ID and SNAPSHOT_BLOB_ID must be set together',
      });
    }
  });

/**
 * Validated environment type
 */
export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Environment validation failed:');
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join('.')}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Validated environment variables
 */
export const env: Environment = parseEnvironment(process.env);

/**
 * Development deploys guild commands and logs gateway debug output
 */
export const isDevelopment = env.NODE_ENV === 'development';

/**
 * Parse MySQL connection URL into components
 */
export function parseDatabaseUrl(url: string): {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
} {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '3306', 10),
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    database: parsed.pathname.slice(1), // Remove leading slash
  };
}
