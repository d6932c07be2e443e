import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Storage
  databasePath: z.string().min(1).optional(), // Falls back to data/sleep-tracker.db

  // Display
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
    .default('UTC'),

  // App. The logger reads LOG_LEVEL and NODE_ENV itself when the first module
  // loads; these entries reject bad values at startup.
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
});

export type Config = z.infer<typeof configSchema>;

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    databasePath: env('DATABASE_PATH'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    nodeEnv: env('NODE_ENV'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
