import { z } from 'zod';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type AppLogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  RATE_FEED_PATH: z.string().min(1).default('./data/usd_rub.dat'),
  TRADE_CURRENCY: z.string().regex(/^[A-Z]{3}$/).default('USD'),
  REPORTING_CURRENCY: z.string().regex(/^[A-Z]{3}$/).default('RUB'),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Validator for ConfigModule.forRoot - receives the merged environment.
 * @throws ConfigValidationError listing every issue
 */
export function validateConfig(config: Record<string, unknown>): AppConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues);
  }
  return result.data;
}

/** Nest log levels enabled by a LOG_LEVEL threshold */
export function enabledLogLevels(threshold: AppLogLevel): AppLogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}
