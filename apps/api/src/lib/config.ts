/**
 * Environment configuration
 * Centralized config with validation
 */

import { z } from 'zod';
import { DEFAULT_DATABASE_URL } from '@finledger/database';
import { currencySchema, ratePolicySchema } from '@finledger/shared/schemas';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database
  DATABASE_URL: z.string().default(DEFAULT_DATABASE_URL),

  // Summaries: currency totals are reported in, and which stored rate applies
  BASE_CURRENCY: currencySchema.default('EUR'),
  RATE_POLICY: ratePolicySchema.default('most_recent_prior'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[Config] Invalid environment:\n${problems}`);
  }
  return result.data;
}

export const config = loadConfig();

console.log(`[Config] ${config.NODE_ENV}: base currency ${config.BASE_CURRENCY}, rate policy ${config.RATE_POLICY}`);
