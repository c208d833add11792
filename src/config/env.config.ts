import { z } from 'zod';
import dotenv from 'dotenv';
import { logger } from './logger.config';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Upper bound on increment rounds per auction before it fails with a timeout
  AUCTION_MAX_ROUNDS: z
    .string()
    .default('1000')
    .transform((val) => Number(val))
    .pipe(z.number().int('AUCTION_MAX_ROUNDS must be an integer').positive('AUCTION_MAX_ROUNDS must be positive')),
});

// Type for environment variables
export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 * Exported so tests can validate an explicit source instead of process.env.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.error('Environment validation failed', {
        issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();
