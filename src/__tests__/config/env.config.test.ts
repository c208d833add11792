import { parseEnv } from '../../config/env.config';
import { logger } from '../../config/logger.config';
import { ValidationException } from '../../utils/exceptions';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      AUCTION_MAX_ROUNDS: 1000,
    });
  });

  it('reads the round cap as an integer', () => {
    expect(parseEnv({ NODE_ENV: 'test', AUCTION_MAX_ROUNDS: '250' }).AUCTION_MAX_ROUNDS).toBe(250);
  });

  it('rejects a non-positive round cap and logs the issue', () => {
    expect(() => parseEnv({ AUCTION_MAX_ROUNDS: '0' })).toThrow(ValidationException);
    expect(logger.error).toHaveBeenCalledWith('Environment validation failed', {
      issues: ['AUCTION_MAX_ROUNDS: AUCTION_MAX_ROUNDS must be positive'],
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow('Invalid environment configuration');
  });
});
