import { EnvConfigSchema, type EnvConfig } from '@stake-converter/schemas';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on application startup.
 *
 * @param env - Source of variables (defaults to process.env)
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);

  if (!result.success) {
    logger.error('Invalid environment variables:');
    for (const issue of result.error.issues) {
      logger.error({ variable: issue.path.join('.'), problem: issue.message });
    }
    logger.error(
      'Please ensure all required environment variables are set. See .env.example for details.'
    );
    process.exit(1);
  }

  logger.info({ nodeEnv: result.data.NODE_ENV }, 'Environment variables validated');
  return result.data;
}
