import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';

const logger = new Logger('LoadEnv');

/**
 * Load the env file for the current NODE_ENV before ConfigModule validates it.
 * ENV_FILE wins when set; otherwise .env.prod / .env.local / .env, falling back to .env.
 */
export function loadEnv(cwd: string = process.cwd()): string | null {
  const nodeEnv = process.env.NODE_ENV || 'development';
  let envFile = process.env.ENV_FILE;

  if (!envFile) {
    if (nodeEnv === 'production') {
      envFile = '.env.prod';
    } else if (nodeEnv === 'development') {
      envFile = '.env.local';
    } else {
      envFile = '.env';
    }
  }

  const envPath = path.resolve(cwd, envFile);

  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    logger.log(`Loaded environment from ${envFile}`);
    return envPath;
  }

  const defaultEnvPath = path.resolve(cwd, '.env');
  if (fs.existsSync(defaultEnvPath)) {
    dotenv.config({ path: defaultEnvPath });
    logger.log('Loaded environment from .env (fallback)');
    return defaultEnvPath;
  }

  logger.warn(
    `Environment file ${envFile} not found and no .env fallback available.`,
  );
  return null;
}
