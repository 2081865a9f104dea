import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const configSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig {
  databaseUrl: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  port: number;
}

/**
 * Read configuration from the environment (and .env).
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    databaseUrl: result.data.DATABASE_URL,
    jwtSecret: result.data.JWT_SECRET,
    jwtExpiresInSeconds: result.data.JWT_EXPIRES_IN_SECONDS,
    port: result.data.PORT,
  };
}
