import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose'] as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVELS: z
    .string()
    .default('log,warn,error')
    .transform((value) =>
      value
        .split(',')
        .map((level) => level.trim())
        .filter((level) => level.length > 0),
    )
    .pipe(z.array(z.enum(LOG_LEVELS)).nonempty()),
});

export type AppConfig = z.infer<typeof envSchema>;

let envLoaded = false;

/** Reads .env from the working directory once; real env vars win */
export function loadEnvironment(): void {
  if (envLoaded) {
    return;
  }
  loadDotenv();
  envLoaded = true;
}

/**
 * Validates the environment into typed settings.
 * @throws Error listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
