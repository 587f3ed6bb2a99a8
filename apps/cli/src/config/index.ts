/**
 * CLI Configuration
 *
 * Environment for the CLI process. Loaded before anything that creates a
 * logger, since the logger reads LOG_LEVEL once at import time.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { homedir, tmpdir } from 'node:os';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from the working directory, then from the monorepo root
dotenvConfig();
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

export const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  SUBBURN_CONFIG_FILE: z.string().min(1).optional(),
  SUBBURN_TEMP_DIR: z.string().min(1).optional(),
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

// Picked up by the shared logger
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = {
  logLevel: env.LOG_LEVEL,
  settingsFile: env.SUBBURN_CONFIG_FILE ?? join(homedir(), '.subburn', 'config.json'),
  tempDir: env.SUBBURN_TEMP_DIR ?? tmpdir(),
} as const;
