/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { BoardSizeSchema } from '../../shared/validation/schemas';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  RawEnv,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './env';

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  game: z.object({
    boardSize: BoardSizeSchema,
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed config from an already-validated environment.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);

  return ConfigSchema.parse({
    nodeEnv,
    isProduction: isProduction(nodeEnv),
    isTest: isTest(nodeEnv),
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    game: {
      boardSize: env.OTHELLO_BOARD_SIZE,
    },
  });
}

/**
 * Load `.env` (outside tests), validate the environment and build the config.
 *
 * @throws Error listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  // Skip in test mode so a developer's .env cannot override test settings.
  if (env === process.env && process.env.NODE_ENV !== 'test') {
    dotenv.config();
  }

  const envResult = parseEnv(env);
  if (!envResult.success || !envResult.data) {
    const details = (envResult.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return Object.freeze(buildConfig(envResult.data));
}

export const config = loadConfig();
