/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for the Node-side helpers.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import path from 'path';
import dotenv from 'dotenv';
import { parseEnv, type LogFormat, type LogLevel, type NodeEnv } from './env';

/**
 * Bundled catalog, relative to the repository root.
 */
export const DEFAULT_ELEMENT_CATALOG_PATH = path.resolve(__dirname, '../../../data/elements.csv');

export interface AppConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  isProduction: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file?: string | undefined;
  };
  catalog: {
    path: string;
  };
  reactions: {
    trace: boolean;
  };
}

/**
 * Build the typed config from an environment object.
 *
 * @throws Error listing every invalid variable
 */
export function createConfig(
  rawEnv: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success || !envResult.data) {
    const details = (envResult.errors ?? [])
      .map((error) => `  - ${error.path || 'root'}: ${error.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }
  const env = envResult.data;

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    isTest: env.NODE_ENV === 'test',
    isProduction: env.NODE_ENV === 'production',
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE,
    },
    catalog: {
      path: env.ELEMENT_CATALOG_PATH
        ? path.resolve(env.ELEMENT_CATALOG_PATH)
        : DEFAULT_ELEMENT_CATALOG_PATH,
    },
    reactions: {
      trace: env.FUSION_RING_TRACE_REACTIONS,
    },
  });
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot change test behaviour.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export const config = createConfig(process.env);
