/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read by
 * the Node-side helpers (logging, catalog loading, reaction tracing) and
 * validates them.
 */

import { z } from 'zod';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1' || val === 'TRUE');

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format; file output is always JSON */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of a JSON log file */
  LOG_FILE: z.string().trim().min(1).optional(),

  /** Element catalog CSV; defaults to the bundled data/elements.csv */
  ELEMENT_CATALOG_PATH: z.string().trim().min(1).optional(),

  /** Trace every fusion and chain step at debug level */
  FUSION_RING_TRACE_REACTIONS: booleanFlag,
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}
