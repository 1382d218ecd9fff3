/**
 * Environment configuration, validated with zod.
 *
 *   LMS_STORE                 sqlite | memory | datastore (default sqlite)
 *   LMS_DB_PATH               SQLite file (default ~/.lms/lms.db)
 *   DATASTORE_EMULATOR_HOST   host:port of a local emulator
 *   DATASTORE_API_URL         REST base URL
 *   DATASTORE_PROJECT_ID      project id (falls back to GOOGLE_CLOUD_PROJECT)
 *   DATASTORE_NAMESPACE       namespace id
 *   DATASTORE_ACCESS_TOKEN    bearer token
 *   DATASTORE_TIMEOUT_MS      request timeout (default 30000)
 *   LMS_LOG_LEVEL             pino level (default info)
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigValidationError } from './errors.js';

const DEFAULT_API_URL = 'https://datastore.googleapis.com';

const configSchema = z
  .object({
    store: z.enum(['sqlite', 'memory', 'datastore']).default('sqlite'),
    sqlite: z.object({
      path: z.string().min(1),
    }),
    datastore: z.object({
      apiUrl: z.string().url().default(DEFAULT_API_URL),
      projectId: z.string().min(1).optional(),
      namespace: z.string().min(1).optional(),
      accessToken: z.string().min(1).optional(),
      timeoutMs: z.coerce.number().int().positive().default(30000),
    }),
    log: z.object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.store === 'datastore' && !cfg.datastore.projectId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['datastore', 'projectId'],
        message: 'DATASTORE_PROJECT_ID is required when LMS_STORE is "datastore"',
      });
    }
  });

export type LmsConfig = z.infer<typeof configSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function apiUrlFromEnv(env: NodeJS.ProcessEnv): string | undefined {
  const explicit = nonEmpty(env.DATASTORE_API_URL);
  if (explicit) return explicit;
  const emulator = nonEmpty(env.DATASTORE_EMULATOR_HOST);
  return emulator ? `http://${emulator}` : undefined;
}

/**
 * Load configuration from environment variables.
 *
 * @throws {ConfigValidationError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LmsConfig {
  const result = configSchema.safeParse({
    store: nonEmpty(env.LMS_STORE),
    sqlite: {
      path: nonEmpty(env.LMS_DB_PATH) ?? join(homedir(), '.lms', 'lms.db'),
    },
    datastore: {
      apiUrl: apiUrlFromEnv(env),
      projectId: nonEmpty(env.DATASTORE_PROJECT_ID) ?? nonEmpty(env.GOOGLE_CLOUD_PROJECT),
      namespace: nonEmpty(env.DATASTORE_NAMESPACE),
      accessToken: nonEmpty(env.DATASTORE_ACCESS_TOKEN),
      timeoutMs: nonEmpty(env.DATASTORE_TIMEOUT_MS),
    },
    log: {
      level: nonEmpty(env.LMS_LOG_LEVEL),
    },
  });

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
