/**
 * Environment configuration of the explorer service.
 *
 * Every variable is optional; invalid values fail startup with a
 * ConfigError listing all problems at once.
 */

import { z } from 'zod';
import { DOC_EXPANSIONS } from './explorer/config.js';
import { ConfigError } from './explorer/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  EXPLORER_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  EXPLORER_HOST: z.string().min(1).default('127.0.0.1'),
  EXPLORER_MOUNT_PATH: z
    .string()
    .regex(/^\/.*[^/]$/, 'must start with "/" and must not end with "/"')
    .default('/api/docs'),
  EXPLORER_DOC_FILE: z.string().min(1).optional(),
  EXPLORER_INSTANCE_NAME: z.string().optional(),
  EXPLORER_DOC_EXPANSION: z.enum(DOC_EXPANSIONS).default('list'),
  EXPLORER_DEEP_LINKING: booleanFlag.default('true'),
  EXPLORER_PERSIST_AUTHORIZATION: booleanFlag.default('false'),
  EXPLORER_RATE_LIMIT: z.coerce.number().int().positive().default(300),
});

export interface ServiceConfig {
  port: number;
  host: string;
  /** Where the explorer is mounted, without trailing slash (e.g. `/api/docs`). */
  mountPath: string;
  /** JSON description document to serve; the service describes itself when absent. */
  docFile?: string;
  instanceName?: string;
  docExpansion: typeof DOC_EXPANSIONS[number];
  deepLinking: boolean;
  persistAuthorization: boolean;
  /** Requests per minute per IP on the explorer routes. */
  rateLimitPerMinute: number;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid explorer service configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    port: vars.EXPLORER_PORT,
    host: vars.EXPLORER_HOST,
    mountPath: vars.EXPLORER_MOUNT_PATH,
    docFile: vars.EXPLORER_DOC_FILE,
    instanceName: vars.EXPLORER_INSTANCE_NAME,
    docExpansion: vars.EXPLORER_DOC_EXPANSION,
    deepLinking: vars.EXPLORER_DEEP_LINKING,
    persistAuthorization: vars.EXPLORER_PERSIST_AUTHORIZATION,
    rateLimitPerMinute: vars.EXPLORER_RATE_LIMIT,
  };
}
