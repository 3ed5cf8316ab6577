import { z } from 'zod';
import { ConfigError } from '../core/errors';

// Milvus caps limit + offset of a single query at this many rows
const MAX_QUERY_WINDOW = 16384;

const envSchema = z.object({
  VECMODEL_DEFAULT_ALIAS: z.string().min(1).default('default'),
  VECMODEL_QUERY_LIMIT: z.coerce.number().int().positive().max(MAX_QUERY_WINDOW).default(1000),
  VECMODEL_MAX_SCAN: z.coerce.number().int().positive().max(MAX_QUERY_WINDOW).default(MAX_QUERY_WINDOW),
  VECMODEL_LOG: z.enum(['off', 'console']).default('off'),
  MILVUS_URI: z.string().min(1).default('http://localhost:19530'),
  MILVUS_TOKEN: z.string().min(1).optional(),
  MILVUS_DATABASE: z.string().min(1).optional()
});

export interface Settings {
  defaultAlias: string;
  queryLimit: number;
  maxScan: number;
  log: 'off' | 'console';
  milvus: {
    uri: string;
    token?: string;
    database?: string;
  };
}

let cached: Settings | undefined;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? 'unreadable value'}. Got: ${env[variable] ?? 'unset'}`);
  }

  const values = parsed.data;
  return {
    defaultAlias: values.VECMODEL_DEFAULT_ALIAS,
    queryLimit: values.VECMODEL_QUERY_LIMIT,
    maxScan: values.VECMODEL_MAX_SCAN,
    log: values.VECMODEL_LOG,
    milvus: {
      uri: values.MILVUS_URI,
      token: values.MILVUS_TOKEN,
      database: values.MILVUS_DATABASE
    }
  };
}

/** Settings for the current process, read once from the environment. */
export function getSettings(): Settings {
  if (!cached) {
    cached = loadSettings();
  }
  return cached;
}

export function resetSettings(): void {
  cached = undefined;
}
