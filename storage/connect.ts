import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import { getSettings } from '../config/settings';
import { ConnectionNotFoundError, ConfigError } from '../core/errors';
import { createDefaultLogger, type StructuredOperationLogger } from '../logging/operation-logger';
import { connections, type ConnectionRegistry } from './connection-registry';
import { MilvusStorageClient } from './milvus-storage-client';
import type { StorageClient } from './storage-client';

const connectOptionsSchema = z.object({
  alias: z.string().min(1).optional(),
  uri: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
  database: z.string().min(1).optional(),
  replace: z.boolean().optional()
});

export interface ConnectOptions extends z.infer<typeof connectOptionsSchema> {
  registry?: ConnectionRegistry;
  logger?: StructuredOperationLogger;
  /** Client to register instead of opening a Milvus connection. */
  client?: StorageClient;
}

/**
 * Opens a Milvus connection and registers it under `alias`. Unset options
 * fall back to `MILVUS_URI`, `MILVUS_TOKEN`, `MILVUS_DATABASE` and
 * `VECMODEL_DEFAULT_ALIAS`.
 */
export async function connect(options: ConnectOptions = {}): Promise<StorageClient> {
  const { registry = connections, logger, client: provided, ...rest } = options;
  const parsed = connectOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid connect option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unreadable value'}`);
  }

  const settings = getSettings();
  const alias = parsed.data.alias ?? settings.defaultAlias;
  const uri = parsed.data.uri ?? settings.milvus.uri;
  const token = parsed.data.token ?? settings.milvus.token;
  const database = parsed.data.database ?? settings.milvus.database;

  const client = provided ?? new MilvusStorageClient(new MilvusClient({ address: uri, token, database }));
  registry.register(alias, client, { replace: parsed.data.replace });

  await (logger ?? createDefaultLogger(settings.log)).log({
    timestamp: Date.now(),
    alias,
    eventType: 'connect',
    data: { uri: provided ? undefined : uri, database, token: token ? '[REDACTED]' : undefined }
  });

  return client;
}

/** Unregisters `alias` and closes its client. */
export async function disconnect(alias?: string, registry: ConnectionRegistry = connections): Promise<void> {
  const target = alias ?? getSettings().defaultAlias;
  const client = registry.unregister(target);
  if (!client) {
    throw new ConnectionNotFoundError(target);
  }
  if (client.close) {
    await client.close();
  }
}
