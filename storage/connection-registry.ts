import { ConfigError, ConnectionNotFoundError } from '../core/errors';
import type { StorageClient } from './storage-client';

/**
 * Maps aliases to storage clients. Populated by `connect`/`disconnect` (or by
 * the application); models and querysets only ever call `resolve`.
 */
export class ConnectionRegistry {
  private readonly clients = new Map<string, StorageClient>();

  register(alias: string, client: StorageClient, options?: { replace?: boolean }): void {
    if (!alias.trim()) {
      throw new ConfigError('Connection alias must be a non-empty string');
    }
    if (this.clients.has(alias) && !options?.replace) {
      throw new ConfigError(`Connection alias '${alias}' is already registered`);
    }

    this.clients.set(alias, client);
  }

  resolve(alias: string): StorageClient {
    const client = this.clients.get(alias);
    if (!client) {
      throw new ConnectionNotFoundError(alias);
    }
    return client;
  }

  has(alias: string): boolean {
    return this.clients.has(alias);
  }

  /** Removes the entry and hands the client back; closing it is the caller's job. */
  unregister(alias: string): StorageClient | undefined {
    const client = this.clients.get(alias);
    this.clients.delete(alias);
    return client;
  }

  aliases(): string[] {
    return [...this.clients.keys()];
  }
}

/** Process-wide registry used by models that are not given one. */
export const connections = new ConnectionRegistry();
