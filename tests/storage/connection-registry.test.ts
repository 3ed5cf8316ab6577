import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { resetSettings } from '../../config/settings';
import { ConfigError, ConnectionNotFoundError } from '../../core/errors';
import { StructuredOperationLogger, type OperationLogEntry } from '../../logging/operation-logger';
import { connect, disconnect } from '../../storage/connect';
import { ConnectionRegistry } from '../../storage/connection-registry';
import { InMemoryStorageClient } from '../../storage/in-memory-storage-client';
import { MilvusStorageClient } from '../../storage/milvus-storage-client';

jest.mock('@zilliz/milvus2-sdk-node', () => ({
  MilvusClient: jest.fn().mockImplementation(() => ({ closeConnection: jest.fn().mockResolvedValue(true) }))
}));

function recordingLogger(entries: OperationLogEntry[]): StructuredOperationLogger {
  return new StructuredOperationLogger({ log: (entry) => void entries.push(entry) });
}

describe('ConnectionRegistry', () => {
  it('resolves registered clients by alias', () => {
    const registry = new ConnectionRegistry();
    const client = new InMemoryStorageClient();

    registry.register('default', client);

    expect(registry.resolve('default')).toBe(client);
    expect(registry.has('default')).toBe(true);
    expect(registry.aliases()).toEqual(['default']);
  });

  it('refuses to overwrite an alias unless asked to', () => {
    const registry = new ConnectionRegistry();
    const replacement = new InMemoryStorageClient();
    registry.register('default', new InMemoryStorageClient());

    expect(() => registry.register('default', replacement)).toThrow("Connection alias 'default' is already registered");
    registry.register('default', replacement, { replace: true });
    expect(registry.resolve('default')).toBe(replacement);
    expect(() => registry.register(' ', replacement)).toThrow(ConfigError);
  });

  it('raises for unknown aliases', () => {
    const registry = new ConnectionRegistry();

    expect(() => registry.resolve('replica')).toThrow("Connection alias 'replica' is not registered");
    expect(registry.unregister('replica')).toBeUndefined();
  });
});

describe('connect', () => {
  beforeEach(() => {
    resetSettings();
    jest.mocked(MilvusClient).mockClear();
  });

  afterAll(() => {
    resetSettings();
  });

  it('opens a Milvus client and logs the connection without the token', async () => {
    const registry = new ConnectionRegistry();
    const entries: OperationLogEntry[] = [];

    const client = await connect({
      alias: 'primary',
      uri: 'http://milvus.test:19530',
      token: 'test-secret',
      database: 'catalog',
      registry,
      logger: recordingLogger(entries)
    });

    expect(MilvusClient).toHaveBeenCalledWith({ address: 'http://milvus.test:19530', token: 'test-secret', database: 'catalog' });
    expect(client).toBeInstanceOf(MilvusStorageClient);
    expect(registry.resolve('primary')).toBe(client);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      alias: 'primary',
      eventType: 'connect',
      data: { uri: 'http://milvus.test:19530', database: 'catalog', token: '[REDACTED]' }
    });
  });

  it('registers a provided client under the default alias', async () => {
    const registry = new ConnectionRegistry();
    const memory = new InMemoryStorageClient();

    await connect({ client: memory, registry, logger: recordingLogger([]) });

    expect(MilvusClient).not.toHaveBeenCalled();
    expect(registry.resolve('default')).toBe(memory);
  });

  it('validates options', async () => {
    await expect(connect({ alias: '', registry: new ConnectionRegistry() })).rejects.toThrow(ConfigError);
    await expect(connect({ uri: '', registry: new ConnectionRegistry() })).rejects.toThrow('Invalid connect option uri');
  });
});

describe('disconnect', () => {
  it('unregisters and closes the client', async () => {
    const registry = new ConnectionRegistry();
    const memory = new InMemoryStorageClient();
    const closeSpy = jest.spyOn(memory, 'close');
    registry.register('default', memory);

    await disconnect('default', registry);

    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(registry.has('default')).toBe(false);
  });

  it('raises for an unknown alias', async () => {
    await expect(disconnect('replica', new ConnectionRegistry())).rejects.toBeInstanceOf(ConnectionNotFoundError);
  });
});
