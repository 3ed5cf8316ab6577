import { ConfigError } from '../../core/errors';
import { getSettings, loadSettings, resetSettings } from '../../config/settings';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual({
      defaultAlias: 'default',
      queryLimit: 1000,
      maxScan: 16384,
      log: 'off',
      milvus: { uri: 'http://localhost:19530', token: undefined, database: undefined }
    });
  });

  it('reads and coerces environment variables', () => {
    const settings = loadSettings({
      VECMODEL_DEFAULT_ALIAS: 'primary',
      VECMODEL_QUERY_LIMIT: '50',
      VECMODEL_MAX_SCAN: '2000',
      VECMODEL_LOG: 'console',
      MILVUS_URI: 'http://milvus.test:19530',
      MILVUS_TOKEN: 'test-secret',
      MILVUS_DATABASE: 'catalog'
    });

    expect(settings).toEqual({
      defaultAlias: 'primary',
      queryLimit: 50,
      maxScan: 2000,
      log: 'console',
      milvus: { uri: 'http://milvus.test:19530', token: 'test-secret', database: 'catalog' }
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadSettings({ VECMODEL_DEFAULT_ALIAS: '', MILVUS_TOKEN: '' })).toMatchObject({
      defaultAlias: 'default',
      milvus: { token: undefined }
    });
  });

  it('names the offending variable', () => {
    expect(() => loadSettings({ VECMODEL_MAX_SCAN: '20000' })).toThrow(
      'Invalid VECMODEL_MAX_SCAN: Number must be less than or equal to 16384. Got: 20000'
    );
    expect(() => loadSettings({ VECMODEL_QUERY_LIMIT: 'lots' })).toThrow(ConfigError);
    expect(() => loadSettings({ VECMODEL_LOG: 'verbose' })).toThrow(/^Invalid VECMODEL_LOG: /);
  });
});

describe('getSettings', () => {
  const saved = process.env.VECMODEL_DEFAULT_ALIAS;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.VECMODEL_DEFAULT_ALIAS;
    } else {
      process.env.VECMODEL_DEFAULT_ALIAS = saved;
    }
    resetSettings();
  });

  it('reads the environment once until reset', () => {
    resetSettings();
    process.env.VECMODEL_DEFAULT_ALIAS = 'first';
    expect(getSettings().defaultAlias).toBe('first');

    process.env.VECMODEL_DEFAULT_ALIAS = 'second';
    expect(getSettings().defaultAlias).toBe('first');

    resetSettings();
    expect(getSettings().defaultAlias).toBe('second');
  });
});
