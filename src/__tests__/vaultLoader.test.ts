import { VaultLoader } from '../loader/VaultLoader';
import { ConfigValues } from '../loader/ConfigValues';
import { LoaderConstructionError } from '../loader/errors';
import { LoaderConfig } from '../loader/types';
import { Logger } from '../utils/logger';
import { MockFactories } from './utils/mockFactories';
import { HOUR, MINUTE, SECOND, TestHelpers } from './utils/testHelpers';

describe('VaultLoader', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = TestHelpers.createTestLogger('info');
  });

  afterEach(() => {
    TestHelpers.cleanupTestEnvironment();
  });

  describe('refresh', () => {
    it('merges every secret into the sink and derives the interval from the leases', async () => {
      const authProvider = MockFactories.createAuthProvider({ token: 'DUMMYTOKEN', ttl: 1 * HOUR });
      const client = MockFactories.createStoreClient({
        '/dummy/secret/path': { data: { FOO: 'BAR' }, leaseDuration: 2 * HOUR },
        '/dummy/secret/path2': { data: { BAR: 'FOO' }, leaseDuration: 1 * HOUR },
      });
      const loader = new VaultLoader({
        client,
        authProvider,
        secrets: [{ key: '/dummy/secret/path' }, { key: '/dummy/secret/path2' }],
        logger,
      });
      const sink = new ConfigValues();

      await loader.refresh(sink);

      expect(loader.getTTL()).toBe(45 * MINUTE);
      expect(sink.get('FOO')).toBe('BAR');
      expect(sink.get('BAR')).toBe('FOO');
      expect(client.setToken).toHaveBeenCalledWith('DUMMYTOKEN');
      expect(client.read.mock.calls).toEqual([['/dummy/secret/path'], ['/dummy/secret/path2']]);
    });

    it('uses 75% of a secret lease shorter than the token lease', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/app': { data: { KEY: 'value' }, leaseDuration: 30 * MINUTE },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/app' }],
        logger,
      });

      await loader.refresh(new ConfigValues());

      expect(loader.getTTL()).toBe(1350 * SECOND);
    });

    it('sets the interval to zero when a secret carries no lease', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/data/app': { data: { KEY: 'value' }, leaseDuration: 0 },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/data/app' }],
        logger,
      });

      await loader.refresh(new ConfigValues());

      expect(loader.getTTL()).toBe(0);
    });

    it('lets later secrets overwrite keys of earlier ones', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/first': { data: { SHARED: 'first', ONLY_FIRST: 1 }, leaseDuration: 1 * HOUR },
          'secret/second': { data: { SHARED: 'second' }, leaseDuration: 1 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/first' }, { key: 'secret/second' }],
        logger,
      });
      const sink = new ConfigValues();

      await loader.refresh(sink);

      expect(sink.toObject()).toEqual({ SHARED: 'second', ONLY_FIRST: 1 });
    });

    it('overwrites values already present in the sink', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/app': { data: { PASSWORD: 'rotated' }, leaseDuration: 1 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/app' }],
        logger,
      });
      const sink = new ConfigValues();
      sink.set('PASSWORD', 'initial');
      sink.set('UNRELATED', 'kept');

      await loader.refresh(sink);

      expect(sink.toObject()).toEqual({ PASSWORD: 'rotated', UNRELATED: 'kept' });
    });

    it('applies the keys prefix and the key replacer', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'database/creds/app': { data: { username: 'app-user', password: 'test-password' }, leaseDuration: 1 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'database/creds/app', keysPrefix: 'db.' }],
        keyReplacer: key => key.toUpperCase().replace('.', '_'),
        logger,
      });
      const sink = new ConfigValues();

      await loader.refresh(sink);

      expect(sink.keys()).toEqual(['DB_USERNAME', 'DB_PASSWORD']);
      expect(sink.get('DB_PASSWORD')).toBe('test-password');
    });

    it('rethrows an auth provider failure and writes nothing', async () => {
      const failure = new Error('auth backend unavailable');
      const client = MockFactories.createStoreClient({});
      const loader = new VaultLoader({
        client,
        authProvider: MockFactories.createAuthProvider(failure),
        secrets: [{ key: '/dummy/secret/path' }],
        logger,
      });
      const sink = new ConfigValues();

      await expect(loader.refresh(sink)).rejects.toBe(failure);

      expect(sink.size).toBe(0);
      expect(loader.getTTL()).toBeUndefined();
      expect(loader.getLastRefreshedAt()).toBeUndefined();
      expect(client.setToken).not.toHaveBeenCalled();
      expect(client.read).not.toHaveBeenCalled();
    });

    it('keeps the previous interval and values when authentication fails later on', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/app': { data: { KEY: 'value' }, leaseDuration: 2 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider(
          { token: 'test-token', ttl: 1 * HOUR },
          new Error('token revoked')
        ),
        secrets: [{ key: 'secret/app' }],
        logger,
      });
      const sink = new ConfigValues();
      await loader.refresh(sink);

      await expect(loader.refresh(sink)).rejects.toThrow('token revoked');

      expect(loader.getTTL()).toBe(45 * MINUTE);
      expect(sink.toObject()).toEqual({ KEY: 'value' });
    });

    it('does not merge earlier secrets when a later read fails', async () => {
      const failure = new Error('permission denied');
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/first': { data: { FIRST: 'value' }, leaseDuration: 1 * HOUR },
          'secret/second': failure,
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/first' }, { key: 'secret/second' }],
        logger,
      });
      const sink = new ConfigValues();

      await expect(loader.refresh(sink)).rejects.toBe(failure);

      expect(sink.has('FIRST')).toBe(false);
      expect(loader.getTTL()).toBeUndefined();
    });

    it('stops reading at the first failing secret', async () => {
      const client = MockFactories.createStoreClient({
        'secret/first': new Error('not found'),
        'secret/second': { data: { SECOND: 'value' }, leaseDuration: 1 * HOUR },
      });
      const loader = new VaultLoader({
        client,
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/first' }, { key: 'secret/second' }],
        logger,
      });

      await expect(loader.refresh(new ConfigValues())).rejects.toThrow('not found');

      expect(client.read).toHaveBeenCalledTimes(1);
    });

    it('logs key and secret counts without values', async () => {
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          '/dummy/secret/path': { data: { FOO: 'BAR' }, leaseDuration: 2 * HOUR },
          '/dummy/secret/path2': { data: { BAR: 'FOO' }, leaseDuration: 1 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'DUMMYTOKEN', ttl: 1 * HOUR }),
        secrets: [{ key: '/dummy/secret/path' }, { key: '/dummy/secret/path2' }],
        logger,
      });

      await loader.refresh(new ConfigValues());

      expect(TestHelpers.loggedLines()).toEqual([
        expect.stringMatching(/^\[.*\] INFO {2}\[loader:vault\] Loaded 2 keys from 2 secrets, next refresh in 2700000ms$/),
      ]);
    });

    it('reports the cycle to telemetry', async () => {
      const { telemetry, span } = MockFactories.createMockTelemetry();
      const loader = new VaultLoader({
        name: 'app-secrets',
        client: MockFactories.createStoreClient({
          'secret/app': { data: { KEY: 'value' }, leaseDuration: 1 * HOUR },
        }),
        authProvider: MockFactories.createAuthProvider({ token: 'test-token', ttl: 1 * HOUR }),
        secrets: [{ key: 'secret/app' }],
        logger,
        telemetry,
      });

      await loader.refresh(new ConfigValues());

      expect(telemetry.startSpan).toHaveBeenCalledWith('vault_loader.refresh', {
        'loader.name': 'app-secrets',
        'loader.secrets_count': 1,
      });
      expect(span.setStatus).toHaveBeenCalledWith({ code: 1 });
      expect(span.end).toHaveBeenCalledTimes(1);
      expect(telemetry.incrementCounter).toHaveBeenCalledWith('vault_loader.refresh.success', 1, { 'loader.name': 'app-secrets' });
      expect(telemetry.setGauge).toHaveBeenCalledWith('vault_loader.ttl_ms', 45 * MINUTE, { 'loader.name': 'app-secrets' });
    });

    it('records failures on the span', async () => {
      const { telemetry, span } = MockFactories.createMockTelemetry();
      const failure = new Error('sealed');
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({}),
        authProvider: MockFactories.createAuthProvider(failure),
        secrets: [{ key: 'secret/app' }],
        logger,
        telemetry,
      });

      await expect(loader.refresh(new ConfigValues())).rejects.toBe(failure);

      expect(span.recordException).toHaveBeenCalledWith(failure);
      expect(span.setStatus).toHaveBeenCalledWith({ code: 2, message: 'sealed' });
      expect(span.end).toHaveBeenCalledTimes(1);
      expect(telemetry.incrementCounter).toHaveBeenCalledWith('vault_loader.refresh.failure', 1, { 'loader.name': 'vault' });
    });

    it('never runs two cycles at the same time', async () => {
      const firstToken = TestHelpers.deferred<{ token: string; ttl: number }>();
      const authProvider = MockFactories.createAuthProvider();
      authProvider.token
        .mockReturnValueOnce(firstToken.promise)
        .mockResolvedValueOnce({ token: 'second-token', ttl: 2 * HOUR });
      const client = MockFactories.createStoreClient({
        'secret/app': { data: { KEY: 'value' }, leaseDuration: 2 * HOUR },
      });
      const loader = new VaultLoader({ client, authProvider, secrets: [{ key: 'secret/app' }], logger });
      const sink = new ConfigValues();

      const first = loader.refresh(sink);
      const second = loader.refresh(sink);
      await TestHelpers.flushPromises();

      expect(authProvider.token).toHaveBeenCalledTimes(1);

      firstToken.resolve({ token: 'first-token', ttl: 1 * HOUR });
      await first;
      expect(loader.getTTL()).toBe(45 * MINUTE);

      await second;
      expect(authProvider.token).toHaveBeenCalledTimes(2);
      expect(client.setToken.mock.calls).toEqual([['first-token'], ['second-token']]);
      expect(loader.getTTL()).toBe(90 * MINUTE);
    });

    it('starts the next queued cycle after a failed one', async () => {
      const authProvider = MockFactories.createAuthProvider(
        new Error('temporary failure'),
        { token: 'test-token', ttl: 1 * HOUR }
      );
      const loader = new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/app': { data: { KEY: 'value' }, leaseDuration: 1 * HOUR },
        }),
        authProvider,
        secrets: [{ key: 'secret/app' }],
        logger,
      });
      const sink = new ConfigValues();

      const results = await Promise.allSettled([loader.refresh(sink), loader.refresh(sink)]);

      expect(results.map(result => result.status)).toEqual(['rejected', 'fulfilled']);
      expect(sink.get('KEY')).toBe('value');
    });
  });

  describe('refreshIfStale', () => {
    const createLoader = (leaseDuration: number) =>
      new VaultLoader({
        client: MockFactories.createStoreClient({
          'secret/app': { data: { KEY: 'value' }, leaseDuration },
        }),
        authProvider: MockFactories.createAuthProvider(
          { token: 'test-token', ttl: 1 * HOUR },
          { token: 'test-token', ttl: 1 * HOUR }
        ),
        secrets: [{ key: 'secret/app' }],
        logger,
      });

    it('runs a cycle before anything was loaded', async () => {
      const sink = new ConfigValues();
      const loader = createLoader(1 * HOUR);

      await expect(loader.refreshIfStale(sink)).resolves.toBe(true);
      expect(sink.get('KEY')).toBe('value');
    });

    it('skips the cycle while the values are within their interval', async () => {
      const loader = createLoader(1 * HOUR);
      await loader.refresh(new ConfigValues());

      await expect(loader.refreshIfStale(new ConfigValues())).resolves.toBe(false);
      expect(loader.getTTL()).toBe(45 * MINUTE);
    });

    it('checks freshness after waiting for a cycle in flight', async () => {
      const loader = createLoader(1 * HOUR);
      const sink = new ConfigValues();

      const foreground = loader.refresh(sink);
      const background = loader.refreshIfStale(sink);

      await foreground;
      await expect(background).resolves.toBe(false);
    });

    it('always runs a cycle for zero-lease secrets', async () => {
      const loader = createLoader(0);
      await loader.refresh(new ConfigValues());

      await expect(loader.refreshIfStale(new ConfigValues())).resolves.toBe(true);
    });
  });

  describe('construction', () => {
    const validConfig = (): LoaderConfig => ({
      client: MockFactories.createStoreClient({}),
      authProvider: MockFactories.createAuthProvider(),
      secrets: [{ key: '/dummy/secret/path' }],
      logger,
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('fails without secrets', () => {
      expect(() => new VaultLoader({})).toThrow(LoaderConstructionError);
      expect(() => new VaultLoader({ ...validConfig(), secrets: [] })).toThrow('at least one secret must be configured');
    });

    it('fails without an auth provider', () => {
      expect(() => new VaultLoader({ ...validConfig(), authProvider: undefined })).toThrow(
        new LoaderConstructionError('Loader vault: an auth provider is required')
      );
    });

    it('fails without a client', () => {
      expect(() => new VaultLoader({ ...validConfig(), client: undefined })).toThrow(
        new LoaderConstructionError('Loader vault: a secret store client is required')
      );
    });

    it('fails on a secret without key', () => {
      expect(() => new VaultLoader({ ...validConfig(), secrets: [{ key: 'secret/a' }, { key: '' }] })).toThrow(
        'Loader vault: secret 2 has no key'
      );
    });

    it('fails when renewal has no sink', () => {
      expect(() => new VaultLoader({ ...validConfig(), renew: true })).toThrow(
        'Loader vault: background renewal needs a sink'
      );
    });

    it('rejects out-of-range retry options', () => {
      expect(() => new VaultLoader({ ...validConfig(), maxRetry: -1 })).toThrow(
        'Loader vault: maxRetry must be a non-negative integer, got -1'
      );
      expect(() => new VaultLoader({ ...validConfig(), maxRetry: 1.5 })).toThrow(LoaderConstructionError);
      expect(() => new VaultLoader({ ...validConfig(), retryDelay: Number.POSITIVE_INFINITY })).toThrow(
        LoaderConstructionError
      );
    });

    it('starts no background activity without renewal', () => {
      jest.useFakeTimers();
      const loader = new VaultLoader(validConfig());

      expect(loader.pollWatcher).toBeUndefined();
      expect(jest.getTimerCount()).toBe(0);
    });

    it('starts the poll watcher with renewal', () => {
      jest.useFakeTimers();
      const loader = new VaultLoader({ ...validConfig(), renew: true, sink: new ConfigValues() });

      expect(loader.pollWatcher).toBeDefined();
      expect(loader.pollWatcher?.isRunning()).toBe(true);
      expect(jest.getTimerCount()).toBe(1);

      loader.close();
      expect(loader.pollWatcher?.getState()).toBe('stopped');
      expect(jest.getTimerCount()).toBe(0);
    });

    it('exposes the retry settings unaltered', () => {
      jest.useFakeTimers();
      const loader = new VaultLoader({
        ...validConfig(),
        renew: true,
        sink: new ConfigValues(),
        stopOnFailure: true,
        maxRetry: 1,
        retryDelay: 1 * SECOND,
      });

      expect(loader.stopOnFailure()).toBe(true);
      expect(loader.maxRetry()).toBe(1);
      expect(loader.retryDelay()).toBe(1 * SECOND);

      loader.close();
    });

    it('defaults to no retries', () => {
      const loader = new VaultLoader(validConfig());

      expect(loader.name).toBe('vault');
      expect(loader.stopOnFailure()).toBe(false);
      expect(loader.maxRetry()).toBe(0);
      expect(loader.retryDelay()).toBe(0);
    });
  });
});
