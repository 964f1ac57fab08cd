import { BaseService } from '../services/baseService';
import {
  AuthProvider,
  ConfigSink,
  Lease,
  LoaderConfig,
  SecretDescriptor,
  SecretPayload,
  SecretStoreClient,
  TokenGrant,
} from './types';
import { LoaderConstructionError } from './errors';
import { computeRefreshInterval, minLease } from './leaseAggregator';
import { PollWatcher, RefreshTarget } from './PollWatcher';
import { RefreshLock } from './RefreshLock';

export const DEFAULT_LOADER_NAME = 'vault';
export const DEFAULT_INITIAL_INTERVAL = 5000; // 5 seconds

interface RetryPolicy {
  maxRetry: number;
  retryDelay: number;
  stopOnFailure: boolean;
}

/**
 * Loads secrets from the secret store into a configuration sink and tracks
 * how long the loaded values stay valid.
 *
 * A refresh cycle authenticates, reads every configured secret in order and only
 * then merges the values into the sink; any failure leaves the sink untouched.
 * Cycles never overlap, whether started by a caller or by the poll watcher.
 */
export class VaultLoader extends BaseService implements RefreshTarget {
  public readonly name: string;
  public readonly pollWatcher?: PollWatcher;

  private readonly client: SecretStoreClient;
  private readonly authProvider: AuthProvider;
  private readonly secrets: readonly SecretDescriptor[];
  private readonly keyReplacer?: (key: string) => string;
  private readonly retryPolicy: RetryPolicy;
  private readonly lock = new RefreshLock();
  private ttl?: number;
  private lastRefreshedAt?: number;

  /**
   * @throws LoaderConstructionError when secrets, auth provider or client are missing,
   * or when an option is out of range
   */
  constructor(config: LoaderConfig) {
    const name = config.name ?? DEFAULT_LOADER_NAME;
    super(`loader:${name}`, config.logger, config.telemetry);
    this.name = name;

    const { secrets, authProvider, client } = config;
    if (!secrets || secrets.length === 0) {
      throw new LoaderConstructionError(`Loader ${name}: at least one secret must be configured`);
    }
    secrets.forEach((secret, index) => {
      if (!secret.key || typeof secret.key !== 'string') {
        throw new LoaderConstructionError(`Loader ${name}: secret ${index + 1} has no key`);
      }
    });
    if (!authProvider) {
      throw new LoaderConstructionError(`Loader ${name}: an auth provider is required`);
    }
    if (!client) {
      throw new LoaderConstructionError(`Loader ${name}: a secret store client is required`);
    }

    this.secrets = [...secrets];
    this.authProvider = authProvider;
    this.client = client;
    this.keyReplacer = config.keyReplacer;
    this.retryPolicy = {
      maxRetry: requireNonNegative(name, 'maxRetry', config.maxRetry ?? 0, true),
      retryDelay: requireNonNegative(name, 'retryDelay', config.retryDelay ?? 0),
      stopOnFailure: config.stopOnFailure ?? false,
    };
    const initialInterval = requireNonNegative(name, 'initialInterval', config.initialInterval ?? DEFAULT_INITIAL_INTERVAL);
    const minInterval = requireNonNegative(name, 'minInterval', config.minInterval ?? 0);

    if (config.renew) {
      if (!config.sink) {
        throw new LoaderConstructionError(`Loader ${name}: background renewal needs a sink`);
      }

      this.pollWatcher = new PollWatcher(this, {
        sink: config.sink,
        ...this.retryPolicy,
        initialInterval,
        minInterval,
        onStop: config.onStop,
        logger: config.logger,
        telemetry: config.telemetry,
      });
      this.pollWatcher.start();
    }

    this.logger.debug(`Loader configured with ${this.secrets.length} secrets (renew: ${config.renew === true})`);
  }

  /**
   * Runs one refresh cycle into the given sink. Errors from the auth provider or
   * the client are rethrown as they are.
   */
  public async refresh(sink: ConfigSink): Promise<void> {
    if (this.lock.isLocked()) {
      this.logger.debug('Refresh already in progress, waiting for it to finish');
    }
    return this.lock.runExclusive(() => this.runCycle(sink));
  }

  /**
   * Runs a refresh cycle unless the last successful cycle is still within its interval.
   * The check happens once the lock is held. Resolves to whether a cycle ran.
   */
  public async refreshIfStale(sink: ConfigSink): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const remaining = this.remainingInterval();
      if (remaining > 0) {
        this.logger.debug(`Values still valid for ${remaining}ms, skipping refresh`);
        return false;
      }
      await this.runCycle(sink);
      return true;
    });
  }

  public getTTL(): number | undefined {
    return this.ttl;
  }

  public getLastRefreshedAt(): number | undefined {
    return this.lastRefreshedAt;
  }

  public maxRetry(): number {
    return this.retryPolicy.maxRetry;
  }

  public retryDelay(): number {
    return this.retryPolicy.retryDelay;
  }

  public stopOnFailure(): boolean {
    return this.retryPolicy.stopOnFailure;
  }

  /**
   * Stops background renewal, if any
   */
  public close(): void {
    this.pollWatcher?.close();
  }

  private async runCycle(sink: ConfigSink): Promise<void> {
    const span = this.telemetry.startSpan('vault_loader.refresh', {
      'loader.name': this.name,
      'loader.secrets_count': this.secrets.length,
    });
    const startTime = Date.now();

    try {
      const grant = await this.obtainToken();
      this.client.setToken(grant.token);

      const staged = new Map<string, unknown>();
      const leases: Lease[] = [{ source: 'token', duration: grant.ttl }];

      for (const secret of this.secrets) {
        const payload = await this.readSecret(secret);
        leases.push({ source: 'secret', duration: payload.leaseDuration });

        for (const [key, value] of Object.entries(payload.data)) {
          staged.set(this.resolveKey(secret, key), value);
        }
      }

      for (const [key, value] of staged) {
        sink.set(key, value);
      }

      const secretLeases = leases.filter(lease => lease.source === 'secret').map(lease => lease.duration);
      this.setTTL(computeRefreshInterval(grant.ttl, minLease(secretLeases)));

      const duration = Date.now() - startTime;
      this.logger.info(`Loaded ${staged.size} keys from ${this.secrets.length} secrets, next refresh in ${this.ttl}ms`);
      if (this.logger.isDebugEnabled()) {
        this.logger.debug(`Leases: ${leases.map(lease => `${lease.source}=${lease.duration}ms`).join(', ')}`);
      }

      span?.setAttributes({
        'loader.success': true,
        'loader.keys_count': staged.size,
        'loader.ttl_ms': this.ttl ?? 0,
        'loader.duration_ms': duration,
      });
      span?.setStatus({ code: 1 }); // OK
      this.telemetry.incrementCounter('vault_loader.refresh.success', 1, { 'loader.name': this.name });
      this.telemetry.recordHistogram('vault_loader.refresh.duration_ms', duration, { 'loader.name': this.name });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span?.recordException(err);
      span?.setStatus({ code: 2, message: err.message }); // ERROR
      this.telemetry.incrementCounter('vault_loader.refresh.failure', 1, { 'loader.name': this.name });
      throw error;
    } finally {
      span?.end();
    }
  }

  private async obtainToken(): Promise<TokenGrant> {
    try {
      return await this.authProvider.token();
    } catch (error) {
      this.logger.error('Failed to obtain a token from the auth provider:', error);
      throw error;
    }
  }

  private async readSecret(secret: SecretDescriptor): Promise<SecretPayload> {
    try {
      return await this.client.read(secret.key);
    } catch (error) {
      this.logger.error(`Failed to read secret ${secret.key}:`, error);
      throw error;
    }
  }

  private resolveKey(secret: SecretDescriptor, key: string): string {
    const prefixed = `${secret.keysPrefix ?? ''}${key}`;
    return this.keyReplacer ? this.keyReplacer(prefixed) : prefixed;
  }

  private remainingInterval(): number {
    if (this.ttl === undefined || this.lastRefreshedAt === undefined) {
      return 0;
    }
    return this.lastRefreshedAt + this.ttl - Date.now();
  }

  // Only called from runCycle, which holds the lock
  private setTTL(ttl: number): void {
    this.ttl = ttl;
    this.lastRefreshedAt = Date.now();
    this.telemetry.setGauge('vault_loader.ttl_ms', ttl, { 'loader.name': this.name });
  }
}

function requireNonNegative(loaderName: string, option: string, value: number, integer = false): number {
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new LoaderConstructionError(
      `Loader ${loaderName}: ${option} must be a non-negative ${integer ? 'integer' : 'number'}, got ${value}`
    );
  }
  return value;
}
