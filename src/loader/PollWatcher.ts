import { Logger } from '../utils/logger';
import type { TelemetryService } from '../services/telemetryInterface';
import { BaseService } from '../services/baseService';
import { ConfigSink, PollWatcherState } from './types';
import { RetryExhaustedError } from './errors';

/**
 * What the watcher needs from a loader
 */
export interface RefreshTarget {
  readonly name: string;
  // Resolves to false when the values were still fresh once the lock was held
  refreshIfStale(sink: ConfigSink): Promise<boolean>;
  getTTL(): number | undefined;
  getLastRefreshedAt(): number | undefined;
}

export interface PollWatcherOptions {
  sink: ConfigSink;
  maxRetry: number;
  retryDelay: number; // milliseconds
  stopOnFailure: boolean;
  initialInterval: number; // milliseconds
  minInterval: number; // milliseconds
  onStop?: (error: RetryExhaustedError) => void;
  logger?: Logger;
  telemetry?: TelemetryService;
}

type CycleOutcome =
  | { ok: true; skipped: boolean }
  | { ok: false; error: unknown; attempts: number };

/**
 * Background loop that refreshes a loader before its leases run out.
 *
 * The watcher sleeps for the loader's last computed interval (or `initialInterval`
 * before the first successful cycle), then refreshes. A failed cycle is retried up to
 * `maxRetry` times, `retryDelay` apart. When every attempt failed the watcher either
 * stops for good (`stopOnFailure`) or logs the failure and sleeps on the stale interval.
 */
export class PollWatcher extends BaseService {
  private readonly target: RefreshTarget;
  private readonly options: PollWatcherOptions;
  private state: PollWatcherState = 'idle';
  private started = false;
  private closed = false;
  private timer?: ReturnType<typeof setTimeout>;
  private wakeSleeper?: () => void;
  private resolveDone: (error: RetryExhaustedError | undefined) => void = () => undefined;
  private readonly donePromise: Promise<RetryExhaustedError | undefined>;

  constructor(target: RefreshTarget, options: PollWatcherOptions) {
    super(`watcher:${target.name}`, options.logger, options.telemetry);
    this.target = target;
    this.options = options;
    this.donePromise = new Promise(resolve => {
      this.resolveDone = resolve;
    });
  }

  public start(): void {
    if (this.closed) {
      throw new Error(`Poll watcher for ${this.target.name} is stopped and cannot be restarted`);
    }

    if (this.started) {
      this.logger.warn('Poll watcher is already running');
      return;
    }

    this.started = true;
    const delay = this.nextDelay();
    this.logger.info(`Poll watcher started, first refresh in ${delay}ms`);
    this.arm(delay);
  }

  /**
   * Stops the loop. A cycle in flight completes but nothing is scheduled after it.
   */
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.wakeSleeper?.();
    this.state = 'stopped';
    this.logger.info('Poll watcher closed');
    this.resolveDone(undefined);
  }

  public getState(): PollWatcherState {
    return this.state;
  }

  public isRunning(): boolean {
    return this.started && !this.closed;
  }

  /**
   * Resolves once the watcher stops: with the exhaustion error when retries ran out
   * under `stopOnFailure`, with undefined after close().
   */
  public done(): Promise<RetryExhaustedError | undefined> {
    return this.donePromise;
  }

  private nextDelay(): number {
    const ttl = this.target.getTTL();
    const interval = ttl === undefined ? this.options.initialInterval : ttl;
    return Math.max(interval, this.options.minInterval);
  }

  private arm(delay: number): void {
    if (this.closed) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.tick().catch(error => {
        this.logger.error('Unexpected error in poll watcher:', error);
      });
    }, delay);
  }

  private async tick(): Promise<void> {
    if (this.closed) {
      return;
    }

    // A foreground refresh may have renewed everything while we slept
    const remaining = this.remainingInterval();
    if (remaining !== undefined && remaining > 0) {
      const delay = Math.max(remaining, this.options.minInterval);
      this.logger.debug(`Values refreshed since the timer was armed, next refresh in ${delay}ms`);
      this.arm(delay);
      return;
    }

    this.state = 'refreshing';
    const outcome = await this.refreshWithRetry();

    if (this.closed) {
      return;
    }

    if (outcome.ok) {
      this.state = 'idle';
      const remaining = this.remainingInterval();
      if (outcome.skipped && remaining !== undefined && remaining > 0) {
        const delay = Math.max(remaining, this.options.minInterval);
        this.logger.debug(`Refreshed in the foreground while waiting, next refresh in ${delay}ms`);
        this.arm(delay);
        return;
      }
      const delay = this.nextDelay();
      this.logger.debug(`Refresh succeeded, next refresh in ${delay}ms`);
      this.arm(delay);
      return;
    }

    const exhausted = new RetryExhaustedError(this.target.name, outcome.attempts, outcome.error);
    this.telemetry.incrementCounter('vault_loader.retry_exhausted', 1, { 'loader.name': this.target.name });

    if (this.options.stopOnFailure) {
      this.logger.error(`${exhausted.message}; stopping poll watcher`);
      this.stop(exhausted);
      return;
    }

    this.state = 'idle';
    const delay = this.nextDelay();
    this.logger.error(`${exhausted.message}; keeping stale values, next attempt in ${delay}ms`);
    this.arm(delay);
  }

  private remainingInterval(): number | undefined {
    const ttl = this.target.getTTL();
    const refreshedAt = this.target.getLastRefreshedAt();
    if (ttl === undefined || refreshedAt === undefined) {
      return undefined;
    }
    return refreshedAt + ttl - Date.now();
  }

  private async refreshWithRetry(): Promise<CycleOutcome> {
    const maxAttempts = this.options.maxRetry + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const ran = await this.target.refreshIfStale(this.options.sink);
        return { ok: true, skipped: !ran };
      } catch (error) {
        lastError = error;
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Refresh failed (attempt ${attempt}/${maxAttempts}): ${reason}`);

        if (attempt < maxAttempts) {
          this.telemetry.incrementCounter('vault_loader.retry', 1, { 'loader.name': this.target.name });
          this.logger.debug(`Retrying in ${this.options.retryDelay}ms...`);
          await this.sleep(this.options.retryDelay);
          if (this.closed) {
            break;
          }
        }
      }
    }

    return { ok: false, error: lastError, attempts: maxAttempts };
  }

  private stop(error: RetryExhaustedError): void {
    this.closed = true;
    this.state = 'stopped';
    this.resolveDone(error);
    this.options.onStop?.(error);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const handle = setTimeout(() => {
        this.wakeSleeper = undefined;
        resolve();
      }, ms);
      this.wakeSleeper = () => {
        clearTimeout(handle);
        this.wakeSleeper = undefined;
        resolve();
      };
    });
  }
}
