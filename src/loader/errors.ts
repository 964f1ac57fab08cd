/**
 * Thrown by the VaultLoader constructor when required configuration is missing or invalid.
 * Signals a programming or deployment mistake; never returned from a refresh.
 */
export class LoaderConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoaderConstructionError';
  }
}

/**
 * Reported by the poll watcher when a background refresh still fails after every retry
 */
export class RetryExhaustedError extends Error {
  public readonly attempts: number;

  constructor(loaderName: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Loader ${loaderName} failed to refresh after ${attempts} attempts: ${reason}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}
