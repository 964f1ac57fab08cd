export { VaultLoader, DEFAULT_LOADER_NAME, DEFAULT_INITIAL_INTERVAL } from './VaultLoader';
export { PollWatcher, type PollWatcherOptions, type RefreshTarget } from './PollWatcher';
export { ConfigValues } from './ConfigValues';
export { RefreshLock } from './RefreshLock';
export { computeRefreshInterval, minLease, REFRESH_RATIO } from './leaseAggregator';
export { LoaderConstructionError, RetryExhaustedError } from './errors';
export * from './types';
