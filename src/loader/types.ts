import { Logger } from '../utils/logger';
import type { TelemetryService } from '../services/telemetryInterface';
import type { RetryExhaustedError } from './errors';

/**
 * A credential issued by an auth provider
 */
export interface TokenGrant {
  token: string;
  ttl: number; // milliseconds
}

/**
 * Produces the credential used for every read of a refresh cycle
 */
export interface AuthProvider {
  token(): Promise<TokenGrant>;
}

/**
 * Payload and lease of one secret
 */
export interface SecretPayload {
  data: Record<string, unknown>;
  leaseDuration: number; // milliseconds
}

/**
 * Read access to the secret store
 */
export interface SecretStoreClient {
  setToken(token: string): void;
  read(path: string): Promise<SecretPayload>;
}

/**
 * Receives merged key/value pairs; existing keys are overwritten
 */
export interface ConfigSink {
  set(key: string, value: unknown): void;
}

/**
 * One path to fetch from the secret store
 */
export interface SecretDescriptor {
  key: string;
  keysPrefix?: string; // Prepended to every key read from this secret
}

export interface Lease {
  source: 'token' | 'secret';
  duration: number; // milliseconds
}

export type PollWatcherState = 'idle' | 'refreshing' | 'stopped';

/**
 * Construction parameters of a VaultLoader
 */
export interface LoaderConfig {
  client?: SecretStoreClient;
  secrets?: SecretDescriptor[];
  authProvider?: AuthProvider;
  name?: string;
  renew?: boolean; // Start background refresh on construction
  sink?: ConfigSink; // Target of background refresh cycles, required with renew
  maxRetry?: number;
  retryDelay?: number; // milliseconds
  stopOnFailure?: boolean;
  initialInterval?: number; // milliseconds, wait before the first background cycle
  minInterval?: number; // milliseconds, floor for the scheduler's sleep
  keyReplacer?: (key: string) => string;
  onStop?: (error: RetryExhaustedError) => void;
  logger?: Logger;
  telemetry?: TelemetryService;
}
