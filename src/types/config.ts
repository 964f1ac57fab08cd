import type { LogLevel } from '../utils/logger';

export type AuthMethod = 'token' | 'kubernetes' | 'approle';

export interface VaultSectionConfig {
  endpoint?: string; // Defaults to VAULT_ADDR, then http://localhost:8200
  apiVersion?: string;
  namespace?: string;
}

export interface AuthSectionConfig {
  method: AuthMethod;
  // token
  token?: string; // Falls back to VAULT_TOKEN
  nonExpiringTtl?: number; // milliseconds
  // kubernetes
  role?: string;
  tokenPath?: string;
  // approle
  roleId?: string;
  secretId?: string; // Falls back to VAULT_SECRET_ID
  // kubernetes and approle
  mountPoint?: string;
}

export interface LoaderSectionConfig {
  name: string;
  renew: boolean;
  maxRetry: number;
  retryDelay: number; // milliseconds
  stopOnFailure: boolean;
  initialInterval?: number; // milliseconds
  minInterval: number; // milliseconds
}

export interface SecretConfig {
  key: string; // Vault path
  keysPrefix?: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface TelemetrySectionConfig {
  enabled: boolean;
  serviceName: string;
}

export interface AppConfig {
  vault: VaultSectionConfig;
  auth: AuthSectionConfig;
  loader: LoaderSectionConfig;
  secrets: SecretConfig[];
  logging: LoggingConfig;
  telemetry: TelemetrySectionConfig;
}

export interface CliOptions {
  config?: string;
  once?: boolean;
  printKeys?: boolean;
  logLevel?: LogLevel;
}
