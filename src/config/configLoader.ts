import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as toml from 'toml';
import {
  AppConfig,
  AuthMethod,
  AuthSectionConfig,
  CliOptions,
  LoaderSectionConfig,
  SecretConfig,
  VaultSectionConfig,
} from '../types/config';
import { isLogLevel } from '../utils/logger';
import { DEFAULT_LOADER_NAME } from '../loader/VaultLoader';

// Floor between background refreshes; KV v2 secrets report lease_duration 0
export const DEFAULT_MIN_INTERVAL = 1000;

const AUTH_METHODS: readonly AuthMethod[] = ['token', 'kubernetes', 'approle'];

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAuthMethod(value: unknown): value is AuthMethod {
  return typeof value === 'string' && AUTH_METHODS.some(method => method === value);
}

export class ConfigLoader {
  private static getDefaultConfigPaths(): string[] {
    return [
      './vault-loader.toml',
      path.join(os.homedir(), '.config', 'vault-loader', 'config.toml')
    ];
  }

  /**
   * Loads configuration from various sources in priority order:
   * 1. CLI --config parameter
   * 2. VAULT_LOADER_CONFIG environment variable
   * 3. ./vault-loader.toml
   * 4. ~/.config/vault-loader/config.toml
   */
  public static loadConfig(cliOptions: CliOptions): AppConfig {
    const configPath = this.findConfigPath(cliOptions);

    if (!configPath) {
      throw new Error('No configuration file found. Please provide a vault-loader.toml file.');
    }

    const config = this.parseConfigFile(configPath);

    if (cliOptions.logLevel) {
      config.logging.level = cliOptions.logLevel;
    }

    return config;
  }

  private static findConfigPath(cliOptions: CliOptions): string | null {
    // 1. CLI --config parameter
    if (cliOptions.config) {
      if (fs.existsSync(cliOptions.config)) {
        return cliOptions.config;
      }
      throw new Error(`Config file specified via CLI not found: ${cliOptions.config}`);
    }

    // 2. VAULT_LOADER_CONFIG environment variable
    const envConfigPath = process.env.VAULT_LOADER_CONFIG;
    if (envConfigPath) {
      if (fs.existsSync(envConfigPath)) {
        return envConfigPath;
      }
      throw new Error(`Config file specified via VAULT_LOADER_CONFIG env var not found: ${envConfigPath}`);
    }

    // 3. Default paths
    for (const defaultPath of this.getDefaultConfigPaths()) {
      if (fs.existsSync(defaultPath)) {
        return defaultPath;
      }
    }

    return null;
  }

  public static parseConfigFile(configPath: string): AppConfig {
    try {
      const configContent = fs.readFileSync(configPath, 'utf-8');
      return this.parseConfig(configContent);
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to parse config file ${configPath}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Validates a TOML document and fills in defaults
   */
  public static parseConfig(content: string): AppConfig {
    const parsed: unknown = toml.parse(content);
    if (!isTable(parsed)) {
      throw new Error('Configuration must be a TOML table');
    }

    return {
      vault: this.parseVault(parsed.vault),
      auth: this.parseAuth(parsed.auth),
      loader: this.parseLoader(parsed.loader),
      secrets: this.parseSecrets(parsed.secrets),
      logging: this.parseLogging(parsed.logging),
      telemetry: this.parseTelemetry(parsed.telemetry),
    };
  }

  private static parseVault(section: unknown): VaultSectionConfig {
    if (section === undefined) {
      return {};
    }
    if (!isTable(section)) {
      throw new Error('[vault] must be a table');
    }

    return {
      endpoint: this.optionalString(section, 'vault', 'endpoint'),
      apiVersion: this.optionalString(section, 'vault', 'apiVersion'),
      namespace: this.optionalString(section, 'vault', 'namespace'),
    };
  }

  private static parseAuth(section: unknown): AuthSectionConfig {
    if (section === undefined) {
      return { method: 'token' };
    }
    if (!isTable(section)) {
      throw new Error('[auth] must be a table');
    }

    const method = section.method ?? 'token';
    if (!isAuthMethod(method)) {
      throw new Error(`[auth] method must be one of ${AUTH_METHODS.join(', ')}, got "${String(method)}"`);
    }

    const auth: AuthSectionConfig = {
      method,
      token: this.optionalString(section, 'auth', 'token'),
      nonExpiringTtl: this.optionalNumber(section, 'auth', 'nonExpiringTtl'),
      role: this.optionalString(section, 'auth', 'role'),
      tokenPath: this.optionalString(section, 'auth', 'tokenPath'),
      roleId: this.optionalString(section, 'auth', 'roleId'),
      secretId: this.optionalString(section, 'auth', 'secretId'),
      mountPoint: this.optionalString(section, 'auth', 'mountPoint'),
    };

    if (method === 'kubernetes' && !auth.role) {
      throw new Error('[auth] kubernetes authentication requires a role');
    }
    if (method === 'approle' && !auth.roleId) {
      throw new Error('[auth] approle authentication requires a roleId');
    }

    return auth;
  }

  private static parseLoader(section: unknown): LoaderSectionConfig {
    const table = this.optionalTable(section, 'loader');

    const maxRetry = this.optionalNumber(table, 'loader', 'maxRetry') ?? 0;
    if (!Number.isInteger(maxRetry)) {
      throw new Error('[loader] maxRetry must be an integer');
    }

    return {
      name: this.optionalString(table, 'loader', 'name') ?? DEFAULT_LOADER_NAME,
      renew: this.optionalBoolean(table, 'loader', 'renew') ?? true,
      maxRetry,
      retryDelay: this.optionalNumber(table, 'loader', 'retryDelay') ?? 1000,
      stopOnFailure: this.optionalBoolean(table, 'loader', 'stopOnFailure') ?? false,
      initialInterval: this.optionalNumber(table, 'loader', 'initialInterval'),
      minInterval: this.optionalNumber(table, 'loader', 'minInterval') ?? DEFAULT_MIN_INTERVAL,
    };
  }

  private static parseSecrets(section: unknown): SecretConfig[] {
    if (!Array.isArray(section) || section.length === 0) {
      throw new Error('Missing or empty [[secrets]] array in config. At least one secret must be configured.');
    }

    return section.map((entry: unknown, index: number) => {
      if (!isTable(entry)) {
        throw new Error(`Secret ${index + 1}: must be a table`);
      }
      const key = entry.key;
      if (typeof key !== 'string' || key.trim() === '') {
        throw new Error(`Secret ${index + 1}: Missing or invalid key`);
      }
      return {
        key,
        keysPrefix: this.optionalString(entry, `secrets.${index + 1}`, 'keysPrefix'),
      };
    });
  }

  private static parseLogging(section: unknown): AppConfig['logging'] {
    if (section === undefined) {
      return { level: 'info' };
    }
    if (!isTable(section)) {
      throw new Error('[logging] must be a table');
    }

    const level = section.level ?? 'info';
    if (!isLogLevel(level)) {
      throw new Error(`[logging] level must be one of debug, info, warn, error, got "${String(level)}"`);
    }
    return { level };
  }

  private static parseTelemetry(section: unknown): AppConfig['telemetry'] {
    const table = this.optionalTable(section, 'telemetry');

    return {
      enabled: this.optionalBoolean(table, 'telemetry', 'enabled') ?? false,
      serviceName: this.optionalString(table, 'telemetry', 'serviceName') ?? 'vault-lease-loader',
    };
  }

  private static optionalTable(value: unknown, section: string): Table {
    if (value === undefined) {
      return {};
    }
    if (!isTable(value)) {
      throw new Error(`[${section}] must be a table`);
    }
    return value;
  }

  private static optionalString(table: Table, section: string, key: string): string | undefined {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new Error(`[${section}] ${key} must be a string`);
    }
    return value;
  }

  private static optionalNumber(table: Table, section: string, key: string): number | undefined {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new Error(`[${section}] ${key} must be a non-negative number`);
    }
    return value;
  }

  private static optionalBoolean(table: Table, section: string, key: string): boolean | undefined {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new Error(`[${section}] ${key} must be a boolean`);
    }
    return value;
  }
}
