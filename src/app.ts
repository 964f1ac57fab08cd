import { Logger } from './utils/logger';
import { ConfigLoader } from './config/configLoader';
import { AppConfig, CliOptions } from './types/config';
import type { TelemetryService } from './services/telemetryInterface';
import { createTelemetryService } from './services/telemetryFactory';
import { ConfigValues } from './loader/ConfigValues';
import { VaultLoader } from './loader/VaultLoader';
import { RetryExhaustedError } from './loader/errors';
import { NodeVaultClient } from './vault/NodeVaultClient';
import { createVaultApi, VaultApi } from './vault/vaultApi';
import { createAuthProvider } from './vault/auth/createAuthProvider';
import { VERSION } from './version';

export interface SecretLoaderAppOptions {
  // Replaces the node-vault client built from the [vault] section
  vaultApi?: VaultApi;
  onStop?: (error: RetryExhaustedError) => void;
}

/**
 * Wires configuration, Vault client, auth provider and loader together
 */
export class SecretLoaderApp {
  private readonly cliOptions: CliOptions;
  private readonly options: SecretLoaderAppOptions;
  private readonly logger: Logger;
  private readonly values = new ConfigValues();
  private config?: AppConfig;
  private telemetry?: TelemetryService;
  private loader?: VaultLoader;

  constructor(cliOptions: CliOptions, options: SecretLoaderAppOptions = {}, logger: Logger = new Logger()) {
    this.cliOptions = cliOptions;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Loads the configuration and builds the loader. Background renewal starts here
   * unless the app runs in one-shot mode or renewal is disabled.
   */
  public initialize(): void {
    if (this.loader) {
      this.logger.warn('Secret loader app is already initialized');
      return;
    }

    const config = ConfigLoader.loadConfig(this.cliOptions);
    this.config = config;
    this.logger.setLevel(config.logging.level);

    this.telemetry = createTelemetryService(
      {
        enabled: config.telemetry.enabled,
        serviceName: config.telemetry.serviceName,
        serviceVersion: VERSION.toString(),
      },
      this.logger
    );

    const api = this.options.vaultApi ?? createVaultApi(config.vault);
    const renew = config.loader.renew && !this.cliOptions.once;

    this.loader = new VaultLoader({
      name: config.loader.name,
      client: new NodeVaultClient(api, this.logger),
      authProvider: createAuthProvider(config.auth, api, this.logger),
      secrets: config.secrets,
      renew,
      sink: this.values,
      maxRetry: config.loader.maxRetry,
      retryDelay: config.loader.retryDelay,
      stopOnFailure: config.loader.stopOnFailure,
      initialInterval: config.loader.initialInterval,
      minInterval: config.loader.minInterval,
      onStop: this.options.onStop,
      logger: this.logger,
      telemetry: this.telemetry,
    });

    this.logger.info(`Initialized loader ${config.loader.name} for ${config.secrets.length} secrets (renew: ${renew})`);
  }

  /**
   * Runs the initial, synchronous refresh
   */
  public async load(): Promise<void> {
    const loader = this.requireLoader();
    try {
      await loader.refresh(this.values);
    } catch (error) {
      loader.close();
      throw error;
    }
  }

  /**
   * Resolves when background renewal ends, immediately when there is none
   */
  public async waitForStop(): Promise<RetryExhaustedError | undefined> {
    const watcher = this.requireLoader().pollWatcher;
    return watcher ? watcher.done() : undefined;
  }

  public stop(): void {
    this.loader?.close();
  }

  public getValues(): ConfigValues {
    return this.values;
  }

  public getLoader(): VaultLoader | undefined {
    return this.loader;
  }

  public getConfig(): AppConfig | undefined {
    return this.config;
  }

  private requireLoader(): VaultLoader {
    if (!this.loader) {
      throw new Error('Secret loader app is not initialized');
    }
    return this.loader;
  }
}
