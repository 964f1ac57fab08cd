import { Logger } from '../utils/logger';
import { SecretPayload, SecretStoreClient } from '../loader/types';
import { VaultApi, isRecord, secondsToMs } from './vaultApi';

/**
 * SecretStoreClient on top of node-vault.
 *
 * KV v2 responses nest the secret under `data.data` next to `data.metadata`;
 * those are unwrapped. KV v1 and dynamic secrets are returned from `data` as is.
 */
export class NodeVaultClient implements SecretStoreClient {
  private readonly api: VaultApi;
  private readonly logger?: Logger;

  constructor(api: VaultApi, logger?: Logger) {
    this.api = api;
    this.logger = logger?.child('vault-client');
  }

  public setToken(token: string): void {
    this.api.token = token;
  }

  public async read(path: string): Promise<SecretPayload> {
    this.logger?.debug(`Reading secret from Vault: ${path}`);

    let response: unknown;
    try {
      response = await this.api.read(path);
    } catch (error) {
      if (error instanceof Error) {
        if (error.message.includes('permission denied')) {
          throw new Error(`Permission denied accessing Vault path: ${path}`);
        }
        if (error.message.includes('Status 404')) {
          throw new Error(`Secret not found at Vault path: ${path}`);
        }
      }
      throw error;
    }

    if (!isRecord(response) || !isRecord(response.data)) {
      throw new Error(`No data found at Vault path: ${path}`);
    }

    const data = isKvV2(response.data) ? response.data.data : response.data;

    return {
      data: { ...data },
      leaseDuration: secondsToMs(response.lease_duration),
    };
  }
}

function isKvV2(data: Record<string, unknown>): data is { data: Record<string, unknown>; metadata: Record<string, unknown> } {
  return isRecord(data.data) && isRecord(data.metadata);
}
