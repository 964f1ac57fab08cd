import NodeVault from 'node-vault';

/**
 * The parts of a node-vault client the loader relies on. A `NodeVault.client`
 * satisfies it; tests hand in plain objects.
 */
export interface VaultApi {
  token: string;
  read(path: string): Promise<unknown>;
  tokenLookupSelf(options?: Record<string, unknown>): Promise<unknown>;
  kubernetesLogin(options?: Record<string, unknown>): Promise<unknown>;
  approleLogin(options?: Record<string, unknown>): Promise<unknown>;
}

export interface VaultConnectionOptions {
  endpoint?: string;
  apiVersion?: string;
  namespace?: string;
  token?: string;
}

export const DEFAULT_VAULT_ENDPOINT = 'http://localhost:8200';

export function createVaultApi(options: VaultConnectionOptions = {}): VaultApi {
  return NodeVault({
    endpoint: options.endpoint || process.env.VAULT_ADDR || DEFAULT_VAULT_ENDPOINT,
    apiVersion: options.apiVersion || 'v1',
    ...(options.namespace ? { namespace: options.namespace } : {}),
    ...(options.token ? { token: options.token } : {}),
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a duration in seconds from a Vault response field and converts it to milliseconds.
 * Missing or malformed values count as 0.
 */
export function secondsToMs(value: unknown): number {
  const seconds = typeof value === 'string' ? Number(value) : value;
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
    return 0;
  }
  return seconds * 1000;
}

/**
 * Extracts `auth.client_token` and `auth.lease_duration` from a login response
 */
export function parseLoginResponse(method: string, response: unknown): { token: string; ttl: number } {
  const auth = isRecord(response) ? response.auth : undefined;
  if (!isRecord(auth) || typeof auth.client_token !== 'string' || auth.client_token === '') {
    throw new Error(`Vault ${method} login returned no client token`);
  }
  return {
    token: auth.client_token,
    ttl: secondsToMs(auth.lease_duration),
  };
}
