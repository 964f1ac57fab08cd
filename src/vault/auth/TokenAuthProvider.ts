import { Logger } from '../../utils/logger';
import { AuthProvider, TokenGrant } from '../../loader/types';
import { VaultApi, isRecord, secondsToMs } from '../vaultApi';

export interface TokenAuthOptions {
  token?: string; // Falls back to VAULT_TOKEN
  nonExpiringTtl?: number; // milliseconds, used for tokens without expiry
}

export const DEFAULT_NON_EXPIRING_TTL = 24 * 60 * 60 * 1000; // 24 hours

/**
 * Uses a pre-issued token. Its remaining lifetime is looked up on every call so the
 * loader refreshes before the token expires.
 */
export class TokenAuthProvider implements AuthProvider {
  private readonly api: VaultApi;
  private readonly vaultToken: string;
  private readonly nonExpiringTtl: number;
  private readonly logger?: Logger;

  constructor(api: VaultApi, options: TokenAuthOptions = {}, logger?: Logger) {
    const token = options.token || process.env.VAULT_TOKEN;
    if (!token) {
      throw new Error('Vault token is required. Set VAULT_TOKEN environment variable or provide token in configuration.');
    }

    this.api = api;
    this.vaultToken = token;
    this.nonExpiringTtl = options.nonExpiringTtl ?? DEFAULT_NON_EXPIRING_TTL;
    this.logger = logger?.child('auth:token');
  }

  public async token(): Promise<TokenGrant> {
    this.api.token = this.vaultToken;
    const response = await this.api.tokenLookupSelf();
    const data = isRecord(response) ? response.data : undefined;
    if (!isRecord(data)) {
      throw new Error('Vault token lookup returned no data');
    }

    let ttl = secondsToMs(data.ttl);
    if (ttl === 0) {
      // Root and periodic tokens without expiry report ttl 0
      ttl = this.nonExpiringTtl;
      this.logger?.debug(`Token has no expiry, using ${ttl}ms`);
    }

    return { token: this.vaultToken, ttl };
  }
}
