import { Logger } from '../../utils/logger';
import { AuthProvider, TokenGrant } from '../../loader/types';
import { VaultApi, parseLoginResponse } from '../vaultApi';

export interface AppRoleAuthOptions {
  roleId: string;
  secretId?: string; // Falls back to VAULT_SECRET_ID
  mountPoint?: string; // Defaults to "approle"
}

export class AppRoleAuthProvider implements AuthProvider {
  private readonly api: VaultApi;
  private readonly roleId: string;
  private readonly secretId: string;
  private readonly mountPoint?: string;
  private readonly logger?: Logger;

  constructor(api: VaultApi, options: AppRoleAuthOptions, logger?: Logger) {
    const secretId = options.secretId || process.env.VAULT_SECRET_ID;
    if (!options.roleId) {
      throw new Error('AppRole auth requires a roleId');
    }
    if (!secretId) {
      throw new Error('AppRole auth requires a secretId. Set VAULT_SECRET_ID environment variable or provide secretId in configuration.');
    }

    this.api = api;
    this.roleId = options.roleId;
    this.secretId = secretId;
    this.mountPoint = options.mountPoint;
    this.logger = logger?.child('auth:approle');
  }

  public async token(): Promise<TokenGrant> {
    this.logger?.debug('Logging in to Vault with AppRole');
    const response = await this.api.approleLogin({
      role_id: this.roleId,
      secret_id: this.secretId,
      ...(this.mountPoint ? { mount_point: this.mountPoint } : {}),
    });

    return parseLoginResponse('approle', response);
  }
}
