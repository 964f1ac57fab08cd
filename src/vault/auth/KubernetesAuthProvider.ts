import * as fs from 'fs';
import { Logger } from '../../utils/logger';
import { AuthProvider, TokenGrant } from '../../loader/types';
import { VaultApi, parseLoginResponse } from '../vaultApi';

export const DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

export interface KubernetesAuthOptions {
  role: string;
  tokenPath?: string;
  mountPoint?: string; // Defaults to "kubernetes"
}

/**
 * Logs in with the pod's service account JWT. The JWT is re-read on every login
 * since the kubelet rotates projected tokens.
 */
export class KubernetesAuthProvider implements AuthProvider {
  private readonly api: VaultApi;
  private readonly role: string;
  private readonly tokenPath: string;
  private readonly mountPoint?: string;
  private readonly logger?: Logger;

  constructor(api: VaultApi, options: KubernetesAuthOptions, logger?: Logger) {
    if (!options.role) {
      throw new Error('Kubernetes auth requires a role');
    }

    this.api = api;
    this.role = options.role;
    this.tokenPath = options.tokenPath || DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH;
    this.mountPoint = options.mountPoint;
    this.logger = logger?.child('auth:kubernetes');
  }

  public async token(): Promise<TokenGrant> {
    let jwt: string;
    try {
      jwt = (await fs.promises.readFile(this.tokenPath, 'utf-8')).trim();
    } catch (error) {
      throw new Error(
        `Failed to read service account token ${this.tokenPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!jwt) {
      throw new Error(`Service account token file is empty: ${this.tokenPath}`);
    }

    this.logger?.debug(`Logging in to Vault with role ${this.role}`);
    const response = await this.api.kubernetesLogin({
      role: this.role,
      jwt,
      ...(this.mountPoint ? { mount_point: this.mountPoint } : {}),
    });

    return parseLoginResponse('kubernetes', response);
  }
}
