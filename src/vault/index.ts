export { NodeVaultClient } from './NodeVaultClient';
export {
  createVaultApi,
  DEFAULT_VAULT_ENDPOINT,
  type VaultApi,
  type VaultConnectionOptions,
} from './vaultApi';
export { TokenAuthProvider, DEFAULT_NON_EXPIRING_TTL, type TokenAuthOptions } from './auth/TokenAuthProvider';
export {
  KubernetesAuthProvider,
  DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH,
  type KubernetesAuthOptions,
} from './auth/KubernetesAuthProvider';
export { AppRoleAuthProvider, type AppRoleAuthOptions } from './auth/AppRoleAuthProvider';
export { createAuthProvider } from './auth/createAuthProvider';
