import { Logger } from '../../utils/logger';
import { AuthProvider } from '../../loader/types';
import { AuthSectionConfig } from '../../types/config';
import { VaultApi } from '../vaultApi';
import { TokenAuthProvider } from './TokenAuthProvider';
import { KubernetesAuthProvider } from './KubernetesAuthProvider';
import { AppRoleAuthProvider } from './AppRoleAuthProvider';

export function createAuthProvider(config: AuthSectionConfig, api: VaultApi, logger?: Logger): AuthProvider {
  switch (config.method) {
    case 'token':
      return new TokenAuthProvider(api, { token: config.token, nonExpiringTtl: config.nonExpiringTtl }, logger);
    case 'kubernetes':
      return new KubernetesAuthProvider(
        api,
        { role: config.role ?? '', tokenPath: config.tokenPath, mountPoint: config.mountPoint },
        logger
      );
    case 'approle':
      return new AppRoleAuthProvider(
        api,
        { roleId: config.roleId ?? '', secretId: config.secretId, mountPoint: config.mountPoint },
        logger
      );
  }
}
