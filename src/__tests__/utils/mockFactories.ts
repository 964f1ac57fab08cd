import { AuthProvider, SecretPayload, SecretStoreClient, TokenGrant } from '../../loader/types';
import { Span, TelemetryService } from '../../services/telemetryInterface';
import { VaultApi } from '../../vault/vaultApi';

/**
 * Factory functions for the scripted doubles used across tests
 */
export class MockFactories {
  /**
   * Auth provider answering each call with the next scripted grant or error
   */
  static createAuthProvider(...results: Array<TokenGrant | Error>): jest.Mocked<AuthProvider> {
    const token = jest.fn<Promise<TokenGrant>, []>();
    for (const result of results) {
      if (result instanceof Error) {
        token.mockRejectedValueOnce(result);
      } else {
        token.mockResolvedValueOnce(result);
      }
    }
    return { token };
  }

  /**
   * Store client answering reads from a fixed table of paths
   */
  static createStoreClient(responses: Record<string, SecretPayload | Error>): jest.Mocked<SecretStoreClient> {
    return {
      setToken: jest.fn<void, [string]>(),
      read: jest.fn<Promise<SecretPayload>, [string]>(async (path: string) => {
        const response = responses[path];
        if (response === undefined) {
          throw new Error(`unexpected read of ${path}`);
        }
        if (response instanceof Error) {
          throw response;
        }
        return response;
      }),
    };
  }

  static createMockTelemetry(): { telemetry: jest.Mocked<TelemetryService>; span: jest.Mocked<Span> } {
    const span: jest.Mocked<Span> = {
      setAttributes: jest.fn(),
      setStatus: jest.fn(),
      recordException: jest.fn(),
      end: jest.fn(),
    };
    const telemetry: jest.Mocked<TelemetryService> = {
      isEnabled: jest.fn().mockReturnValue(true),
      startSpan: jest.fn().mockReturnValue(span),
      incrementCounter: jest.fn(),
      recordHistogram: jest.fn(),
      setGauge: jest.fn(),
    };
    return { telemetry, span };
  }

  /**
   * Stand-in for a node-vault client
   */
  static createVaultApi(): jest.Mocked<VaultApi> {
    return {
      token: '',
      read: jest.fn(),
      tokenLookupSelf: jest.fn(),
      kubernetesLogin: jest.fn(),
      approleLogin: jest.fn(),
    };
  }
}
