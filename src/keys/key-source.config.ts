import { AgentConfig } from '../common/config/agent.config';
import { ConfigurationError } from '../common/errors/configuration.error';
import { KeystoreSecret } from './keystore/keystore-secret';

/**
 * 키 소스 설정 (tagged union)
 *
 * 정확히 하나의 variant만 선택 가능
 */
export type KeySourceConfig =
  | { kind: 'secret-keys'; secretKeys: string[] }
  | { kind: 'local-keystore'; path: string; secret: KeystoreSecret }
  | {
      kind: 'remote-signer';
      url: string;
      clientCertPath: string;
      clientKeyPath: string;
      caCertPath?: string;
      walletPath: string;
      passphrases: string[];
      timeoutMs: number;
    };

/**
 * AgentConfig → KeySourceConfig
 *
 * 규칙:
 * - SECRET_KEYS / KEYSTORE_PATH / REMOTE_SIGNER_URL 중 정확히 하나
 * - keystore: KEYSTORE_PASSWORD와 KEYSTORE_SECRETS_PATH 중 정확히 하나
 * - remote signer: 클라이언트 인증서, 키, wallet 경로 필수
 *
 * @throws {ConfigurationError}
 */
export function resolveKeySourceConfig(config: AgentConfig): KeySourceConfig {
  const selected = [
    config.secretKeys !== undefined && config.secretKeys.length > 0
      ? 'SECRET_KEYS'
      : null,
    config.keystorePath ? 'KEYSTORE_PATH' : null,
    config.remoteSignerUrl ? 'REMOTE_SIGNER_URL' : null,
  ].filter((name): name is string => name !== null);

  if (selected.length === 0) {
    throw new ConfigurationError(
      'No key source configured: set one of SECRET_KEYS, KEYSTORE_PATH or REMOTE_SIGNER_URL',
    );
  }
  if (selected.length > 1) {
    throw new ConfigurationError(
      `Exactly one key source must be configured, got ${selected.join(', ')}`,
    );
  }

  if (config.secretKeys && config.secretKeys.length > 0) {
    return { kind: 'secret-keys', secretKeys: config.secretKeys };
  }

  if (config.keystorePath) {
    return {
      kind: 'local-keystore',
      path: config.keystorePath,
      secret: resolveKeystoreSecret(config),
    };
  }

  const { remoteSignerClientCertPath, remoteSignerClientKeyPath } = config;
  const walletPath = config.remoteSignerWalletPath;
  if (!remoteSignerClientCertPath || !remoteSignerClientKeyPath) {
    throw new ConfigurationError(
      'Remote signer requires REMOTE_SIGNER_CLIENT_CERT_PATH and REMOTE_SIGNER_CLIENT_KEY_PATH',
    );
  }
  if (!walletPath) {
    throw new ConfigurationError(
      'Remote signer requires REMOTE_SIGNER_WALLET_PATH',
    );
  }

  return {
    kind: 'remote-signer',
    url: config.remoteSignerUrl ?? '',
    clientCertPath: remoteSignerClientCertPath,
    clientKeyPath: remoteSignerClientKeyPath,
    caCertPath: config.remoteSignerCaCertPath,
    walletPath,
    passphrases: config.remoteSignerPassphrases ?? [],
    timeoutMs: config.remoteSignerTimeoutMs,
  };
}

function resolveKeystoreSecret(config: AgentConfig): KeystoreSecret {
  const { keystorePassword, keystoreSecretsPath } = config;

  if (keystorePassword !== undefined && keystoreSecretsPath !== undefined) {
    throw new ConfigurationError(
      'Set only one of KEYSTORE_PASSWORD and KEYSTORE_SECRETS_PATH',
    );
  }
  if (keystorePassword !== undefined) {
    return { kind: 'shared', password: keystorePassword };
  }
  if (keystoreSecretsPath !== undefined) {
    return { kind: 'directory', directory: keystoreSecretsPath };
  }

  throw new ConfigurationError(
    'Keystore requires KEYSTORE_PASSWORD or KEYSTORE_SECRETS_PATH',
  );
}
