import { BlsService } from '../common/crypto/bls.service';
import { KeySourceConfig } from './key-source.config';
import { IKeySource } from './key-source.interface';
import { LocalKeystoreKeySource } from './keystore/keystore.source';
import { SecretKeysKeySource } from './local/secret-keys.source';
import { DirkClient } from './remote/dirk.client';
import { IRemoteSignerClient } from './remote/remote-signer.client.interface';
import { RemoteSignerKeySource } from './remote/remote-signer.source';

/**
 * 원격 서명자 클라이언트 생성 함수 (테스트에서 fake 주입)
 */
export type RemoteSignerClientFactory = (
  config: Extract<KeySourceConfig, { kind: 'remote-signer' }>,
) => IRemoteSignerClient;

export const createDirkClient: RemoteSignerClientFactory = (config) =>
  new DirkClient(config.url, {
    clientCertPath: config.clientCertPath,
    clientKeyPath: config.clientKeyPath,
    caCertPath: config.caCertPath,
  });

/**
 * KeySourceConfig → IKeySource
 */
export function createKeySource(
  config: KeySourceConfig,
  blsService: BlsService,
  createRemoteClient: RemoteSignerClientFactory = createDirkClient,
): IKeySource {
  switch (config.kind) {
    case 'secret-keys':
      return new SecretKeysKeySource(blsService, config.secretKeys);
    case 'local-keystore':
      return new LocalKeystoreKeySource(blsService, config.path, config.secret);
    case 'remote-signer':
      return new RemoteSignerKeySource(blsService, createRemoteClient(config), {
        walletPath: config.walletPath,
        passphrases: config.passphrases,
        timeoutMs: config.timeoutMs,
      });
  }
}
