import { Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { AgentConfig } from '../common/config/agent.config';
import { BlsService } from '../common/crypto/bls.service';
import { resolveKeySourceConfig } from './key-source.config';
import { createKeySource } from './key-source.factory';
import { IKeySource } from './key-source.interface';

/**
 * Keys Module
 *
 * 설정에서 선택된 키 소스 하나를 IKeySource로 제공
 *
 * 구성:
 * - SecretKeys: SECRET_KEYS
 * - LocalKeystore: KEYSTORE_PATH + (KEYSTORE_PASSWORD | KEYSTORE_SECRETS_PATH)
 * - RemoteSigner: REMOTE_SIGNER_URL + mTLS 인증서 + wallet 경로
 *
 * 선택이 없거나 2개 이상이면 ConfigurationError로 시작 중단
 */
@Module({
  providers: [
    {
      provide: IKeySource,
      useFactory: (config: AgentConfig, blsService: BlsService) => {
        const keySourceConfig = resolveKeySourceConfig(config);
        new Logger(KeysModule.name).log(
          `Using key source: ${keySourceConfig.kind}`,
        );
        return createKeySource(keySourceConfig, blsService);
      },
      inject: [AgentConfig, BlsService],
    },
  ],
  exports: [IKeySource],
})
export class KeysModule implements OnApplicationShutdown {
  constructor(@Inject(IKeySource) private readonly keySource: IKeySource) {}

  async onApplicationShutdown(): Promise<void> {
    await this.keySource.close();
  }
}
