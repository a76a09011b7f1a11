import { Module } from '@nestjs/common';
import { AuthorizationModule } from './authorization/authorization.module';
import { CommonModule } from './common/common.module';
import { DelegationModule } from './delegation/delegation.module';
import { KeysModule } from './keys/keys.module';
import { ValidatorModule } from './validator/validator.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Global Modules:
 * - CommonModule: AgentConfig, BlsService, CryptoService
 *
 * Feature Modules:
 * - KeysModule: 설정된 키 소스 (SecretKeys / LocalKeystore / RemoteSigner)
 * - DelegationModule: 위임 서명 / 검증 / DelegationStore
 * - ValidatorModule: Validator 레지스트리
 * - AuthorizationModule: 커밋먼트 요청 인가
 */
@Module({
  imports: [
    CommonModule,
    KeysModule,
    DelegationModule,
    ValidatorModule,
    AuthorizationModule,
  ],
})
export class AppModule {}
