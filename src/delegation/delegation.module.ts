import { Module } from '@nestjs/common';
import { DelegationSignerService } from './delegation-signer.service';
import { DelegationStoreService } from './delegation-store.service';
import { DelegationVerifierService } from './delegation-verifier.service';

/**
 * Delegation Module
 *
 * 구성:
 * - DelegationVerifierService: 위임 메시지 검증 (레지스트리와 공유)
 * - DelegationSignerService: 키 소스로 위임/회수 메시지 서명
 * - DelegationStoreService: 시작 시 위임 파일 로드 + resolveSigner
 */
@Module({
  providers: [
    DelegationVerifierService,
    DelegationSignerService,
    DelegationStoreService,
  ],
  exports: [
    DelegationVerifierService,
    DelegationSignerService,
    DelegationStoreService,
  ],
})
export class DelegationModule {}
