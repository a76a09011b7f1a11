import { Global, Module } from '@nestjs/common';
import { AgentConfig, loadAgentConfig } from './config/agent.config';
import { BlsService } from './crypto/bls.service';
import { CryptoService } from './crypto/crypto.service';

/**
 * CommonModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 자동으로 사용 가능
 *
 * 왜 @Global() 사용:
 * - BlsService는 키 소스, 위임 서명/검증, 레지스트리 모두에서 사용
 * - CryptoService(ECDSA, Keccak, RLP)는 레지스트리 저장소와 커밋먼트 인가에서 사용
 * - AgentConfig는 모든 모듈이 읽는 설정
 *
 * 포함된 서비스:
 * - CryptoService: 실행 레이어 암호화 (secp256k1, Keccak-256, RLP)
 * - BlsService: BLS12-381 서명 + 도메인 분리
 * - AgentConfig: 환경 변수에서 로드 + 검증된 설정
 */
@Global()
@Module({
  providers: [
    CryptoService,
    BlsService,
    {
      provide: AgentConfig,
      useFactory: () => loadAgentConfig(process.env),
    },
  ],
  exports: [CryptoService, BlsService, AgentConfig],
})
export class CommonModule {}
