import { Test, TestingModule } from '@nestjs/testing';
import { CommonModule } from '../../src/common/common.module';
import { AgentConfig } from '../../src/common/config/agent.config';
import { BlsService } from '../../src/common/crypto/bls.service';
import { CryptoService } from '../../src/common/crypto/crypto.service';

/**
 * CommonModule 테스트
 *
 * - 전역 제공자 등록 확인 (CryptoService, BlsService, AgentConfig)
 * - AgentConfig는 process.env에서 로드
 */
describe('CommonModule', () => {
  let module: TestingModule;
  const originalEnv = process.env;

  beforeEach(async () => {
    process.env = { ...originalEnv, CHAIN_ID: '17000' };
    module = await Test.createTestingModule({
      imports: [CommonModule],
    }).compile();
  });

  afterEach(async () => {
    process.env = originalEnv;
    await module.close();
  });

  it('should provide CryptoService and BlsService', () => {
    expect(module.get(CryptoService)).toBeInstanceOf(CryptoService);
    expect(module.get(BlsService)).toBeInstanceOf(BlsService);
  });

  it('AgentConfig를 환경 변수에서 로드해야 함', () => {
    const config = module.get(AgentConfig);

    expect(config).toBeInstanceOf(AgentConfig);
    expect(config.chainId).toBe(17000);
  });

  it('같은 인스턴스를 반환해야 함 (싱글톤)', () => {
    expect(module.get(BlsService)).toBe(module.get(BlsService));
  });
});
