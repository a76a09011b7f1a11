import { Test, TestingModule } from '@nestjs/testing';
import { AgentConfig, loadAgentConfig } from '../../src/common/config/agent.config';
import { CommonModule } from '../../src/common/common.module';
import { signedDelegationToJson } from '../../src/delegation/delegation.codec';
import { DelegationModule } from '../../src/delegation/delegation.module';
import { DelegationStoreService } from '../../src/delegation/delegation-store.service';
import {
  DelegationAction,
  SignedDelegationMessage,
} from '../../src/delegation/entities/delegation-message.entity';
import { ValidatorModule } from '../../src/validator/validator.module';
import { ValidatorService } from '../../src/validator/validator.service';
import { HOLESKY, pubkeyOf, signedDelegation } from '../helpers/fixtures';

/**
 * 레지스트리 verifyDelegation과 DelegationStore가
 * 같은 입력에 대해 같은 판정을 내리는지 확인
 */
describe('delegation verification conformance', () => {
  let module: TestingModule;
  let registry: ValidatorService;
  let store: DelegationStoreService;

  const valid = signedDelegation(1, pubkeyOf(20), DelegationAction.Delegate, HOLESKY);
  const fixtures: Array<[string, SignedDelegationMessage]> = [
    ['valid delegate', valid],
    ['valid revoke', signedDelegation(2, pubkeyOf(20), DelegationAction.Revoke, HOLESKY)],
    ['other chain', signedDelegation(3, pubkeyOf(20))],
    [
      'tampered delegatee',
      { ...valid, message: { ...valid.message, delegateePubkey: pubkeyOf(21) } },
    ],
    [
      'tampered action',
      { ...valid, message: { ...valid.message, action: DelegationAction.Revoke } },
    ],
    ['foreign signature', { ...valid, signature: signedDelegation(4, pubkeyOf(20), DelegationAction.Delegate, HOLESKY).signature }],
    [
      'malformed delegatee',
      { ...valid, message: { ...valid.message, delegateePubkey: `0x${'ab'.repeat(48)}` } },
    ],
  ];

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [CommonModule, DelegationModule, ValidatorModule],
    })
      .overrideProvider(AgentConfig)
      .useValue(loadAgentConfig({ CHAIN_ID: String(HOLESKY) }))
      .compile();
    await module.init();

    registry = module.get(ValidatorService);
    store = module.get(DelegationStoreService);
  });

  afterAll(async () => {
    await module.close();
  });

  it.each(fixtures)('%s', (_name, signed) => {
    const verdict = registry.verifyDelegation(signed);
    const report = store.load([signedDelegationToJson(signed)]);

    if (verdict.valid) {
      expect(report.rejected).toEqual([]);
    } else {
      expect(report.rejected).toEqual([
        { index: 0, reason: verdict.reason, detail: verdict.detail },
      ]);
    }
  });

  it('유효한 fixture만 true', () => {
    expect(
      fixtures.map(([name, signed]) => [name, registry.verifyDelegation(signed).valid]),
    ).toEqual([
      ['valid delegate', true],
      ['valid revoke', true],
      ['other chain', false],
      ['tampered delegatee', false],
      ['tampered action', false],
      ['foreign signature', false],
      ['malformed delegatee', false],
    ]);
  });
});
