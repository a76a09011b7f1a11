import { Test, TestingModule } from '@nestjs/testing';
import { BlsService } from '../../src/common/crypto/bls.service';
import { DelegationVerifierService } from '../../src/delegation/delegation-verifier.service';
import {
  DelegationAction,
  SignedDelegationMessage,
} from '../../src/delegation/entities/delegation-message.entity';
import { HOLESKY, MAINNET, pubkeyOf, signedDelegation } from '../helpers/fixtures';

/**
 * DelegationVerifierService 테스트
 *
 * 검증 순서: WrongChain → MalformedPoint → BadSignature
 */
describe('DelegationVerifierService', () => {
  let module: TestingModule;
  let verifier: DelegationVerifierService;

  // 곡선 위에 없는 48바이트 (압축 플래그만 설정)
  const notOnCurve = `0x8${'1'.repeat(95)}` as const;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      providers: [BlsService, DelegationVerifierService],
    }).compile();
    verifier = module.get(DelegationVerifierService);
  });

  afterAll(async () => {
    await module.close();
  });

  it('올바른 위임 메시지는 valid', () => {
    const result = verifier.verify(signedDelegation(1, pubkeyOf(2)), MAINNET);

    expect(result).toEqual({ valid: true });
    expect(verifier.isAuthorized(result)).toBe(true);
  });

  it('Revoke 메시지도 같은 규칙으로 검증', () => {
    const signed = signedDelegation(1, pubkeyOf(2), DelegationAction.Revoke);

    expect(verifier.verify(signed, MAINNET).valid).toBe(true);
  });

  it('다른 체인에서 서명된 메시지는 WrongChain', () => {
    const result = verifier.verify(
      signedDelegation(1, pubkeyOf(2), DelegationAction.Delegate, HOLESKY),
      MAINNET,
    );

    expect(result).toEqual({
      valid: false,
      reason: 'WrongChain',
      detail: 'message chain id 17000 does not match 1',
    });
    expect(verifier.isAuthorized(result)).toBe(false);
  });

  it('기대 체인이 지원되지 않으면 WrongChain', () => {
    const signed = signedDelegation(1, pubkeyOf(2));
    const forged: SignedDelegationMessage = {
      ...signed,
      message: { ...signed.message, chainId: 5 },
    };

    expect(verifier.verify(forged, 5)).toMatchObject({
      valid: false,
      reason: 'WrongChain',
      detail: 'unsupported chain id 5',
    });
  });

  describe('서명 이후 필드가 바뀌면 BadSignature', () => {
    const signed = signedDelegation(1, pubkeyOf(2));

    it.each<[string, SignedDelegationMessage]>([
      [
        'action',
        { ...signed, message: { ...signed.message, action: DelegationAction.Revoke } },
      ],
      [
        'validatorPubkey',
        { ...signed, message: { ...signed.message, validatorPubkey: pubkeyOf(3) } },
      ],
      [
        'delegateePubkey',
        { ...signed, message: { ...signed.message, delegateePubkey: pubkeyOf(3) } },
      ],
      ['signature', { ...signed, signature: signedDelegation(1, pubkeyOf(3)).signature }],
    ])('%s', (_field, tampered) => {
      expect(verifier.verify(tampered, MAINNET)).toMatchObject({
        valid: false,
        reason: 'BadSignature',
      });
    });

    it('chainId 변경은 WrongChain이 먼저', () => {
      const tampered: SignedDelegationMessage = {
        ...signed,
        message: { ...signed.message, chainId: HOLESKY },
      };

      expect(verifier.verify(tampered, MAINNET)).toMatchObject({
        reason: 'WrongChain',
      });
      expect(verifier.verify(tampered, HOLESKY)).toMatchObject({
        reason: 'BadSignature',
      });
    });
  });

  describe('MalformedPoint', () => {
    const signed = signedDelegation(1, pubkeyOf(2));

    it('validator 공개키가 곡선 위에 없음', () => {
      const result = verifier.verify(
        { ...signed, message: { ...signed.message, validatorPubkey: notOnCurve } },
        MAINNET,
      );

      expect(result).toMatchObject({ valid: false, reason: 'MalformedPoint' });
    });

    it('delegatee 공개키가 무한원점', () => {
      const infinity = `0xc${'0'.repeat(95)}` as const;
      const result = verifier.verify(
        { ...signed, message: { ...signed.message, delegateePubkey: infinity } },
        MAINNET,
      );

      expect(result).toEqual({
        valid: false,
        reason: 'MalformedPoint',
        detail: 'public key is the point at infinity',
      });
    });

    it('서명이 G2 점이 아님', () => {
      const result = verifier.verify(
        { ...signed, signature: `0x${'00'.repeat(96)}` },
        MAINNET,
      );

      expect(result).toMatchObject({ valid: false, reason: 'MalformedPoint' });
    });

    it('WrongChain이 MalformedPoint보다 먼저', () => {
      const result = verifier.verify(
        {
          ...signed,
          message: {
            ...signed.message,
            chainId: HOLESKY,
            validatorPubkey: notOnCurve,
          },
        },
        MAINNET,
      );

      expect(result).toMatchObject({ reason: 'WrongChain' });
    });
  });

  it('같은 입력에는 항상 같은 판정', () => {
    const signed = signedDelegation(4, pubkeyOf(5));

    expect(verifier.verify(signed, MAINNET)).toEqual(
      verifier.verify(signed, MAINNET),
    );
  });
});
