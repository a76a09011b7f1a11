import { Injectable, Logger } from '@nestjs/common';
import { BlsService } from '../common/crypto/bls.service';
import { SigningPurpose } from '../common/constants/signing.constants';
import { CryptoValidationError } from '../common/errors/crypto.errors';
import { errorMessage } from '../common/utils/error.util';
import { delegationDigest } from './delegation.codec';
import { SignedDelegationMessage } from './entities/delegation-message.entity';

export type VerificationFailureReason =
  | 'WrongChain'
  | 'MalformedPoint'
  | 'BadSignature';

export type DelegationVerification =
  | { valid: true }
  | { valid: false; reason: VerificationFailureReason; detail: string };

/**
 * Delegation Verifier
 *
 * 서명된 위임/회수 메시지 검증
 *
 * 검증 순서 (첫 실패에서 중단):
 * 1. WrongChain: message.chainId !== expectedChainId, 또는 지원하지 않는 체인
 * 2. MalformedPoint: validator / delegatee 공개키, 서명이 올바른 점이 아님
 * 3. BadSignature: pairing check 실패
 *
 * 레지스트리(verifyDelegation)와 DelegationStore가 같은 인스턴스를 사용하므로
 * 같은 입력에 대해 항상 같은 판정을 내림
 */
@Injectable()
export class DelegationVerifierService {
  private readonly logger = new Logger(DelegationVerifierService.name);

  constructor(private readonly blsService: BlsService) {}

  verify(
    signed: SignedDelegationMessage,
    expectedChainId: number,
  ): DelegationVerification {
    const { message } = signed;

    if (message.chainId !== expectedChainId) {
      return this.reject(
        'WrongChain',
        `message chain id ${message.chainId} does not match ${expectedChainId}`,
      );
    }

    let domain: Uint8Array;
    try {
      domain = this.blsService.computeDomain(
        SigningPurpose.Delegation,
        message.chainId,
      );
    } catch (error) {
      return this.reject('WrongChain', errorMessage(error));
    }

    try {
      this.blsService.parsePublicKey(message.validatorPubkey);
      this.blsService.parsePublicKey(message.delegateePubkey);
      this.blsService.parseSignature(signed.signature);
    } catch (error) {
      return this.reject('MalformedPoint', errorMessage(error));
    }

    let objectRoot: Uint8Array;
    try {
      objectRoot = delegationDigest(message);
    } catch (error) {
      if (error instanceof CryptoValidationError) {
        return this.reject('BadSignature', error.message);
      }
      throw error;
    }

    const signingRoot = this.blsService.computeSigningRoot({
      objectRoot,
      domain,
    });
    const valid = this.blsService.verifyRoot(
      message.validatorPubkey,
      signingRoot,
      signed.signature,
    );

    return valid
      ? { valid: true }
      : this.reject(
          'BadSignature',
          `signature does not verify under ${message.validatorPubkey}`,
        );
  }

  /**
   * 인가 판정
   *
   * Invalid 사유는 진단용이고 인가 관점에서는 모두 거부
   */
  isAuthorized(result: DelegationVerification): boolean {
    return result.valid;
  }

  private reject(
    reason: VerificationFailureReason,
    detail: string,
  ): DelegationVerification {
    this.logger.debug(`Delegation rejected (${reason}): ${detail}`);
    return { valid: false, reason, detail };
  }
}
