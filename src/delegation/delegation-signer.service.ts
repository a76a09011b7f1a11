import { Injectable, Logger } from '@nestjs/common';
import { BlsService } from '../common/crypto/bls.service';
import { SigningPurpose } from '../common/constants/signing.constants';
import { BadSignatureError } from '../common/errors/crypto.errors';
import { BlsPublicKey } from '../common/types/common.types';
import { retryWithBackoff } from '../common/utils/async.util';
import { IKeySource, SignOptions } from '../keys/key-source.interface';
import { delegationDigest } from './delegation.codec';
import { DelegationVerifierService } from './delegation-verifier.service';
import {
  DelegationAction,
  DelegationMessage,
  SignedDelegationMessage,
} from './entities/delegation-message.entity';

export interface DelegationSignOptions extends SignOptions {
  /** ConnectionError 재시도 횟수 (원격 서명자만 해당) */
  maxRetries?: number;
}

/**
 * Delegation Signer
 *
 * 키 소스로 위임/회수 메시지에 서명
 *
 * 동작:
 * 1. 메시지 생성 (action, chainId, validatorPubkey, delegateePubkey)
 * 2. object root = sha256(정규 인코딩), domain = delegation domain
 * 3. 키 소스에 서명 요청
 * 4. 결과를 바로 검증 (잘못된 서명은 파일에 쓰지 않음)
 *
 * 여러 validator는 메시지 하나씩 (집계 서명 아님)
 */
@Injectable()
export class DelegationSignerService {
  private readonly logger = new Logger(DelegationSignerService.name);

  constructor(
    private readonly blsService: BlsService,
    private readonly verifier: DelegationVerifierService,
  ) {}

  /**
   * 키 소스가 가진 모든 키로 메시지 생성
   */
  async signAll(
    keySource: IKeySource,
    delegateePubkey: BlsPublicKey,
    action: DelegationAction,
    chainId: number,
    options: DelegationSignOptions = {},
  ): Promise<SignedDelegationMessage[]> {
    const pubkeys = await keySource.publicKeys();
    this.logger.log(
      `Signing ${pubkeys.length} ${DelegationAction[action]} messages with ${keySource.kind}`,
    );

    const signed: SignedDelegationMessage[] = [];
    for (const validatorPubkey of pubkeys) {
      signed.push(
        await this.sign(
          keySource,
          validatorPubkey,
          delegateePubkey,
          action,
          chainId,
          options,
        ),
      );
    }
    return signed;
  }

  /**
   * 단일 validator 메시지 서명
   *
   * @throws {UnknownKeyError} 키 소스가 validatorPubkey를 갖고 있지 않은 경우
   * @throws {BadSignatureError} 키 소스가 반환한 서명이 검증되지 않는 경우
   */
  async sign(
    keySource: IKeySource,
    validatorPubkey: BlsPublicKey,
    delegateePubkey: BlsPublicKey,
    action: DelegationAction,
    chainId: number,
    options: DelegationSignOptions = {},
  ): Promise<SignedDelegationMessage> {
    const message: DelegationMessage = {
      action,
      chainId,
      validatorPubkey: this.blsService.parsePublicKey(validatorPubkey),
      delegateePubkey: this.blsService.parsePublicKey(delegateePubkey),
    };

    const request = this.blsService.buildSigningRequest(
      delegationDigest(message),
      SigningPurpose.Delegation,
      chainId,
    );

    const signature = await retryWithBackoff(
      () =>
        keySource.sign(message.validatorPubkey, request, {
          timeoutMs: options.timeoutMs,
          signal: options.signal,
        }),
      { maxRetries: options.maxRetries ?? 0 },
    );

    const signed = { message, signature };
    const verification = this.verifier.verify(signed, chainId);
    if (!verification.valid) {
      throw new BadSignatureError(
        `Produced signature for ${message.validatorPubkey} failed verification: ${verification.detail}`,
      );
    }

    return signed;
  }
}
