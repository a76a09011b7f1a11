import { Injectable, Logger } from '@nestjs/common';
import { concatBytes, hexToBytes } from '@ethereumjs/util';
import { AgentConfig } from '../common/config/agent.config';
import { BlsService } from '../common/crypto/bls.service';
import { CryptoService } from '../common/crypto/crypto.service';
import { Signature } from '../common/crypto/crypto.types';
import { SigningPurpose } from '../common/constants/signing.constants';
import { UnknownKeyError } from '../common/errors/crypto.errors';
import {
  Address,
  BlsPublicKey,
  BlsSignature,
  Hex,
  isHexString,
} from '../common/types/common.types';
import { errorMessage } from '../common/utils/error.util';
import { DelegationStoreService } from '../delegation/delegation-store.service';
import { IKeySource, SignOptions } from '../keys/key-source.interface';
import { ValidatorService } from '../validator/validator.service';

export interface OperatorAuthorizationRequest {
  validatorPubkey: string;
  /** keccak-256 커밋먼트 digest */
  commitmentDigest: Hex;
  operatorSignature: Signature;
}

export type OperatorAuthorization =
  | { authorized: true; operator: Address }
  | {
      authorized: false;
      reason:
        | 'NotRegisteredValidator'
        | 'UnauthorizedOperator'
        | 'InvalidOperatorSignature';
      detail: string;
    };

export interface ConstraintSigner {
  signer: BlsPublicKey;
  /** true: delegatee 키, false: validator 자신의 키 */
  delegated: boolean;
  canSignLocally: boolean;
}

/**
 * Commitment Authorizer
 *
 * 커밋먼트 요청 인가:
 * 1. 레지스트리: validator가 등록되어 있고,
 *    커밋먼트 서명(ECDSA)의 복구 주소가 authorizedOperator인지
 * 2. DelegationStore: 누가 validator 대신 constraint에 BLS 서명할 수 있는지
 *
 * constraint 서명은 commitment domain을 사용하므로
 * 위임 서명과 서로 재사용할 수 없음
 */
@Injectable()
export class CommitmentAuthorizerService {
  private readonly logger = new Logger(CommitmentAuthorizerService.name);

  constructor(
    private readonly validatorService: ValidatorService,
    private readonly delegationStore: DelegationStoreService,
    private readonly keySource: IKeySource,
    private readonly cryptoService: CryptoService,
    private readonly blsService: BlsService,
    private readonly config: AgentConfig,
  ) {}

  /**
   * 커밋먼트 digest
   *
   * keccak256(validatorPubkey(48) + slot(u64 little-endian) + payloadHashes...)
   */
  commitmentDigest(
    validatorPubkey: BlsPublicKey,
    slot: number,
    payloadHashes: Hex[],
  ): Hex {
    if (!Number.isSafeInteger(slot) || slot < 0) {
      throw new Error(`Invalid slot: ${slot}`);
    }
    for (const hash of payloadHashes) {
      if (!isHexString(hash, 32)) {
        throw new Error(`Invalid payload hash: ${hash}`);
      }
    }

    const slotBytes = new Uint8Array(8);
    new DataView(slotBytes.buffer).setBigUint64(0, BigInt(slot), true);

    return this.cryptoService.hashBuffer(
      concatBytes(
        hexToBytes(validatorPubkey),
        slotBytes,
        ...payloadHashes.map((hash) => hexToBytes(hash)),
      ),
    );
  }

  /**
   * operator 서명 인가
   *
   * 레지스트리 수준 인가 (BLS 위임과는 별개)
   */
  async authorizeOperator(
    request: OperatorAuthorizationRequest,
  ): Promise<OperatorAuthorization> {
    const validator = await this.validatorService.getValidatorByPubkey(
      request.validatorPubkey,
    );
    if (!validator || !validator.exists) {
      return {
        authorized: false,
        reason: 'NotRegisteredValidator',
        detail: `${request.validatorPubkey} is not registered`,
      };
    }

    let operator: Address;
    try {
      operator = this.cryptoService.recoverAddress(
        request.commitmentDigest,
        request.operatorSignature,
      );
    } catch (error) {
      return {
        authorized: false,
        reason: 'InvalidOperatorSignature',
        detail: errorMessage(error),
      };
    }

    if (operator !== validator.authorizedOperator) {
      this.logger.warn(
        `Commitment for ${validator.pubkey} signed by ${operator}, expected ${validator.authorizedOperator}`,
      );
      return {
        authorized: false,
        reason: 'UnauthorizedOperator',
        detail: `${operator} is not the authorized operator`,
      };
    }

    return { authorized: true, operator };
  }

  /**
   * constraint 서명 키 결정
   *
   * 1. 활성 위임이 있으면 delegatee
   * 2. 없으면 FALLBACK_TO_VALIDATOR_KEY에 따라 validator 키 또는 null
   */
  async resolveConstraintSigner(
    validatorPubkey: BlsPublicKey,
  ): Promise<ConstraintSigner | null> {
    const pubkey = this.blsService.parsePublicKey(validatorPubkey);
    const delegatee = this.delegationStore.resolveSigner(pubkey);

    if (delegatee) {
      return {
        signer: delegatee,
        delegated: true,
        canSignLocally: await this.keySource.canSign(delegatee),
      };
    }

    if (!this.config.fallbackToValidatorKey) {
      return null;
    }

    return {
      signer: pubkey,
      delegated: false,
      canSignLocally: await this.keySource.canSign(pubkey),
    };
  }

  /**
   * validator를 대신해 constraint에 서명 (commitment domain)
   *
   * @throws {UnknownKeyError} 서명할 수 있는 키가 없는 경우
   */
  async signConstraint(
    validatorPubkey: BlsPublicKey,
    objectRoot: Uint8Array,
    options?: SignOptions,
  ): Promise<{ signer: BlsPublicKey; signature: BlsSignature }> {
    const resolved = await this.resolveConstraintSigner(validatorPubkey);
    if (!resolved || !resolved.canSignLocally) {
      throw new UnknownKeyError(resolved ? resolved.signer : validatorPubkey);
    }

    const signature = await this.keySource.sign(
      resolved.signer,
      this.blsService.buildSigningRequest(
        objectRoot,
        SigningPurpose.Commitment,
        this.config.chainId,
      ),
      options,
    );
    return { signer: resolved.signer, signature };
  }

  /**
   * constraint 서명 검증 (commitment domain)
   *
   * @throws {MalformedPointError}
   */
  verifyConstraint(
    signer: BlsPublicKey,
    objectRoot: Uint8Array,
    signature: BlsSignature,
  ): boolean {
    const request = this.blsService.buildSigningRequest(
      objectRoot,
      SigningPurpose.Commitment,
      this.config.chainId,
    );
    return this.blsService.verifyRoot(
      signer,
      this.blsService.computeSigningRoot(request),
      signature,
    );
  }
}
