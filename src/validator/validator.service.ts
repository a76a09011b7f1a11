import { Injectable, Logger } from '@nestjs/common';
import { concatBytes, hexToBytes } from '@ethereumjs/util';
import { sha256 } from '@noble/hashes/sha2';
import { BlsService } from '../common/crypto/bls.service';
import { SigningRequest } from '../common/crypto/crypto.types';
import {
  MAX_COMMITTED_GAS_LIMIT,
  SigningPurpose,
} from '../common/constants/signing.constants';
import { ConfigurationError } from '../common/errors/configuration.error';
import { MalformedPointError } from '../common/errors/crypto.errors';
import {
  InvalidAuthorizedOperatorError,
  InvalidMaxCommittedGasLimitError,
  InvalidRegistrationSignatureError,
  NotRegisteredValidatorError,
  UnauthorizedCallerError,
  UnsafeRegistrationNotAllowedError,
  ValidatorAlreadyExistsError,
} from '../common/errors/registry.errors';
import {
  addHexPrefix,
  Address,
  BlsPublicKey,
  isValidAddress,
  isZeroAddress,
  normalizeAddress,
} from '../common/types/common.types';
import {
  DelegationVerification,
  DelegationVerifierService,
} from '../delegation/delegation-verifier.service';
import { SignedDelegationMessage } from '../delegation/entities/delegation-message.entity';
import { Validator, ValidatorState } from './entities/validator.entity';
import { IValidatorRepository } from './repositories/validator.repository.interface';
import {
  RecordedRegistryEvent,
  RegisterValidatorParams,
  RegisterValidatorUnsafeParams,
  RegistryEvent,
  RegistryOptions,
} from './validator.types';

/**
 * Validator Service (레지스트리)
 *
 * 상태 머신 (pubkey 단위):
 *   absent → registered → deregistered (종료, 재등록 불가)
 *
 * 변경 호출의 검사 순서:
 * 1. unsafe 등록 플래그
 * 2. caller 주소 형식
 * 3. authorizedOperator != zero address
 * 4. maxCommittedGasLimit 범위 (0 ~ 2^32-1)
 * 5. 존재 여부 / controller 일치
 * 6. proof-of-possession 서명
 *
 * 동시성:
 * - 컨트랙트에서는 트랜잭션 순서가 직렬화를 보장
 * - 여기서는 내부 Promise 큐로 변경 호출을 순서대로 실행
 *   (같은 pubkey를 동시에 등록하면 나중 호출이 ValidatorAlreadyExists)
 */
@Injectable()
export class ValidatorService {
  private readonly logger = new Logger(ValidatorService.name);
  private readonly admin: Address;
  private allowUnsafeRegistration: boolean;
  private readonly events: RecordedRegistryEvent[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: IValidatorRepository,
    private readonly blsService: BlsService,
    private readonly verifier: DelegationVerifierService,
    private readonly options: RegistryOptions,
  ) {
    if (!isValidAddress(options.admin)) {
      throw new ConfigurationError(
        `Registry admin is not a valid address: ${options.admin}`,
      );
    }
    this.admin = normalizeAddress(options.admin);
    this.allowUnsafeRegistration = options.allowUnsafeRegistration;

    if (this.allowUnsafeRegistration) {
      this.logger.warn('Unsafe validator registration is enabled');
    }
  }

  /**
   * Validator 등록 (proof-of-possession 필요)
   *
   * 서명 대상: sha256(pubkey + controller), registration domain
   *
   * @param caller - 트랜잭션 발신자 (controller가 됨)
   * @throws {InvalidAuthorizedOperatorError}
   * @throws {InvalidMaxCommittedGasLimitError}
   * @throws {ValidatorAlreadyExistsError}
   * @throws {InvalidRegistrationSignatureError}
   */
  registerValidator(
    caller: string,
    params: RegisterValidatorParams,
  ): Promise<Validator> {
    return this.serialize(async () => {
      const controller = this.parseCaller(caller);
      const operator = this.parseOperator(params.authorizedOperator);
      this.assertGasLimit(params.maxCommittedGasLimit);
      const pubkey = this.parsePubkey(params.pubkey);
      await this.assertAbsent(pubkey);

      const signingRoot = this.blsService.computeSigningRoot(
        this.buildRegistrationRequest(pubkey, controller),
      );
      let valid: boolean;
      try {
        valid = this.blsService.verifyRoot(pubkey, signingRoot, params.signature);
      } catch (error) {
        if (error instanceof MalformedPointError) {
          throw new InvalidRegistrationSignatureError(pubkey, error.message);
        }
        throw error;
      }
      if (!valid) {
        throw new InvalidRegistrationSignatureError(
          pubkey,
          'proof of possession does not verify',
        );
      }

      return this.create(
        pubkey,
        controller,
        operator,
        params.maxCommittedGasLimit,
        false,
      );
    });
  }

  /**
   * Validator 등록 (서명 검증 없음)
   *
   * allowUnsafeRegistration이 꺼져 있으면 입력과 관계없이 항상 실패
   *
   * @throws {UnsafeRegistrationNotAllowedError}
   */
  registerValidatorUnsafe(
    caller: string,
    params: RegisterValidatorUnsafeParams,
  ): Promise<Validator> {
    return this.serialize(async () => {
      if (!this.allowUnsafeRegistration) {
        throw new UnsafeRegistrationNotAllowedError();
      }

      const controller = this.parseCaller(caller);
      const operator = this.parseOperator(params.authorizedOperator);
      this.assertGasLimit(params.maxCommittedGasLimit);
      const pubkey = this.parsePubkey(params.pubkey);
      await this.assertAbsent(pubkey);

      return this.create(
        pubkey,
        controller,
        operator,
        params.maxCommittedGasLimit,
        true,
      );
    });
  }

  /**
   * 등록 해제 (controller만 가능)
   *
   * 항목은 삭제되지 않고 exists = false로 남음
   */
  deregisterValidator(caller: string, pubkey: string): Promise<void> {
    return this.serialize(async () => {
      const validator = await this.getOwned(caller, pubkey);
      validator.deregister();
      await this.repository.save(validator);

      this.emit({
        type: 'ValidatorDeregistered',
        pubkey: validator.pubkey,
        controller: validator.controller,
      });
      this.logger.log(`Validator deregistered: ${validator.pubkey}`);
    });
  }

  updateMaxCommittedGasLimit(
    caller: string,
    pubkey: string,
    maxCommittedGasLimit: number,
  ): Promise<Validator> {
    return this.serialize(async () => {
      this.assertGasLimit(maxCommittedGasLimit);
      const validator = await this.getOwned(caller, pubkey);

      const previous = validator.maxCommittedGasLimit;
      validator.maxCommittedGasLimit = maxCommittedGasLimit;
      await this.repository.save(validator);

      this.emit({
        type: 'MaxCommittedGasLimitUpdated',
        pubkey: validator.pubkey,
        previous,
        current: maxCommittedGasLimit,
      });
      return validator;
    });
  }

  updateAuthorizedOperator(
    caller: string,
    pubkey: string,
    authorizedOperator: string,
  ): Promise<Validator> {
    return this.serialize(async () => {
      const operator = this.parseOperator(authorizedOperator);
      const validator = await this.getOwned(caller, pubkey);

      const previous = validator.authorizedOperator;
      validator.authorizedOperator = operator;
      await this.repository.save(validator);

      this.emit({
        type: 'AuthorizedOperatorUpdated',
        pubkey: validator.pubkey,
        previous,
        current: operator,
      });
      return validator;
    });
  }

  /**
   * unsafe 등록 플래그 변경 (admin만 가능)
   *
   * @throws {UnauthorizedCallerError}
   */
  setAllowUnsafeRegistration(caller: string, allowed: boolean): Promise<void> {
    return this.serialize(async () => {
      const sender = this.parseCaller(caller);
      // admin이 zero address면 플래그는 고정
      if (isZeroAddress(this.admin) || sender !== this.admin) {
        throw new UnauthorizedCallerError(sender);
      }

      this.allowUnsafeRegistration = allowed;
      this.emit({ type: 'UnsafeRegistrationToggled', caller: sender, allowed });
      this.logger.log(`Unsafe registration ${allowed ? 'enabled' : 'disabled'}`);
    });
  }

  isUnsafeRegistrationAllowed(): boolean {
    return this.allowUnsafeRegistration;
  }

  /**
   * pubkey로 조회 (tombstone 포함)
   *
   * @returns Validator 또는 null (한 번도 등록되지 않은 경우)
   */
  async getValidatorByPubkey(pubkey: string): Promise<Validator | null> {
    return this.repository.findByPubkey(this.parsePubkey(pubkey));
  }

  async getValidatorState(pubkey: string): Promise<ValidatorState> {
    const validator = await this.getValidatorByPubkey(pubkey);
    return validator ? validator.state : 'absent';
  }

  /**
   * operator가 관리하는 등록된 validator 목록
   */
  async getValidatorsByOperator(operator: string): Promise<Validator[]> {
    if (!isValidAddress(operator)) {
      return [];
    }
    const normalized = normalizeAddress(operator);
    const validators = await this.repository.findAll();
    return validators.filter(
      (v) => v.exists && v.authorizedOperator === normalized,
    );
  }

  /**
   * 등록된 validator 전체 (tombstone 제외)
   */
  async getAllValidators(): Promise<Validator[]> {
    const validators = await this.repository.findAll();
    return validators.filter((v) => v.exists);
  }

  /**
   * 위임 메시지 검증 (레지스트리 체인 기준)
   *
   * DelegationStore와 같은 검증기를 사용
   */
  verifyDelegation(signed: SignedDelegationMessage): DelegationVerification {
    return this.verifier.verify(signed, this.options.chainId);
  }

  /**
   * proof-of-possession 서명 요청
   *
   * object root = sha256(pubkey(48) + controller(20))
   */
  buildRegistrationRequest(
    pubkey: BlsPublicKey,
    controller: Address,
  ): SigningRequest {
    return this.blsService.buildSigningRequest(
      sha256(concatBytes(hexToBytes(pubkey), hexToBytes(controller))),
      SigningPurpose.Registration,
      this.options.chainId,
    );
  }

  getEvents(): readonly RecordedRegistryEvent[] {
    return this.events;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // 실패한 호출은 호출자에게 전달되고 큐는 다음 작업으로 진행
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async create(
    pubkey: BlsPublicKey,
    controller: Address,
    operator: Address,
    maxCommittedGasLimit: number,
    unsafe: boolean,
  ): Promise<Validator> {
    const validator = new Validator(
      pubkey,
      controller,
      operator,
      maxCommittedGasLimit,
    );
    await this.repository.save(validator);

    this.emit({
      type: 'ValidatorRegistered',
      pubkey,
      controller,
      authorizedOperator: operator,
      maxCommittedGasLimit,
      unsafe,
    });
    this.logger.log(
      `Validator registered${unsafe ? ' (unsafe)' : ''}: ${pubkey} by ${controller}`,
    );
    return validator;
  }

  private emit(event: RegistryEvent): void {
    this.events.push({ ...event, sequence: this.events.length });
  }

  private parseCaller(caller: string): Address {
    if (!isValidAddress(caller)) {
      throw new UnauthorizedCallerError(addHexPrefix(caller));
    }
    return normalizeAddress(caller);
  }

  private parseOperator(operator: string): Address {
    if (!isValidAddress(operator) || isZeroAddress(operator)) {
      throw new InvalidAuthorizedOperatorError(operator);
    }
    return normalizeAddress(operator);
  }

  private parsePubkey(pubkey: string): BlsPublicKey {
    return this.blsService.parsePublicKey(pubkey);
  }

  private assertGasLimit(gasLimit: number): void {
    if (
      !Number.isSafeInteger(gasLimit) ||
      gasLimit < 0 ||
      gasLimit > MAX_COMMITTED_GAS_LIMIT
    ) {
      throw new InvalidMaxCommittedGasLimitError(gasLimit);
    }
  }

  private async assertAbsent(pubkey: BlsPublicKey): Promise<void> {
    const existing = await this.repository.findByPubkey(pubkey);
    if (existing) {
      throw new ValidatorAlreadyExistsError(pubkey, !existing.exists);
    }
  }

  /**
   * 등록된 항목 + controller 확인
   *
   * @throws {NotRegisteredValidatorError}
   * @throws {UnauthorizedCallerError}
   */
  private async getOwned(caller: string, pubkey: string): Promise<Validator> {
    const sender = this.parseCaller(caller);
    const key = this.parsePubkey(pubkey);
    const validator = await this.repository.findByPubkey(key);

    if (!validator || !validator.exists) {
      throw new NotRegisteredValidatorError(key);
    }
    if (validator.controller !== sender) {
      throw new UnauthorizedCallerError(sender);
    }
    return validator;
  }
}
