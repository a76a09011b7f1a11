import { Address, BlsPublicKey } from '../types/common.types';

/**
 * 레지스트리 상태 오류
 *
 * 변경 호출의 결과로 즉시 반환됨
 * 재시도는 의미 없음 (요청 자체를 바꿔야 함)
 */
export abstract class RegistryError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidatorAlreadyExistsError extends RegistryError {
  readonly code = 'ValidatorAlreadyExists';

  constructor(
    readonly pubkey: BlsPublicKey,
    readonly deregistered: boolean,
  ) {
    super(
      deregistered
        ? `Validator ${pubkey} was deregistered and cannot be registered again`
        : `Validator ${pubkey} is already registered`,
    );
  }
}

export class InvalidAuthorizedOperatorError extends RegistryError {
  readonly code = 'InvalidAuthorizedOperator';

  constructor(readonly operator: string) {
    super(`Invalid authorized operator: ${operator}`);
  }
}

export class InvalidMaxCommittedGasLimitError extends RegistryError {
  readonly code = 'InvalidMaxCommittedGasLimit';

  constructor(readonly gasLimit: number) {
    super(`Invalid max committed gas limit: ${gasLimit}`);
  }
}

export class UnsafeRegistrationNotAllowedError extends RegistryError {
  readonly code = 'UnsafeRegistrationNotAllowed';

  constructor() {
    super('Unsafe registration is disabled');
  }
}

export class UnauthorizedCallerError extends RegistryError {
  readonly code = 'UnauthorizedCaller';

  constructor(readonly caller: Address) {
    super(`Caller ${caller} is not authorized`);
  }
}

export class NotRegisteredValidatorError extends RegistryError {
  readonly code = 'NotRegisteredValidator';

  constructor(readonly pubkey: BlsPublicKey) {
    super(`Validator ${pubkey} is not registered`);
  }
}

/**
 * Proof-of-possession 서명 검증 실패
 */
export class InvalidRegistrationSignatureError extends RegistryError {
  readonly code = 'BadSignature';

  constructor(
    readonly pubkey: BlsPublicKey,
    reason: string,
  ) {
    super(`Invalid registration signature for ${pubkey}: ${reason}`);
  }
}
