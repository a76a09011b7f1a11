/**
 * 암호 검증 오류 (항목 단위로 복구 가능)
 *
 * 배치 처리 중 발생하면 로그를 남기고 해당 항목만 건너뜀
 */
export abstract class CryptoValidationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadSignatureError extends CryptoValidationError {
  readonly code = 'BadSignature';
}

/**
 * 곡선 위에 없거나 올바른 subgroup이 아닌 점
 */
export class MalformedPointError extends CryptoValidationError {
  readonly code = 'MalformedPoint';
}

export class WrongChainError extends CryptoValidationError {
  readonly code = 'WrongChain';
}

/**
 * 위임 파일의 레코드 형식 오류
 */
export class MalformedRecordError extends CryptoValidationError {
  readonly code = 'MalformedRecord';
}

export class KeystoreDecryptionError extends CryptoValidationError {
  readonly code = 'KeystoreDecryptionError';

  constructor(
    readonly keystorePath: string,
    message: string,
  ) {
    super(`${keystorePath}: ${message}`);
  }
}

export class UnknownKeyError extends CryptoValidationError {
  readonly code = 'UnknownKey';

  constructor(readonly pubkey: string) {
    super(`Key source cannot sign for ${pubkey}`);
  }
}
