/**
 * 원격 서명자 계정
 *
 * distributed 계정은 threshold 서명이므로 composite public key 사용
 */
export interface RemoteAccount {
  name: string;
  publicKey: Uint8Array;
  distributed: boolean;
}

export interface RemoteCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Remote Signer Client Interface
 *
 * Dirk API 호출 추상화 (테스트에서는 in-process fake로 교체)
 *
 * 오류 규칙:
 * - 전송 실패 → ConnectionError
 * - 호출자 취소 → OperationCancelledError
 * - 서명자가 거부(DENIED/FAILED) → RemoteSignerRejectedError
 */
export abstract class IRemoteSignerClient {
  abstract listAccounts(
    walletPath: string,
    options: RemoteCallOptions,
  ): Promise<RemoteAccount[]>;

  /**
   * @returns 잠금 해제 성공 여부 (passphrase 불일치면 false)
   */
  abstract unlockAccount(
    account: string,
    passphrase: string,
    options: RemoteCallOptions,
  ): Promise<boolean>;

  abstract lockAccount(
    account: string,
    options: RemoteCallOptions,
  ): Promise<boolean>;

  /**
   * 서명 요청
   *
   * 서명자가 signing root를 직접 계산함 (data = object root)
   *
   * @returns 96바이트 압축 G2 서명
   */
  abstract sign(
    account: string,
    data: Uint8Array,
    domain: Uint8Array,
    options: RemoteCallOptions,
  ): Promise<Uint8Array>;

  abstract close(): void;
}
