import { SigningRequest } from '../common/crypto/crypto.types';
import {
  BlsPublicKey,
  BlsSignature,
  normalizePubkey,
} from '../common/types/common.types';

export type KeySourceKind = 'secret-keys' | 'local-keystore' | 'remote-signer';

export interface SignOptions {
  /** 원격 서명자 호출 타임아웃 (로컬 키 소스는 무시) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Key Source Interface
 *
 * BLS 서명 능력을 제공하는 키 소스
 * - SecretKeys: 설정에 직접 입력된 비밀키
 * - LocalKeystore: EIP-2335 암호화 keystore 디렉토리
 * - RemoteSigner: 원격 서명 서버 (Dirk)
 *
 * 복호화된 키는 프로세스 메모리에만 존재하고 디스크에 저장되지 않음
 */
export abstract class IKeySource {
  abstract readonly kind: KeySourceKind;

  /**
   * 이 키 소스가 서명할 수 있는 공개키 목록
   */
  abstract publicKeys(): Promise<BlsPublicKey[]>;

  /**
   * 지정한 공개키로 서명
   *
   * @throws {UnknownKeyError} pubkey가 publicKeys()에 없는 경우
   * @throws {ConnectionError} 원격 서명자 연결 실패
   * @throws {OperationTimeoutError} timeoutMs 초과
   * @throws {OperationCancelledError} signal이 abort된 경우
   * @throws {RemoteSignerRejectedError} 원격 서명자가 요청을 거부한 경우
   */
  abstract sign(
    pubkey: BlsPublicKey,
    request: SigningRequest,
    options?: SignOptions,
  ): Promise<BlsSignature>;

  /**
   * 보유 여부 확인
   */
  async canSign(pubkey: BlsPublicKey): Promise<boolean> {
    const keys = await this.publicKeys();
    return keys.includes(normalizePubkey(pubkey));
  }

  /**
   * 연결/리소스 정리
   *
   * 기본 구현은 정리할 리소스가 없음 (원격 서명자만 재정의)
   */
  async close(): Promise<void> {
    return Promise.resolve();
  }
}
