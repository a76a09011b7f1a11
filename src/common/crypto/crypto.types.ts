/**
 * 암호화 관련 타입 정의
 */

/**
 * Signature: ECDSA 서명 결과 (secp256k1)
 *
 * 용도:
 * - Operator가 커밋먼트에 서명
 * - 서명으로부터 Operator 주소 복구
 *
 * 구성:
 * - r, s: 각 32 bytes (0x + 64 hex chars)
 * - v: 복구 식별자 (27 or 28)
 */
export interface Signature {
  v: number;
  r: string;
  s: string;
}

/**
 * SigningRequest: BLS 서명 요청
 *
 * - objectRoot: 서명할 메시지의 hash tree root (32 bytes)
 * - domain: 용도/체인별 signing domain (32 bytes)
 *
 * 로컬 키 소스는 signing root = sha256(objectRoot + domain)을 직접 계산해서 서명하고,
 * 원격 서명자(Dirk)는 두 값을 그대로 받아 내부에서 계산함
 */
export interface SigningRequest {
  objectRoot: Uint8Array;
  domain: Uint8Array;
}
