/**
 * 프로젝트 전체에서 사용되는 공통 타입 정의
 * 이더리움 / 컨센서스 레이어와 동일한 hex 형식을 따름
 */

/**
 * Hex: "0x" 접두사가 붙은 hex 문자열
 */
export type Hex = `0x${string}`;

/**
 * Address: 이더리움 실행 레이어 주소
 *
 * - 20바이트 (40 hex chars) + "0x"
 * - 레지스트리 내부에서는 항상 소문자로 정규화
 */
export type Address = Hex;

/**
 * BlsPublicKey: 압축된 BLS12-381 G1 점
 *
 * - 48바이트 (96 hex chars) + "0x"
 * - Validator의 고유 식별자
 */
export type BlsPublicKey = Hex;

/**
 * BlsSignature: 압축된 BLS12-381 G2 점
 *
 * - 96바이트 (192 hex chars) + "0x"
 */
export type BlsSignature = Hex;

export const BLS_PUBLIC_KEY_LENGTH = 48;
export const BLS_SIGNATURE_LENGTH = 96;
export const BLS_SECRET_KEY_LENGTH = 32;
export const ADDRESS_LENGTH = 20;

/**
 * Zero Address
 *
 * authorizedOperator로 사용할 수 없음
 */
export const ZERO_ADDRESS: Address = `0x${'0'.repeat(40)}`;

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): Hex {
  return `0x${stripHexPrefix(hex)}`;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 48 = 96 hex chars)
 */
export function isHexString(value: unknown, byteLength?: number): value is Hex {
  if (typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

export function isValidAddress(address: unknown): address is Address {
  return isHexString(address, ADDRESS_LENGTH);
}

export function isValidBlsPublicKeyHex(value: unknown): value is BlsPublicKey {
  return isHexString(value, BLS_PUBLIC_KEY_LENGTH);
}

export function isValidBlsSignatureHex(value: unknown): value is BlsSignature {
  return isHexString(value, BLS_SIGNATURE_LENGTH);
}

/**
 * 주소 정규화 (소문자)
 *
 * 이더리움 주소는 case-insensitive
 */
export function normalizeAddress(address: Address): Address {
  return addHexPrefix(address.toLowerCase());
}

/**
 * hex 정규화 (소문자, 0x 접두사)
 */
export function normalizeHex(value: string): Hex {
  return addHexPrefix(value.toLowerCase());
}

/**
 * BLS 공개키 정규화
 */
export function normalizePubkey(pubkey: string): BlsPublicKey {
  return normalizeHex(pubkey);
}

export function isZeroAddress(address: Address): boolean {
  return normalizeAddress(address) === ZERO_ADDRESS;
}
