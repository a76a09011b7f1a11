/**
 * 서명 도메인 / 체인 파라미터 정의
 */

/**
 * BLS_DST: hash-to-curve Domain Separation Tag
 *
 * 이더리움 컨센서스 레이어:
 * - Proof-of-Possession ciphersuite 사용
 * - 모든 BLS 서명(블록, 어테스테이션, 위임 메시지)에 동일
 *
 * 용도별 분리는 DST가 아니라 signing domain(mask)으로 처리함
 */
export const BLS_DST = 'BLS_SIG_BLS12381G2_XMD:SHA-256_SSWU_RO_POP_';

/**
 * SigningPurpose: 서명 용도
 *
 * 용도마다 다른 domain mask를 사용하므로
 * 위임 서명을 커밋먼트 서명으로 재사용(replay)할 수 없음
 */
export enum SigningPurpose {
  Delegation = 'delegation',
  Registration = 'registration',
  Commitment = 'commitment',
}

/**
 * DOMAIN_MASKS: 용도별 4바이트 domain type
 *
 * - Delegation: commit-boost 도메인 ("mmoC")
 * - Registration: "regi"
 * - Commitment: "comm"
 */
export const DOMAIN_MASKS: Record<SigningPurpose, Uint8Array> = {
  [SigningPurpose.Delegation]: Uint8Array.from([0x6d, 0x6d, 0x6f, 0x43]),
  [SigningPurpose.Registration]: Uint8Array.from([0x72, 0x65, 0x67, 0x69]),
  [SigningPurpose.Commitment]: Uint8Array.from([0x63, 0x6f, 0x6d, 0x6d]),
};

export interface ChainSpec {
  name: string;
  chainId: number;
  forkVersion: Uint8Array;
}

/**
 * 지원 체인 목록
 *
 * forkVersion: genesis fork version (도메인 계산에 사용)
 */
export const CHAINS: readonly ChainSpec[] = [
  {
    name: 'mainnet',
    chainId: 1,
    forkVersion: Uint8Array.from([0x00, 0x00, 0x00, 0x00]),
  },
  {
    name: 'holesky',
    chainId: 17000,
    forkVersion: Uint8Array.from([0x01, 0x01, 0x70, 0x00]),
  },
  {
    name: 'helder',
    chainId: 7014190335,
    forkVersion: Uint8Array.from([0x10, 0x00, 0x00, 0x00]),
  },
  {
    name: 'kurtosis',
    chainId: 3151908,
    forkVersion: Uint8Array.from([0x10, 0x00, 0x00, 0x38]),
  },
];

export const DEFAULT_CHAIN_ID = 1;

export function findChain(chainId: number): ChainSpec | undefined {
  return CHAINS.find((chain) => chain.chainId === chainId);
}

/**
 * MAX_COMMITTED_GAS_LIMIT: 레지스트리에 저장 가능한 최대 가스 한도 (uint32)
 */
export const MAX_COMMITTED_GAS_LIMIT = 0xffffffff;
