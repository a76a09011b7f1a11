import { Address, BlsPublicKey } from '../../common/types/common.types';

/**
 * 레지스트리 상의 validator 상태
 *
 * - absent: 한 번도 등록되지 않음
 * - registered: 등록됨 (exists = true)
 * - deregistered: 등록 해제됨 (tombstone, 같은 pubkey 재등록 불가)
 */
export type ValidatorState = 'absent' | 'registered' | 'deregistered';

/**
 * Validator Entity
 *
 * 레지스트리 항목 하나
 *
 * 물리 삭제 없음:
 * - 등록 해제는 exists = false로 표시 (tombstone)
 * - controller / operator 값은 기록으로 남음
 */
export class Validator {
  /**
   * BLS 공개키 (압축 G1, 소문자 hex)
   *
   * validator의 고유 식별자
   */
  readonly pubkey: BlsPublicKey;

  exists: boolean;

  /**
   * 등록한 주소
   *
   * 이 주소만 항목을 수정 / 해제할 수 있음
   */
  readonly controller: Address;

  /**
   * 커밋먼트에 서명할 수 있는 실행 레이어 주소 (zero address 불가)
   */
  authorizedOperator: Address;

  /**
   * 슬롯당 커밋할 수 있는 최대 가스
   */
  maxCommittedGasLimit: number;

  constructor(
    pubkey: BlsPublicKey,
    controller: Address,
    authorizedOperator: Address,
    maxCommittedGasLimit: number,
    exists = true,
  ) {
    this.pubkey = pubkey;
    this.controller = controller;
    this.authorizedOperator = authorizedOperator;
    this.maxCommittedGasLimit = maxCommittedGasLimit;
    this.exists = exists;
  }

  get state(): ValidatorState {
    return this.exists ? 'registered' : 'deregistered';
  }

  /**
   * 등록 해제 (tombstone)
   */
  deregister(): void {
    this.exists = false;
  }

  clone(): Validator {
    return new Validator(
      this.pubkey,
      this.controller,
      this.authorizedOperator,
      this.maxCommittedGasLimit,
      this.exists,
    );
  }

  toJSON() {
    return {
      pubkey: this.pubkey,
      exists: this.exists,
      controller: this.controller,
      authorizedOperator: this.authorizedOperator,
      maxCommittedGasLimit: this.maxCommittedGasLimit,
    };
  }
}
