import { BlsPublicKey } from '../../common/types/common.types';
import { Validator } from '../entities/validator.entity';

/**
 * Validator Repository Interface
 *
 * 레지스트리 항목 저장소
 *
 * 구현:
 * - ValidatorMemoryRepository: Map (테스트, 기본값)
 * - ValidatorLevelDBRepository: LevelDB + RLP (영구 저장)
 *
 * 반환되는 Validator는 복사본이므로 수정 후 save()로 저장해야 함
 */
export abstract class IValidatorRepository {
  /**
   * 항목 조회 (tombstone 포함)
   *
   * @returns Validator 또는 null (한 번도 등록되지 않은 경우)
   */
  abstract findByPubkey(pubkey: BlsPublicKey): Promise<Validator | null>;

  abstract save(validator: Validator): Promise<void>;

  /**
   * 모든 항목 조회 (tombstone 포함)
   */
  abstract findAll(): Promise<Validator[]>;

  abstract close(): Promise<void>;
}
