import { Injectable } from '@nestjs/common';
import { BlsPublicKey, normalizePubkey } from '../../common/types/common.types';
import { Validator } from '../entities/validator.entity';
import { IValidatorRepository } from './validator.repository.interface';

/**
 * In-Memory Validator Repository
 *
 * - Map<BlsPublicKey, Validator>
 * - 재시작하면 초기화됨 (REGISTRY_STORAGE=memory)
 */
@Injectable()
export class ValidatorMemoryRepository implements IValidatorRepository {
  private readonly validators = new Map<BlsPublicKey, Validator>();

  async findByPubkey(pubkey: BlsPublicKey): Promise<Validator | null> {
    const validator = this.validators.get(normalizePubkey(pubkey));
    return validator ? validator.clone() : null;
  }

  async save(validator: Validator): Promise<void> {
    this.validators.set(normalizePubkey(validator.pubkey), validator.clone());
  }

  async findAll(): Promise<Validator[]> {
    return Array.from(this.validators.values(), (v) => v.clone());
  }

  async close(): Promise<void> {
    this.validators.clear();
  }
}
