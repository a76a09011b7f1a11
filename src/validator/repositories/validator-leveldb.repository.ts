import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { bytesToHex, bytesToInt, hexToBytes } from '@ethereumjs/util';
import { ClassicLevel } from 'classic-level';
import { CryptoService } from '../../common/crypto/crypto.service';
import {
  BlsPublicKey,
  isValidAddress,
  isValidBlsPublicKeyHex,
  normalizePubkey,
} from '../../common/types/common.types';
import { Validator } from '../entities/validator.entity';
import { IValidatorRepository } from './validator.repository.interface';

const KEY_PREFIX = 'validator:';

/**
 * classic-level의 NotFound 오류 판별
 *
 * 네이티브 바인딩에서 온 오류는 다른 realm의 Error일 수 있어 code만 확인
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'LEVEL_NOT_FOUND'
  );
}

/**
 * ValidatorLevelDBRepository
 *
 * 저장 구조:
 * - Key: "validator:" + pubkey (소문자 hex)
 * - Value: RLP([pubkey, exists, controller, authorizedOperator, maxCommittedGasLimit])
 *   (hex 문자열로 저장)
 *
 * tombstone도 그대로 저장되므로 재시작 후에도 재등록이 막힘
 */
export class ValidatorLevelDBRepository
  implements IValidatorRepository, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(ValidatorLevelDBRepository.name);
  private readonly db: ClassicLevel;

  constructor(
    private readonly cryptoService: CryptoService,
    location: string,
  ) {
    this.db = new ClassicLevel(location);
  }

  async onModuleInit(): Promise<void> {
    await this.db.open();
    this.logger.log(`Registry LevelDB opened at ${this.db.location}`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  async findByPubkey(pubkey: BlsPublicKey): Promise<Validator | null> {
    try {
      const value = await this.db.get(this.key(pubkey));
      return this.decode(value);
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async save(validator: Validator): Promise<void> {
    const encoded = this.cryptoService.rlpEncode([
      hexToBytes(validator.pubkey),
      validator.exists ? 1 : 0,
      hexToBytes(validator.controller),
      hexToBytes(validator.authorizedOperator),
      validator.maxCommittedGasLimit,
    ]);

    await this.db.put(
      this.key(validator.pubkey),
      Buffer.from(encoded).toString('hex'),
    );
  }

  async findAll(): Promise<Validator[]> {
    const validators: Validator[] = [];
    for await (const value of this.db.values({
      gte: KEY_PREFIX,
      lt: `${KEY_PREFIX.slice(0, -1)};`,
    })) {
      validators.push(this.decode(value));
    }
    return validators;
  }

  async close(): Promise<void> {
    if (this.db.status === 'open' || this.db.status === 'opening') {
      await this.db.close();
    }
  }

  private key(pubkey: BlsPublicKey): string {
    return `${KEY_PREFIX}${normalizePubkey(pubkey)}`;
  }

  /**
   * RLP 디코딩
   *
   * @throws {Error} 저장된 값의 형식이 잘못된 경우
   */
  private decode(value: string): Validator {
    const decoded = this.cryptoService.rlpDecode(Buffer.from(value, 'hex'));

    if (!Array.isArray(decoded) || decoded.length !== 5) {
      throw new Error('Corrupt validator record: expected 5 RLP fields');
    }
    const [pubkeyBytes, existsBytes, controllerBytes, operatorBytes, gasBytes] =
      decoded;
    if (
      !(pubkeyBytes instanceof Uint8Array) ||
      !(existsBytes instanceof Uint8Array) ||
      !(controllerBytes instanceof Uint8Array) ||
      !(operatorBytes instanceof Uint8Array) ||
      !(gasBytes instanceof Uint8Array)
    ) {
      throw new Error('Corrupt validator record: nested RLP list');
    }

    const pubkey = bytesToHex(pubkeyBytes);
    const controller = bytesToHex(controllerBytes);
    const operator = bytesToHex(operatorBytes);
    if (
      !isValidBlsPublicKeyHex(pubkey) ||
      !isValidAddress(controller) ||
      !isValidAddress(operator)
    ) {
      throw new Error('Corrupt validator record: invalid field length');
    }

    return new Validator(
      pubkey,
      controller,
      operator,
      bytesToInt(gasBytes),
      bytesToInt(existsBytes) === 1,
    );
  }
}
