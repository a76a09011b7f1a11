import { Logger } from '@nestjs/common';
import { BlsService } from '../../common/crypto/bls.service';
import { SigningRequest } from '../../common/crypto/crypto.types';
import { ConfigurationError } from '../../common/errors/configuration.error';
import { UnknownKeyError } from '../../common/errors/crypto.errors';
import {
  BlsPublicKey,
  BlsSignature,
  normalizePubkey,
} from '../../common/types/common.types';
import { IKeySource, KeySourceKind } from '../key-source.interface';

/**
 * SecretKeys Key Source
 *
 * 설정에 직접 입력된 BLS 비밀키 목록
 * - 공개키는 secretKey * G1 generator로 계산
 * - 잘못된 키가 하나라도 있으면 시작 단계에서 ConfigurationError
 */
export class SecretKeysKeySource extends IKeySource {
  readonly kind: KeySourceKind = 'secret-keys';

  private readonly logger = new Logger(SecretKeysKeySource.name);
  private readonly keys = new Map<BlsPublicKey, Uint8Array>();

  constructor(
    private readonly blsService: BlsService,
    secretKeys: string[],
  ) {
    super();

    if (secretKeys.length === 0) {
      throw new ConfigurationError('At least one secret key is required');
    }

    secretKeys.forEach((value, index) => {
      let secretKey: Uint8Array;
      try {
        secretKey = this.blsService.parseSecretKey(value);
      } catch {
        // 키 값 자체는 에러 메시지에 포함하지 않음
        throw new ConfigurationError(
          `Secret key #${index} is not a valid BLS secret key`,
        );
      }
      this.keys.set(this.blsService.getPublicKey(secretKey), secretKey);
    });

    this.logger.log(`Loaded ${this.keys.size} BLS secret keys`);
  }

  async publicKeys(): Promise<BlsPublicKey[]> {
    return Array.from(this.keys.keys());
  }

  async sign(
    pubkey: BlsPublicKey,
    request: SigningRequest,
  ): Promise<BlsSignature> {
    const secretKey = this.keys.get(normalizePubkey(pubkey));
    if (!secretKey) {
      throw new UnknownKeyError(pubkey);
    }

    const signingRoot = this.blsService.computeSigningRoot(request);
    return this.blsService.signRoot(secretKey, signingRoot);
  }
}
