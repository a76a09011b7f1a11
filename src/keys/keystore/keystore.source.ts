import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { BlsService } from '../../common/crypto/bls.service';
import { SigningRequest } from '../../common/crypto/crypto.types';
import { ConfigurationError } from '../../common/errors/configuration.error';
import {
  KeystoreDecryptionError,
  UnknownKeyError,
} from '../../common/errors/crypto.errors';
import {
  addHexPrefix,
  BlsPublicKey,
  BlsSignature,
  normalizePubkey,
} from '../../common/types/common.types';
import { errorMessage } from '../../common/utils/error.util';
import { IKeySource, KeySourceKind } from '../key-source.interface';
import { decryptKeystore, InvalidPasswordError, parseKeystore } from './eip2335';
import {
  assertKeystoreSecret,
  KeystoreSecret,
  readKeystorePassword,
} from './keystore-secret';

/**
 * keystore 디렉토리 안의 모든 .json 파일 경로 (정렬됨)
 *
 * 지원 레이아웃:
 * - lighthouse: validators/<pubkey>/voting-keystore.json
 * - flat: keystore-m_12381_3600_0_0_0-*.json
 *
 * @throws {ConfigurationError} 경로가 없거나 디렉토리가 아닌 경우
 */
export function findKeystorePaths(root: string): string[] {
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ConfigurationError(`Keystore path is not a directory: ${root}`);
  }

  const found: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        found.push(fullPath);
      }
    }
  };
  walk(root);

  return found.sort();
}

/**
 * LocalKeystore Key Source
 *
 * EIP-2335 keystore 디렉토리에서 BLS 키 로드
 *
 * 동작:
 * 1. 첫 publicKeys()/sign() 호출 시 한 번만 복호화
 * 2. 각 keystore는 독립적으로 복호화
 * 3. 실패한 항목은 KeystoreDecryptionError로 기록하고 건너뜀
 *    (다른 keystore 로딩은 계속)
 *
 * 복호화된 비밀키는 메모리에만 보관
 */
export class LocalKeystoreKeySource extends IKeySource {
  readonly kind: KeySourceKind = 'local-keystore';

  private readonly logger = new Logger(LocalKeystoreKeySource.name);
  private readonly keystorePaths: string[];
  private readonly keys = new Map<BlsPublicKey, Uint8Array>();
  private readonly failures: KeystoreDecryptionError[] = [];
  private loaded = false;

  constructor(
    private readonly blsService: BlsService,
    keystorePath: string,
    private readonly secret: KeystoreSecret,
  ) {
    super();

    // 디렉토리 구조 / 비밀번호 소스 오류는 시작 단계에서 바로 실패
    assertKeystoreSecret(secret);
    this.keystorePaths = findKeystorePaths(keystorePath);

    if (this.keystorePaths.length === 0) {
      throw new ConfigurationError(
        `No keystore files found under ${keystorePath}`,
      );
    }
  }

  async publicKeys(): Promise<BlsPublicKey[]> {
    this.load();
    return Array.from(this.keys.keys());
  }

  async sign(
    pubkey: BlsPublicKey,
    request: SigningRequest,
  ): Promise<BlsSignature> {
    this.load();

    const secretKey = this.keys.get(normalizePubkey(pubkey));
    if (!secretKey) {
      throw new UnknownKeyError(pubkey);
    }

    return this.blsService.signRoot(
      secretKey,
      this.blsService.computeSigningRoot(request),
    );
  }

  /**
   * 복호화에 실패한 keystore 목록
   */
  loadFailures(): readonly KeystoreDecryptionError[] {
    this.load();
    return this.failures;
  }

  private load(): void {
    if (this.loaded) {
      return;
    }
    this.loaded = true;

    for (const keystorePath of this.keystorePaths) {
      try {
        const [pubkey, secretKey] = this.decryptOne(keystorePath);
        this.keys.set(pubkey, secretKey);
      } catch (error) {
        const failure =
          error instanceof KeystoreDecryptionError
            ? error
            : new KeystoreDecryptionError(keystorePath, errorMessage(error));
        this.failures.push(failure);
        this.logger.warn(`Skipping keystore: ${failure.message}`);
      }
    }

    this.logger.log(
      `Loaded ${this.keys.size} keys from ${this.keystorePaths.length} keystores (${this.failures.length} failed)`,
    );
  }

  private decryptOne(keystorePath: string): [BlsPublicKey, Uint8Array] {
    const raw: unknown = JSON.parse(fs.readFileSync(keystorePath, 'utf8'));
    const keystore = parseKeystore(raw);

    const password = readKeystorePassword(
      this.secret,
      keystore.pubkey ?? path.basename(path.dirname(keystorePath)),
    );
    if (password === null) {
      throw new KeystoreDecryptionError(
        keystorePath,
        `missing password file for ${keystore.pubkey ?? 'unknown pubkey'}`,
      );
    }

    let secretKey: Uint8Array;
    try {
      secretKey = decryptKeystore(keystore, password);
    } catch (error) {
      if (error instanceof InvalidPasswordError) {
        throw new KeystoreDecryptionError(keystorePath, 'invalid password');
      }
      throw error;
    }

    const pubkey = this.blsService.getPublicKey(secretKey);
    if (
      keystore.pubkey !== undefined &&
      normalizePubkey(addHexPrefix(keystore.pubkey)) !== pubkey
    ) {
      throw new KeystoreDecryptionError(
        keystorePath,
        `decrypted key does not match pubkey ${keystore.pubkey}`,
      );
    }

    return [pubkey, secretKey];
  }
}
