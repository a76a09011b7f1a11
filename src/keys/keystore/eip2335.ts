import { createCipheriv, createDecipheriv } from 'crypto';
import { pbkdf2 } from '@noble/hashes/pbkdf2';
import { scrypt } from '@noble/hashes/scrypt';
import { sha256 } from '@noble/hashes/sha2';
import {
  bytesToHex,
  concatBytes,
  hexToBytes,
  randomBytes,
  utf8ToBytes,
} from '@noble/hashes/utils';

/**
 * EIP-2335 BLS12-381 Keystore
 *
 * 구조:
 * - crypto.kdf: 비밀번호 → 32바이트 decryption key (scrypt 또는 pbkdf2)
 * - crypto.checksum: sha256(dk[16..32] + cipher.message)
 * - crypto.cipher: aes-128-ctr (key = dk[0..16])
 *
 * 모든 hex 필드는 "0x" 접두사 없음
 */
export interface ScryptKdf {
  function: 'scrypt';
  params: { dklen: number; n: number; r: number; p: number; salt: string };
  message: string;
}

export interface Pbkdf2Kdf {
  function: 'pbkdf2';
  params: { dklen: number; c: number; prf: 'hmac-sha256'; salt: string };
  message: string;
}

export type KdfModule = ScryptKdf | Pbkdf2Kdf;

export interface Eip2335Keystore {
  crypto: {
    kdf: KdfModule;
    checksum: {
      function: 'sha256';
      params: Record<string, never>;
      message: string;
    };
    cipher: {
      function: 'aes-128-ctr';
      params: { iv: string };
      message: string;
    };
  };
  description?: string;
  pubkey?: string;
  path?: string;
  uuid?: string;
  version: 4;
}

export class KeystoreFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeystoreFormatError';
  }
}

export class InvalidPasswordError extends Error {
  constructor() {
    super('Checksum mismatch: invalid password');
    this.name = 'InvalidPasswordError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new KeystoreFormatError(`${field} must be an object`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new KeystoreFormatError(`${field} must be a string`);
  }
  return value;
}

function requireHex(value: unknown, field: string): string {
  const hex = requireString(value, field);
  if (!/^([0-9a-fA-F]{2})*$/.test(hex)) {
    throw new KeystoreFormatError(`${field} must be hex without 0x prefix`);
  }
  return hex;
}

function requireInt(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
    throw new KeystoreFormatError(`${field} must be a positive integer`);
  }
  return value;
}

function parseKdf(value: unknown): KdfModule {
  const kdf = requireRecord(value, 'crypto.kdf');
  const params = requireRecord(kdf.params, 'crypto.kdf.params');
  const message = typeof kdf.message === 'string' ? kdf.message : '';

  switch (kdf.function) {
    case 'scrypt':
      return {
        function: 'scrypt',
        params: {
          dklen: requireInt(params.dklen, 'kdf.params.dklen'),
          n: requireInt(params.n, 'kdf.params.n'),
          r: requireInt(params.r, 'kdf.params.r'),
          p: requireInt(params.p, 'kdf.params.p'),
          salt: requireHex(params.salt, 'kdf.params.salt'),
        },
        message,
      };
    case 'pbkdf2':
      if (params.prf !== 'hmac-sha256') {
        throw new KeystoreFormatError('pbkdf2 prf must be hmac-sha256');
      }
      return {
        function: 'pbkdf2',
        params: {
          dklen: requireInt(params.dklen, 'kdf.params.dklen'),
          c: requireInt(params.c, 'kdf.params.c'),
          prf: 'hmac-sha256',
          salt: requireHex(params.salt, 'kdf.params.salt'),
        },
        message,
      };
    default:
      throw new KeystoreFormatError(
        `Unsupported kdf function: ${String(kdf.function)}`,
      );
  }
}

/**
 * JSON 값 → Eip2335Keystore
 *
 * @throws {KeystoreFormatError}
 */
export function parseKeystore(json: unknown): Eip2335Keystore {
  const root = requireRecord(json, 'keystore');
  if (root.version !== 4) {
    throw new KeystoreFormatError('Only keystore version 4 is supported');
  }

  const crypto = requireRecord(root.crypto, 'crypto');
  const checksum = requireRecord(crypto.checksum, 'crypto.checksum');
  const cipher = requireRecord(crypto.cipher, 'crypto.cipher');
  const cipherParams = requireRecord(cipher.params, 'crypto.cipher.params');

  if (checksum.function !== 'sha256') {
    throw new KeystoreFormatError('checksum function must be sha256');
  }
  if (cipher.function !== 'aes-128-ctr') {
    throw new KeystoreFormatError('cipher function must be aes-128-ctr');
  }

  return {
    crypto: {
      kdf: parseKdf(crypto.kdf),
      checksum: {
        function: 'sha256',
        params: {},
        message: requireHex(checksum.message, 'crypto.checksum.message'),
      },
      cipher: {
        function: 'aes-128-ctr',
        params: { iv: requireHex(cipherParams.iv, 'crypto.cipher.params.iv') },
        message: requireHex(cipher.message, 'crypto.cipher.message'),
      },
    },
    description:
      typeof root.description === 'string' ? root.description : undefined,
    pubkey:
      root.pubkey === undefined
        ? undefined
        : requireHex(root.pubkey, 'pubkey').toLowerCase(),
    path: typeof root.path === 'string' ? root.path : undefined,
    uuid: typeof root.uuid === 'string' ? root.uuid : undefined,
    version: 4,
  };
}

/**
 * 비밀번호 정규화
 *
 * EIP-2335:
 * 1. NFKD 정규화
 * 2. 제어 문자 제거 (C0: 0x00-0x1F, DEL: 0x7F, C1: 0x80-0x9F)
 * 3. UTF-8 인코딩
 */
export function normalizePassword(password: string): Uint8Array {
  const stripped = Array.from(password.normalize('NFKD'))
    .filter((char) => {
      const code = char.codePointAt(0) ?? 0;
      return !(code <= 0x1f || (code >= 0x7f && code <= 0x9f));
    })
    .join('');
  return utf8ToBytes(stripped);
}

function deriveKey(kdf: KdfModule, password: Uint8Array): Uint8Array {
  const salt = hexToBytes(kdf.params.salt);

  if (kdf.function === 'scrypt') {
    return scrypt(password, salt, {
      N: kdf.params.n,
      r: kdf.params.r,
      p: kdf.params.p,
      dkLen: kdf.params.dklen,
    });
  }

  return pbkdf2(sha256, password, salt, {
    c: kdf.params.c,
    dkLen: kdf.params.dklen,
  });
}

function checksumOf(decryptionKey: Uint8Array, cipherText: Uint8Array): string {
  return bytesToHex(sha256(concatBytes(decryptionKey.slice(16, 32), cipherText)));
}

/**
 * keystore 복호화
 *
 * @returns 32바이트 BLS 비밀키
 * @throws {InvalidPasswordError} checksum 불일치 (비밀번호 오류)
 */
export function decryptKeystore(
  keystore: Eip2335Keystore,
  password: string,
): Uint8Array {
  const decryptionKey = deriveKey(
    keystore.crypto.kdf,
    normalizePassword(password),
  );
  if (decryptionKey.length < 32) {
    throw new KeystoreFormatError('kdf dklen must be at least 32');
  }

  const cipherText = hexToBytes(keystore.crypto.cipher.message);
  const checksum = checksumOf(decryptionKey, cipherText);

  if (checksum !== keystore.crypto.checksum.message.toLowerCase()) {
    throw new InvalidPasswordError();
  }

  const decipher = createDecipheriv(
    'aes-128-ctr',
    decryptionKey.slice(0, 16),
    hexToBytes(keystore.crypto.cipher.params.iv),
  );
  return new Uint8Array(
    Buffer.concat([decipher.update(cipherText), decipher.final()]),
  );
}

export interface EncryptKeystoreOptions {
  kdf?: 'scrypt' | 'pbkdf2';
  /** scrypt N (기본값 262144) */
  scryptN?: number;
  /** pbkdf2 반복 횟수 (기본값 262144) */
  pbkdf2C?: number;
  salt?: Uint8Array;
  iv?: Uint8Array;
  path?: string;
  description?: string;
}

/**
 * keystore 생성 (암호화)
 *
 * decryptKeystore의 역연산 (테스트에서 keystore 파일을 만들 때 사용)
 *
 * @param secretKey - 32바이트 BLS 비밀키
 * @param password - 평문 비밀번호
 * @param pubkey - 공개키 (0x 접두사 선택)
 */
export function encryptKeystore(
  secretKey: Uint8Array,
  password: string,
  pubkey: string,
  options: EncryptKeystoreOptions = {},
): Eip2335Keystore {
  const salt = options.salt ?? randomBytes(32);
  const iv = options.iv ?? randomBytes(16);

  const kdf: KdfModule =
    options.kdf === 'pbkdf2'
      ? {
          function: 'pbkdf2',
          params: {
            dklen: 32,
            c: options.pbkdf2C ?? 262144,
            prf: 'hmac-sha256',
            salt: bytesToHex(salt),
          },
          message: '',
        }
      : {
          function: 'scrypt',
          params: {
            dklen: 32,
            n: options.scryptN ?? 262144,
            r: 8,
            p: 1,
            salt: bytesToHex(salt),
          },
          message: '',
        };

  const decryptionKey = deriveKey(kdf, normalizePassword(password));
  const cipher = createCipheriv('aes-128-ctr', decryptionKey.slice(0, 16), iv);
  const cipherText = new Uint8Array(
    Buffer.concat([cipher.update(secretKey), cipher.final()]),
  );

  return {
    crypto: {
      kdf,
      checksum: {
        function: 'sha256',
        params: {},
        message: checksumOf(decryptionKey, cipherText),
      },
      cipher: {
        function: 'aes-128-ctr',
        params: { iv: bytesToHex(iv) },
        message: bytesToHex(cipherText),
      },
    },
    description: options.description ?? '',
    pubkey: (pubkey.startsWith('0x') ? pubkey.slice(2) : pubkey).toLowerCase(),
    path: options.path ?? '',
    uuid: randomUuid(),
    version: 4,
  };
}

function randomUuid(): string {
  const hex = bytesToHex(randomBytes(16));
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `4${hex.slice(13, 16)}`,
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}
