import { Injectable } from '@nestjs/common';
import { Input, NestedUint8Array, RLP } from '@ethereumjs/rlp';
import * as elliptic from 'elliptic';
import keccak from 'keccak';
import {
  addHexPrefix,
  Address,
  Hex,
  isHexString,
  stripHexPrefix,
} from '../types/common.types';
import { Signature } from './crypto.types';

/**
 * CryptoService
 *
 * 실행 레이어(ECDSA) 암호화 기능 담당
 * - secp256k1 타원곡선 (ECDSA)
 * - Keccak-256 해싱
 * - RLP 인코딩 (레지스트리 저장 포맷)
 *
 * 왜 필요한가:
 * - 레지스트리의 controller / authorizedOperator는 실행 레이어 주소
 * - Operator는 커밋먼트에 ECDSA로 서명하고,
 *   서명에서 복구한 주소가 authorizedOperator와 일치해야 함
 */
@Injectable()
export class CryptoService {
  private readonly ec: elliptic.ec;

  constructor() {
    this.ec = new elliptic.ec('secp256k1');
  }

  /**
   * Keccak-256 해시
   *
   * @returns "0x" + 64 hex characters
   */
  hashBuffer(buffer: Uint8Array): Hex {
    const hash = keccak('keccak256').update(Buffer.from(buffer)).digest('hex');
    return addHexPrefix(hash);
  }

  hashHex(hex: string): Hex {
    return this.hashBuffer(Buffer.from(stripHexPrefix(hex), 'hex'));
  }

  /**
   * 개인키로부터 주소 생성
   *
   * 1. 개인키 * G = 공개키 (비압축 64바이트)
   * 2. Keccak-256(공개키)의 마지막 20바이트
   */
  privateKeyToAddress(privateKey: Hex): Address {
    if (!isHexString(privateKey, 32)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    const publicKey = keyPair.getPublic().encode('hex', false).slice(2);
    return this.publicKeyToAddress(publicKey);
  }

  private publicKeyToAddress(publicKey: string): Address {
    const hash = this.hashHex(publicKey);
    return addHexPrefix(stripHexPrefix(hash).slice(-40).toLowerCase());
  }

  /**
   * 메시지 해시 서명 (v = 27/28)
   *
   * @param messageHash - 32바이트 해시
   * @param privateKey - secp256k1 개인키
   */
  sign(messageHash: Hex, privateKey: Hex): Signature {
    if (!isHexString(messageHash, 32)) {
      throw new Error('Invalid message hash (must be 32 bytes)');
    }
    if (!isHexString(privateKey, 32)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    const signature = keyPair.sign(stripHexPrefix(messageHash), {
      canonical: true,
    });

    const v = (signature.recoveryParam ?? 0) + 27;
    const r = addHexPrefix(signature.r.toString('hex').padStart(64, '0'));
    const s = addHexPrefix(signature.s.toString('hex').padStart(64, '0'));

    return { v, r, s };
  }

  /**
   * 서명으로부터 주소 복구
   *
   * @throws {Error} 해시 형식이나 recovery id가 잘못된 경우
   */
  recoverAddress(messageHash: Hex, signature: Signature): Address {
    if (!isHexString(messageHash, 32)) {
      throw new Error('Invalid message hash');
    }

    const recoveryId = signature.v >= 27 ? signature.v - 27 : signature.v;
    if (recoveryId !== 0 && recoveryId !== 1) {
      throw new Error(`Invalid recovery id: ${recoveryId}`);
    }

    const publicKey: elliptic.curve.base.BasePoint = this.ec.recoverPubKey(
      Buffer.from(stripHexPrefix(messageHash), 'hex'),
      { r: stripHexPrefix(signature.r), s: stripHexPrefix(signature.s) },
      recoveryId,
    );

    return this.publicKeyToAddress(publicKey.encode('hex', false).slice(2));
  }

  /**
   * RLP 인코딩
   *
   * 같은 데이터 → 항상 같은 인코딩
   */
  rlpEncode(input: Input): Uint8Array {
    return RLP.encode(input);
  }

  rlpDecode(encoded: Uint8Array): Uint8Array | NestedUint8Array {
    return RLP.decode(encoded);
  }
}
