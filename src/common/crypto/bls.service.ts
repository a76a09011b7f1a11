import { Injectable } from '@nestjs/common';
import { bytesToHex, concatBytes, hexToBytes } from '@ethereumjs/util';
import { bls12_381 } from '@noble/curves/bls12-381';
import { sha256 } from '@noble/hashes/sha2';
import {
  BLS_DST,
  DOMAIN_MASKS,
  findChain,
  SigningPurpose,
} from '../constants/signing.constants';
import { MalformedPointError, WrongChainError } from '../errors/crypto.errors';
import {
  BLS_PUBLIC_KEY_LENGTH,
  BLS_SECRET_KEY_LENGTH,
  BLS_SIGNATURE_LENGTH,
  BlsPublicKey,
  BlsSignature,
  isHexString,
  normalizeHex,
  normalizePubkey,
} from '../types/common.types';
import { errorMessage } from '../utils/error.util';
import { SigningRequest } from './crypto.types';

/**
 * BlsService
 *
 * BLS12-381 서명 기능을 담당하는 서비스
 * 이더리움 컨센서스 레이어와 동일한 규칙 사용:
 * - 공개키: G1 (48바이트 압축)
 * - 서명: G2 (96바이트 압축)
 * - Proof-of-Possession ciphersuite
 *
 * 곡선 연산 자체는 @noble/curves가 담당하고
 * 이 서비스는 도메인 분리(signing domain)와 입력 검증만 책임짐
 */
@Injectable()
export class BlsService {
  /**
   * 비밀키로부터 공개키 생성
   *
   * 컨센서스 레이어:
   * - secretKey * G1 generator = publicKey
   *
   * @param secretKey - 32바이트 big-endian 스칼라
   * @throws {Error} 스칼라가 0이거나 곡선 order 이상인 경우
   */
  getPublicKey(secretKey: Uint8Array): BlsPublicKey {
    return bytesToHex(bls12_381.getPublicKey(secretKey));
  }

  /**
   * hex 비밀키 파싱
   *
   * - "0x" 접두사 선택
   * - 정확히 32바이트
   * - 유효한 스칼라 범위
   */
  parseSecretKey(value: string): Uint8Array {
    const trimmed = value.trim();
    const prefixed = trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`;

    if (!isHexString(prefixed, BLS_SECRET_KEY_LENGTH)) {
      throw new Error('BLS secret key must be 32 bytes of hex');
    }

    const secretKey = hexToBytes(prefixed);
    // 범위 검증 (0 또는 order 이상이면 예외)
    this.getPublicKey(secretKey);
    return secretKey;
  }

  /**
   * 공개키 파싱 + 검증
   *
   * - 압축 G1 형식 (48바이트)
   * - 곡선 위의 점이어야 함
   * - 올바른 subgroup에 속해야 함
   * - 무한원점은 거부
   *
   * @returns 정규화된 공개키 (소문자 hex)
   * @throws {MalformedPointError}
   */
  parsePublicKey(value: string): BlsPublicKey {
    if (!isHexString(value, BLS_PUBLIC_KEY_LENGTH)) {
      throw new MalformedPointError(
        `public key must be ${BLS_PUBLIC_KEY_LENGTH} bytes of 0x-prefixed hex`,
      );
    }

    const { ProjectivePoint } = bls12_381.G1;
    let point: typeof ProjectivePoint.ZERO;
    try {
      point = ProjectivePoint.fromHex(hexToBytes(value));
    } catch (error) {
      throw new MalformedPointError(`invalid G1 point: ${errorMessage(error)}`);
    }

    if (point.equals(ProjectivePoint.ZERO)) {
      throw new MalformedPointError('public key is the point at infinity');
    }

    return normalizePubkey(value);
  }

  /**
   * 서명 파싱 + 검증 (압축 G2, 96바이트)
   *
   * @throws {MalformedPointError}
   */
  parseSignature(value: string): BlsSignature {
    if (!isHexString(value, BLS_SIGNATURE_LENGTH)) {
      throw new MalformedPointError(
        `signature must be ${BLS_SIGNATURE_LENGTH} bytes of 0x-prefixed hex`,
      );
    }

    try {
      bls12_381.G2.ProjectivePoint.fromHex(hexToBytes(value));
    } catch (error) {
      throw new MalformedPointError(`invalid G2 point: ${errorMessage(error)}`);
    }

    return normalizeHex(value);
  }

  /**
   * Signing domain 계산
   *
   * 컨센서스 레이어 compute_domain:
   * - forkDataRoot = hash_tree_root(ForkData{forkVersion, genesisValidatorsRoot = 0})
   * - domain = domainType(4) + forkDataRoot[0..28]
   *
   * @throws {WrongChainError} 지원하지 않는 체인
   */
  computeDomain(purpose: SigningPurpose, chainId: number): Uint8Array {
    const chain = findChain(chainId);
    if (!chain) {
      throw new WrongChainError(`unsupported chain id ${chainId}`);
    }

    const versionChunk = new Uint8Array(32);
    versionChunk.set(chain.forkVersion);
    const forkDataRoot = sha256(concatBytes(versionChunk, new Uint8Array(32)));

    return concatBytes(DOMAIN_MASKS[purpose], forkDataRoot.slice(0, 28));
  }

  /**
   * Signing root 계산
   *
   * hash_tree_root(SigningData{objectRoot, domain}) = sha256(objectRoot + domain)
   */
  computeSigningRoot(request: SigningRequest): Uint8Array {
    if (request.objectRoot.length !== 32 || request.domain.length !== 32) {
      throw new Error('objectRoot and domain must both be 32 bytes');
    }
    return sha256(concatBytes(request.objectRoot, request.domain));
  }

  /**
   * SigningRequest 생성 (object root + 용도별 domain)
   */
  buildSigningRequest(
    objectRoot: Uint8Array,
    purpose: SigningPurpose,
    chainId: number,
  ): SigningRequest {
    return { objectRoot, domain: this.computeDomain(purpose, chainId) };
  }

  /**
   * signing root에 서명
   */
  signRoot(secretKey: Uint8Array, signingRoot: Uint8Array): BlsSignature {
    return bytesToHex(bls12_381.sign(signingRoot, secretKey, { DST: BLS_DST }));
  }

  /**
   * 서명 검증 (pairing check)
   *
   * @returns 서명이 유효하면 true
   * @throws {MalformedPointError} 공개키 또는 서명이 올바른 점이 아닌 경우
   */
  verifyRoot(
    pubkey: string,
    signingRoot: Uint8Array,
    signature: string,
  ): boolean {
    const publicKey = this.parsePublicKey(pubkey);
    const sig = this.parseSignature(signature);

    try {
      return bls12_381.verify(
        hexToBytes(sig),
        signingRoot,
        hexToBytes(publicKey),
        { DST: BLS_DST },
      );
    } catch {
      return false;
    }
  }
}
