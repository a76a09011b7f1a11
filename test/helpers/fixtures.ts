import { hexToBytes } from '@ethereumjs/util';
import { BlsService } from '../../src/common/crypto/bls.service';
import { SigningPurpose } from '../../src/common/constants/signing.constants';
import { Address, BlsPublicKey, Hex } from '../../src/common/types/common.types';
import { delegationDigest } from '../../src/delegation/delegation.codec';
import {
  DelegationAction,
  SignedDelegationMessage,
} from '../../src/delegation/entities/delegation-message.entity';

/**
 * 테스트용 고정 키 / 주소
 *
 * 비밀키: 같은 바이트를 32번 반복 (n = 1..0x70, 곡선 order보다 작음)
 */
export const bls = new BlsService();

export const MAINNET = 1;
export const HOLESKY = 17000;

export const CONTROLLER: Address = `0x${'c1'.repeat(20)}`;
export const OTHER_CALLER: Address = `0x${'c2'.repeat(20)}`;
export const OPERATOR_A: Address = `0x${'a1'.repeat(20)}`;
export const OPERATOR_B: Address = `0x${'b2'.repeat(20)}`;
export const ADMIN: Address = `0x${'ad'.repeat(20)}`;

export function secretKeyHex(n: number): Hex {
  return `0x${n.toString(16).padStart(2, '0').repeat(32)}`;
}

export function secretKey(n: number): Uint8Array {
  return hexToBytes(secretKeyHex(n));
}

export function pubkeyOf(n: number): BlsPublicKey {
  return bls.getPublicKey(secretKey(n));
}

/**
 * 비밀키 n으로 위임 메시지 서명
 */
export function signedDelegation(
  validator: number,
  delegatee: BlsPublicKey,
  action: DelegationAction = DelegationAction.Delegate,
  chainId: number = MAINNET,
): SignedDelegationMessage {
  const message = {
    action,
    chainId,
    validatorPubkey: pubkeyOf(validator),
    delegateePubkey: delegatee,
  };
  const request = bls.buildSigningRequest(
    delegationDigest(message),
    SigningPurpose.Delegation,
    chainId,
  );
  return {
    message,
    signature: bls.signRoot(secretKey(validator), bls.computeSigningRoot(request)),
  };
}
