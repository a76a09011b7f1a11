import { bytesToHex, concatBytes, hexToBytes } from '@ethereumjs/util';
import { sha256 } from '@noble/hashes/sha2';
import { MalformedRecordError } from '../common/errors/crypto.errors';
import {
  BLS_PUBLIC_KEY_LENGTH,
  isValidBlsPublicKeyHex,
  isValidBlsSignatureHex,
  normalizeHex,
  normalizePubkey,
} from '../common/types/common.types';
import {
  DelegationAction,
  DelegationMessage,
  SignedDelegationJson,
  SignedDelegationMessage,
} from './entities/delegation-message.entity';

/**
 * 정규 인코딩 길이
 *
 * action(1) + chainId(8) + validatorPubkey(48) + delegateePubkey(48) = 105
 */
export const DELEGATION_MESSAGE_LENGTH = 1 + 8 + BLS_PUBLIC_KEY_LENGTH * 2;

const MAX_U64 = (1n << 64n) - 1n;

function isDelegationAction(value: unknown): value is DelegationAction {
  return value === DelegationAction.Delegate || value === DelegationAction.Revoke;
}

function isChainId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * DelegationMessage → 105바이트 정규 인코딩
 *
 * 고정 폭 / 고정 순서:
 * [0]      action (u8)
 * [1..9]   chainId (u64 big-endian)
 * [9..57]  validatorPubkey (압축 G1)
 * [57..105] delegateePubkey (압축 G1)
 */
export function encodeDelegationMessage(message: DelegationMessage): Uint8Array {
  if (!isDelegationAction(message.action)) {
    throw new MalformedRecordError(`unknown action ${message.action}`);
  }
  if (!isChainId(message.chainId) || BigInt(message.chainId) > MAX_U64) {
    throw new MalformedRecordError(`invalid chain id ${message.chainId}`);
  }
  if (
    !isValidBlsPublicKeyHex(message.validatorPubkey) ||
    !isValidBlsPublicKeyHex(message.delegateePubkey)
  ) {
    throw new MalformedRecordError('public keys must be 48 bytes of hex');
  }

  const chainId = new Uint8Array(8);
  new DataView(chainId.buffer).setBigUint64(0, BigInt(message.chainId), false);

  return concatBytes(
    Uint8Array.of(message.action),
    chainId,
    hexToBytes(message.validatorPubkey),
    hexToBytes(message.delegateePubkey),
  );
}

/**
 * 정규 인코딩 → DelegationMessage
 *
 * @throws {MalformedRecordError} 길이가 다르거나 action이 알 수 없는 값인 경우
 */
export function decodeDelegationMessage(bytes: Uint8Array): DelegationMessage {
  if (bytes.length !== DELEGATION_MESSAGE_LENGTH) {
    throw new MalformedRecordError(
      `encoded message must be ${DELEGATION_MESSAGE_LENGTH} bytes, got ${bytes.length}`,
    );
  }

  const action = bytes[0];
  if (!isDelegationAction(action)) {
    throw new MalformedRecordError(`unknown action ${action}`);
  }

  const chainId = new DataView(
    bytes.buffer,
    bytes.byteOffset + 1,
    8,
  ).getBigUint64(0, false);
  if (chainId > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedRecordError(`chain id ${chainId} is out of range`);
  }

  return {
    action,
    chainId: Number(chainId),
    validatorPubkey: bytesToHex(bytes.slice(9, 9 + BLS_PUBLIC_KEY_LENGTH)),
    delegateePubkey: bytesToHex(bytes.slice(9 + BLS_PUBLIC_KEY_LENGTH)),
  };
}

/**
 * 서명 대상 object root = sha256(정규 인코딩)
 *
 * 이 값이 delegation domain과 함께 signing root로 묶임
 */
export function delegationDigest(message: DelegationMessage): Uint8Array {
  return sha256(encodeDelegationMessage(message));
}

export function signedDelegationToJson(
  signed: SignedDelegationMessage,
): SignedDelegationJson {
  return {
    message: {
      action: signed.message.action,
      chain_id: signed.message.chainId,
      validator_pubkey: signed.message.validatorPubkey,
      delegatee_pubkey: signed.message.delegateePubkey,
    },
    signature: signed.signature,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 위임 파일 레코드 파싱 (형식 검증만)
 *
 * 곡선 위의 점인지는 검증기에서 확인 (MalformedPoint)
 *
 * @throws {MalformedRecordError}
 */
export function parseSignedDelegation(record: unknown): SignedDelegationMessage {
  if (!isRecord(record) || !isRecord(record.message)) {
    throw new MalformedRecordError('record must contain a message object');
  }

  const { message, signature } = record;
  const action = message.action;
  const chainId = message.chain_id;
  const validatorPubkey = message.validator_pubkey;
  const delegateePubkey = message.delegatee_pubkey;

  if (!isDelegationAction(action)) {
    throw new MalformedRecordError(`unknown action ${String(action)}`);
  }
  if (!isChainId(chainId)) {
    throw new MalformedRecordError('chain_id must be a non-negative integer');
  }
  if (!isValidBlsPublicKeyHex(validatorPubkey)) {
    throw new MalformedRecordError('validator_pubkey must be 48 bytes of hex');
  }
  if (!isValidBlsPublicKeyHex(delegateePubkey)) {
    throw new MalformedRecordError('delegatee_pubkey must be 48 bytes of hex');
  }
  if (!isValidBlsSignatureHex(signature)) {
    throw new MalformedRecordError('signature must be 96 bytes of hex');
  }

  return {
    message: {
      action,
      chainId,
      validatorPubkey: normalizePubkey(validatorPubkey),
      delegateePubkey: normalizePubkey(delegateePubkey),
    },
    signature: normalizeHex(signature),
  };
}
