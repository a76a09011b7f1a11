import { BlsPublicKey, BlsSignature } from '../../common/types/common.types';

/**
 * 위임 메시지 종류
 *
 * - Delegate: validator가 delegatee에게 커밋먼트 서명 권한 부여
 * - Revoke: 부여했던 권한 회수
 */
export enum DelegationAction {
  Delegate = 0,
  Revoke = 1,
}

/**
 * DelegationMessage
 *
 * 서명 대상 튜플 (action, chainId, validatorPubkey, delegateePubkey)
 * 네 필드 모두 인코딩에 포함되므로 하나라도 바뀌면 서명이 무효가 됨
 */
export interface DelegationMessage {
  action: DelegationAction;
  chainId: number;
  validatorPubkey: BlsPublicKey;
  delegateePubkey: BlsPublicKey;
}

/**
 * 서명된 위임 메시지 (validator 키로 서명)
 */
export interface SignedDelegationMessage {
  message: DelegationMessage;
  signature: BlsSignature;
}

/**
 * 위임 파일 레코드의 JSON 형식
 */
export interface SignedDelegationJson {
  message: {
    action: number;
    chain_id: number;
    validator_pubkey: string;
    delegatee_pubkey: string;
  };
  signature: string;
}
