import { Address, BlsPublicKey } from '../common/types/common.types';

/**
 * 레지스트리 설정 (생성 시 주입)
 *
 * allowUnsafeRegistration은 초기값이고,
 * 이후에는 admin만 setAllowUnsafeRegistration으로 변경 가능
 */
export class RegistryOptions {
  constructor(
    readonly chainId: number,
    readonly admin: string,
    readonly allowUnsafeRegistration: boolean,
  ) {}
}

export interface RegisterValidatorParams {
  pubkey: string;
  /** proof-of-possession 서명 (압축 G2) */
  signature: string;
  maxCommittedGasLimit: number;
  authorizedOperator: string;
}

export type RegisterValidatorUnsafeParams = Omit<
  RegisterValidatorParams,
  'signature'
>;

/**
 * 레지스트리 이벤트 (컨트랙트 이벤트 로그에 대응)
 */
export type RegistryEvent =
  | {
      type: 'ValidatorRegistered';
      pubkey: BlsPublicKey;
      controller: Address;
      authorizedOperator: Address;
      maxCommittedGasLimit: number;
      unsafe: boolean;
    }
  | { type: 'ValidatorDeregistered'; pubkey: BlsPublicKey; controller: Address }
  | {
      type: 'AuthorizedOperatorUpdated';
      pubkey: BlsPublicKey;
      previous: Address;
      current: Address;
    }
  | {
      type: 'MaxCommittedGasLimitUpdated';
      pubkey: BlsPublicKey;
      previous: number;
      current: number;
    }
  | { type: 'UnsafeRegistrationToggled'; caller: Address; allowed: boolean };

export type RecordedRegistryEvent = RegistryEvent & { sequence: number };
