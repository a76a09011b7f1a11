import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { AgentConfig } from '../common/config/agent.config';
import { ConfigurationError } from '../common/errors/configuration.error';
import { CryptoValidationError } from '../common/errors/crypto.errors';
import { BlsPublicKey, normalizePubkey } from '../common/types/common.types';
import { parseSignedDelegation } from './delegation.codec';
import { readDelegationFile } from './delegation-file';
import {
  DelegationVerifierService,
  VerificationFailureReason,
} from './delegation-verifier.service';
import {
  DelegationAction,
  SignedDelegationMessage,
} from './entities/delegation-message.entity';

export interface RejectedDelegation {
  /** 파일 내 위치 (0부터) */
  index: number;
  reason: VerificationFailureReason | 'MalformedRecord';
  detail: string;
}

export interface DelegationLoadReport {
  total: number;
  /** 검증을 통과해 적용된 메시지 수 */
  applied: number;
  /** 검증은 통과했지만 활성 위임과 맞지 않아 무시된 Revoke 수 */
  ignored: number;
  rejected: RejectedDelegation[];
}

/**
 * Delegation Store
 *
 * validatorPubkey → delegateePubkey (validator당 활성 delegatee 최대 1개)
 *
 * 로딩 규칙:
 * - 모든 레코드는 DelegationVerifier를 통과해야 적용됨
 * - 실패한 레코드는 사유와 함께 로그를 남기고 건너뜀 (전체 로딩은 계속)
 * - 파일 순서대로 적용, 같은 validator에 대해서는 마지막 메시지가 이김
 * - Revoke는 현재 활성 delegatee를 가리킬 때만 위임을 해제
 *
 * 로딩이 끝난 뒤 map은 통째로 교체되므로 조회 중 부분 상태가 보이지 않음
 */
@Injectable()
export class DelegationStoreService implements OnModuleInit {
  private readonly logger = new Logger(DelegationStoreService.name);
  private delegations = new Map<BlsPublicKey, BlsPublicKey>();

  constructor(
    private readonly verifier: DelegationVerifierService,
    private readonly config: AgentConfig,
  ) {}

  onModuleInit(): void {
    if (this.config.delegationsPath) {
      this.loadFromFile(this.config.delegationsPath);
    } else {
      this.logger.log('No delegations file configured');
    }
  }

  /**
   * 위임 파일 로드
   *
   * @throws {ConfigurationError} 파일이 없거나 JSON 배열이 아닌 경우
   */
  loadFromFile(filePath: string): DelegationLoadReport {
    const report = this.load(readDelegationFile(filePath));
    this.logger.log(
      `Loaded ${filePath}: ${report.applied}/${report.total} applied, ${report.rejected.length} rejected, ${report.ignored} ignored`,
    );
    return report;
  }

  /**
   * 레코드 배열로부터 store 재구성
   */
  load(records: unknown[]): DelegationLoadReport {
    const next = new Map<BlsPublicKey, BlsPublicKey>();
    const report: DelegationLoadReport = {
      total: records.length,
      applied: 0,
      ignored: 0,
      rejected: [],
    };

    records.forEach((record, index) => {
      let signed: SignedDelegationMessage;
      try {
        signed = parseSignedDelegation(record);
      } catch (error) {
        if (!(error instanceof CryptoValidationError)) {
          throw error;
        }
        this.rejectRecord(report, index, 'MalformedRecord', error.message);
        return;
      }

      const verification = this.verifier.verify(signed, this.config.chainId);
      if (!verification.valid) {
        this.rejectRecord(
          report,
          index,
          verification.reason,
          verification.detail,
        );
        return;
      }

      if (this.apply(next, signed)) {
        report.applied++;
      } else {
        report.ignored++;
      }
    });

    this.delegations = next;
    return report;
  }

  /**
   * 설정된 파일을 다시 로드
   */
  reload(filePath = this.config.delegationsPath): DelegationLoadReport {
    if (!filePath) {
      throw new ConfigurationError('No delegations file to reload');
    }
    return this.loadFromFile(filePath);
  }

  /**
   * validator를 대신해 서명할 수 있는 키
   *
   * @returns delegatee 공개키 또는 null (활성 위임 없음)
   */
  resolveSigner(validatorPubkey: BlsPublicKey): BlsPublicKey | null {
    return this.delegations.get(normalizePubkey(validatorPubkey)) ?? null;
  }

  size(): number {
    return this.delegations.size;
  }

  entries(): Array<[BlsPublicKey, BlsPublicKey]> {
    return Array.from(this.delegations.entries());
  }

  private apply(
    target: Map<BlsPublicKey, BlsPublicKey>,
    signed: SignedDelegationMessage,
  ): boolean {
    const { action, validatorPubkey, delegateePubkey } = signed.message;

    if (action === DelegationAction.Delegate) {
      target.set(validatorPubkey, delegateePubkey);
      return true;
    }

    if (target.get(validatorPubkey) === delegateePubkey) {
      target.delete(validatorPubkey);
      return true;
    }

    this.logger.debug(
      `Ignoring revocation of ${delegateePubkey} for ${validatorPubkey}: not the active delegatee`,
    );
    return false;
  }

  private rejectRecord(
    report: DelegationLoadReport,
    index: number,
    reason: RejectedDelegation['reason'],
    detail: string,
  ): void {
    report.rejected.push({ index, reason, detail });
    this.logger.warn(`Dropping delegation #${index} (${reason}): ${detail}`);
  }
}
