import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { loadAgentConfig } from '../common/config/agent.config';
import { BlsService } from '../common/crypto/bls.service';
import { DelegationSignerService } from '../delegation/delegation-signer.service';
import { DelegationVerifierService } from '../delegation/delegation-verifier.service';
import { writeDelegationFile } from '../delegation/delegation-file';
import { DelegationAction } from '../delegation/entities/delegation-message.entity';
import { resolveKeySourceConfig } from '../keys/key-source.config';
import { createKeySource } from '../keys/key-source.factory';

/**
 * 위임 / 회수 파일 생성 스크립트
 *
 * 키 소스 설정은 에이전트와 동일 (SECRET_KEYS / KEYSTORE_PATH / REMOTE_SIGNER_URL)
 *
 * 추가 환경 변수:
 * - DELEGATEE_PUBKEY: 서명 권한을 받을 BLS 공개키 (필수)
 * - DELEGATION_ACTION: delegate | revoke (기본값 delegate)
 * - DELEGATIONS_OUT: 출력 파일 경로, "-"이면 stdout (기본값 delegations.json)
 *
 * 진행 상황은 stderr로 출력 (stdout은 결과 전용)
 */
function parseAction(value: string | undefined): DelegationAction {
  switch ((value ?? 'delegate').toLowerCase()) {
    case 'delegate':
      return DelegationAction.Delegate;
    case 'revoke':
      return DelegationAction.Revoke;
    default:
      throw new Error(`DELEGATION_ACTION must be delegate or revoke, got ${value}`);
  }
}

async function main(): Promise<void> {
  dotenv.config();

  const delegatee = process.env.DELEGATEE_PUBKEY;
  if (!delegatee) {
    throw new Error('DELEGATEE_PUBKEY is required');
  }
  const action = parseAction(process.env.DELEGATION_ACTION);
  const target = process.env.DELEGATIONS_OUT ?? 'delegations.json';

  const config = loadAgentConfig(process.env);
  const blsService = new BlsService();
  const keySource = createKeySource(resolveKeySourceConfig(config), blsService);
  const signer = new DelegationSignerService(
    blsService,
    new DelegationVerifierService(blsService),
  );

  try {
    const delegateePubkey = blsService.parsePublicKey(delegatee);
    console.error(
      `Signing ${DelegationAction[action]} messages for delegatee ${delegateePubkey.slice(0, 18)}... on chain ${config.chainId}`,
    );

    const messages = await signer.signAll(
      keySource,
      delegateePubkey,
      action,
      config.chainId,
      {
        timeoutMs: config.remoteSignerTimeoutMs,
        maxRetries: config.remoteSignerMaxRetries,
      },
    );

    writeDelegationFile(target, messages);
    console.error(
      `Wrote ${messages.length} signed messages to ${target === '-' ? 'stdout' : target}`,
    );
  } finally {
    await keySource.close();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
