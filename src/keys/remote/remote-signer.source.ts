import { Logger } from '@nestjs/common';
import { bytesToHex } from '@ethereumjs/util';
import { BlsService } from '../../common/crypto/bls.service';
import { SigningRequest } from '../../common/crypto/crypto.types';
import { ConfigurationError } from '../../common/errors/configuration.error';
import { UnknownKeyError } from '../../common/errors/crypto.errors';
import { RemoteSignerRejectedError } from '../../common/errors/transport.errors';
import {
  BlsPublicKey,
  BlsSignature,
  normalizePubkey,
} from '../../common/types/common.types';
import { withTimeout } from '../../common/utils/async.util';
import { errorMessage } from '../../common/utils/error.util';
import { IKeySource, KeySourceKind, SignOptions } from '../key-source.interface';
import {
  IRemoteSignerClient,
  RemoteCallOptions,
} from './remote-signer.client.interface';

export interface RemoteSignerOptions {
  walletPath: string;
  passphrases: string[];
  timeoutMs: number;
}

/**
 * RemoteSigner Key Source
 *
 * 비밀키를 보유하지 않고 원격 서명자(Dirk)에게 서명을 요청
 *
 * 서명 과정:
 * 1. 계정 잠금 해제 (passphrase를 순서대로 시도)
 * 2. (objectRoot, domain) 전송 → 서명자가 signing root 계산 후 서명
 * 3. 계정 다시 잠금 (실패해도 경고만)
 *
 * 모든 호출에 타임아웃 + AbortSignal 적용
 */
export class RemoteSignerKeySource extends IKeySource {
  readonly kind: KeySourceKind = 'remote-signer';

  private readonly logger = new Logger(RemoteSignerKeySource.name);

  /**
   * 공개키 → 원격 계정 이름 (첫 조회 후 캐시)
   */
  private accounts: Promise<Map<BlsPublicKey, string>> | null = null;

  constructor(
    private readonly blsService: BlsService,
    private readonly client: IRemoteSignerClient,
    private readonly options: RemoteSignerOptions,
  ) {
    super();

    if (options.passphrases.length === 0) {
      throw new ConfigurationError(
        'At least one passphrase is required to sign with a remote signer',
      );
    }
  }

  async publicKeys(): Promise<BlsPublicKey[]> {
    const accounts = await this.loadAccounts();
    return Array.from(accounts.keys());
  }

  async sign(
    pubkey: BlsPublicKey,
    request: SigningRequest,
    options: SignOptions = {},
  ): Promise<BlsSignature> {
    const accounts = await this.loadAccounts(options);
    const account = accounts.get(normalizePubkey(pubkey));
    if (!account) {
      throw new UnknownKeyError(pubkey);
    }

    const callOptions = this.callOptions(options);
    await this.unlock(account, callOptions);

    try {
      const signature = await withTimeout(
        this.client.sign(account, request.objectRoot, request.domain, callOptions),
        callOptions.timeoutMs,
        `Remote signing for ${account}`,
        callOptions.signal,
      );
      return this.blsService.parseSignature(bytesToHex(signature));
    } finally {
      await this.lock(account, callOptions);
    }
  }

  async close(): Promise<void> {
    this.client.close();
  }

  private callOptions(options: SignOptions = {}): RemoteCallOptions {
    return {
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      signal: options.signal,
    };
  }

  private loadAccounts(
    options?: SignOptions,
  ): Promise<Map<BlsPublicKey, string>> {
    if (!this.accounts) {
      this.accounts = this.fetchAccounts(this.callOptions(options));
      // 실패한 조회는 캐시하지 않음 (다음 호출에서 재시도)
      this.accounts.catch(() => {
        this.accounts = null;
      });
    }
    return this.accounts;
  }

  private async fetchAccounts(
    callOptions: RemoteCallOptions,
  ): Promise<Map<BlsPublicKey, string>> {
    const remoteAccounts = await withTimeout(
      this.client.listAccounts(this.options.walletPath, callOptions),
      callOptions.timeoutMs,
      'Listing remote accounts',
      callOptions.signal,
    );

    const accounts = new Map<BlsPublicKey, string>();
    for (const account of remoteAccounts) {
      try {
        const pubkey = this.blsService.parsePublicKey(
          bytesToHex(account.publicKey),
        );
        accounts.set(pubkey, account.name);
      } catch (error) {
        this.logger.warn(
          `Skipping remote account ${account.name}: ${errorMessage(error)}`,
        );
      }
    }

    this.logger.log(
      `Found ${accounts.size} remote accounts under ${this.options.walletPath}`,
    );
    return accounts;
  }

  /**
   * passphrase를 순서대로 시도해 계정 잠금 해제
   *
   * @throws {RemoteSignerRejectedError} 모든 passphrase가 거부된 경우
   */
  private async unlock(
    account: string,
    callOptions: RemoteCallOptions,
  ): Promise<void> {
    for (const passphrase of this.options.passphrases) {
      const unlocked = await withTimeout(
        this.client.unlockAccount(account, passphrase, callOptions),
        callOptions.timeoutMs,
        `Unlocking ${account}`,
        callOptions.signal,
      );
      if (unlocked) {
        this.logger.debug(`Unlocked remote account ${account}`);
        return;
      }
    }

    throw new RemoteSignerRejectedError('Unlock', 'DENIED');
  }

  private async lock(
    account: string,
    callOptions: RemoteCallOptions,
  ): Promise<void> {
    try {
      await withTimeout(
        this.client.lockAccount(account, callOptions),
        callOptions.timeoutMs,
        `Locking ${account}`,
      );
    } catch (error) {
      this.logger.warn(
        `Failed to lock remote account ${account}: ${errorMessage(error)}`,
      );
    }
  }
}
