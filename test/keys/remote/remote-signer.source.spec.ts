import { Logger } from '@nestjs/common';
import { SigningPurpose } from '../../../src/common/constants/signing.constants';
import { ConfigurationError } from '../../../src/common/errors/configuration.error';
import { UnknownKeyError } from '../../../src/common/errors/crypto.errors';
import {
  ConnectionError,
  OperationCancelledError,
  OperationTimeoutError,
  RemoteSignerRejectedError,
} from '../../../src/common/errors/transport.errors';
import { RemoteSignerKeySource } from '../../../src/keys/remote/remote-signer.source';
import { FakeRemoteSignerClient } from '../../helpers/fake-remote-signer.client';
import { bls, HOLESKY, pubkeyOf } from '../../helpers/fixtures';

/**
 * RemoteSigner 테스트
 *
 * 네트워크 없이 in-process fake 서명자 사용
 */
describe('RemoteSignerKeySource', () => {
  const walletPath = 'DelegationWallet';
  const request = bls.buildSigningRequest(
    new Uint8Array(32).fill(9),
    SigningPurpose.Delegation,
    HOLESKY,
  );

  let client: FakeRemoteSignerClient;

  const createSource = (passphrases = ['test-secret'], timeoutMs = 1000) =>
    new RemoteSignerKeySource(bls, client, {
      walletPath,
      passphrases,
      timeoutMs,
    });

  beforeEach(() => {
    client = new FakeRemoteSignerClient([
      { name: 'DelegationWallet/validator-1', key: 1, passphrase: 'test-secret' },
      {
        name: 'DelegationWallet/validator-2',
        key: 2,
        passphrase: 'other-secret',
        distributed: true,
      },
    ]);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('passphrase가 없으면 ConfigurationError', () => {
    expect(() => createSource([])).toThrow(ConfigurationError);
  });

  describe('publicKeys', () => {
    it('일반 계정과 distributed 계정을 모두 반환', async () => {
      const source = createSource();

      expect(await source.publicKeys()).toEqual([pubkeyOf(1), pubkeyOf(2)]);
      expect(source.kind).toBe('remote-signer');
    });

    it('계정 목록은 한 번만 조회 (캐시)', async () => {
      const source = createSource();

      await source.publicKeys();
      await source.publicKeys();

      expect(client.calls.filter((call) => call.startsWith('list:'))).toEqual([
        `list:${walletPath}`,
      ]);
    });

    it('공개키가 잘못된 계정은 건너뜀', async () => {
      client.extraAccounts = [
        {
          name: 'DelegationWallet/broken',
          publicKey: new Uint8Array(48),
          distributed: false,
        },
      ];
      const source = createSource();

      expect(await source.publicKeys()).toEqual([pubkeyOf(1), pubkeyOf(2)]);
      expect(Logger.prototype.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('sign', () => {
    it('unlock → sign → lock 순서로 호출', async () => {
      const source = createSource();

      const signature = await source.sign(pubkeyOf(1), request);

      expect(
        bls.verifyRoot(pubkeyOf(1), bls.computeSigningRoot(request), signature),
      ).toBe(true);
      expect(client.calls).toEqual([
        `list:${walletPath}`,
        'unlock:DelegationWallet/validator-1:test-secret',
        'sign:DelegationWallet/validator-1',
        'lock:DelegationWallet/validator-1',
      ]);
      expect(client.unlocked.size).toBe(0);
    });

    it('passphrase를 순서대로 시도', async () => {
      const source = createSource(['test-secret', 'other-secret']);

      await source.sign(pubkeyOf(2), request);

      expect(client.calls.filter((call) => call.startsWith('unlock:'))).toEqual([
        'unlock:DelegationWallet/validator-2:test-secret',
        'unlock:DelegationWallet/validator-2:other-secret',
      ]);
    });

    it('모든 passphrase가 거부되면 RemoteSignerRejectedError', async () => {
      const source = createSource(['wrong-secret']);

      await expect(source.sign(pubkeyOf(1), request)).rejects.toThrow(
        new RemoteSignerRejectedError('Unlock', 'DENIED'),
      );
      expect(client.calls).not.toContain('sign:DelegationWallet/validator-1');
    });

    it('모르는 공개키는 UnknownKeyError', async () => {
      const source = createSource();

      await expect(source.sign(pubkeyOf(3), request)).rejects.toBeInstanceOf(
        UnknownKeyError,
      );
    });

    it('lock 실패는 경고만 남기고 서명은 반환', async () => {
      client.failLock = true;
      const source = createSource();

      const signature = await source.sign(pubkeyOf(1), request);

      expect(signature).toMatch(/^0x[0-9a-f]{192}$/);
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'Failed to lock remote account DelegationWallet/validator-1: lock failed',
      );
    });

    it('응답이 없으면 OperationTimeoutError, 계정은 다시 잠금', async () => {
      client.hangSign = true;
      const source = createSource();
      const pending = source.sign(pubkeyOf(1), request, { timeoutMs: 20 });

      await expect(pending).rejects.toBeInstanceOf(OperationTimeoutError);
      await expect(pending).rejects.toThrow(
        'Remote signing for DelegationWallet/validator-1 timed out after 20ms',
      );
      expect(client.calls[client.calls.length - 1]).toBe(
        'lock:DelegationWallet/validator-1',
      );
    });

    it('전송 오류는 ConnectionError 그대로 전달', async () => {
      client.failSigns = 1;
      const source = createSource();

      await expect(source.sign(pubkeyOf(1), request)).rejects.toBeInstanceOf(
        ConnectionError,
      );
    });

    it('abort된 signal이면 취소', async () => {
      const source = createSource();
      await source.publicKeys();
      const controller = new AbortController();
      controller.abort();

      const pending = source.sign(pubkeyOf(1), request, {
        signal: controller.signal,
      });

      await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
      await expect(pending).rejects.toThrow(
        'Unlocking DelegationWallet/validator-1 was cancelled',
      );
    });
  });

  it('close는 클라이언트 연결을 닫음', async () => {
    const source = createSource();

    await source.close();

    expect(client.closed).toBe(true);
  });
});
