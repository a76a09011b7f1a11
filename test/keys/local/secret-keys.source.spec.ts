import { SigningPurpose } from '../../../src/common/constants/signing.constants';
import { ConfigurationError } from '../../../src/common/errors/configuration.error';
import { UnknownKeyError } from '../../../src/common/errors/crypto.errors';
import { BlsPublicKey } from '../../../src/common/types/common.types';
import { SecretKeysKeySource } from '../../../src/keys/local/secret-keys.source';
import { bls, MAINNET, pubkeyOf, secretKeyHex } from '../../helpers/fixtures';

describe('SecretKeysKeySource', () => {
  const request = bls.buildSigningRequest(
    new Uint8Array(32).fill(1),
    SigningPurpose.Delegation,
    MAINNET,
  );

  it('비밀키에서 공개키를 계산해야 함', async () => {
    const source = new SecretKeysKeySource(bls, [
      secretKeyHex(1),
      secretKeyHex(2).slice(2),
    ]);

    expect(source.kind).toBe('secret-keys');
    expect(await source.publicKeys()).toEqual([pubkeyOf(1), pubkeyOf(2)]);
  });

  it('보유한 키로 서명하면 검증되어야 함', async () => {
    const source = new SecretKeysKeySource(bls, [secretKeyHex(1)]);

    const signature = await source.sign(pubkeyOf(1), request);

    expect(
      bls.verifyRoot(pubkeyOf(1), bls.computeSigningRoot(request), signature),
    ).toBe(true);
  });

  it('canSign은 대소문자와 관계없이 동작해야 함', async () => {
    const source = new SecretKeysKeySource(bls, [secretKeyHex(1)]);
    const upper: BlsPublicKey = `0x${pubkeyOf(1).slice(2).toUpperCase()}`;

    expect(await source.canSign(upper)).toBe(true);
    expect(await source.canSign(pubkeyOf(2))).toBe(false);
  });

  it('모르는 공개키는 UnknownKeyError', async () => {
    const source = new SecretKeysKeySource(bls, [secretKeyHex(1)]);

    await expect(source.sign(pubkeyOf(2), request)).rejects.toBeInstanceOf(
      UnknownKeyError,
    );
  });

  it('빈 목록은 ConfigurationError', () => {
    expect(() => new SecretKeysKeySource(bls, [])).toThrow(ConfigurationError);
  });

  it('잘못된 키는 값을 노출하지 않고 ConfigurationError', () => {
    expect(() => new SecretKeysKeySource(bls, [secretKeyHex(1), 'test-secret'])).toThrow(
      'Secret key #1 is not a valid BLS secret key',
    );
  });
});
