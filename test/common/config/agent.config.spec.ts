import { loadAgentConfig } from '../../../src/common/config/agent.config';
import { ConfigurationError } from '../../../src/common/errors/configuration.error';
import { ZERO_ADDRESS } from '../../../src/common/types/common.types';

describe('loadAgentConfig', () => {
  it('환경 변수가 없으면 기본값', () => {
    const config = loadAgentConfig({});

    expect(config.chainId).toBe(1);
    expect(config.allowUnsafeRegistration).toBe(false);
    expect(config.fallbackToValidatorKey).toBe(true);
    expect(config.registryAdmin).toBe(ZERO_ADDRESS);
    expect(config.registryStorage).toBe('memory');
    expect(config.registryDataDir).toBe('data/registry');
    expect(config.remoteSignerTimeoutMs).toBe(10000);
    expect(config.remoteSignerMaxRetries).toBe(3);
    expect(config.secretKeys).toBeUndefined();
  });

  it('숫자 / 불리언 / 목록 변환', () => {
    const config = loadAgentConfig({
      CHAIN_ID: '7014190335',
      SECRET_KEYS: ' 0xaa , 0xbb ,',
      ALLOW_UNSAFE_REGISTRATION: 'true',
      FALLBACK_TO_VALIDATOR_KEY: '0',
      REMOTE_SIGNER_TIMEOUT_MS: '2500',
      REGISTRY_STORAGE: 'leveldb',
    });

    expect(config.chainId).toBe(7014190335);
    expect(config.secretKeys).toEqual(['0xaa', '0xbb']);
    expect(config.allowUnsafeRegistration).toBe(true);
    expect(config.fallbackToValidatorKey).toBe(false);
    expect(config.remoteSignerTimeoutMs).toBe(2500);
    expect(config.registryStorage).toBe('leveldb');
  });

  it('빈 문자열은 미설정으로 취급', () => {
    const config = loadAgentConfig({ CHAIN_ID: '', KEYSTORE_PATH: '  ' });

    expect(config.chainId).toBe(1);
    expect(config.keystorePath).toBeUndefined();
  });

  it('지원하지 않는 체인은 ConfigurationError', () => {
    expect(() => loadAgentConfig({ CHAIN_ID: '5' })).toThrow(
      ConfigurationError,
    );
  });

  it('잘못된 admin 주소는 ConfigurationError', () => {
    expect(() => loadAgentConfig({ REGISTRY_ADMIN: '0x1234' })).toThrow(
      /registryAdmin must be a valid address/,
    );
  });

  it('알 수 없는 저장소 종류는 ConfigurationError', () => {
    expect(() => loadAgentConfig({ REGISTRY_STORAGE: 'redis' })).toThrow(
      ConfigurationError,
    );
  });
});
