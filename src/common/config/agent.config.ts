import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Min,
  validateSync,
} from 'class-validator';
import { CHAINS, DEFAULT_CHAIN_ID } from '../constants/signing.constants';
import { ConfigurationError } from '../errors/configuration.error';
import { ZERO_ADDRESS } from '../types/common.types';

export type RegistryStorage = 'memory' | 'leveldb';

function toList({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toBoolean({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

/**
 * AgentConfig
 *
 * 환경 변수 기반 설정
 *
 * 검증 규칙:
 * - chainId: 지원하는 체인 중 하나
 * - registryAdmin: 0x + 40자리 hex
 * - 키 소스 조합(정확히 하나)은 resolveKeySourceConfig에서 검증
 */
export class AgentConfig {
  @Type(() => Number)
  @IsInt()
  @IsIn(CHAINS.map((chain) => chain.chainId), {
    message: 'chainId must be one of the supported chains',
  })
  chainId: number = DEFAULT_CHAIN_ID;

  // ---- Key source: SecretKeys ----
  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  secretKeys?: string[];

  // ---- Key source: LocalKeystore ----
  @IsOptional()
  @IsString()
  keystorePath?: string;

  @IsOptional()
  @IsString()
  keystorePassword?: string;

  @IsOptional()
  @IsString()
  keystoreSecretsPath?: string;

  // ---- Key source: RemoteSigner (Dirk) ----
  @IsOptional()
  @IsString()
  remoteSignerUrl?: string;

  @IsOptional()
  @IsString()
  remoteSignerClientCertPath?: string;

  @IsOptional()
  @IsString()
  remoteSignerClientKeyPath?: string;

  @IsOptional()
  @IsString()
  remoteSignerCaCertPath?: string;

  @IsOptional()
  @IsString()
  remoteSignerWalletPath?: string;

  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  remoteSignerPassphrases?: string[];

  @Type(() => Number)
  @IsInt()
  @Min(1)
  remoteSignerTimeoutMs: number = 10_000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  remoteSignerMaxRetries: number = 3;

  // ---- Delegations ----
  @IsOptional()
  @IsString()
  delegationsPath?: string;

  @Transform(toBoolean)
  @IsBoolean()
  fallbackToValidatorKey: boolean = true;

  // ---- Registry ----
  @IsString()
  @Matches(/^0x[a-fA-F0-9]{40}$/, {
    message: 'registryAdmin must be a valid address (0x + 40 hex characters)',
  })
  registryAdmin: string = ZERO_ADDRESS;

  @Transform(toBoolean)
  @IsBoolean()
  allowUnsafeRegistration: boolean = false;

  @IsIn(['memory', 'leveldb'])
  registryStorage: RegistryStorage = 'memory';

  @IsString()
  registryDataDir: string = 'data/registry';
}

/**
 * 환경 변수 이름 → AgentConfig 필드 매핑
 */
const ENV_KEYS: Record<string, keyof AgentConfig> = {
  CHAIN_ID: 'chainId',
  SECRET_KEYS: 'secretKeys',
  KEYSTORE_PATH: 'keystorePath',
  KEYSTORE_PASSWORD: 'keystorePassword',
  KEYSTORE_SECRETS_PATH: 'keystoreSecretsPath',
  REMOTE_SIGNER_URL: 'remoteSignerUrl',
  REMOTE_SIGNER_CLIENT_CERT_PATH: 'remoteSignerClientCertPath',
  REMOTE_SIGNER_CLIENT_KEY_PATH: 'remoteSignerClientKeyPath',
  REMOTE_SIGNER_CA_CERT_PATH: 'remoteSignerCaCertPath',
  REMOTE_SIGNER_WALLET_PATH: 'remoteSignerWalletPath',
  REMOTE_SIGNER_PASSPHRASES: 'remoteSignerPassphrases',
  REMOTE_SIGNER_TIMEOUT_MS: 'remoteSignerTimeoutMs',
  REMOTE_SIGNER_MAX_RETRIES: 'remoteSignerMaxRetries',
  DELEGATIONS_PATH: 'delegationsPath',
  FALLBACK_TO_VALIDATOR_KEY: 'fallbackToValidatorKey',
  REGISTRY_ADMIN: 'registryAdmin',
  ALLOW_UNSAFE_REGISTRATION: 'allowUnsafeRegistration',
  REGISTRY_STORAGE: 'registryStorage',
  REGISTRY_DATA_DIR: 'registryDataDir',
};

/**
 * 환경 변수로부터 설정 로드 + 검증
 *
 * 빈 문자열은 미설정으로 취급
 *
 * @throws {ConfigurationError} 검증 실패 시
 */
export function loadAgentConfig(env: NodeJS.ProcessEnv): AgentConfig {
  const raw: Record<string, string> = {};

  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      raw[field] = value;
    }
  }

  const config = plainToInstance(AgentConfig, raw, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(config);

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return config;
}
