import * as fs from 'fs';
import * as path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors/configuration.error';
import {
  ConnectionError,
  OperationCancelledError,
  RemoteSignerRejectedError,
} from '../../common/errors/transport.errors';
import {
  IRemoteSignerClient,
  RemoteAccount,
  RemoteCallOptions,
} from './remote-signer.client.interface';

export interface DirkTlsCredentials {
  clientCertPath: string;
  clientKeyPath: string;
  caCertPath?: string;
}

const PROTO_FILE = 'eth2_signer.proto';

/**
 * 전송 계층 오류로 취급하는 gRPC status
 */
const TRANSIENT_STATUS = new Set<number>([
  grpc.status.UNAVAILABLE,
  grpc.status.DEADLINE_EXCEEDED,
  grpc.status.RESOURCE_EXHAUSTED,
  grpc.status.ABORTED,
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isServiceError(error: unknown): error is grpc.ServiceError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'number' &&
    'metadata' in error
  );
}

/**
 * gRPC 오류 → 도메인 오류
 *
 * - UNAVAILABLE / DEADLINE_EXCEEDED 등 → ConnectionError (재시도 가능)
 * - 그 외 status → RemoteSignerRejectedError (재시도 무의미)
 */
export function mapGrpcError(operation: string, error: unknown): Error {
  if (!isServiceError(error)) {
    return error instanceof Error
      ? error
      : new ConnectionError(`${operation} failed: ${String(error)}`, error);
  }

  if (TRANSIENT_STATUS.has(error.code)) {
    return new ConnectionError(
      `${operation} failed: ${error.details || error.message}`,
      error,
    );
  }

  return new RemoteSignerRejectedError(operation, grpc.status[error.code]);
}

function findProtoFile(): string {
  const candidates = [
    path.resolve(process.cwd(), 'proto', PROTO_FILE),
    path.resolve(__dirname, '../../../proto', PROTO_FILE),
    path.resolve(__dirname, '../../../../proto', PROTO_FILE),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigurationError(`${PROTO_FILE} not found`);
}

function readState(response: unknown): string {
  return isRecord(response) && typeof response.state === 'string'
    ? response.state
    : 'UNKNOWN';
}

function readBytes(value: unknown): Uint8Array {
  return value instanceof Uint8Array ? new Uint8Array(value) : new Uint8Array();
}

function readList(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Dirk gRPC Client
 *
 * Dirk (분산 원격 서명자) 서비스:
 * - Lister: 계정 목록
 * - Signer: 서명 요청 (signing root는 Dirk가 계산)
 * - AccountManager: 계정 잠금 / 해제
 *
 * 연결: mutual TLS (클라이언트 인증서 + 키, CA 인증서 선택)
 * proto 정의는 실행 시 proto/eth2_signer.proto에서 로드
 */
export class DirkClient extends IRemoteSignerClient {
  private readonly logger = new Logger(DirkClient.name);
  private readonly client: grpc.Client;
  private readonly services: Record<string, protoLoader.ServiceDefinition>;

  constructor(url: string, credentials: DirkTlsCredentials) {
    super();

    const packageDefinition = protoLoader.loadSync(findProtoFile(), {
      keepCase: false,
      longs: String,
      enums: String,
      defaults: true,
      oneofs: true,
    });

    this.services = {};
    for (const name of ['Lister', 'Signer', 'AccountManager']) {
      const definition = packageDefinition[`v1.${name}`];
      if (!definition || 'format' in definition) {
        throw new ConfigurationError(`Service v1.${name} missing from proto`);
      }
      this.services[name] = definition;
    }

    this.client = new grpc.Client(
      url.replace(/^https?:\/\//, ''),
      DirkClient.createCredentials(credentials),
    );
    this.logger.log(`Dirk client created for ${url}`);
  }

  /**
   * mTLS 자격 증명 생성
   *
   * @throws {ConfigurationError} 인증서 파일을 읽을 수 없는 경우
   */
  private static createCredentials(
    credentials: DirkTlsCredentials,
  ): grpc.ChannelCredentials {
    const read = (filePath: string, label: string): Buffer => {
      if (!fs.existsSync(filePath)) {
        throw new ConfigurationError(`${label} not found: ${filePath}`);
      }
      return fs.readFileSync(filePath);
    };

    const clientCert = read(credentials.clientCertPath, 'Client certificate');
    const clientKey = read(credentials.clientKeyPath, 'Client key');
    const caCert = credentials.caCertPath
      ? read(credentials.caCertPath, 'CA certificate')
      : null;

    return grpc.credentials.createSsl(caCert, clientKey, clientCert);
  }

  async listAccounts(
    walletPath: string,
    options: RemoteCallOptions,
  ): Promise<RemoteAccount[]> {
    const response = await this.call(
      'Lister',
      'ListAccounts',
      { paths: [walletPath] },
      options,
    );

    const state = readState(response);
    if (state !== 'SUCCEEDED' || !isRecord(response)) {
      throw new RemoteSignerRejectedError('ListAccounts', state);
    }

    const accounts: RemoteAccount[] = readList(response.accounts).map(
      (account) => ({
        name: String(account.name ?? ''),
        publicKey: readBytes(account.publicKey),
        distributed: false,
      }),
    );
    const distributed: RemoteAccount[] = readList(
      response.distributedAccounts,
    ).map((account) => ({
      name: String(account.name ?? ''),
      publicKey: readBytes(account.compositePublicKey),
      distributed: true,
    }));

    this.logger.debug(
      `Listed ${accounts.length} accounts and ${distributed.length} distributed accounts`,
    );
    return [...accounts, ...distributed];
  }

  async unlockAccount(
    account: string,
    passphrase: string,
    options: RemoteCallOptions,
  ): Promise<boolean> {
    const response = await this.call(
      'AccountManager',
      'Unlock',
      { account, passphrase: Buffer.from(passphrase, 'utf8') },
      options,
    );
    return this.interpretLockState('Unlock', readState(response));
  }

  async lockAccount(
    account: string,
    options: RemoteCallOptions,
  ): Promise<boolean> {
    const response = await this.call(
      'AccountManager',
      'Lock',
      { account },
      options,
    );
    return this.interpretLockState('Lock', readState(response));
  }

  async sign(
    account: string,
    data: Uint8Array,
    domain: Uint8Array,
    options: RemoteCallOptions,
  ): Promise<Uint8Array> {
    const response = await this.call(
      'Signer',
      'Sign',
      { account, data: Buffer.from(data), domain: Buffer.from(domain) },
      options,
    );

    const state = readState(response);
    if (state !== 'SUCCEEDED' || !isRecord(response)) {
      throw new RemoteSignerRejectedError('Sign', state);
    }

    const signature = readBytes(response.signature);
    if (signature.length === 0) {
      throw new RemoteSignerRejectedError('Sign', 'EMPTY_SIGNATURE');
    }
    return signature;
  }

  close(): void {
    this.client.close();
  }

  /**
   * SUCCEEDED → true, DENIED → false, 그 외 → 거부
   */
  private interpretLockState(operation: string, state: string): boolean {
    if (state === 'SUCCEEDED') return true;
    if (state === 'DENIED') return false;
    throw new RemoteSignerRejectedError(operation, state);
  }

  private call(
    serviceName: string,
    methodName: string,
    request: object,
    options: RemoteCallOptions,
  ): Promise<unknown> {
    const method = this.services[serviceName]?.[methodName];
    if (!method) {
      return Promise.reject(
        new ConfigurationError(`Unknown method ${serviceName}.${methodName}`),
      );
    }

    const operation = `${serviceName}.${methodName}`;
    if (options.signal?.aborted) {
      return Promise.reject(new OperationCancelledError(operation));
    }

    return new Promise<unknown>((resolve, reject) => {
      const call = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline: Date.now() + options.timeoutMs },
        (error: grpc.ServiceError | null, response?: object) => {
          options.signal?.removeEventListener('abort', onAbort);
          if (error && options.signal?.aborted) {
            reject(new OperationCancelledError(operation));
            return;
          }
          if (error) {
            reject(mapGrpcError(operation, error));
            return;
          }
          resolve(response);
        },
      );

      const onAbort = () => call.cancel();
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
