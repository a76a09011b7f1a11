/**
 * 원격 서명자 전송 오류
 *
 * ConnectionError만 재시도 대상
 * RemoteSignerRejectedError는 서명자가 명시적으로 거부한 경우이므로 재시도하지 않음
 * 호출자 취소 / 로컬 타임아웃도 재시도하지 않음
 */
export class ConnectionError extends Error {
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class OperationCancelledError extends Error {
  constructor(readonly operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export class OperationTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export class RemoteSignerRejectedError extends Error {
  constructor(
    readonly operation: string,
    readonly state: string,
  ) {
    super(`Remote signer rejected ${operation} (state: ${state})`);
    this.name = 'RemoteSignerRejectedError';
  }
}
