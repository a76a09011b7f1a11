import {
  ConnectionError,
  OperationCancelledError,
  OperationTimeoutError,
} from '../errors/transport.errors';

export interface RetryOptions {
  /** 최대 재시도 횟수 (첫 시도 제외) */
  maxRetries: number;
  baseDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  /** 기본값: ConnectionError만 재시도 */
  shouldRetry?: (error: unknown) => boolean;
  /** 테스트에서 대기 시간을 대체할 때 사용 */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 지수 백오프 + jitter 재시도
 *
 * 대기 시간: base * factor^attempt (최대 maxDelay), 이후 [50%, 100%] 구간 jitter
 * 기본값: 100ms, x2, 최대 1초
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs = 100,
    factor = 2,
    maxDelayMs = 1000,
    shouldRetry = (error: unknown) => error instanceof ConnectionError,
    sleep: wait = sleep,
  } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = Math.min(baseDelayMs * factor ** attempt, maxDelayMs);
      const jittered = Math.round(delay / 2 + Math.random() * (delay / 2));
      attempt++;
      await wait(jittered);
    }
  }
}

/**
 * 타임아웃 / 취소 가능한 Promise
 *
 * - timeoutMs가 지나면 OperationTimeoutError로 reject
 * - signal이 abort되면 OperationCancelledError로 reject
 * - 원래 작업 자체는 중단시키지 않음 (호출자가 signal을 전달해야 함)
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError(label));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError(label));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(new OperationTimeoutError(label, timeoutMs));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
