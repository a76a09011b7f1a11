/**
 * ConfigurationError
 *
 * 시작 전(pre-flight) 단계의 치명적 오류
 * - 키 소스 선택이 없거나 2개 이상
 * - keystore 디렉토리 구조 오류
 * - 비밀번호 소스 누락
 *
 * 암호 연산이 시작되기 전에 프로세스를 중단시킴
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
