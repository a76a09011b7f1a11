import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../../common/errors/configuration.error';
import { stripHexPrefix } from '../../common/types/common.types';

/**
 * Keystore 비밀번호 소스
 *
 * - shared: 모든 keystore에 같은 비밀번호
 * - directory: 공개키별 비밀번호 파일 (lighthouse secrets/ 디렉토리)
 *   파일 이름은 "0x<pubkey>" 또는 "<pubkey>"
 */
export type KeystoreSecret =
  | { kind: 'shared'; password: string }
  | { kind: 'directory'; directory: string };

/**
 * 비밀번호 소스 검증
 *
 * @throws {ConfigurationError} 디렉토리가 존재하지 않는 경우
 */
export function assertKeystoreSecret(secret: KeystoreSecret): void {
  if (secret.kind !== 'directory') {
    return;
  }
  if (
    !fs.existsSync(secret.directory) ||
    !fs.statSync(secret.directory).isDirectory()
  ) {
    throw new ConfigurationError(
      `Keystore secrets path is not a directory: ${secret.directory}`,
    );
  }
}

/**
 * 공개키에 해당하는 비밀번호 조회
 *
 * @param pubkey - keystore의 pubkey 필드 (0x 접두사 선택)
 * @returns 비밀번호 또는 null (파일 없음)
 */
export function readKeystorePassword(
  secret: KeystoreSecret,
  pubkey: string,
): string | null {
  if (secret.kind === 'shared') {
    return secret.password;
  }

  const hex = stripHexPrefix(pubkey).toLowerCase();
  for (const name of [`0x${hex}`, hex]) {
    const filePath = path.join(secret.directory, name);
    if (fs.existsSync(filePath) && fs.statSync(filePath).isFile()) {
      // 비밀번호 파일 끝의 개행 제거
      return fs.readFileSync(filePath, 'utf8').replace(/\r?\n$/, '');
    }
  }

  return null;
}
