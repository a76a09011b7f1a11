import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../common/errors/configuration.error';
import { errorMessage } from '../common/utils/error.util';
import { signedDelegationToJson } from './delegation.codec';
import { SignedDelegationMessage } from './entities/delegation-message.entity';

/**
 * 위임 파일 읽기
 *
 * 레코드 단위 검증은 하지 않음 (DelegationStoreService에서 레코드별로 처리)
 *
 * @returns 파싱되지 않은 레코드 배열 (파일 순서 유지)
 * @throws {ConfigurationError} 파일이 없거나 JSON 배열이 아닌 경우
 */
export function readDelegationFile(filePath: string): unknown[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Delegations file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Delegations file ${filePath} is not valid JSON: ${errorMessage(error)}`,
    );
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(
      `Delegations file ${filePath} must contain a JSON array`,
    );
  }

  return parsed;
}

export function serializeDelegations(
  messages: SignedDelegationMessage[],
): string {
  return JSON.stringify(messages.map(signedDelegationToJson), null, 2);
}

/**
 * 위임 파일 쓰기
 *
 * @param target - 파일 경로 또는 "-" (stdout)
 */
export function writeDelegationFile(
  target: string,
  messages: SignedDelegationMessage[],
): void {
  const content = `${serializeDelegations(messages)}\n`;

  if (target === '-') {
    process.stdout.write(content);
    return;
  }

  fs.mkdirSync(path.dirname(path.resolve(target)), { recursive: true });
  fs.writeFileSync(target, content);
}
