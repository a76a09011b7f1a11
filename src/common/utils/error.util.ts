/**
 * unknown 타입 에러에서 메시지 추출
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
