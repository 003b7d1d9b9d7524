/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Run ID, Target 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * Run 전용 로거 생성 (CLI 1회 실행 단위)
 * @param runId - Run ID (UUID)
 */
export function createRunLogger(runId: string): Logger {
  return logger.child({ run_id: runId });
}

/**
 * Target 전용 로거 생성
 * @param parent - 상위 로거 (Run 로거)
 * @param targetName - Export 대상 이름
 */
export function createTargetLogger(parent: Logger, targetName: string): Logger {
  return parent.child({ target: targetName });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  log: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  log.info({ ...data, important: true }, message);
}
