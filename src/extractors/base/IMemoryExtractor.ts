/**
 * Memory Extractor Interface
 *
 * 모든 추출 전략의 공통 계약:
 * - 입력: 현재 page-view 상태 (Driver + 이번 page-view 동안 캡처된 응답)
 * - 출력: MemoryRecord 배열 (DOM 순서 유지)
 * - 데이터가 없으면 빈 배열, 구조 파싱 실패도 빈 배열 (예외 전파 금지)
 * - 무기한 대기 금지 (Driver의 타임아웃에 의존)
 */

import type { MemoryRecord, SourceStrategy } from "@/core/domain/MemoryRecord";
import type { CapturedResponse, IPageDriver } from "@/core/interfaces";

/**
 * Page-view 상태
 */
export interface PageState {
  driver: IPageDriver;
  /** 이번 page-view 동안 캡처된 응답 (ResponseBuffer 소유) */
  responses: readonly CapturedResponse[];
}

export interface IMemoryExtractor {
  readonly source: SourceStrategy;
  attempt(state: PageState): Promise<MemoryRecord[]>;
}
