/**
 * Page Driver Interface
 *
 * 코어(전략/페이지네이션)가 사용하는 최소 브라우저 기능 집합
 *
 * SOLID 원칙:
 * - ISP: 코어가 실제로 쓰는 기능만 노출
 * - DIP: 코어는 Playwright가 아닌 이 인터페이스에 의존
 *
 * 규칙:
 * - 모든 대기는 상한(타임아웃)이 있음
 * - 액션 실패는 예외 대신 ActionResult로 반환
 */

import type { SelectorSpec } from "@/core/domain/SelectorSpec";

/**
 * JSON 값 (evaluateInPage 반환 타입)
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * 액션 결과
 */
export interface ActionResult {
  ok: boolean;
  error?: string;
}

/**
 * 캡처된 네트워크 응답
 */
export interface CapturedResponse {
  url: string;
  status: number;
  contentType: string;
  /** JSON이면 파싱된 값, 텍스트면 문자열, 그 외/실패는 undefined */
  body?: unknown;
}

export type ResponseListener = (response: CapturedResponse) => void;

/**
 * 요소 핸들
 */
export interface IElementHandle {
  /** textContent (없으면 빈 문자열) */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  innerHtml(): Promise<string>;
  childCount(): Promise<number>;
  /** 화면에 보이고 비활성화되지 않았는지 */
  isActionable(): Promise<boolean>;
  /** 하위 요소 조회 (DOM 순서) */
  findAll(spec: SelectorSpec): Promise<IElementHandle[]>;
}

/**
 * Page Driver
 */
export interface IPageDriver {
  /** 페이지 본문 표시 텍스트 */
  currentText(): Promise<string>;
  currentUrl(): string;
  /** 요소 조회 (DOM 순서) */
  findAll(spec: SelectorSpec): Promise<IElementHandle[]>;
  click(element: IElementHandle): Promise<ActionResult>;
  navigate(url: string): Promise<ActionResult>;
  /**
   * 응답 리스너 등록
   * @returns 등록 해제 함수
   */
  onResponse(listener: ResponseListener): () => void;
  evaluateInPage(script: string): Promise<JsonValue>;
  /** 현재 HTML (디버그 스냅샷용) */
  pageContent(): Promise<string>;
}
