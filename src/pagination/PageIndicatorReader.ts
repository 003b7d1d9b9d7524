/**
 * Page Indicator Reader
 *
 * 페이지 본문 텍스트에서 "Page X of Y" 표시를 읽어 PageCursor로 변환
 * 첫 번째 일치만 사용, 대소문자 무시
 */

import { logger } from "@/config/logger";
import {
  PageCursor,
  UNPAGINATED_CURSOR,
  parsePageIndicator,
} from "@/core/domain/PageCursor";
import type { IPageDriver } from "@/core/interfaces";

export class PageIndicatorReader {
  private readonly pattern: RegExp;

  constructor(indicatorPattern: string) {
    this.pattern = new RegExp(indicatorPattern, "i");
  }

  /**
   * 텍스트에 페이지 표시가 있는지 (위치 기반 컨트롤 탐색용)
   */
  matches(text: string): boolean {
    return this.pattern.test(text);
  }

  /**
   * 현재 커서 읽기
   * @returns 표시가 없거나 깨진 값이면 null
   */
  async read(driver: IPageDriver): Promise<PageCursor | null> {
    let text: string;
    try {
      text = await driver.currentText();
    } catch (error) {
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "페이지 텍스트 읽기 실패",
      );
      return null;
    }
    return parsePageIndicator(text, this.pattern);
  }

  /**
   * 현재 커서 읽기 (표시가 없으면 { 1, 1 })
   */
  async readOrDefault(driver: IPageDriver): Promise<PageCursor> {
    return (await this.read(driver)) ?? { ...UNPAGINATED_CURSOR };
  }
}
