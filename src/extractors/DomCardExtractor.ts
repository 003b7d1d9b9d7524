/**
 * DOM Card Extractor (기본 DOM 전략)
 *
 * 목적:
 * - 카드형 컨테이너(부분 class 일치)에서 라벨/본문/날짜 추출
 * - class명은 빌드 해시로 바뀌므로 부분 일치 명세만 사용
 *
 * 규칙:
 * - 컨테이너 명세는 우선순위 순서, 결과가 있는 첫 명세만 사용
 * - 본문 요소가 없는 컨테이너는 스킵 (에러 아님)
 */

import { logger } from "@/config/logger";
import type { NamedSelector } from "@/core/domain/SelectorSpec";
import type { DomConfig } from "@/core/domain/SiteConfig";
import {
  MemoryRecord,
  SourceStrategy,
  createMemoryRecord,
  dedupeRecords,
} from "@/core/domain/MemoryRecord";
import type { IElementHandle } from "@/core/interfaces";
import type { IMemoryExtractor, PageState } from "@/extractors/base";

export class DomCardExtractor implements IMemoryExtractor {
  readonly source = SourceStrategy.DOM_PRIMARY;

  constructor(
    private readonly config: DomConfig,
    private readonly minContentLength: number,
  ) {}

  async attempt(state: PageState): Promise<MemoryRecord[]> {
    try {
      const containers = await this.findContainers(state);
      const records: MemoryRecord[] = [];

      for (const container of containers) {
        const record = await this.readContainer(container);
        if (record) {
          records.push(record);
        }
      }

      return dedupeRecords(records);
    } catch (error) {
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "DOM 카드 추출 실패 - 빈 결과 처리",
      );
      return [];
    }
  }

  /**
   * 결과가 있는 첫 번째 컨테이너 명세의 요소들
   */
  private async findContainers(state: PageState): Promise<IElementHandle[]> {
    for (const selector of this.config.containers) {
      const elements = await state.driver.findAll(selector.spec);
      if (elements.length > 0) {
        logger.debug(
          { selector: selector.name, count: elements.length },
          "메모리 카드 컨테이너 발견",
        );
        return elements;
      }
    }
    return [];
  }

  private async readContainer(
    container: IElementHandle,
  ): Promise<MemoryRecord | null> {
    try {
      const content = await this.firstText(container, this.config.content);
      if (!content) {
        return null;
      }

      const kind = await this.firstText(container, this.config.label);
      const observedAt = await this.firstText(container, this.config.date);

      return createMemoryRecord(
        { content, kind, observedAt },
        this.source,
        this.minContentLength,
      );
    } catch (error) {
      // 재렌더링으로 분리된 요소 등
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "카드 읽기 실패 - 스킵",
      );
      return null;
    }
  }

  private async firstText(
    container: IElementHandle,
    selectors: readonly NamedSelector[],
  ): Promise<string> {
    for (const selector of selectors) {
      const [element] = await container.findAll(selector.spec);
      if (!element) continue;

      const text = (await element.text()).trim();
      if (text) {
        return text;
      }
    }
    return "";
  }
}
