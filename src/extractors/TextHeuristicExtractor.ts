/**
 * Text Heuristic Extractor (Fallback 전략)
 *
 * 목적:
 * - 구조 셀렉터가 모두 깨졌을 때 텍스트 패턴으로 메모리 추출
 * - 분류 키워드("automatic memory" 등) + 선택 체크박스가 함께 있는 요소를 카드로 간주
 *
 * 규칙:
 * - 텍스트가 maxTextLength 이상이거나 자식이 없는 요소는 제외
 * - 키워드가 정확히 1회 등장하는 요소만 (여러 카드를 감싼 요소 제외)
 * - 다른 후보를 포함하는 상위 요소는 제외 (가장 안쪽 카드만)
 * - 보일러플레이트 제거는 best-effort (잔여 노이즈 허용)
 */

import { logger } from "@/config/logger";
import type { FallbackConfig } from "@/core/domain/SiteConfig";
import {
  MemoryRecord,
  SourceStrategy,
  createMemoryRecord,
  dedupeRecords,
} from "@/core/domain/MemoryRecord";
import type { IMemoryExtractor, PageState } from "@/extractors/base";
import { TextCleaner } from "@/extractors/common/TextCleaner";

interface HeuristicCandidate {
  text: string;
  keyword: string;
}

export class TextHeuristicExtractor implements IMemoryExtractor {
  readonly source = SourceStrategy.DOM_FALLBACK;
  private readonly cleaner: TextCleaner;
  private readonly keywords: string[];

  constructor(
    private readonly config: FallbackConfig,
    private readonly minContentLength: number,
  ) {
    this.cleaner = TextCleaner.fromConfig(config.stripRules);
    this.keywords = config.keywords.map((keyword) => keyword.toLowerCase());
  }

  async attempt(state: PageState): Promise<MemoryRecord[]> {
    try {
      const candidates = this.innermost(await this.collectCandidates(state));
      const records: MemoryRecord[] = [];

      for (const candidate of candidates) {
        const record = this.toRecord(candidate);
        if (record) {
          records.push(record);
        }
      }

      return dedupeRecords(records);
    } catch (error) {
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "텍스트 휴리스틱 추출 실패 - 빈 결과 처리",
      );
      return [];
    }
  }

  private async collectCandidates(
    state: PageState,
  ): Promise<HeuristicCandidate[]> {
    const candidates: HeuristicCandidate[] = [];
    const seenTexts = new Set<string>();

    for (const selector of this.config.candidates) {
      const elements = await state.driver.findAll(selector.spec);

      for (const element of elements) {
        const text = (await element.text()).trim();
        if (!text || text.length >= this.config.maxTextLength) continue;
        if (seenTexts.has(text)) continue;
        if ((await element.childCount()) === 0) continue;

        const keyword = this.singleKeyword(text);
        if (!keyword) continue;

        seenTexts.add(text);
        candidates.push({ text, keyword });
      }
    }

    return candidates;
  }

  /**
   * 키워드가 정확히 1회 등장하면 해당 키워드, 아니면 null
   */
  private singleKeyword(text: string): string | null {
    const lower = text.toLowerCase();
    let found: string | null = null;
    let occurrences = 0;

    for (const keyword of this.keywords) {
      let index = lower.indexOf(keyword);
      while (index !== -1) {
        occurrences++;
        found = keyword;
        index = lower.indexOf(keyword, index + keyword.length);
      }
    }

    return occurrences === 1 ? found : null;
  }

  /**
   * 다른 후보 텍스트를 포함하는 상위 요소 제거
   */
  private innermost(candidates: HeuristicCandidate[]): HeuristicCandidate[] {
    return candidates.filter(
      (candidate) =>
        !candidates.some(
          (other) =>
            other !== candidate &&
            other.text.length < candidate.text.length &&
            candidate.text.includes(other.text),
        ),
    );
  }

  private toRecord(candidate: HeuristicCandidate): MemoryRecord | null {
    const dateMatch = new RegExp(this.config.datePattern).exec(candidate.text);
    const observedAt = dateMatch?.[1] ?? dateMatch?.[0] ?? "";
    const content = this.cleaner.clean(
      candidate.text,
      observedAt ? [observedAt] : [],
    );

    return createMemoryRecord(
      { content, kind: candidate.keyword, observedAt },
      this.source,
      this.minContentLength,
    );
  }
}
