/**
 * Extraction Chain
 *
 * 목적:
 * - 추출 전략을 우선순위 순서로 실행하고 첫 번째 비어있지 않은 결과 반환
 * - 결과 병합 없음 (출처가 섞이지 않음)
 *
 * 패턴: Chain of Responsibility
 *
 * 순서: network → domPrimary → domFallback
 */

import { logger } from "@/config/logger";
import type { MemoryRecord, SourceStrategy } from "@/core/domain/MemoryRecord";
import type { SiteConfig } from "@/core/domain/SiteConfig";
import type { IMemoryExtractor, PageState } from "@/extractors/base";
import { DomCardExtractor } from "@/extractors/DomCardExtractor";
import { NetworkMemoryExtractor } from "@/extractors/NetworkMemoryExtractor";
import { TextHeuristicExtractor } from "@/extractors/TextHeuristicExtractor";

/**
 * 전략별 시도 기록 (진단용)
 */
export interface StrategyAttempt {
  source: SourceStrategy;
  count: number;
  error?: string;
}

export interface ChainResult {
  records: MemoryRecord[];
  /** 결과를 낸 전략 (모두 비었으면 null) */
  source: SourceStrategy | null;
  attempts: StrategyAttempt[];
}

export class ExtractionChain {
  constructor(private readonly strategies: readonly IMemoryExtractor[]) {}

  /**
   * 사이트 설정 → 기본 3단계 체인
   */
  static fromConfig(config: SiteConfig, minContentLength: number): ExtractionChain {
    return new ExtractionChain([
      new NetworkMemoryExtractor(config.network, minContentLength),
      new DomCardExtractor(config.dom, minContentLength),
      new TextHeuristicExtractor(config.fallback, minContentLength),
    ]);
  }

  get sources(): SourceStrategy[] {
    return this.strategies.map((strategy) => strategy.source);
  }

  async run(state: PageState): Promise<ChainResult> {
    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategies) {
      let records: MemoryRecord[];
      try {
        records = await strategy.attempt(state);
      } catch (error) {
        // 계약 위반 (예외 전파) → 빈 결과로 간주
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(
          { source: strategy.source, error: message },
          "추출 전략 예외 - 빈 결과로 처리",
        );
        attempts.push({ source: strategy.source, count: 0, error: message });
        continue;
      }

      attempts.push({ source: strategy.source, count: records.length });

      if (records.length > 0) {
        logger.debug(
          { source: strategy.source, count: records.length },
          "추출 전략 성공",
        );
        return { records, source: strategy.source, attempts };
      }
    }

    logger.debug({ attempts }, "모든 추출 전략 결과 없음");
    return { records: [], source: null, attempts };
  }
}
