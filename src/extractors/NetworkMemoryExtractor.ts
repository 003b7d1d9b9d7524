/**
 * Network Memory Extractor
 *
 * 목적:
 * - page-view 동안 캡처된 API 응답에서 메모리 추출
 * - 서버 원본 데이터이므로 결과가 있으면 최우선
 *
 * Strategy Pattern: IMemoryExtractor 구현
 */

import { logger } from "@/config/logger";
import type { NetworkConfig } from "@/core/domain/SiteConfig";
import {
  MemoryRecord,
  SourceStrategy,
  createMemoryRecord,
  dedupeRecords,
} from "@/core/domain/MemoryRecord";
import type { IMemoryExtractor, PageState } from "@/extractors/base";
import { PayloadInspector } from "@/extractors/common/PayloadInspector";

export class NetworkMemoryExtractor implements IMemoryExtractor {
  readonly source = SourceStrategy.NETWORK;
  private readonly inspector: PayloadInspector;

  constructor(
    config: NetworkConfig,
    private readonly minContentLength: number,
  ) {
    this.inspector = new PayloadInspector(config);
  }

  async attempt(state: PageState): Promise<MemoryRecord[]> {
    const records: MemoryRecord[] = [];

    for (const response of state.responses) {
      if (response.status < 200 || response.status >= 300) {
        continue;
      }

      try {
        for (const candidate of this.inspector.toCandidates(response.body)) {
          const record = createMemoryRecord(
            candidate,
            this.source,
            this.minContentLength,
          );
          if (record) {
            records.push(record);
          }
        }
      } catch (error) {
        logger.debug(
          {
            url: response.url,
            error: error instanceof Error ? error.message : String(error),
          },
          "API 응답 파싱 실패 - 해당 응답 스킵",
        );
      }
    }

    const unique = dedupeRecords(records);
    if (unique.length > 0) {
      logger.debug(
        { count: unique.length, responses: state.responses.length },
        "API 응답에서 메모리 추출",
      );
    }
    return unique;
  }
}
