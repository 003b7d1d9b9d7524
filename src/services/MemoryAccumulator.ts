/**
 * Memory Accumulator
 *
 * 목적:
 * - 페이지 간 중복 제거 (trim된 content가 유일 키, 먼저 본 레코드 우선)
 * - 주기적 체크포인트 (실패해도 Export는 계속)
 *
 * 규칙:
 * - 같은 레코드 집합은 순서와 무관하게 같은 키 집합을 만듦
 * - 체크포인트는 같은 상태면 같은 내용 (exportedAt = 시작 시각)
 * - 하나의 컨트롤러 실행이 소유 (공유 금지)
 */

import { logger } from "@/config/logger";
import type { ExportDocument } from "@/core/domain/ExportDocument";
import { MemoryRecord, contentKey } from "@/core/domain/MemoryRecord";
import { ExportError, ExportErrorType } from "@/core/interfaces";
import type { ICheckpointStore } from "@/core/interfaces";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export class MemoryAccumulator {
  private readonly ordered: MemoryRecord[] = [];
  private readonly seen = new Set<string>();
  readonly startedAt: string;
  private checkpointCount = 0;
  private lastCheckpoint: string | null = null;

  constructor(
    readonly targetName: string,
    private readonly store: ICheckpointStore | null = null,
    startedAt: Date = new Date(),
  ) {
    this.startedAt = getTimestampWithTimezone(startedAt);
  }

  /**
   * 레코드 추가
   * @returns 새로 추가된 레코드 수
   */
  add(records: readonly MemoryRecord[]): number {
    let added = 0;
    for (const record of records) {
      const key = contentKey(record.content);
      if (!key || this.seen.has(key)) continue;
      this.seen.add(key);
      this.ordered.push(record);
      added++;
    }
    return added;
  }

  /**
   * 이전 체크포인트 레코드 선적재 (--resume)
   */
  seed(records: readonly MemoryRecord[]): number {
    const added = this.add(records);
    logger.info(
      { targetName: this.targetName, seeded: added },
      "체크포인트에서 레코드 복원",
    );
    return added;
  }

  has(content: string): boolean {
    return this.seen.has(contentKey(content));
  }

  get size(): number {
    return this.ordered.length;
  }

  get checkpointsWritten(): number {
    return this.checkpointCount;
  }

  /** 마지막으로 저장한 체크포인트 위치 */
  get lastCheckpointPath(): string | null {
    return this.lastCheckpoint;
  }

  records(): MemoryRecord[] {
    return [...this.ordered];
  }

  toDocument(): ExportDocument {
    return {
      targetName: this.targetName,
      exportedAt: this.startedAt,
      count: this.ordered.length,
      records: this.records(),
    };
  }

  /**
   * 현재 상태 체크포인트 저장
   * 실패는 로그만 남기고 삼킴
   *
   * @returns 저장 성공 여부
   */
  async checkpoint(): Promise<boolean> {
    if (!this.store) {
      return false;
    }

    try {
      this.lastCheckpoint = await this.store.save(this.toDocument());
      this.checkpointCount++;
      logger.info(
        { targetName: this.targetName, count: this.ordered.length },
        "체크포인트 저장 완료",
      );
      return true;
    } catch (error) {
      const exportError = new ExportError(
        ExportErrorType.CHECKPOINT_FAILED,
        `체크포인트 저장 실패: ${error instanceof Error ? error.message : String(error)}`,
        {
          targetName: this.targetName,
          cause: error instanceof Error ? error : undefined,
        },
      );
      logger.warn(exportError.toLogObject(), "체크포인트 저장 실패 - 계속 진행");
      return false;
    }
  }
}
