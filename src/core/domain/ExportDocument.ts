/**
 * ExportDocument / ExportOutcome - Export 결과 모델
 *
 * - ExportDocument: 체크포인트와 최종 JSON이 공유하는 형태
 * - ExportOutcome: Target 1개당 외부에 노출되는 단일 결과
 */

import { z } from "zod";
import { MemoryRecord, SourceStrategy } from "@/core/domain/MemoryRecord";
import type { PageCursor } from "@/core/domain/PageCursor";

export interface ExportDocument {
  targetName: string;
  exportedAt: string;
  count: number;
  records: MemoryRecord[];
}

/**
 * 페이지 순회 종료 사유
 */
export type StopReason =
  | "exhausted"
  | "page_cap"
  | "advance_failed"
  | "cancelled"
  | "interrupted";

/**
 * 페이지 단위 요약 (진단용)
 */
export interface PageSummary {
  page: number;
  /** 이동 후 다시 읽은 커서 (표시가 없으면 null) */
  observedCursor: PageCursor | null;
  /** 결과를 낸 전략 (모두 비었으면 null) */
  source: string | null;
  extracted: number;
  added: number;
  accumulated: number;
}

export type ExportStatus =
  | "completed"
  | "partial"
  | "empty"
  | "not_authenticated"
  | "failed";

/**
 * 진단 정보 (debug 모드)
 */
export interface ExportDiagnostics {
  pages: PageSummary[];
  capturedResponses: number;
  finalCursor: PageCursor | null;
  error?: Record<string, unknown>;
  debugSnapshotPath?: string;
}

export interface ExportOutcome {
  targetName: string;
  status: ExportStatus;
  count: number;
  stopReason?: StopReason;
  message?: string;
  /** 실패 시 보존된 체크포인트 위치 */
  checkpointPath?: string;
  outputPaths?: {
    jsonPath: string;
    textPath: string;
  };
  diagnostics?: ExportDiagnostics;
}

/**
 * 결과 파일까지 저장된 Target인지 (failed 의 체크포인트 보존분은 제외)
 */
export function hasExportedRecords(outcome: ExportOutcome): boolean {
  return (
    (outcome.status === "completed" || outcome.status === "partial") &&
    outcome.count > 0
  );
}

/**
 * 저장된 Export JSON / 체크포인트 검증 스키마
 */
export const ExportDocumentSchema = z.object({
  targetName: z.string(),
  exportedAt: z.string(),
  count: z.number().int().nonnegative(),
  records: z.array(
    z.object({
      content: z.string().min(1),
      kind: z.string(),
      observedAt: z.string(),
      sourceStrategy: z.nativeEnum(SourceStrategy),
      raw: z.unknown().optional(),
    }),
  ),
});
