/**
 * ExportOptions - Export 실행 옵션 스키마
 *
 * CLI/코드 어느 쪽에서 생성해도 동일한 검증을 거친다
 */

import { z } from "zod";
import { EXPORT_DEFAULTS } from "@/config/constants";

export const ExportOptionsSchema = z.object({
  /** 결과/체크포인트 출력 디렉토리 */
  outputDirectory: z.string().min(1).default(EXPORT_DEFAULTS.OUTPUT_DIR),
  /** 최대 페이지 수 (없으면 전체) */
  pageCap: z.number().int().positive().optional(),
  /** 체크포인트 주기 (페이지) */
  checkpointInterval: z
    .number()
    .int()
    .positive()
    .default(EXPORT_DEFAULTS.CHECKPOINT_INTERVAL),
  /** 대용량 Export 기준 페이지 수 */
  largeExportThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(EXPORT_DEFAULTS.LARGE_EXPORT_THRESHOLD),
  /** 진단 정보 포함 + 실패 시 HTML 저장 */
  debug: z.boolean().default(false),
  /** 최소 content 길이 */
  minContentLength: z
    .number()
    .int()
    .nonnegative()
    .default(EXPORT_DEFAULTS.MIN_CONTENT_LENGTH),
  /** 기존 체크포인트에서 이어받기 */
  resume: z.boolean().default(false),
});

export type ExportOptions = z.infer<typeof ExportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof ExportOptionsSchema>;

/**
 * Export 대상
 */
export const ExportTargetSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

export type ExportTarget = z.infer<typeof ExportTargetSchema>;
