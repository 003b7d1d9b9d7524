/**
 * Report Converter
 *
 * 저장된 JSON (Export 결과 또는 API 원본 덤프) → 같은 폴더의 TXT 리포트
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "@/config/logger";
import { ExportError, ExportErrorType } from "@/core/interfaces";
import { ReportFormatter } from "@/services/ReportFormatter";

export interface ConversionResult {
  outputPath: string;
  count: number;
}

/**
 * 입력 경로의 확장자를 .txt로 교체
 */
export function textPathFor(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.txt`);
}

export async function convertJsonFile(inputPath: string): Promise<ConversionResult> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(inputPath, "utf8"));
  } catch (error) {
    throw new ExportError(
      ExportErrorType.CONFIG_INVALID,
      `JSON 파일을 읽을 수 없음 (${inputPath}): ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined },
    );
  }

  const report = ReportFormatter.parseJson(data);
  const outputPath = textPathFor(inputPath);
  await fs.writeFile(
    outputPath,
    ReportFormatter.format(report.entries, report),
    "utf8",
  );

  logger.info({ inputPath, outputPath, count: report.entries.length }, "TXT 변환 완료");
  return { outputPath, count: report.entries.length };
}
