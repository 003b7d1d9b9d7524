/**
 * File Report Serializer
 *
 * SOLID 원칙:
 * - SRP: 최종 결과 파일(JSON + TXT) 저장만 담당
 * - DIP: IExportSerializer 구현
 *
 * 파일명: <safeName>_<YYYYMMDD_HHMMSS>.json / .txt
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "@/config/logger";
import type { ExportDocument } from "@/core/domain/ExportDocument";
import type { MemoryRecord } from "@/core/domain/MemoryRecord";
import type { IExportSerializer, SerializedExport } from "@/core/interfaces";
import { ReportFormatter } from "@/services/ReportFormatter";
import { toSafeFileName } from "@/utils/fileName";
import { getFileTimestamp, getTimestampWithTimezone } from "@/utils/timestamp";

export class FileReportSerializer implements IExportSerializer {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async serialize(
    records: readonly MemoryRecord[],
    targetName: string,
  ): Promise<SerializedExport> {
    const now = this.now();
    const baseName = `${toSafeFileName(targetName)}_${getFileTimestamp(now)}`;
    const jsonPath = path.join(this.outputDir, `${baseName}.json`);
    const textPath = path.join(this.outputDir, `${baseName}.txt`);
    const exportedAt = getTimestampWithTimezone(now);

    const document: ExportDocument = {
      targetName,
      exportedAt,
      count: records.length,
      records: [...records],
    };

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(jsonPath, JSON.stringify(document, null, 2), "utf8");
    await fs.writeFile(
      textPath,
      ReportFormatter.formatRecords(records, targetName, exportedAt),
      "utf8",
    );

    logger.info({ jsonPath, textPath, count: records.length }, "Export 파일 저장 완료");
    return { jsonPath, textPath };
  }
}
