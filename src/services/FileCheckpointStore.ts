/**
 * File Checkpoint Store
 *
 * SOLID 원칙:
 * - SRP: 체크포인트 파일 저장/로드만 담당
 * - DIP: ICheckpointStore 구현
 *
 * 파일: <outputDir>/<safeName>.checkpoint.json
 * 임시 파일에 쓴 뒤 rename (중단 시에도 이전 체크포인트 보존)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "@/config/logger";
import {
  ExportDocument,
  ExportDocumentSchema,
} from "@/core/domain/ExportDocument";
import type { ICheckpointStore } from "@/core/interfaces";
import { toSafeFileName } from "@/utils/fileName";

export class FileCheckpointStore implements ICheckpointStore {
  constructor(private readonly outputDir: string) {}

  pathFor(targetName: string): string {
    return path.join(
      this.outputDir,
      `${toSafeFileName(targetName)}.checkpoint.json`,
    );
  }

  async save(document: ExportDocument): Promise<string> {
    const filePath = this.pathFor(document.targetName);
    const tempPath = `${filePath}.tmp`;

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
    await fs.rename(tempPath, filePath);

    logger.debug({ filePath, count: document.count }, "체크포인트 저장");
    return filePath;
  }

  async load(targetName: string): Promise<ExportDocument | null> {
    const filePath = this.pathFor(targetName);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const result = ExportDocumentSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      logger.warn(
        { filePath, issues: result.error.issues.length },
        "체크포인트 형식 오류 - 무시",
      );
      return null;
    }
    return result.data;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
