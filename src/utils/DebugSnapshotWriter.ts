/**
 * Debug Snapshot Writer
 *
 * 추출 결과가 없을 때 페이지 HTML 저장 (debug 모드)
 * 파일: <outputDir>/<safeName>_debug.html
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "@/config/logger";
import type { IPageDriver } from "@/core/interfaces";
import { toSafeFileName } from "@/utils/fileName";

export class DebugSnapshotWriter {
  constructor(private readonly outputDir: string) {}

  pathFor(targetName: string): string {
    return path.join(this.outputDir, `${toSafeFileName(targetName)}_debug.html`);
  }

  /**
   * @returns 저장된 경로, 실패 시 null
   */
  async write(driver: IPageDriver, targetName: string): Promise<string | null> {
    const filePath = this.pathFor(targetName);
    try {
      const html = await driver.pageContent();
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(filePath, html, "utf8");
      logger.info({ filePath }, "디버그 HTML 저장");
      return filePath;
    } catch (error) {
      logger.warn(
        { filePath, error: error instanceof Error ? error.message : String(error) },
        "디버그 HTML 저장 실패 - 무시",
      );
      return null;
    }
  }
}
