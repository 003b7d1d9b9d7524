/**
 * Export Serializer Interface
 *
 * Target 1개당 실행 종료 시 정확히 한 번 호출됨 (성공/부분 성공)
 */

import type { MemoryRecord } from "@/core/domain/MemoryRecord";

export interface SerializedExport {
  jsonPath: string;
  textPath: string;
}

export interface IExportSerializer {
  serialize(
    records: readonly MemoryRecord[],
    targetName: string,
  ): Promise<SerializedExport>;
}
