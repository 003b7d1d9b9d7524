/**
 * Checkpoint Store Interface
 *
 * 같은 Target의 이전 체크포인트를 덮어씀
 */

import type { ExportDocument } from "@/core/domain/ExportDocument";

export interface ICheckpointStore {
  /** @returns 저장 위치 */
  save(document: ExportDocument): Promise<string>;
  /** 저장된 체크포인트 (없으면 null) */
  load(targetName: string): Promise<ExportDocument | null>;
}
