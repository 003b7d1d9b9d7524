/**
 * Report Formatter
 *
 * 사람이 읽는 TXT 리포트 생성
 *
 * 형식:
 *   Memories for: <target>
 *   Exported: <timestamp>
 *   Total: <N>
 *   ============================================================
 *
 *   --- Memory #1 [AUTOMATIC] 01/15/2024 ---
 *   <content>
 */

import type { MemoryRecord } from "@/core/domain/MemoryRecord";
import { isPlainObject } from "@/extractors/common/PayloadInspector";
import { formatObservedDate } from "@/utils/timestamp";

export const REPORT_SEPARATOR = "=".repeat(60);

export interface ReportEntry {
  content: string;
  kind: string;
  observedAt: string;
}

export interface ReportHeader {
  targetName?: string;
  exportedAt?: string;
}

export interface ParsedReport extends ReportHeader {
  entries: ReportEntry[];
}

const EMPTY_CONTENT = "(empty)";

export class ReportFormatter {
  static formatEntry(entry: ReportEntry, index: number): string {
    const date = formatObservedDate(entry.observedAt);
    const kind = (entry.kind || "unknown").toUpperCase();
    const heading = date
      ? `--- Memory #${index} [${kind}] ${date} ---`
      : `--- Memory #${index} [${kind}] ---`;
    return `${heading}\n${entry.content}\n\n`;
  }

  static format(entries: readonly ReportEntry[], header: ReportHeader = {}): string {
    let output = "";
    if (header.targetName !== undefined) {
      output += `Memories for: ${header.targetName}\n`;
    }
    if (header.exportedAt !== undefined) {
      output += `Exported: ${header.exportedAt}\n`;
    }
    output += `Total: ${entries.length}\n`;
    output += `${REPORT_SEPARATOR}\n\n`;

    entries.forEach((entry, i) => {
      output += this.formatEntry(entry, i + 1);
    });

    return output;
  }

  static formatRecords(
    records: readonly MemoryRecord[],
    targetName: string,
    exportedAt: string,
  ): string {
    return this.format(records, { targetName, exportedAt });
  }

  /**
   * 저장된 JSON → 리포트 항목
   *
   * 지원 형식:
   * - Export 결과 ({ targetName, exportedAt, records })
   * - API 원본 덤프 ({ items } / { memories } / 배열)
   *   필드: result|content, summary_type|type|kind, created_at|date|observedAt
   */
  static parseJson(data: unknown): ParsedReport {
    let items: unknown[] = [];
    const header: ReportHeader = {};

    if (Array.isArray(data)) {
      items = data;
    } else if (isPlainObject(data)) {
      for (const key of ["items", "memories", "records"]) {
        const value = data[key];
        if (Array.isArray(value)) {
          items = value;
          break;
        }
      }
      if (typeof data.targetName === "string") header.targetName = data.targetName;
      if (typeof data.exportedAt === "string") header.exportedAt = data.exportedAt;
    }

    const entries: ReportEntry[] = [];
    for (const item of items) {
      if (!isPlainObject(item)) continue;
      entries.push({
        content: firstString(item, ["result", "content"]) ?? EMPTY_CONTENT,
        kind: firstString(item, ["summary_type", "type", "kind"]) ?? "unknown",
        observedAt: firstString(item, ["created_at", "date", "observedAt"]) ?? "",
      });
    }

    return { ...header, entries };
  }
}

/**
 * 첫 번째로 존재하는 문자열/숫자 필드 (숫자는 문자열로)
 */
function firstString(
  item: Record<string, unknown>,
  fields: readonly string[],
): string | null {
  for (const field of fields) {
    const value = item[field];
    if (typeof value === "string" && value !== "") {
      return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}
