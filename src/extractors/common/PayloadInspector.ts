/**
 * PayloadInspector
 *
 * 목적: 캡처된 API 응답 본문에서 메모리 후보 객체를 찾아 필드를 읽음
 *
 * 후보 탐색 순서:
 * 1. 본문이 배열이면 그대로 사용
 * 2. 컨테이너 키 우선순위 목록 중 첫 번째 비어있지 않은 배열
 * 3. 본문 자체가 단일 레코드처럼 보이면 (content 필드 + id 필드) 단일 항목
 *
 * 형태가 예상과 달라도 예외 없이 빈 결과로 수렴
 */

import type { NetworkConfig } from "@/core/domain/SiteConfig";
import type { MemoryCandidate } from "@/core/domain/MemoryRecord";

type PlainObject = Record<string, unknown>;

export type PayloadInspectorOptions = Pick<
  NetworkConfig,
  | "containerKeys"
  | "contentFields"
  | "identifierFields"
  | "kindFields"
  | "dateFields"
  | "metadataVocabulary"
  | "metadataOverlapThreshold"
>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class PayloadInspector {
  private readonly metadataKeys: Set<string>;

  constructor(private readonly options: PayloadInspectorOptions) {
    this.metadataKeys = new Set(options.metadataVocabulary);
  }

  /**
   * 응답 본문 → 후보 항목 배열
   */
  locateCandidates(body: unknown): unknown[] {
    const decoded = this.decodeTextBody(body);

    if (Array.isArray(decoded)) {
      return decoded;
    }

    if (!isPlainObject(decoded)) {
      return [];
    }

    for (const key of this.options.containerKeys) {
      const value = decoded[key];
      if (Array.isArray(value) && value.length > 0) {
        return value;
      }
    }

    if (this.looksLikeSingleRecord(decoded)) {
      return [decoded];
    }

    return [];
  }

  /**
   * 응답 본문 → MemoryCandidate 목록
   * 객체가 아닌 항목, 메타데이터 오탐, content 없는 항목은 제외
   */
  toCandidates(body: unknown): MemoryCandidate[] {
    const candidates: MemoryCandidate[] = [];

    for (const item of this.locateCandidates(body)) {
      if (!isPlainObject(item) || this.isMetadataObject(item)) {
        continue;
      }

      const content = this.readContent(item);
      if (!content) {
        continue;
      }

      candidates.push({
        content,
        kind: this.readKind(item),
        observedAt: this.readObservedAt(item),
        raw: item,
      });
    }

    return candidates;
  }

  /**
   * 메타데이터(설정/성격/모델 설정) 객체 여부
   */
  isMetadataObject(item: PlainObject): boolean {
    let overlap = 0;
    for (const key of Object.keys(item)) {
      if (this.metadataKeys.has(key)) {
        overlap++;
        if (overlap >= this.options.metadataOverlapThreshold) {
          return true;
        }
      }
    }
    return false;
  }

  /**
   * content 필드 우선순위 중 첫 번째 비어있지 않은 문자열
   */
  readContent(item: PlainObject): string | null {
    for (const field of this.options.contentFields) {
      const value = item[field];
      if (typeof value === "string" && value.trim()) {
        return value;
      }
    }
    return null;
  }

  readKind(item: PlainObject): string | null {
    for (const field of this.options.kindFields) {
      const value = item[field];
      if (typeof value === "string" && value.trim()) {
        return value;
      }
    }
    return null;
  }

  readObservedAt(item: PlainObject): string | number | null {
    for (const field of this.options.dateFields) {
      const value = item[field];
      if (typeof value === "number" && Number.isFinite(value)) {
        return value;
      }
      if (typeof value === "string" && value.trim()) {
        return value;
      }
    }
    return null;
  }

  private looksLikeSingleRecord(item: PlainObject): boolean {
    const hasIdentifier = this.options.identifierFields.some(
      (field) => item[field] !== undefined && item[field] !== null,
    );
    return hasIdentifier && this.readContent(item) !== null;
  }

  /**
   * text/plain 으로 내려온 JSON 처리
   */
  private decodeTextBody(body: unknown): unknown {
    if (typeof body !== "string") {
      return body;
    }

    const trimmed = body.trim();
    if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(trimmed);
      return parsed;
    } catch {
      return undefined;
    }
  }
}
