/**
 * MemoryRecord - 추출된 메모리 항목 도메인 모델
 *
 * 핵심 규칙:
 * - content(trim)가 유일한 중복 제거 키
 * - 최소 길이 미만 content는 노이즈(라벨, UI 텍스트)로 폐기
 * - observedAt은 파싱하지 않고 원본 형태 그대로 보존
 */

/**
 * 추출 전략 출처 (진단용, 병합/우선순위에는 사용하지 않음)
 */
export enum SourceStrategy {
  NETWORK = "network",
  DOM_PRIMARY = "domPrimary",
  DOM_FALLBACK = "domFallback",
}

/**
 * 메모리 항목
 */
export interface MemoryRecord {
  /** 본문 (trim 완료, 비어있지 않음) */
  content: string;
  /** 분류 ("automatic" | "manual" | "unknown" 등) */
  kind: string;
  /** 관측 날짜 (원본 형태) */
  observedAt: string;
  /** 추출 전략 */
  sourceStrategy: SourceStrategy;
  /** 원본 payload (network 전략일 때만) */
  raw?: unknown;
}

/**
 * 레코드 후보 (전략이 읽어낸 가공 전 값)
 */
export interface MemoryCandidate {
  content: string | null | undefined;
  kind?: string | null;
  observedAt?: string | number | null;
  raw?: unknown;
}

export const UNKNOWN_KIND = "unknown";

/**
 * 중복 제거 키
 */
export function contentKey(content: string): string {
  return content.trim();
}

/**
 * 분류 정규화
 * 예: "Automatic Memory" → "automatic", "" → "unknown"
 */
export function normalizeKind(kind: string | null | undefined): string {
  const normalized = (kind ?? "")
    .trim()
    .toLowerCase()
    .replace(/\s+memory$/, "")
    .trim();
  return normalized || UNKNOWN_KIND;
}

/**
 * 후보 → MemoryRecord 변환
 *
 * @returns content가 최소 길이 미만이면 null
 */
export function createMemoryRecord(
  candidate: MemoryCandidate,
  source: SourceStrategy,
  minContentLength: number,
): MemoryRecord | null {
  const content = contentKey(candidate.content ?? "");
  if (!content || content.length < minContentLength) {
    return null;
  }

  const observedAt =
    candidate.observedAt === null || candidate.observedAt === undefined
      ? ""
      : String(candidate.observedAt).trim();

  const record: MemoryRecord = {
    content,
    kind: normalizeKind(candidate.kind),
    observedAt,
    sourceStrategy: source,
  };

  if (source === SourceStrategy.NETWORK && candidate.raw !== undefined) {
    record.raw = candidate.raw;
  }

  return record;
}

/**
 * 한 페이지 결과 내 중복 제거 (순서 유지, 첫 항목 우선)
 */
export function dedupeRecords(records: readonly MemoryRecord[]): MemoryRecord[] {
  const seen = new Set<string>();
  const unique: MemoryRecord[] = [];
  for (const record of records) {
    const key = contentKey(record.content);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}
