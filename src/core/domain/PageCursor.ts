/**
 * PageCursor - 페이지 위치 (current / total)
 *
 * 규칙:
 * - current ≤ total (파싱 시 위반하면 깨진 값으로 간주)
 * - 페이지 표시가 없으면 { 1, 1 } (페이지네이션 없음)
 * - 이미 방문한 페이지보다 작은 total은 받아들이지 않음
 */

export interface PageCursor {
  current: number;
  total: number;
}

export const UNPAGINATED_CURSOR: Readonly<PageCursor> = Object.freeze({
  current: 1,
  total: 1,
});

/**
 * 페이지 표시 텍스트 파싱 ("Page 3 of 12")
 *
 * @param text 페이지 본문 텍스트
 * @param pattern 두 개의 캡처 그룹(current, total)을 가진 정규식
 * @returns 파싱 결과, 표시가 없거나 값이 깨졌으면 null
 */
export function parsePageIndicator(
  text: string,
  pattern: RegExp,
): PageCursor | null {
  const match = pattern.exec(text);
  if (!match) {
    return null;
  }

  const current = Number.parseInt(match[1] ?? "", 10);
  const total = Number.parseInt(match[2] ?? "", 10);

  if (!Number.isInteger(current) || !Number.isInteger(total)) {
    return null;
  }
  if (current < 1 || total < 1 || current > total) {
    return null;
  }

  return { current, total };
}

/**
 * 커서 재조정 결과
 */
export interface CursorReconciliation {
  cursor: PageCursor;
  /** 새 읽기 값을 받아들였는지 여부 */
  accepted: boolean;
  /** 받아들이지 않은 이유 */
  reason?: "total_below_visited";
}

/**
 * 새로 읽은 커서를 기존 커서와 재조정
 *
 * - total 증가: 수용
 * - total 감소 (방문한 최대 페이지 이상): 새 읽기로 수용
 * - total 감소 (방문한 최대 페이지 미만): 거부, 기존 total 유지
 */
export function reconcileCursor(
  previous: PageCursor,
  next: PageCursor,
  highestVisited: number,
): CursorReconciliation {
  if (next.total >= previous.total || next.total >= highestVisited) {
    return { cursor: { ...next }, accepted: true };
  }

  return {
    cursor: {
      current: Math.min(next.current, previous.total),
      total: previous.total,
    },
    accepted: false,
    reason: "total_below_visited",
  };
}
