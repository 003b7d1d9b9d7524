/**
 * PageCursor Test
 *
 * 목적: 페이지 표시 파싱 + 커서 재조정 규칙 검증
 */

import { describe, it, expect } from "@jest/globals";
import { parsePageIndicator, reconcileCursor } from "@/core/domain/PageCursor";

const PATTERN = /Page\s+(\d+)\s+of\s+(\d+)/i;

describe("PageCursor", () => {
  describe("parsePageIndicator()", () => {
    it("첫 번째 페이지 표시를 읽어야 함", () => {
      expect(parsePageIndicator("Memories\nPage 3 of 12\nPage 9 of 9", PATTERN)).toEqual({
        current: 3,
        total: 12,
      });
    });

    it("대소문자와 공백에 관계없이 읽어야 함", () => {
      expect(parsePageIndicator("page  2   OF 4", PATTERN)).toEqual({ current: 2, total: 4 });
    });

    it("표시가 없으면 null을 반환해야 함", () => {
      expect(parsePageIndicator("No pagination here", PATTERN)).toBeNull();
    });

    it("current > total 이면 깨진 값으로 null을 반환해야 함", () => {
      expect(parsePageIndicator("Page 5 of 3", PATTERN)).toBeNull();
    });

    it("0 페이지는 거부해야 함", () => {
      expect(parsePageIndicator("Page 0 of 3", PATTERN)).toBeNull();
    });
  });

  describe("reconcileCursor()", () => {
    it("total 증가는 수용해야 함", () => {
      const result = reconcileCursor({ current: 2, total: 5 }, { current: 3, total: 8 }, 2);

      expect(result).toEqual({ cursor: { current: 3, total: 8 }, accepted: true });
    });

    it("방문한 최대 페이지 이상으로 줄어든 total은 새 읽기로 수용해야 함", () => {
      const result = reconcileCursor({ current: 2, total: 5 }, { current: 3, total: 3 }, 2);

      expect(result).toEqual({ cursor: { current: 3, total: 3 }, accepted: true });
    });

    it("방문한 페이지보다 작은 total은 거부하고 기존 total을 유지해야 함", () => {
      const result = reconcileCursor({ current: 4, total: 6 }, { current: 2, total: 2 }, 4);

      expect(result).toEqual({
        cursor: { current: 2, total: 6 },
        accepted: false,
        reason: "total_below_visited",
      });
    });
  });
});
