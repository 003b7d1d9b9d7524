/**
 * timestamp / fileName 유틸리티 Test
 */

import { describe, it, expect } from "@jest/globals";
import { toSafeFileName } from "@/utils/fileName";
import {
  formatObservedDate,
  getFileTimestamp,
  getLocalDateString,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

describe("timestamp", () => {
  const date = new Date(2024, 0, 5, 7, 8, 9);

  it("getFileTimestamp()는 YYYYMMDD_HHMMSS 형식이어야 함", () => {
    expect(getFileTimestamp(date)).toBe("20240105_070809");
  });

  it("getLocalDateString()은 YYYY-MM-DD 형식이어야 함", () => {
    expect(getLocalDateString(date)).toBe("2024-01-05");
  });

  it("getTimestampWithTimezone()은 오프셋을 포함해야 함", () => {
    expect(getTimestampWithTimezone(date)).toMatch(
      /^2024-01-05T07:08:09\.000[+-]\d{2}:\d{2}$/,
    );
  });

  describe("formatObservedDate()", () => {
    it("epoch 초는 UTC 기준 MM/DD/YYYY로 바꿔야 함", () => {
      expect(formatObservedDate("1700000000")).toBe("11/14/2023");
      expect(formatObservedDate("1700000000.5")).toBe("11/14/2023");
    });

    it("그 외 형식은 원본을 유지해야 함", () => {
      expect(formatObservedDate("01/15/2024")).toBe("01/15/2024");
      expect(formatObservedDate("2024-01-15T10:00:00Z")).toBe("2024-01-15T10:00:00Z");
      expect(formatObservedDate("  ")).toBe("");
    });
  });
});

describe("toSafeFileName()", () => {
  it("허용되지 않는 문자는 _ 로 치환해야 함", () => {
    expect(toSafeFileName("Luna (v2)!")).toBe("Luna _v2__");
    expect(toSafeFileName("../etc")).toBe("___etc");
  });

  it("결과가 비면 unnamed를 반환해야 함", () => {
    expect(toSafeFileName("   ")).toBe("unnamed");
  });
});
