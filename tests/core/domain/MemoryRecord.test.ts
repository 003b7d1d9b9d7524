/**
 * MemoryRecord Test
 *
 * 목적: 레코드 생성 규칙 (최소 길이, 분류 정규화, 원본 보존) 검증
 */

import { describe, it, expect } from "@jest/globals";
import {
  SourceStrategy,
  createMemoryRecord,
  dedupeRecords,
  normalizeKind,
} from "@/core/domain/MemoryRecord";

describe("MemoryRecord", () => {
  describe("createMemoryRecord()", () => {
    it("content를 trim해서 저장해야 함", () => {
      const record = createMemoryRecord(
        { content: "  likes green tea in the morning \n" },
        SourceStrategy.DOM_PRIMARY,
        10,
      );

      expect(record?.content).toBe("likes green tea in the morning");
    });

    it("trim 후 최소 길이 미만이면 null을 반환해야 함", () => {
      expect(
        createMemoryRecord({ content: "   short    " }, SourceStrategy.NETWORK, 10),
      ).toBeNull();
    });

    it("최소 길이와 같으면 포함해야 함", () => {
      const record = createMemoryRecord(
        { content: "0123456789" },
        SourceStrategy.NETWORK,
        10,
      );

      expect(record?.content).toBe("0123456789");
    });

    it("content가 없으면 null을 반환해야 함", () => {
      expect(createMemoryRecord({ content: null }, SourceStrategy.NETWORK, 0)).toBeNull();
      expect(createMemoryRecord({ content: "   " }, SourceStrategy.NETWORK, 0)).toBeNull();
    });

    it("숫자 observedAt은 파싱하지 않고 문자열로 보존해야 함", () => {
      const record = createMemoryRecord(
        { content: "remembers the trip to Lisbon", observedAt: 1700000000 },
        SourceStrategy.NETWORK,
        10,
      );

      expect(record?.observedAt).toBe("1700000000");
    });

    it("observedAt이 없으면 빈 문자열이어야 함", () => {
      const record = createMemoryRecord(
        { content: "remembers the trip to Lisbon" },
        SourceStrategy.DOM_FALLBACK,
        10,
      );

      expect(record?.observedAt).toBe("");
      expect(record?.kind).toBe("unknown");
    });

    it("raw는 network 전략일 때만 보존해야 함", () => {
      const raw = { id: "m-1", result: "remembers the trip to Lisbon" };

      const network = createMemoryRecord(
        { content: raw.result, raw },
        SourceStrategy.NETWORK,
        10,
      );
      const dom = createMemoryRecord(
        { content: raw.result, raw },
        SourceStrategy.DOM_PRIMARY,
        10,
      );

      expect(network?.raw).toBe(raw);
      expect(dom).not.toHaveProperty("raw");
    });
  });

  describe("normalizeKind()", () => {
    it("소문자 변환 후 ' memory' 접미어를 제거해야 함", () => {
      expect(normalizeKind("Automatic Memory")).toBe("automatic");
      expect(normalizeKind("MANUAL")).toBe("manual");
    });

    it("비어있으면 unknown이어야 함", () => {
      expect(normalizeKind("")).toBe("unknown");
      expect(normalizeKind(null)).toBe("unknown");
      expect(normalizeKind(undefined)).toBe("unknown");
    });
  });

  describe("dedupeRecords()", () => {
    it("trim된 content 기준으로 첫 항목만 남겨야 함", () => {
      const first = createMemoryRecord(
        { content: "prefers window seats", kind: "automatic" },
        SourceStrategy.DOM_PRIMARY,
        10,
      );
      const duplicate = createMemoryRecord(
        { content: "  prefers window seats ", kind: "manual" },
        SourceStrategy.DOM_PRIMARY,
        10,
      );
      const other = createMemoryRecord(
        { content: "allergic to peanuts" },
        SourceStrategy.DOM_PRIMARY,
        10,
      );
      if (!first || !duplicate || !other) {
        throw new Error("fixture");
      }

      const result = dedupeRecords([first, duplicate, other]);

      expect(result.map((r) => r.content)).toEqual([
        "prefers window seats",
        "allergic to peanuts",
      ]);
      expect(result[0]?.kind).toBe("automatic");
    });
  });
});
