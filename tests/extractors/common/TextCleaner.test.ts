/**
 * TextCleaner Test
 *
 * 보일러플레이트 제거는 best-effort: 대표 노이즈 제거 여부만 검증
 */

import { describe, it, expect } from "@jest/globals";
import { ConfigLoader } from "@/config/ConfigLoader";
import { TextCleaner } from "@/extractors/common/TextCleaner";

describe("TextCleaner", () => {
  const config = ConfigLoader.getInstance().loadConfig("shapes");
  const cleaner = TextCleaner.fromConfig(config.fallback.stripRules);

  it("설정 순서대로 규칙을 컴파일해야 함", () => {
    expect(cleaner.ruleNames).toEqual([
      "automatic-label",
      "manual-label",
      "select-all",
      "page-indicator",
      "collapse-whitespace",
    ]);
  });

  it("분류 키워드, SELECT ALL, 페이지 표시, 감지된 날짜를 제거해야 함", () => {
    const raw =
      "Automatic Memory  03/14/2024  SELECT ALL (12)  User enjoys sourdough baking  Page 1 of 4";

    expect(cleaner.clean(raw, ["03/14/2024"])).toBe("User enjoys sourdough baking");
  });

  it("규칙이 없으면 trim만 해야 함", () => {
    expect(new TextCleaner([]).clean("  keep   spacing  ")).toBe("keep   spacing");
  });

  it("빈 literal은 무시해야 함", () => {
    expect(new TextCleaner([]).clean("abc", [""])).toBe("abc");
  });
});
