/**
 * SelectorTranslator Test
 */

import { describe, it, expect } from "@jest/globals";
import { SelectorTranslator } from "@/extractors/common/SelectorTranslator";

describe("SelectorTranslator", () => {
  it("tag 명세를 변환해야 함", () => {
    expect(SelectorTranslator.toCss({ kind: "tag", tag: "label" })).toBe("label");
  });

  it("부분 class 일치를 변환해야 함", () => {
    expect(SelectorTranslator.toCss({ kind: "classContains", fragment: "cardPreview" })).toBe(
      '[class*="cardPreview"]',
    );
    expect(
      SelectorTranslator.toCss({ kind: "classContains", fragment: "load-more", tag: "button" }),
    ).toBe('button[class*="load-more"]');
  });

  it("attribute 명세를 일치 방식과 대소문자 옵션에 맞게 변환해야 함", () => {
    expect(
      SelectorTranslator.toCss({
        kind: "attribute",
        name: "aria-label",
        value: "next",
        match: "contains",
        ignoreCase: true,
      }),
    ).toBe('[aria-label*="next" i]');
    expect(
      SelectorTranslator.toCss({ kind: "attribute", name: "type", value: "checkbox", tag: "input" }),
    ).toBe('input[type="checkbox"]');
    expect(SelectorTranslator.toCss({ kind: "attribute", name: "disabled" })).toBe("[disabled]");
  });

  it("containsText와 hasDescendant를 Playwright 확장 문법으로 변환해야 함", () => {
    expect(
      SelectorTranslator.toCss({
        kind: "tag",
        tag: "*",
        containsText: "automatic memory",
        hasDescendant: { kind: "attribute", name: "type", value: "checkbox" },
      }),
    ).toBe('*:has-text("automatic memory"):has([type="checkbox"])');
  });

  it("따옴표와 역슬래시를 escape 해야 함", () => {
    expect(SelectorTranslator.quote('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });
});
