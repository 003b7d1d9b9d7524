/**
 * PageIndicatorReader Test
 */

import { describe, it, expect } from "@jest/globals";
import { PageIndicatorReader } from "@/pagination/PageIndicatorReader";
import { FakePageDriver } from "../fakes/FakePageDriver";

describe("PageIndicatorReader", () => {
  const reader = new PageIndicatorReader("Page\\s+(\\d+)\\s+of\\s+(\\d+)");

  it("본문의 첫 번째 페이지 표시를 대소문자 무관하게 읽어야 함", async () => {
    const driver = new FakePageDriver({
      children: [{ text: "PAGE 2 OF 7" }, { text: "Page 5 of 9" }],
    });

    expect(await reader.read(driver)).toEqual({ current: 2, total: 7 });
  });

  it("current > total 같은 깨진 표시는 null이어야 함", async () => {
    const driver = new FakePageDriver({ text: "Page 8 of 3" });

    expect(await reader.read(driver)).toBeNull();
  });

  it("표시가 없으면 readOrDefault는 { 1, 1 }을 반환해야 함", async () => {
    const driver = new FakePageDriver({ text: "No pagination here" });

    expect(await reader.read(driver)).toBeNull();
    expect(await reader.readOrDefault(driver)).toEqual({ current: 1, total: 1 });
  });

  it("텍스트 읽기가 실패하면 null이어야 함", async () => {
    const driver = new FakePageDriver({ text: "Page 1 of 2" });
    driver.failText = true;

    expect(await reader.read(driver)).toBeNull();
  });

  it("matches()는 페이지 표시 포함 여부를 반환해야 함", () => {
    expect(reader.matches("Page 1 of 4")).toBe(true);
    expect(reader.matches("Pages: 4")).toBe(false);
  });
});
