/**
 * TextHeuristicExtractor Test
 *
 * 보일러플레이트 제거는 best-effort: 대표 케이스의 결과와 "예외 없음"만 검증
 */

import { describe, it, expect } from "@jest/globals";
import { ConfigLoader } from "@/config/ConfigLoader";
import { SourceStrategy } from "@/core/domain/MemoryRecord";
import { TextHeuristicExtractor } from "@/extractors/TextHeuristicExtractor";
import { FakeNodeInit, FakePageDriver } from "../fakes/FakePageDriver";

const card = (label: string, date: string, body: string): FakeNodeInit => ({
  children: [
    { tag: "input", attrs: { type: "checkbox" } },
    { tag: "span", text: label },
    { tag: "span", text: date },
    { tag: "p", text: body },
  ],
});

describe("TextHeuristicExtractor", () => {
  const config = ConfigLoader.getInstance().loadConfig("shapes");
  const extractor = new TextHeuristicExtractor(config.fallback, 10);

  it("키워드 + 체크박스를 가진 가장 안쪽 요소만 레코드로 만들어야 함", async () => {
    const driver = new FakePageDriver({
      children: [
        { text: "SELECT ALL (2)" },
        {
          className: "list",
          children: [
            card("Automatic Memory", "01/02/2024", "User likes jazz records"),
            card("Manual Memory", "03/04/2024", "User has two younger brothers"),
          ],
        },
      ],
    });

    expect(await extractor.attempt({ driver, responses: [] })).toEqual([
      {
        content: "User likes jazz records",
        kind: "automatic",
        observedAt: "01/02/2024",
        sourceStrategy: SourceStrategy.DOM_FALLBACK,
      },
      {
        content: "User has two younger brothers",
        kind: "manual",
        observedAt: "03/04/2024",
        sourceStrategy: SourceStrategy.DOM_FALLBACK,
      },
    ]);
  });

  it("카드 하나를 감싼 상위 요소는 제외해야 함", async () => {
    const driver = new FakePageDriver({
      children: [
        {
          children: [
            card("Automatic Memory", "01/02/2024", "User likes jazz records"),
            { tag: "footer", text: "footer links" },
          ],
        },
      ],
    });

    const records = await extractor.attempt({ driver, responses: [] });

    expect(records.map((r) => r.content)).toEqual(["User likes jazz records"]);
  });

  it("maxTextLength 이상인 요소는 제외해야 함", async () => {
    const driver = new FakePageDriver({
      children: [card("Automatic Memory", "01/02/2024", "x".repeat(2000))],
    });

    expect(await extractor.attempt({ driver, responses: [] })).toEqual([]);
  });

  it("날짜가 없어도 본문을 추출해야 함", async () => {
    const driver = new FakePageDriver({
      children: [card("Manual Memory", "", "Prefers tea over coffee")],
    });

    const records = await extractor.attempt({ driver, responses: [] });

    expect(records).toEqual([
      {
        content: "Prefers tea over coffee",
        kind: "manual",
        observedAt: "",
        sourceStrategy: SourceStrategy.DOM_FALLBACK,
      },
    ]);
  });

  it("잔여 노이즈가 있어도 예외 없이 결과를 반환해야 함", async () => {
    const driver = new FakePageDriver({
      children: [card("Automatic Memory", "13/45/20244", "Edit · Delete · User collects stamps")],
    });

    const records = await extractor.attempt({ driver, responses: [] });

    expect(records).toHaveLength(1);
    expect(records[0]?.content).toContain("User collects stamps");
  });
});
