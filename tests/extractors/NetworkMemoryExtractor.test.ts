/**
 * NetworkMemoryExtractor Test
 */

import { describe, it, expect } from "@jest/globals";
import { ConfigLoader } from "@/config/ConfigLoader";
import { SourceStrategy } from "@/core/domain/MemoryRecord";
import type { CapturedResponse } from "@/core/interfaces";
import { NetworkMemoryExtractor } from "@/extractors/NetworkMemoryExtractor";
import { FakePageDriver } from "../fakes/FakePageDriver";
import { memoryResponse } from "../fakes/FakeMemorySite";

describe("NetworkMemoryExtractor", () => {
  const config = ConfigLoader.getInstance().loadConfig("shapes");
  const extractor = new NetworkMemoryExtractor(config.network, 10);
  const driver = new FakePageDriver();

  it("캡처된 응답에서 레코드를 추출해야 함", async () => {
    const records = await extractor.attempt({
      driver,
      responses: [memoryResponse(["remembers the beach house", "works night shifts"])],
    });

    expect(records).toEqual([
      {
        content: "remembers the beach house",
        kind: "automatic",
        observedAt: "1700000000",
        sourceStrategy: SourceStrategy.NETWORK,
        raw: {
          id: "m-0",
          result: "remembers the beach house",
          summary_type: "automatic",
          created_at: 1700000000,
        },
      },
      {
        content: "works night shifts",
        kind: "automatic",
        observedAt: "1700000000",
        sourceStrategy: SourceStrategy.NETWORK,
        raw: {
          id: "m-1",
          result: "works night shifts",
          summary_type: "automatic",
          created_at: 1700000000,
        },
      },
    ]);
  });

  it("2xx가 아닌 응답은 무시해야 함", async () => {
    const failed: CapturedResponse = {
      ...memoryResponse(["remembers the beach house"]),
      status: 500,
    };

    expect(await extractor.attempt({ driver, responses: [failed] })).toEqual([]);
  });

  it("여러 응답의 중복 content는 한 번만 포함해야 함", async () => {
    const records = await extractor.attempt({
      driver,
      responses: [
        memoryResponse(["remembers the beach house"]),
        memoryResponse(["remembers the beach house", "works night shifts"]),
      ],
    });

    expect(records.map((r) => r.content)).toEqual([
      "remembers the beach house",
      "works night shifts",
    ]);
  });

  it("최소 길이 미만 content는 제외해야 함", async () => {
    const records = await extractor.attempt({
      driver,
      responses: [memoryResponse(["tiny", "long enough content"])],
    });

    expect(records.map((r) => r.content)).toEqual(["long enough content"]);
  });

  it("응답이 없거나 형태가 다르면 빈 결과여야 함", async () => {
    const odd: CapturedResponse = {
      url: "https://api.example.test/config",
      status: 200,
      contentType: "application/json",
      body: { version: 3, flags: { beta: true } },
    };

    expect(await extractor.attempt({ driver, responses: [] })).toEqual([]);
    expect(await extractor.attempt({ driver, responses: [odd] })).toEqual([]);
  });
});
