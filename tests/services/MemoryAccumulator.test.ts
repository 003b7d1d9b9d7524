/**
 * MemoryAccumulator Test
 */

import { describe, it, expect } from "@jest/globals";
import type { ExportDocument } from "@/core/domain/ExportDocument";
import { MemoryRecord, SourceStrategy } from "@/core/domain/MemoryRecord";
import type { ICheckpointStore } from "@/core/interfaces";
import { MemoryAccumulator } from "@/services/MemoryAccumulator";

const record = (
  content: string,
  source: SourceStrategy = SourceStrategy.DOM_PRIMARY,
): MemoryRecord => ({ content, kind: "automatic", observedAt: "", sourceStrategy: source });

const A = record("Enjoys hiking in the Alps");
const B = record("Works as a marine biologist");
const C = record("Has a cat named Pixel");

class RecordingStore implements ICheckpointStore {
  readonly saved: ExportDocument[] = [];

  async save(document: ExportDocument): Promise<string> {
    this.saved.push(document);
    return `${document.targetName}.checkpoint.json`;
  }

  async load(): Promise<ExportDocument | null> {
    return null;
  }
}

class FailingStore implements ICheckpointStore {
  async save(): Promise<string> {
    throw new Error("disk full");
  }

  async load(): Promise<ExportDocument | null> {
    return null;
  }
}

describe("MemoryAccumulator", () => {
  it("먼저 들어온 레코드를 유지하고 중복은 건너뛰어야 함", () => {
    const accumulator = new MemoryAccumulator("luna");

    expect(accumulator.add([A, B])).toBe(2);
    expect(accumulator.add([record(B.content, SourceStrategy.NETWORK), C])).toBe(1);

    expect(accumulator.records()).toEqual([A, B, C]);
    expect(accumulator.size).toBe(3);
  });

  it("trim 기준으로 중복을 판단해야 함", () => {
    const accumulator = new MemoryAccumulator("luna");
    accumulator.add([A]);

    expect(accumulator.has(`  ${A.content} `)).toBe(true);
    expect(accumulator.add([record(`${A.content}  `)])).toBe(0);
  });

  it("같은 레코드 집합은 추가 순서와 무관하게 같은 키 집합을 만들어야 함", () => {
    const first = new MemoryAccumulator("luna");
    first.add([A, B]);
    first.add([B, C]);

    const second = new MemoryAccumulator("luna");
    second.add([C, B]);
    second.add([A]);

    const keys = (accumulator: MemoryAccumulator) =>
      accumulator.records().map((r) => r.content).sort();

    expect(keys(first)).toEqual(keys(second));
  });

  it("records()는 내부 상태의 복사본이어야 함", () => {
    const accumulator = new MemoryAccumulator("luna");
    accumulator.add([A]);

    accumulator.records().push(B);

    expect(accumulator.size).toBe(1);
  });

  it("같은 상태의 체크포인트는 같은 내용이어야 함", async () => {
    const store = new RecordingStore();
    const accumulator = new MemoryAccumulator("luna", store, new Date(2024, 0, 15, 9, 0, 0));
    accumulator.add([A, B]);

    expect(await accumulator.checkpoint()).toBe(true);
    expect(await accumulator.checkpoint()).toBe(true);

    expect(store.saved).toHaveLength(2);
    expect(store.saved[0]).toEqual(store.saved[1]);
    expect(store.saved[0]).toEqual({
      targetName: "luna",
      exportedAt: accumulator.startedAt,
      count: 2,
      records: [A, B],
    });
    expect(accumulator.checkpointsWritten).toBe(2);
  });

  it("마지막으로 저장한 체크포인트 위치를 기억해야 함", async () => {
    const accumulator = new MemoryAccumulator("luna", new RecordingStore());
    accumulator.add([A]);

    expect(accumulator.lastCheckpointPath).toBeNull();
    await accumulator.checkpoint();
    expect(accumulator.lastCheckpointPath).toBe("luna.checkpoint.json");
  });

  it("저장소 실패는 false를 반환하고 예외를 던지지 않아야 함", async () => {
    const accumulator = new MemoryAccumulator("luna", new FailingStore());
    accumulator.add([A]);

    await expect(accumulator.checkpoint()).resolves.toBe(false);
    expect(accumulator.checkpointsWritten).toBe(0);
    expect(accumulator.lastCheckpointPath).toBeNull();
    expect(accumulator.size).toBe(1);
  });

  it("저장소가 없으면 체크포인트는 false여야 함", async () => {
    expect(await new MemoryAccumulator("luna").checkpoint()).toBe(false);
  });

  it("seed()로 이전 레코드를 선적재하면 이후 중복으로 취급해야 함", () => {
    const accumulator = new MemoryAccumulator("luna");

    expect(accumulator.seed([A, B])).toBe(2);
    expect(accumulator.add([B, C])).toBe(1);
  });
});
