/**
 * ResponseBuffer Test
 */

import { describe, it, expect } from "@jest/globals";
import type { CapturedResponse } from "@/core/interfaces";
import { ResponseBuffer } from "@/scrapers/capture/ResponseBuffer";
import { FakePageDriver } from "../../fakes/FakePageDriver";

const response = (url: string): CapturedResponse => ({
  url,
  status: 200,
  contentType: "application/json",
  body: {},
});

describe("ResponseBuffer", () => {
  const createBuffer = () =>
    new ResponseBuffer({
      excludedSuffixes: [".js", ".PNG"],
      excludedHosts: ["sentry.io"],
    });

  describe("accepts()", () => {
    const buffer = createBuffer();

    it("API 응답은 통과시켜야 함", () => {
      expect(buffer.accepts("https://api.example.test/v1/memories?page=2")).toBe(true);
    });

    it("정적 자원 확장자는 대소문자 무관하게 제외해야 함", () => {
      expect(buffer.accepts("https://example.test/static/app.js")).toBe(false);
      expect(buffer.accepts("https://example.test/img/logo.png")).toBe(false);
    });

    it("텔레메트리 호스트와 그 서브도메인을 제외해야 함", () => {
      expect(buffer.accepts("https://sentry.io/api/1/envelope")).toBe(false);
      expect(buffer.accepts("https://o123.ingest.sentry.io/api/1")).toBe(false);
      expect(buffer.accepts("https://notsentry.io/api")).toBe(true);
    });

    it("잘못된 URL은 제외해야 함", () => {
      expect(buffer.accepts("not a url")).toBe(false);
    });
  });

  it("drain은 직전 drain 이후 응답만 반환하고 비워야 함", () => {
    const buffer = createBuffer();
    buffer.push(response("https://example.test/api/a"));
    buffer.push(response("https://example.test/app.js"));

    expect(buffer.drain().map((r) => r.url)).toEqual(["https://example.test/api/a"]);
    expect(buffer.pendingCount).toBe(0);

    buffer.push(response("https://example.test/api/b"));

    expect(buffer.drain().map((r) => r.url)).toEqual(["https://example.test/api/b"]);
    expect(buffer.totalCaptured).toBe(2);
  });

  it("attach/detach로 Driver 리스너를 등록하고 해제해야 함", () => {
    const driver = new FakePageDriver();
    const buffer = createBuffer();

    buffer.attach(driver);
    buffer.attach(driver);
    expect(driver.listenerCount).toBe(1);
    expect(buffer.isAttached).toBe(true);

    driver.emit(response("https://example.test/api/memories"));
    expect(buffer.pendingCount).toBe(1);

    buffer.detach();
    expect(driver.listenerCount).toBe(0);
    expect(buffer.isAttached).toBe(false);

    driver.emit(response("https://example.test/api/memories"));
    expect(buffer.pendingCount).toBe(1);
  });
});
