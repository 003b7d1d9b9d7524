/**
 * Playwright Page Driver
 *
 * IPageDriver 구현체 (Adapter Pattern)
 *
 * 규칙:
 * - 조회 실패는 빈 결과, 액션 실패는 ActionResult로 반환 (예외 전파 금지)
 * - 모든 대기에 타임아웃 적용
 */

import type { ElementHandle, Page, Response } from "playwright";
import { TIMING_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { SelectorSpec } from "@/core/domain/SelectorSpec";
import type {
  ActionResult,
  CapturedResponse,
  IElementHandle,
  IPageDriver,
  JsonValue,
  ResponseListener,
} from "@/core/interfaces";
import { SelectorTranslator } from "@/extractors/common/SelectorTranslator";

type DomElementHandle = ElementHandle<SVGElement | HTMLElement>;

export interface PlaywrightDriverOptions {
  navigationTimeoutMs?: number;
  actionTimeoutMs?: number;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * page.evaluate 결과 → JsonValue (직렬화 불가능한 값은 null)
 */
export function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  return null;
}

/**
 * Playwright ElementHandle 래퍼
 */
export class PlaywrightElement implements IElementHandle {
  constructor(
    readonly handle: DomElementHandle,
    private readonly actionTimeoutMs: number,
  ) {}

  async text(): Promise<string> {
    return this.handle.evaluate((el) =>
      el instanceof HTMLElement ? el.innerText : el.textContent ?? "",
    );
  }

  attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  innerHtml(): Promise<string> {
    return this.handle.innerHTML();
  }

  childCount(): Promise<number> {
    return this.handle.evaluate((el) => el.children.length);
  }

  async isActionable(): Promise<boolean> {
    try {
      return (await this.handle.isVisible()) && (await this.handle.isEnabled());
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, "요소 상태 확인 실패");
      return false;
    }
  }

  async findAll(spec: SelectorSpec): Promise<IElementHandle[]> {
    const handles = await this.handle.$$(SelectorTranslator.toCss(spec));
    return handles.map((handle) => new PlaywrightElement(handle, this.actionTimeoutMs));
  }

  async click(): Promise<void> {
    await this.handle.click({ timeout: this.actionTimeoutMs });
  }
}

export class PlaywrightPageDriver implements IPageDriver {
  private readonly navigationTimeoutMs: number;
  private readonly actionTimeoutMs: number;

  constructor(
    private readonly page: Page,
    options: PlaywrightDriverOptions = {},
  ) {
    this.navigationTimeoutMs =
      options.navigationTimeoutMs ?? TIMING_CONFIG.NAVIGATION_TIMEOUT_MS;
    this.actionTimeoutMs = options.actionTimeoutMs ?? TIMING_CONFIG.ACTION_TIMEOUT_MS;
  }

  async currentText(): Promise<string> {
    try {
      return await this.page.evaluate(() => document.body?.innerText ?? "");
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, "본문 텍스트 읽기 실패");
      return "";
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async findAll(spec: SelectorSpec): Promise<IElementHandle[]> {
    const selector = SelectorTranslator.toCss(spec);
    try {
      const handles = await this.page.$$(selector);
      return handles.map(
        (handle) => new PlaywrightElement(handle, this.actionTimeoutMs),
      );
    } catch (error) {
      logger.debug({ selector, error: errorMessage(error) }, "요소 조회 실패");
      return [];
    }
  }

  async click(element: IElementHandle): Promise<ActionResult> {
    if (!(element instanceof PlaywrightElement)) {
      return { ok: false, error: "PlaywrightElement가 아닌 요소" };
    }
    try {
      await element.click();
      return { ok: true };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  async navigate(url: string): Promise<ActionResult> {
    try {
      await this.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }

    try {
      await this.page.waitForLoadState("networkidle", {
        timeout: this.actionTimeoutMs,
      });
    } catch (error) {
      // 폴링/텔레메트리 요청이 계속되는 페이지
      logger.debug({ url, error: errorMessage(error) }, "networkidle 대기 시간 초과");
    }
    return { ok: true };
  }

  onResponse(listener: ResponseListener): () => void {
    const handler = (response: Response): void => {
      this.capture(response)
        .then((captured) => listener(captured))
        .catch((error: unknown) => {
          logger.debug(
            { url: response.url(), error: errorMessage(error) },
            "응답 캡처 실패",
          );
        });
    };

    this.page.on("response", handler);
    return () => {
      this.page.off("response", handler);
    };
  }

  async evaluateInPage(script: string): Promise<JsonValue> {
    const value: unknown = await this.page.evaluate(script);
    return toJsonValue(value);
  }

  pageContent(): Promise<string> {
    return this.page.content();
  }

  /**
   * Response → CapturedResponse
   * JSON/텍스트 본문만 읽음 (그 외는 body 없음)
   */
  private async capture(response: Response): Promise<CapturedResponse> {
    const contentType = (await response.headerValue("content-type")) ?? "";
    const captured: CapturedResponse = {
      url: response.url(),
      status: response.status(),
      contentType,
    };

    try {
      if (contentType.includes("json")) {
        const body: unknown = await response.json();
        captured.body = body;
      } else if (contentType.startsWith("text/plain")) {
        captured.body = await response.text();
      }
    } catch (error) {
      // 리다이렉트 응답 등 본문 없음
      logger.debug({ url: captured.url, error: errorMessage(error) }, "응답 본문 읽기 실패");
    }

    return captured;
  }
}
