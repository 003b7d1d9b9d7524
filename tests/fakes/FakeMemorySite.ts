/**
 * 테스트용 페이지네이션 메모리 화면
 *
 * - "Page X of Y" 표시 + aria-label 이전/다음 버튼
 * - 카드: cardPreview 컨테이너 > label / result__ / date__
 * - 페이지 진입 시 해당 페이지의 API 응답을 Driver 리스너로 전달
 */

import type { CapturedResponse } from "@/core/interfaces";
import { FakeNodeInit, FakePageDriver } from "./FakePageDriver";

export interface FakeCard {
  content: string;
  kind?: string;
  date?: string;
}

export interface FakeSitePage {
  cards?: FakeCard[];
  responses?: CapturedResponse[];
  /** 이 페이지에서 표시되는 전체 페이지 수 (기본: pages.length) */
  total?: number;
  /** 이 페이지에서 다음 버튼 클릭 실패 */
  failNext?: boolean;
  /** 이 페이지에서 다음 버튼 클릭 시 예외 */
  nextError?: string;
  /** 이 페이지에서 이전 버튼 클릭 실패 */
  failPrevious?: boolean;
  /** 페이지 표시 문구 대체 (버튼 활성화는 실제 위치 기준) */
  indicator?: string;
}

export interface FakeMemorySiteOptions {
  startPage?: number;
  /** 새로고침 후 이동할 페이지 (기본: 1) */
  reloadPage?: number;
  /** 페이지 표시 없음 (페이지네이션 없는 화면) */
  unpaginated?: boolean;
  loginPrompt?: boolean;
}

export function memoryResponse(
  contents: readonly string[],
  url = "https://api.example.test/memories",
): CapturedResponse {
  return {
    url,
    status: 200,
    contentType: "application/json",
    body: {
      items: contents.map((content, i) => ({
        id: `m-${i}`,
        result: content,
        summary_type: "automatic",
        created_at: 1700000000,
      })),
    },
  };
}

export class FakeMemorySite {
  current: number;
  readonly driver: FakePageDriver;
  readonly visits: number[] = [];
  loginPrompt: boolean;

  constructor(
    readonly pages: FakeSitePage[],
    private readonly options: FakeMemorySiteOptions = {},
  ) {
    this.current = options.startPage ?? 1;
    this.loginPrompt = options.loginPrompt ?? false;
    this.driver = new FakePageDriver({}, "https://example.test/bot/memory");
    this.driver.onNavigate = () => this.goTo(this.options.reloadPage ?? 1);
    this.render();
  }

  goTo(page: number): void {
    this.current = page;
    this.visits.push(page);
    this.render();
    for (const response of this.pageAt(page).responses ?? []) {
      this.driver.emit(response);
    }
  }

  private pageAt(page: number): FakeSitePage {
    return this.pages[page - 1] ?? {};
  }

  private render(): void {
    const page = this.pageAt(this.current);
    const total = page.total ?? this.pages.length;
    const children: FakeNodeInit[] = [];

    if (this.loginPrompt) {
      children.push({ tag: "button", text: "Log in" });
    } else {
      children.push({ tag: "a", attrs: { href: "/dashboard" }, text: "Dashboard" });
    }

    if (!this.options.unpaginated) {
      children.push({
        tag: "nav",
        text: page.indicator ?? `Page ${this.current} of ${total}`,
        children: [
          {
            tag: "button",
            attrs: { "aria-label": "Previous page" },
            text: "‹",
            disabled: this.current <= 1,
            failClick: page.failPrevious ?? false,
            onClick: () => this.goTo(this.current - 1),
          },
          {
            tag: "button",
            attrs: { "aria-label": "Next page" },
            text: "›",
            disabled: this.current >= total,
            failClick: page.failNext ?? false,
            clickError: page.nextError,
            onClick: () => this.goTo(this.current + 1),
          },
        ],
      });
    }

    for (const card of page.cards ?? []) {
      children.push({
        className: "cardPreview_x91",
        children: [
          { tag: "label", text: card.kind ?? "Automatic Memory" },
          { className: "result__k2", text: card.content },
          { className: "date__p0", text: card.date ?? "01/15/2024" },
        ],
      });
    }

    this.driver.setDocument({ children });
  }
}
