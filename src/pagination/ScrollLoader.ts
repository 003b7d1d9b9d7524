/**
 * Scroll Loader
 *
 * 페이지네이션이 없는 화면(무한 스크롤 / 더보기 버튼)에서 전체 항목을 로드
 *
 * 종료 조건:
 * - 문서 높이가 stableRounds 회 연속 변하지 않음
 * - maxScrolls 회 도달
 */

import { TIMING_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { ScrollConfig } from "@/core/domain/SiteConfig";
import type { IElementHandle, IPageDriver } from "@/core/interfaces";
import { Sleep, sleep as defaultSleep } from "@/utils/delay";

const SCROLL_TO_BOTTOM = "window.scrollTo(0, document.body.scrollHeight)";
const DOCUMENT_HEIGHT = "document.body.scrollHeight";

export interface ScrollLoaderOptions {
  scrollDelayMs?: number;
  sleep?: Sleep;
}

export interface ScrollResult {
  rounds: number;
  loadMoreClicks: number;
  finalHeight: number;
  /** 높이가 안정되어 종료했는지 (false면 maxScrolls 도달) */
  settled: boolean;
}

export class ScrollLoader {
  private readonly scrollDelayMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: ScrollConfig,
    options: ScrollLoaderOptions = {},
  ) {
    this.scrollDelayMs = options.scrollDelayMs ?? TIMING_CONFIG.SCROLL_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async loadAll(driver: IPageDriver): Promise<ScrollResult> {
    let previousHeight = 0;
    let stableCount = 0;
    let loadMoreClicks = 0;
    let rounds = 0;
    let settled = false;

    while (rounds < this.config.maxScrolls) {
      rounds++;
      let height: number;
      try {
        height = await this.scrollRound(driver, () => {
          loadMoreClicks++;
        });
      } catch (error) {
        logger.warn(
          { rounds, error: error instanceof Error ? error.message : String(error) },
          "스크롤 로딩 중단 - 현재 화면으로 추출",
        );
        break;
      }

      if (height === previousHeight) {
        stableCount++;
        if (stableCount >= this.config.stableRounds) {
          settled = true;
          break;
        }
      } else {
        stableCount = 0;
      }
      previousHeight = height;
    }

    logger.debug(
      { rounds, loadMoreClicks, finalHeight: previousHeight, settled },
      "스크롤 로딩 완료",
    );

    return { rounds, loadMoreClicks, finalHeight: previousHeight, settled };
  }

  private async scrollRound(driver: IPageDriver, onLoadMore: () => void): Promise<number> {
    await driver.evaluateInPage(SCROLL_TO_BOTTOM);
    await this.sleep(this.scrollDelayMs);

    const loadMore = await this.findLoadMore(driver);
    if (loadMore) {
      const result = await driver.click(loadMore);
      if (result.ok) {
        onLoadMore();
        await this.sleep(this.scrollDelayMs);
      } else {
        logger.debug({ error: result.error }, "더보기 버튼 클릭 실패");
      }
    }

    return this.readHeight(driver);
  }

  private async findLoadMore(driver: IPageDriver): Promise<IElementHandle | null> {
    for (const selector of this.config.loadMoreButtons) {
      for (const element of await driver.findAll(selector.spec)) {
        if (await element.isActionable()) {
          return element;
        }
      }
    }
    return null;
  }

  private async readHeight(driver: IPageDriver): Promise<number> {
    const value = await driver.evaluateInPage(DOCUMENT_HEIGHT);
    return typeof value === "number" ? value : 0;
  }
}
