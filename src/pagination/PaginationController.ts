/**
 * Pagination Controller
 *
 * 목적: 페이지 단위 결과 목록을 처음부터 끝까지 순회하며 추출 결과 누적
 *
 * 상태:
 * - AtPage: 안정된 page-view, 추출 가능
 * - Advancing: 다음 페이지 컨트롤 클릭 중
 * - Stalled: 이동 실패, 재시도 대기
 * - Done: 종료 (범위 소진 / 페이지 상한 / 이동 실패 / 취소)
 *
 * 규칙:
 * - 페이지는 엄격히 순차 처리
 * - 이동 실패는 1회 재시도, 다시 실패하면 누적된 결과를 유지한 채 종료
 * - 컨트롤 탐색/클릭 중 예외는 이동 실패로 취급
 * - 페이지 상한은 순회를 시작한 페이지부터 계산
 * - 커서 불일치는 로그만 남김 (치명적 아님)
 * - 취소는 페이지 사이에서만 확인
 */

import { TIMING_CONFIG } from "@/config/constants";
import { logger as rootLogger, Logger } from "@/config/logger";
import type { ExportOptions } from "@/core/domain/ExportOptions";
import type { PageSummary, StopReason } from "@/core/domain/ExportDocument";
import { PageCursor, reconcileCursor } from "@/core/domain/PageCursor";
import type { SiteConfig } from "@/core/domain/SiteConfig";
import type { IPageDriver } from "@/core/interfaces";
import { ExtractionChain } from "@/extractors/ExtractionChain";
import {
  LocatorTier,
  PageControlLocator,
  PageDirection,
} from "@/pagination/PageControlLocator";
import { PageIndicatorReader } from "@/pagination/PageIndicatorReader";
import { ScrollLoader } from "@/pagination/ScrollLoader";
import type { ResponseBuffer } from "@/scrapers/capture/ResponseBuffer";
import type { MemoryAccumulator } from "@/services/MemoryAccumulator";
import { Sleep, sleep as defaultSleep } from "@/utils/delay";

export type PaginationState = "AtPage" | "Advancing" | "Stalled" | "Done";

/**
 * 실행 환경 옵션 (대기 시간, 취소, 로거)
 */
export interface PaginationRuntimeOptions {
  settleDelayMs?: number;
  retryDelayMs?: number;
  scrollDelayMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  log?: Logger;
}

export type PaginationOptions = Pick<
  ExportOptions,
  "pageCap" | "checkpointInterval" | "largeExportThreshold"
> &
  PaginationRuntimeOptions;

export interface PaginationComponents {
  chain: ExtractionChain;
  indicator: PageIndicatorReader;
  locator: PageControlLocator;
  /** 페이지네이션이 없는 화면용 (없으면 스크롤 생략) */
  scrollLoader?: ScrollLoader | null;
}

interface ControlClick {
  ok: boolean;
  tier?: LocatorTier;
  error?: string;
}

export interface TraversalResult {
  pagesVisited: number[];
  stopReason: StopReason;
  finalCursor: PageCursor;
  pageSummaries: PageSummary[];
}

export class PaginationController {
  private state: PaginationState = "AtPage";
  private stableFailureCount = 0;
  private readonly settleDelayMs: number;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(
    private readonly components: PaginationComponents,
    private readonly options: PaginationOptions,
  ) {
    this.settleDelayMs = options.settleDelayMs ?? TIMING_CONFIG.SETTLE_DELAY_MS;
    this.retryDelayMs = options.retryDelayMs ?? TIMING_CONFIG.RETRY_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? rootLogger;
  }

  /**
   * 사이트 설정 + Export 옵션 → 컨트롤러
   */
  static fromConfig(
    site: SiteConfig,
    exportOptions: Pick<
      ExportOptions,
      "pageCap" | "checkpointInterval" | "largeExportThreshold" | "minContentLength"
    >,
    runtime: PaginationRuntimeOptions = {},
  ): PaginationController {
    return new PaginationController(
      {
        chain: ExtractionChain.fromConfig(site, exportOptions.minContentLength),
        indicator: new PageIndicatorReader(site.pagination.indicatorPattern),
        locator: new PageControlLocator(site.pagination),
        scrollLoader: site.scroll.enabled
          ? new ScrollLoader(site.scroll, {
              scrollDelayMs: runtime.scrollDelayMs,
              sleep: runtime.sleep,
            })
          : null,
      },
      {
        pageCap: exportOptions.pageCap,
        checkpointInterval: exportOptions.checkpointInterval,
        largeExportThreshold: exportOptions.largeExportThreshold,
        ...runtime,
      },
    );
  }

  get currentState(): PaginationState {
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.stableFailureCount;
  }

  async run(
    driver: IPageDriver,
    buffer: ResponseBuffer,
    accumulator: MemoryAccumulator,
  ): Promise<TraversalResult> {
    this.state = "AtPage";
    this.stableFailureCount = 0;

    const initial = await this.components.indicator.readOrDefault(driver);
    let cursor = await this.rewind(driver, buffer, initial);
    const startPage = cursor.current;
    let bound = this.boundFor(cursor.total, startPage);

    this.log.info(
      { current: cursor.current, total: cursor.total, bound },
      "페이지 순회 시작",
    );

    const pagesVisited: number[] = [];
    const pageSummaries: PageSummary[] = [];
    let highestVisited = 0;
    let stopReason: StopReason | null = null;

    for (let page = startPage; page <= bound; page++) {
      if (this.options.signal?.aborted) {
        this.log.warn({ page }, "취소 요청 - 순회 중단");
        stopReason = "cancelled";
        break;
      }

      let observedCursor: PageCursor | null = null;

      if (page > startPage) {
        const advanced = await this.advance(driver, buffer, page);
        if (!advanced) {
          stopReason = "advance_failed";
          break;
        }

        observedCursor = await this.components.indicator.read(driver);
        // 지금 보고 있는 페이지도 방문한 것으로 계산
        cursor = this.reconcile(
          cursor,
          observedCursor,
          page,
          Math.max(highestVisited, page),
        );
        bound = this.boundFor(cursor.total, startPage);
      } else {
        observedCursor = { ...cursor };
      }

      this.state = "AtPage";

      if (page === 1 && cursor.total === 1 && this.components.scrollLoader) {
        await this.components.scrollLoader.loadAll(driver);
      }

      const result = await this.components.chain.run({
        driver,
        responses: buffer.drain(),
      });
      const added = accumulator.add(result.records);

      pagesVisited.push(page);
      highestVisited = Math.max(highestVisited, page);
      pageSummaries.push({
        page,
        observedCursor,
        source: result.source,
        extracted: result.records.length,
        added,
        accumulated: accumulator.size,
      });

      this.log.info(
        {
          page,
          total: cursor.total,
          source: result.source,
          extracted: result.records.length,
          added,
          accumulated: accumulator.size,
        },
        "페이지 추출 완료",
      );

      if (this.shouldCheckpoint(page, cursor.total)) {
        await accumulator.checkpoint();
      }
    }

    if (stopReason === null) {
      const capped = this.options.pageCap !== undefined && bound < cursor.total;
      stopReason = capped ? "page_cap" : "exhausted";
    }

    this.state = "Done";
    this.log.info(
      {
        stopReason,
        pages: pagesVisited.length,
        accumulated: accumulator.size,
      },
      "페이지 순회 종료",
    );

    return { pagesVisited, stopReason, finalCursor: cursor, pageSummaries };
  }

  /**
   * 순회 상한 (전체 페이지 수, 시작 페이지 + 페이지 상한 - 1 중 작은 값)
   */
  private boundFor(total: number, startPage: number): number {
    return this.options.pageCap === undefined
      ? total
      : Math.min(total, startPage + this.options.pageCap - 1);
  }

  private shouldCheckpoint(page: number, knownTotal: number): boolean {
    return (
      knownTotal > this.options.largeExportThreshold &&
      page % this.options.checkpointInterval === 0
    );
  }

  /**
   * 첫 페이지로 복귀
   * 새로고침 → 그래도 아니면 이전 버튼 (current - 1)회
   * 복귀 실패 시 현재 위치에서 진행
   */
  private async rewind(
    driver: IPageDriver,
    buffer: ResponseBuffer,
    cursor: PageCursor,
  ): Promise<PageCursor> {
    if (cursor.current <= 1) {
      return cursor;
    }

    this.log.info({ current: cursor.current }, "첫 페이지가 아님 - 새로고침");
    buffer.drain();
    const reload = await driver.navigate(driver.currentUrl());
    if (reload.ok) {
      await this.sleep(this.settleDelayMs);
    } else {
      this.log.warn({ error: reload.error }, "새로고침 실패");
    }

    let fresh = await this.components.indicator.readOrDefault(driver);
    const maxClicks = fresh.current - 1;
    let clicks = 0;

    while (fresh.current > 1 && clicks < maxClicks) {
      const clicked = await this.clickControl(driver, buffer, "previous");
      if (!clicked.ok) {
        this.log.debug({ error: clicked.error }, "이전 페이지 클릭 실패");
        break;
      }
      clicks++;
      await this.sleep(this.settleDelayMs);
      fresh = await this.components.indicator.readOrDefault(driver);
    }

    if (fresh.current > 1) {
      this.log.warn(
        { current: fresh.current, total: fresh.total },
        "첫 페이지 복귀 실패 - 현재 위치에서 진행",
      );
    }
    return fresh;
  }

  /**
   * 다음 페이지로 이동 (실패 시 1회 재시도)
   */
  private async advance(
    driver: IPageDriver,
    buffer: ResponseBuffer,
    page: number,
  ): Promise<boolean> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      this.state = "Advancing";

      const clicked = await this.clickControl(driver, buffer, "next");
      if (clicked.ok) {
        this.stableFailureCount = 0;
        await this.sleep(this.settleDelayMs);
        return true;
      }
      this.log.debug(
        { page, attempt, tier: clicked.tier, error: clicked.error },
        "다음 페이지 클릭 실패",
      );

      this.stableFailureCount++;
      this.state = "Stalled";

      if (attempt === 1) {
        this.log.warn({ page }, "다음 페이지 이동 실패 - 재시도");
        await this.sleep(this.retryDelayMs);
      }
    }

    this.log.warn(
      { page, failures: this.stableFailureCount },
      "다음 페이지 이동 재시도 실패 - 수집된 결과로 종료",
    );
    return false;
  }

  /**
   * 컨트롤 탐색 + 클릭 (예외는 실패 결과로 변환)
   */
  private async clickControl(
    driver: IPageDriver,
    buffer: ResponseBuffer,
    direction: PageDirection,
  ): Promise<ControlClick> {
    try {
      const control = await this.components.locator.locate(driver, direction);
      if (!control) {
        return { ok: false, error: "control not found" };
      }

      buffer.drain();
      const result = await driver.click(control.element);
      return { ok: result.ok, tier: control.tier, error: result.error };
    } catch (error) {
      return {
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private reconcile(
    previous: PageCursor,
    observed: PageCursor | null,
    page: number,
    highestVisited: number,
  ): PageCursor {
    if (!observed) {
      this.log.debug({ page }, "페이지 표시 없음 - 기존 total 유지");
      return { current: Math.min(page, previous.total), total: previous.total };
    }

    const reconciliation = reconcileCursor(previous, observed, highestVisited);
    if (!reconciliation.accepted) {
      this.log.warn(
        {
          page,
          observedTotal: observed.total,
          knownTotal: previous.total,
          highestVisited,
        },
        "방문한 페이지보다 작은 total - 무시",
      );
    } else if (observed.total !== previous.total) {
      this.log.info(
        { previousTotal: previous.total, total: observed.total },
        "전체 페이지 수 변경",
      );
    }

    if (reconciliation.cursor.current !== page) {
      this.log.warn(
        { expected: page, observed: reconciliation.cursor.current },
        "페이지 번호 불일치",
      );
    }

    return reconciliation.cursor;
  }
}
