/**
 * Export Service
 *
 * 목적: Target 단위 Export 오케스트레이션
 *
 * 흐름 (Target 1개):
 * 1. 로그인 확인 → 필요 시 로그인 절차
 * 2. ResponseBuffer 연결 → Target URL 이동 (1회 재시도)
 * 3. 이동 후 로그인 상태 재확인
 * 4. (resume) 체크포인트 복원 → 페이지 순회
 * 5. 결과가 있으면 Serializer 1회 호출, 없으면 empty (debug 모드: HTML 저장)
 * 6. ResponseBuffer 해제
 *
 * 순회 도중 예외가 나도 누적된 레코드가 있으면 저장 후 partial 반환
 *
 * 여러 Target은 같은 Driver로 순차 처리, 한 Target의 실패가 나머지를 중단시키지 않음
 *
 * SOLID 원칙:
 * - SRP: 흐름 조율만 담당 (추출/순회/저장은 위임)
 * - DIP: Driver/Session/Serializer/CheckpointStore 인터페이스에 의존
 */

import { TIMING_CONFIG } from "@/config/constants";
import { logger as rootLogger, Logger } from "@/config/logger";
import type {
  ExportDiagnostics,
  ExportOutcome,
  ExportStatus,
  StopReason,
} from "@/core/domain/ExportDocument";
import type { ExportOptions, ExportTarget } from "@/core/domain/ExportOptions";
import type { SiteConfig } from "@/core/domain/SiteConfig";
import {
  ActionResult,
  ExportError,
  ExportErrorType,
  ICheckpointStore,
  IExportSerializer,
  IPageDriver,
  ISessionProvider,
  SerializedExport,
} from "@/core/interfaces";
import {
  PaginationController,
  PaginationRuntimeOptions,
  TraversalResult,
} from "@/pagination/PaginationController";
import { ResponseBuffer } from "@/scrapers/capture/ResponseBuffer";
import { MemoryAccumulator } from "@/services/MemoryAccumulator";
import type { DebugSnapshotWriter } from "@/utils/DebugSnapshotWriter";
import { Sleep, sleep as defaultSleep } from "@/utils/delay";
import { createTargetLogger, logImportant } from "@/utils/LoggerContext";

export interface ExportServiceDeps {
  driver: IPageDriver;
  site: SiteConfig;
  session: ISessionProvider;
  serializer: IExportSerializer;
  checkpointStore: ICheckpointStore;
  snapshotWriter?: DebugSnapshotWriter | null;
  log?: Logger;
}

export type ExportRuntimeOptions = Omit<PaginationRuntimeOptions, "log">;

const PARTIAL_STOP_REASONS: readonly StopReason[] = [
  "advance_failed",
  "cancelled",
  "interrupted",
];

export class ExportService {
  private readonly log: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: ExportServiceDeps,
    private readonly options: ExportOptions,
    private readonly runtime: ExportRuntimeOptions = {},
  ) {
    this.log = deps.log ?? rootLogger;
    this.sleep = runtime.sleep ?? defaultSleep;
  }

  /**
   * 여러 Target 순차 Export
   * 취소 요청 시 남은 Target은 처리하지 않음
   */
  async exportAll(targets: readonly ExportTarget[]): Promise<ExportOutcome[]> {
    const outcomes: ExportOutcome[] = [];

    for (const [index, target] of targets.entries()) {
      if (this.runtime.signal?.aborted) {
        this.log.warn(
          { remaining: targets.length - index },
          "취소 요청 - 남은 Target 건너뜀",
        );
        break;
      }

      this.log.info(
        { target: target.name, index: index + 1, total: targets.length },
        "Target 처리 시작",
      );
      outcomes.push(await this.exportTarget(target));
    }

    const exported = outcomes.reduce((sum, outcome) => sum + outcome.count, 0);
    logImportant(this.log, "전체 Export 완료", {
      targets: outcomes.length,
      exported,
      statuses: outcomes.map((outcome) => `${outcome.targetName}:${outcome.status}`),
    });

    return outcomes;
  }

  /**
   * Target 1개 Export
   * 예외를 던지지 않고 항상 ExportOutcome 반환
   */
  async exportTarget(target: ExportTarget): Promise<ExportOutcome> {
    const log = createTargetLogger(this.log, target.name);
    const buffer = new ResponseBuffer(this.deps.site.network);
    let accumulator: MemoryAccumulator | null = null;

    try {
      await this.ensureSession(target);

      buffer.attach(this.deps.driver);
      await this.navigate(target, log);

      if (!(await this.deps.session.isAuthenticated())) {
        throw new ExportError(
          ExportErrorType.NOT_AUTHENTICATED,
          "Target 페이지에서 로그인 요구 화면 감지",
          { targetName: target.name },
        );
      }

      accumulator = new MemoryAccumulator(target.name, this.deps.checkpointStore);
      if (this.options.resume) {
        await this.seedFromCheckpoint(accumulator, log);
      }

      const controller = PaginationController.fromConfig(
        this.deps.site,
        this.options,
        { ...this.runtime, log },
      );

      let traversal: TraversalResult;
      try {
        traversal = await controller.run(this.deps.driver, buffer, accumulator);
      } catch (error) {
        if (accumulator.size === 0) {
          throw error;
        }
        return await this.salvage(target, accumulator, error, buffer, log);
      }

      return await this.finish(target, accumulator, traversal, buffer, log);
    } catch (error) {
      return this.failureOutcome(target, error, buffer, log, accumulator);
    } finally {
      buffer.detach();
    }
  }

  private async ensureSession(target: ExportTarget): Promise<void> {
    if (await this.deps.session.isAuthenticated()) {
      return;
    }
    if (await this.deps.session.establishSession()) {
      return;
    }
    throw new ExportError(
      ExportErrorType.NOT_AUTHENTICATED,
      "로그인되지 않음 - 브라우저에서 로그인 후 다시 실행하세요",
      { targetName: target.name },
    );
  }

  /**
   * Target URL 이동 (실패 시 1회 재시도)
   */
  private async navigate(target: ExportTarget, log: Logger): Promise<void> {
    let result: ActionResult = await this.deps.driver.navigate(target.url);

    if (!result.ok) {
      log.warn({ url: target.url, error: result.error }, "페이지 이동 실패 - 재시도");
      await this.sleep(this.runtime.retryDelayMs ?? TIMING_CONFIG.RETRY_DELAY_MS);
      result = await this.deps.driver.navigate(target.url);
    }

    if (!result.ok) {
      throw new ExportError(
        ExportErrorType.NAVIGATION_FAILED,
        `페이지 이동 실패: ${result.error ?? target.url}`,
        { targetName: target.name },
      );
    }

    await this.sleep(this.runtime.settleDelayMs ?? TIMING_CONFIG.SETTLE_DELAY_MS);
    log.info({ url: target.url }, "Target 페이지 이동 완료");
  }

  private async seedFromCheckpoint(
    accumulator: MemoryAccumulator,
    log: Logger,
  ): Promise<void> {
    try {
      const checkpoint = await this.deps.checkpointStore.load(accumulator.targetName);
      if (checkpoint) {
        accumulator.seed(checkpoint.records);
      } else {
        log.info("이어받을 체크포인트 없음 - 처음부터 시작");
      }
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "체크포인트 로드 실패 - 처음부터 시작",
      );
    }
  }

  private async finish(
    target: ExportTarget,
    accumulator: MemoryAccumulator,
    traversal: TraversalResult,
    buffer: ResponseBuffer,
    log: Logger,
  ): Promise<ExportOutcome> {
    const diagnostics: ExportDiagnostics = {
      pages: traversal.pageSummaries,
      capturedResponses: buffer.totalCaptured,
      finalCursor: traversal.finalCursor,
    };

    if (accumulator.size === 0) {
      log.warn({ stopReason: traversal.stopReason }, "추출된 메모리 없음");

      if (this.options.debug && this.deps.snapshotWriter) {
        const snapshotPath = await this.deps.snapshotWriter.write(
          this.deps.driver,
          target.name,
        );
        if (snapshotPath) {
          diagnostics.debugSnapshotPath = snapshotPath;
        }
      }

      return this.withDiagnostics(
        {
          targetName: target.name,
          status: "empty",
          count: 0,
          stopReason: traversal.stopReason,
        },
        diagnostics,
      );
    }

    const outputPaths = await this.serialize(target, accumulator);
    const status: ExportStatus = PARTIAL_STOP_REASONS.includes(traversal.stopReason)
      ? "partial"
      : "completed";

    logImportant(log, "Target Export 완료", {
      status,
      count: accumulator.size,
      pages: traversal.pagesVisited.length,
      stopReason: traversal.stopReason,
    });

    return this.withDiagnostics(
      {
        targetName: target.name,
        status,
        count: accumulator.size,
        stopReason: traversal.stopReason,
        outputPaths,
      },
      diagnostics,
    );
  }

  /**
   * 순회 중 예외 - 그때까지 누적된 레코드 저장
   */
  private async salvage(
    target: ExportTarget,
    accumulator: MemoryAccumulator,
    error: unknown,
    buffer: ResponseBuffer,
    log: Logger,
  ): Promise<ExportOutcome> {
    const exportError = ExportError.from(error, target.name);
    log.warn(
      { ...exportError.toLogObject(), accumulated: accumulator.size },
      "페이지 순회 중단 - 누적된 결과 저장",
    );

    const outputPaths = await this.serialize(target, accumulator);

    logImportant(log, "Target Export 완료", {
      status: "partial",
      count: accumulator.size,
      stopReason: "interrupted",
    });

    return this.withDiagnostics(
      {
        targetName: target.name,
        status: "partial",
        count: accumulator.size,
        stopReason: "interrupted",
        message: exportError.message,
        outputPaths,
      },
      {
        pages: [],
        capturedResponses: buffer.totalCaptured,
        finalCursor: null,
        error: exportError.toLogObject(),
      },
    );
  }

  /**
   * Serializer 호출
   * 실패 시 체크포인트로라도 보존한 뒤 예외 전파
   */
  private async serialize(
    target: ExportTarget,
    accumulator: MemoryAccumulator,
  ): Promise<SerializedExport> {
    try {
      return await this.deps.serializer.serialize(accumulator.records(), target.name);
    } catch (error) {
      await accumulator.checkpoint();
      throw error;
    }
  }

  private failureOutcome(
    target: ExportTarget,
    error: unknown,
    buffer: ResponseBuffer,
    log: Logger,
    accumulator: MemoryAccumulator | null,
  ): ExportOutcome {
    const exportError = ExportError.from(error, target.name);
    const status: ExportStatus =
      exportError.type === ExportErrorType.NOT_AUTHENTICATED
        ? "not_authenticated"
        : "failed";

    const count = accumulator?.size ?? 0;
    const checkpointPath = accumulator?.lastCheckpointPath ?? null;

    log.error(
      { ...exportError.toLogObject(), count, checkpointPath },
      "Target Export 실패",
    );

    const outcome: ExportOutcome = {
      targetName: target.name,
      status,
      count,
      message: exportError.message,
    };
    if (checkpointPath) {
      outcome.checkpointPath = checkpointPath;
    }

    return this.withDiagnostics(
      outcome,
      {
        pages: [],
        capturedResponses: buffer.totalCaptured,
        finalCursor: null,
        error: exportError.toLogObject(),
      },
    );
  }

  /**
   * debug 모드일 때만 진단 정보 포함
   */
  private withDiagnostics(
    outcome: ExportOutcome,
    diagnostics: ExportDiagnostics,
  ): ExportOutcome {
    return this.options.debug ? { ...outcome, diagnostics } : outcome;
  }
}
