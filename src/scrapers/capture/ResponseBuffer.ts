/**
 * Response Buffer
 *
 * 목적:
 * - Target 1개 동안 캡처된 네트워크 응답을 보관하는 명시적 버퍼
 * - page-view 단위로 drain 해서 추출 체인에 전달
 *
 * 규칙:
 * - 정적 자원(.js/.css/이미지/폰트)과 텔레메트리 호스트 응답은 버림
 * - attach는 Target 시작 시 1회, detach는 종료 시 반드시 호출
 */

import { logger } from "@/config/logger";
import type { NetworkConfig } from "@/core/domain/SiteConfig";
import type { CapturedResponse, IPageDriver } from "@/core/interfaces";

export type ResponseFilterOptions = Pick<
  NetworkConfig,
  "excludedSuffixes" | "excludedHosts"
>;

export class ResponseBuffer {
  private pending: CapturedResponse[] = [];
  private detachListener: (() => void) | null = null;
  private captured = 0;
  private readonly suffixes: string[];
  private readonly hosts: string[];

  constructor(options: ResponseFilterOptions) {
    this.suffixes = options.excludedSuffixes.map((suffix) => suffix.toLowerCase());
    this.hosts = options.excludedHosts.map((host) => host.toLowerCase());
  }

  /**
   * Driver에 응답 리스너 등록 (이미 등록되어 있으면 교체)
   */
  attach(driver: IPageDriver): void {
    this.detach();
    this.detachListener = driver.onResponse((response) => this.push(response));
  }

  detach(): void {
    if (this.detachListener) {
      this.detachListener();
      this.detachListener = null;
    }
  }

  get isAttached(): boolean {
    return this.detachListener !== null;
  }

  /**
   * 응답 추가 (필터 통과 시)
   * @returns 버퍼에 들어갔는지 여부
   */
  push(response: CapturedResponse): boolean {
    if (!this.accepts(response.url)) {
      return false;
    }
    this.pending.push(response);
    this.captured++;
    return true;
  }

  /**
   * 직전 drain 이후 캡처된 응답 반환 후 비움
   */
  drain(): CapturedResponse[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  /** 지금까지 버퍼에 들어간 전체 응답 수 */
  get totalCaptured(): number {
    return this.captured;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * URL 필터
   */
  accepts(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      logger.debug({ url }, "잘못된 응답 URL - 제외");
      return false;
    }

    const pathname = parsed.pathname.toLowerCase();
    if (this.suffixes.some((suffix) => pathname.endsWith(suffix))) {
      return false;
    }

    const hostname = parsed.hostname.toLowerCase();
    return !this.hosts.some(
      (host) => hostname === host || hostname.endsWith(`.${host}`),
    );
  }
}
