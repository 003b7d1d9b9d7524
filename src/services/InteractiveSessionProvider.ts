/**
 * Interactive Session Provider
 *
 * 목적:
 * - 로그인 여부 판별 (로그인 표시 요소 존재 + 로그인 요구 요소 부재)
 * - 비로그인 시 사이트 진입 → 로그인 버튼 클릭 → 사용자가 브라우저에서 직접 로그인할 때까지 폴링
 *
 * 자격 증명은 다루지 않음 (사용자가 브라우저 창에서 직접 로그인)
 */

import { TIMING_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { NamedSelector } from "@/core/domain/SelectorSpec";
import type { SessionConfig } from "@/core/domain/SiteConfig";
import type { IPageDriver, ISessionProvider } from "@/core/interfaces";
import { Sleep, sleep as defaultSleep } from "@/utils/delay";

export interface InteractiveSessionOptions {
  baseUrl: string;
  loginTimeoutSec?: number;
  pollIntervalMs?: number;
  sleep?: Sleep;
}

export class InteractiveSessionProvider implements ISessionProvider {
  private readonly loginTimeoutSec: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly driver: IPageDriver,
    private readonly config: SessionConfig,
    private readonly options: InteractiveSessionOptions,
  ) {
    this.loginTimeoutSec = options.loginTimeoutSec ?? TIMING_CONFIG.LOGIN_TIMEOUT_SEC;
    this.pollIntervalMs = options.pollIntervalMs ?? TIMING_CONFIG.LOGIN_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async isAuthenticated(): Promise<boolean> {
    if (await this.anyPresent(this.config.loginPromptMarkers)) {
      return false;
    }
    return this.anyPresent(this.config.authenticatedMarkers);
  }

  async establishSession(): Promise<boolean> {
    if (await this.isAuthenticated()) {
      return true;
    }

    logger.info({ baseUrl: this.options.baseUrl }, "로그인 필요 - 사이트 진입");
    const navigation = await this.driver.navigate(this.options.baseUrl);
    if (!navigation.ok) {
      logger.warn({ error: navigation.error }, "사이트 진입 실패");
    }

    if (await this.isAuthenticated()) {
      return true;
    }

    await this.clickLoginTrigger();

    logger.info(
      { timeoutSec: this.loginTimeoutSec },
      "브라우저 창에서 로그인해 주세요 - 로그인 대기 중",
    );

    const maxPolls = Math.max(
      1,
      Math.ceil((this.loginTimeoutSec * 1000) / this.pollIntervalMs),
    );
    for (let poll = 0; poll < maxPolls; poll++) {
      if (await this.isAuthenticated()) {
        logger.info({ polls: poll + 1 }, "로그인 감지");
        return true;
      }
      await this.sleep(this.pollIntervalMs);
    }

    logger.warn({ timeoutSec: this.loginTimeoutSec }, "로그인 대기 시간 초과");
    return false;
  }

  private async clickLoginTrigger(): Promise<boolean> {
    for (const trigger of this.config.loginTriggers) {
      for (const element of await this.driver.findAll(trigger.spec)) {
        if (!(await element.isActionable())) continue;

        const result = await this.driver.click(element);
        if (result.ok) {
          logger.info({ trigger: trigger.name }, "로그인 버튼 클릭");
          return true;
        }
        logger.debug({ trigger: trigger.name, error: result.error }, "로그인 버튼 클릭 실패");
      }
    }
    return false;
  }

  private async anyPresent(markers: readonly NamedSelector[]): Promise<boolean> {
    for (const marker of markers) {
      const elements = await this.driver.findAll(marker.spec);
      if (elements.length > 0) {
        return true;
      }
    }
    return false;
  }
}
