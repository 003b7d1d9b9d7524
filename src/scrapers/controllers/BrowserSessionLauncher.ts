/**
 * Browser Session Launcher
 *
 * 브라우저/컨텍스트/페이지 생명주기 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 실행/정리만 담당 (추출/순회 X)
 * - DIP: 상위 모듈은 IPageDriver만 사용
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright";

import { browserArgsFor } from "@/config/BrowserArgs";
import { BROWSER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import {
  PlaywrightDriverOptions,
  PlaywrightPageDriver,
} from "@/scrapers/controllers/PlaywrightPageDriver";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

export interface BrowserLaunchOptions extends PlaywrightDriverOptions {
  /** 기본 false (사용자가 로그인할 창 필요) */
  headless?: boolean;
}

export interface BrowserSession {
  page: Page;
  driver: PlaywrightPageDriver;
  close(): Promise<void>;
}

export class BrowserSessionLauncher {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;

  async launch(options: BrowserLaunchOptions = {}): Promise<BrowserSession> {
    const headless = options.headless ?? false;
    logger.info({ headless }, "브라우저 초기화 시작");

    const browser = await chromium.launch({
      headless,
      args: browserArgsFor(headless),
    });
    this.browser = browser;

    const context = await browser.newContext({
      viewport: BROWSER_CONFIG.VIEWPORT,
      userAgent: BROWSER_CONFIG.USER_AGENT,
    });
    this.context = context;

    // Anti-detection 설정
    await context.addInitScript(() => {
      Object.defineProperty(navigator, "webdriver", {
        get: () => false,
      });
    });

    const page = await context.newPage();
    const driver = new PlaywrightPageDriver(page, {
      navigationTimeoutMs: options.navigationTimeoutMs,
      actionTimeoutMs: options.actionTimeoutMs,
    });

    logger.info("브라우저 초기화 완료");
    return { page, driver, close: () => this.close() };
  }

  /**
   * 리소스 정리
   */
  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
    logger.info("브라우저 정리 완료");
  }
}
