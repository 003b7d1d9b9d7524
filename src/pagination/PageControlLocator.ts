/**
 * Page Control Locator
 *
 * 목적: 다음/이전 페이지 컨트롤 탐색
 *
 * 탐색 단계 (앞 단계에서 찾으면 종료):
 * 1. aria-label 부분 일치 (대소문자 무시)
 * 2. 모든 button 스캔: innerHTML 아이콘 마커 또는 화살표 텍스트 완전 일치
 * 3. 위치 기반: "Page X of Y" 를 보여주는 작은 요소 안의 button (next=마지막, previous=첫 번째)
 *
 * 1, 2단계는 화면에 보이고 활성화된 요소만 사용
 */

import { logger } from "@/config/logger";
import type { SelectorSpec } from "@/core/domain/SelectorSpec";
import type { PageControlConfig, PaginationConfig } from "@/core/domain/SiteConfig";
import type { IElementHandle, IPageDriver } from "@/core/interfaces";
import { PageIndicatorReader } from "@/pagination/PageIndicatorReader";

export type PageDirection = "next" | "previous";

export type LocatorTier = "ariaLabel" | "glyph" | "positional";

export interface LocatedControl {
  element: IElementHandle;
  tier: LocatorTier;
}

const BUTTON: SelectorSpec = { kind: "tag", tag: "button" };

/**
 * 위치 기반 탐색 후보: "Page" 텍스트 + 하위 button
 */
const POSITIONAL_CONTAINER: SelectorSpec = {
  kind: "tag",
  tag: "*",
  containsText: "Page",
  hasDescendant: BUTTON,
};

export class PageControlLocator {
  private readonly indicator: PageIndicatorReader;

  constructor(private readonly config: PaginationConfig) {
    this.indicator = new PageIndicatorReader(config.indicatorPattern);
  }

  async locate(
    driver: IPageDriver,
    direction: PageDirection,
  ): Promise<LocatedControl | null> {
    const controls = direction === "next" ? this.config.next : this.config.previous;

    const byAria = await this.findByAriaLabel(driver, controls);
    if (byAria) {
      return { element: byAria, tier: "ariaLabel" };
    }

    const byGlyph = await this.findByGlyph(driver, controls);
    if (byGlyph) {
      return { element: byGlyph, tier: "glyph" };
    }

    const byPosition = await this.findByPosition(driver, direction);
    if (byPosition) {
      return { element: byPosition, tier: "positional" };
    }

    logger.debug({ direction }, "페이지 이동 컨트롤을 찾지 못함");
    return null;
  }

  private async findByAriaLabel(
    driver: IPageDriver,
    controls: PageControlConfig,
  ): Promise<IElementHandle | null> {
    for (const label of controls.ariaLabels) {
      const elements = await driver.findAll({
        kind: "attribute",
        name: "aria-label",
        value: label,
        match: "contains",
        ignoreCase: true,
      });
      const actionable = await this.firstActionable(elements);
      if (actionable) {
        return actionable;
      }
    }
    return null;
  }

  private async findByGlyph(
    driver: IPageDriver,
    controls: PageControlConfig,
  ): Promise<IElementHandle | null> {
    if (controls.glyphMarkers.length === 0 && controls.glyphTexts.length === 0) {
      return null;
    }

    for (const button of await driver.findAll(BUTTON)) {
      try {
        const inner = await button.innerHtml();
        const text = (await button.text()).trim();
        const isGlyph =
          controls.glyphMarkers.some((marker) => inner.includes(marker)) ||
          controls.glyphTexts.includes(text);

        if (isGlyph && (await button.isActionable())) {
          return button;
        }
      } catch (error) {
        // 스캔 중 분리된 버튼
        logger.debug(
          { error: error instanceof Error ? error.message : String(error) },
          "버튼 검사 실패 - 다음 버튼",
        );
      }
    }
    return null;
  }

  private async findByPosition(
    driver: IPageDriver,
    direction: PageDirection,
  ): Promise<IElementHandle | null> {
    for (const container of await driver.findAll(POSITIONAL_CONTAINER)) {
      try {
        const button = await this.positionalButton(container, direction);
        if (button) {
          return button;
        }
      } catch (error) {
        // 스캔 중 분리된 컨테이너
        logger.debug(
          { error: error instanceof Error ? error.message : String(error) },
          "페이지 표시 컨테이너 검사 실패 - 다음 컨테이너",
        );
      }
    }
    return null;
  }

  private async positionalButton(
    container: IElementHandle,
    direction: PageDirection,
  ): Promise<IElementHandle | null> {
    const text = await container.text();
    if (!this.indicator.matches(text)) return null;
    if ((await container.childCount()) >= this.config.positionalMaxChildren) return null;

    const buttons = await container.findAll(BUTTON);
    if (buttons.length < 2) return null;

    return (direction === "next" ? buttons[buttons.length - 1] : buttons[0]) ?? null;
  }

  private async firstActionable(
    elements: readonly IElementHandle[],
  ): Promise<IElementHandle | null> {
    for (const element of elements) {
      if (await element.isActionable()) {
        return element;
      }
    }
    return null;
  }
}
