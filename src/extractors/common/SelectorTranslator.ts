/**
 * SelectorTranslator Utility
 *
 * 목적: SelectorSpec → Playwright CSS selector 변환
 * 패턴: Utility Class (Static Methods)
 *
 * 변환 예:
 * - { kind: "classContains", fragment: "cardPreview" } → [class*="cardPreview"]
 * - { kind: "tag", tag: "button", containsText: "load more" } → button:has-text("load more")
 */

import type { SelectorSpec } from "@/core/domain/SelectorSpec";

export class SelectorTranslator {
  /**
   * CSS 문자열 값 escape (큰따옴표/역슬래시)
   */
  static quote(value: string): string {
    return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
  }

  /**
   * SelectorSpec → CSS selector
   */
  static toCss(spec: SelectorSpec): string {
    let base: string;

    switch (spec.kind) {
      case "tag":
        base = spec.tag;
        break;
      case "classContains":
        base = `${spec.tag ?? ""}[class*=${this.quote(spec.fragment)}]`;
        break;
      case "attribute": {
        const tag = spec.tag ?? "";
        if (spec.value === undefined) {
          base = `${tag}[${spec.name}]`;
        } else {
          const operator = spec.match === "contains" ? "*=" : "=";
          const flag = spec.ignoreCase ? " i" : "";
          base = `${tag}[${spec.name}${operator}${this.quote(spec.value)}${flag}]`;
        }
        break;
      }
    }

    if (spec.containsText) {
      base += `:has-text(${this.quote(spec.containsText)})`;
    }
    if (spec.hasDescendant) {
      base += `:has(${this.toCss(spec.hasDescendant)})`;
    }

    return base;
  }
}
