/**
 * TextCleaner Utility
 *
 * 목적: 선언적 "패턴 → 치환" 규칙을 순서대로 적용해 보일러플레이트 제거
 *
 * best-effort: 규칙에 없는 잔여 노이즈는 남을 수 있음
 */

import type { StripRuleConfig } from "@/core/domain/SiteConfig";

/**
 * 컴파일된 제거 규칙
 */
export interface StripRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

export class TextCleaner {
  private readonly rules: StripRule[];

  constructor(rules: readonly StripRule[]) {
    this.rules = [...rules];
  }

  /**
   * YAML 설정 → TextCleaner
   * 설정 로드 단계에서 정규식 유효성은 이미 검증됨
   */
  static fromConfig(rules: readonly StripRuleConfig[]): TextCleaner {
    return new TextCleaner(
      rules.map((rule) => ({
        name: rule.name,
        pattern: new RegExp(rule.pattern, rule.flags),
        replacement: rule.replacement,
      })),
    );
  }

  /**
   * 규칙 적용
   *
   * @param text 원본 텍스트
   * @param literals 추가로 제거할 고정 문자열 (예: 감지된 날짜)
   */
  clean(text: string, literals: readonly string[] = []): string {
    let result = text;

    for (const literal of literals) {
      if (literal) {
        result = result.split(literal).join(" ");
      }
    }

    for (const rule of this.rules) {
      result = result.replace(rule.pattern, rule.replacement);
    }

    return result.trim();
  }

  get ruleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }
}
