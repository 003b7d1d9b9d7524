/**
 * SelectorSpec - 요소 선택 명세 (Tagged Variant)
 *
 * 대상 사이트의 class명은 빌드 해시가 붙어 불안정하므로
 * CSS 문자열 대신 구조화된 명세를 우선순위 순서로 평가한다.
 *
 * - 각 명세는 YAML에 이름과 함께 선언 (NamedSelector)
 * - Playwright Driver는 CSS로 변환해서 사용
 * - 테스트용 Fake Driver는 명세를 직접 매칭
 */

import { z } from "zod";

/**
 * 공통 수식자
 * - containsText: 요소 텍스트에 포함되어야 하는 문자열 (대소문자 무시)
 * - hasDescendant: 하위에 존재해야 하는 요소 명세
 */
export interface SelectorModifiers {
  containsText?: string;
  hasDescendant?: SelectorSpec;
}

export type SelectorSpec =
  | ({ kind: "tag"; tag: string } & SelectorModifiers)
  | ({ kind: "classContains"; fragment: string; tag?: string } & SelectorModifiers)
  | ({
      kind: "attribute";
      name: string;
      value?: string;
      match?: "exact" | "contains";
      ignoreCase?: boolean;
      tag?: string;
    } & SelectorModifiers);

const modifierShape = {
  containsText: z.string().min(1).optional(),
  hasDescendant: z.lazy((): z.ZodType<SelectorSpec> => SelectorSpecSchema).optional(),
};

export const SelectorSpecSchema: z.ZodType<SelectorSpec> = z.discriminatedUnion(
  "kind",
  [
    z.object({
      kind: z.literal("tag"),
      tag: z.string().min(1),
      ...modifierShape,
    }),
    z.object({
      kind: z.literal("classContains"),
      fragment: z.string().min(1),
      tag: z.string().min(1).optional(),
      ...modifierShape,
    }),
    z.object({
      kind: z.literal("attribute"),
      name: z.string().min(1),
      value: z.string().optional(),
      match: z.enum(["exact", "contains"]).optional(),
      ignoreCase: z.boolean().optional(),
      tag: z.string().min(1).optional(),
      ...modifierShape,
    }),
  ],
);

/**
 * 이름이 붙은 선택 명세 (로그/진단용 이름)
 */
export interface NamedSelector {
  name: string;
  spec: SelectorSpec;
}

export const NamedSelectorSchema: z.ZodType<NamedSelector> = z.object({
  name: z.string().min(1),
  spec: SelectorSpecSchema,
});
