/**
 * SiteConfig - 사이트별 YAML 설정 스키마
 *
 * SOLID 원칙:
 * - SRP: 설정 스키마 정의만 담당
 * - OCP: 사이트 추가 시 YAML만 추가
 */

import { z } from "zod";
import { NamedSelectorSchema } from "@/core/domain/SelectorSpec";

/**
 * 텍스트 제거 규칙 (선언적, 순서대로 적용)
 * pattern은 정규식 소스, flags 기본값 "gi"
 */
export const StripRuleSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().default("gi"),
  replacement: z.string().default(""),
});

export type StripRuleConfig = z.infer<typeof StripRuleSchema>;

/**
 * 세션(로그인) 감지 설정
 */
export const SessionConfigSchema = z.object({
  /** 로그인 상태 표시 요소 (하나라도 있으면 로그인 상태) */
  authenticatedMarkers: z.array(NamedSelectorSchema).min(1),
  /** 로그인 요구 표시 요소 (있으면 비로그인 상태) */
  loginPromptMarkers: z.array(NamedSelectorSchema).default([]),
  /** 로그인 시작 버튼 */
  loginTriggers: z.array(NamedSelectorSchema).default([]),
});

/**
 * Network 인터셉트 전략 설정
 */
export const NetworkConfigSchema = z.object({
  excludedSuffixes: z
    .array(z.string())
    .default([".js", ".css", ".png", ".jpg", ".svg", ".ico", ".woff", ".woff2"]),
  excludedHosts: z.array(z.string()).default([]),
  containerKeys: z
    .array(z.string())
    .default([
      "memories",
      "data",
      "results",
      "items",
      "records",
      "long_term_memories",
      "ltm",
      "memory_list",
    ]),
  contentFields: z
    .array(z.string())
    .min(1)
    .default(["content", "text", "memory", "summary", "value", "message"]),
  identifierFields: z.array(z.string()).default(["id", "uuid", "_id"]),
  kindFields: z.array(z.string()).default(["summary_type", "type", "kind"]),
  dateFields: z
    .array(z.string())
    .default(["created_at", "createdAt", "date", "timestamp"]),
  /** 메모리가 아닌 메타데이터 객체 판별용 키 목록 */
  metadataVocabulary: z.array(z.string()).default([]),
  /** 위 목록과 겹치는 키가 이 값 이상이면 오탐으로 제외 */
  metadataOverlapThreshold: z.number().int().min(1).default(2),
});

/**
 * 기본 DOM 전략 설정
 */
export const DomConfigSchema = z.object({
  containers: z.array(NamedSelectorSchema).min(1),
  label: z.array(NamedSelectorSchema).default([]),
  content: z.array(NamedSelectorSchema).min(1),
  date: z.array(NamedSelectorSchema).default([]),
});

/**
 * Fallback 휴리스틱 전략 설정
 */
export const FallbackConfigSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  candidates: z.array(NamedSelectorSchema).min(1),
  maxTextLength: z.number().int().positive().default(2000),
  datePattern: z.string().default("(\\d{1,2}/\\d{1,2}/\\d{4})"),
  stripRules: z.array(StripRuleSchema).default([]),
});

/**
 * 페이지 이동 컨트롤 탐색 설정 (next/previous 공통)
 */
export const PageControlConfigSchema = z.object({
  /** aria-label 포함 문자열 (대소문자 무시) */
  ariaLabels: z.array(z.string().min(1)).default([]),
  /** 버튼 innerHTML에 포함되는 아이콘 마커 */
  glyphMarkers: z.array(z.string().min(1)).default([]),
  /** 버튼 텍스트 전체가 일치하는 화살표 문자 */
  glyphTexts: z.array(z.string().min(1)).default([]),
});

/**
 * 페이지네이션 설정
 */
export const PaginationConfigSchema = z.object({
  indicatorPattern: z.string().default("Page\\s+(\\d+)\\s+of\\s+(\\d+)"),
  next: PageControlConfigSchema,
  previous: PageControlConfigSchema,
  /** 위치 기반 fallback: 페이지 표시를 포함한 요소의 최대 자식 수 */
  positionalMaxChildren: z.number().int().positive().default(10),
});

/**
 * 무한 스크롤 / 더보기 설정 (페이지네이션이 없을 때)
 */
export const ScrollConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxScrolls: z.number().int().positive().default(50),
  stableRounds: z.number().int().positive().default(3),
  loadMoreButtons: z.array(NamedSelectorSchema).default([]),
});

/**
 * 사이트 설정 (YAML 루트)
 */
export const SiteConfigSchema = z.object({
  site: z.string().min(1),
  baseUrl: z.string().url(),
  session: SessionConfigSchema,
  network: NetworkConfigSchema,
  dom: DomConfigSchema,
  fallback: FallbackConfigSchema,
  pagination: PaginationConfigSchema,
  scroll: ScrollConfigSchema.default({}),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type DomConfig = z.infer<typeof DomConfigSchema>;
export type FallbackConfig = z.infer<typeof FallbackConfigSchema>;
export type PageControlConfig = z.infer<typeof PageControlConfigSchema>;
export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;
export type ScrollConfig = z.infer<typeof ScrollConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
