/**
 * YAML 사이트 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드 + 스키마 검증만 담당
 * - OCP: 새로운 사이트 추가 시 YAML만 추가
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { SiteConfig, SiteConfigSchema } from "@/core/domain/SiteConfig";
import { ExportError, ExportErrorType } from "@/core/interfaces/ExportErrorType";
import { logger } from "@/config/logger";

/**
 * 설정 디렉토리
 * src/config, dist/config 어느 쪽에서 실행해도 프로젝트 루트의 config/sites를 가리킴
 */
const DEFAULT_CONFIG_DIR = path.resolve(__dirname, "..", "..", "config", "sites");

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, SiteConfig> = new Map();
  private configDir: string;

  private constructor() {
    this.configDir = process.env.SITE_CONFIG_DIR || DEFAULT_CONFIG_DIR;
  }

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 사이트 설정 로드 (캐시 우선)
   */
  loadConfig(site: string): SiteConfig {
    const cached = this.configCache.get(site);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.configDir, `${site}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new ExportError(
        ExportErrorType.CONFIG_INVALID,
        `Config file not found: ${configPath}`,
      );
    }

    const fileContent = fs.readFileSync(configPath, "utf8");
    const config = this.parseConfig(fileContent, configPath);

    this.configCache.set(site, config);
    logger.debug({ site, configPath }, "사이트 설정 로드 완료");

    return config;
  }

  /**
   * YAML 문자열 파싱 + 스키마 검증
   */
  parseConfig(content: string, source: string = "<inline>"): SiteConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new ExportError(
        ExportErrorType.CONFIG_INVALID,
        `YAML 파싱 실패 (${source}): ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined },
      );
    }

    const result = SiteConfigSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ExportError(
        ExportErrorType.CONFIG_INVALID,
        `설정 검증 실패 (${source}): ${issues}`,
      );
    }

    this.validateConfig(result.data, source);
    return result.data;
  }

  /**
   * 스키마로 표현하기 어려운 추가 검증 (정규식 컴파일 가능 여부)
   */
  private validateConfig(config: SiteConfig, source: string): void {
    const patterns: Array<[string, string, string]> = [
      ["pagination.indicatorPattern", config.pagination.indicatorPattern, "i"],
      ["fallback.datePattern", config.fallback.datePattern, ""],
      ...config.fallback.stripRules.map(
        (rule): [string, string, string] => [
          `fallback.stripRules.${rule.name}`,
          rule.pattern,
          rule.flags,
        ],
      ),
    ];

    for (const [name, pattern, flags] of patterns) {
      try {
        new RegExp(pattern, flags);
      } catch (error) {
        throw new ExportError(
          ExportErrorType.CONFIG_INVALID,
          `잘못된 정규식 ${name} (${source}): ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }

  /**
   * 캐시 초기화 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
