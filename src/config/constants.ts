/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - CLI 옵션이 최종 우선
 */

/**
 * 정수 환경변수 파싱 (없거나 잘못된 값이면 기본값)
 */
const intFromEnv = (name: string, defaultValue: number): number => {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
};

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 "version": "1.0.0"과 동기화 필수
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Memory Exporter",
} as const;

/**
 * Export 기본값
 */
export const EXPORT_DEFAULTS = {
  /**
   * 결과 출력 디렉토리
   * 환경변수: EXPORT_OUTPUT_DIR
   */
  OUTPUT_DIR: process.env.EXPORT_OUTPUT_DIR || "exports",

  /**
   * 체크포인트 주기 (페이지 수)
   * 환경변수: EXPORT_CHECKPOINT_INTERVAL
   */
  CHECKPOINT_INTERVAL: intFromEnv("EXPORT_CHECKPOINT_INTERVAL", 50) || 50,

  /**
   * 대용량 Export 기준 (전체 페이지 수가 이 값을 넘을 때만 체크포인트)
   * 환경변수: EXPORT_LARGE_THRESHOLD
   */
  LARGE_EXPORT_THRESHOLD: intFromEnv("EXPORT_LARGE_THRESHOLD", 10),

  /**
   * 최소 content 길이 (trim 후, 미만이면 노이즈로 간주)
   * 환경변수: EXPORT_MIN_CONTENT_LENGTH
   */
  MIN_CONTENT_LENGTH: intFromEnv("EXPORT_MIN_CONTENT_LENGTH", 10),

  /**
   * 기본 사이트 설정 ID (config/sites/{id}.yaml)
   */
  SITE_ID: process.env.EXPORT_SITE_ID || "shapes",
} as const;

/**
 * 타이밍 설정 (ms)
 *
 * 모든 대기는 상한이 있고, 타임아웃은 "없음/실패"로 처리됨
 */
export const TIMING_CONFIG = {
  /** 페이지 이동(next/previous 클릭) 후 렌더링 대기 */
  SETTLE_DELAY_MS: intFromEnv("EXPORT_SETTLE_DELAY_MS", 2000),

  /** 액션 실패 후 재시도 전 대기 */
  RETRY_DELAY_MS: intFromEnv("EXPORT_RETRY_DELAY_MS", 1500),

  /** 네비게이션 타임아웃 */
  NAVIGATION_TIMEOUT_MS: intFromEnv("EXPORT_NAVIGATION_TIMEOUT_MS", 30000),

  /** 요소 조회/클릭 타임아웃 */
  ACTION_TIMEOUT_MS: intFromEnv("EXPORT_ACTION_TIMEOUT_MS", 5000),

  /** 스크롤 후 추가 로딩 대기 */
  SCROLL_DELAY_MS: intFromEnv("EXPORT_SCROLL_DELAY_MS", 1500),

  /** 로그인 대기 최대 시간 (초) */
  LOGIN_TIMEOUT_SEC: intFromEnv("EXPORT_LOGIN_TIMEOUT_SEC", 300),

  /** 로그인 상태 폴링 주기 */
  LOGIN_POLL_INTERVAL_MS: 2000,
} as const;

/**
 * 브라우저 설정
 */
export const BROWSER_CONFIG = {
  VIEWPORT: { width: 1280, height: 900 },
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
} as const;
