/**
 * Browser Launch Arguments
 *
 * SOLID 원칙:
 * - SRP: Browser 실행 인자 관리만 담당
 * - OCP: 카테고리별 확장 가능
 *
 * 로그인 창을 띄워야 하므로 기본은 headed 실행
 * headless는 세션이 이미 살아있는 환경(컨테이너 등)에서만 사용
 */

export const BROWSER_ARGS = {
  /**
   * Stealth 플래그 (자동화 제어 표시 제거)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (컨테이너 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 공유 메모리 절약 (컨테이너 /dev/shm 부족 대비)
   */
  SHARED_MEMORY: ["--disable-dev-shm-usage"],

  /**
   * headless 조합 (Container + Stealth)
   */
  get HEADLESS() {
    return [...this.SANDBOX, ...this.SHARED_MEMORY, ...this.STEALTH];
  },

  /**
   * headed 조합 (사용자 로그인용 로컬 실행)
   */
  get HEADED() {
    return [...this.STEALTH];
  },
} as const;

export function browserArgsFor(headless: boolean): string[] {
  return headless ? BROWSER_ARGS.HEADLESS : BROWSER_ARGS.HEADED;
}
