/**
 * Session Provider Interface
 *
 * 코어는 인증된 페이지를 전달받는다고 가정하며 자격 증명은 다루지 않음
 */
export interface ISessionProvider {
  /** 현재 페이지가 로그인 상태인지 */
  isAuthenticated(): Promise<boolean>;
  /** 로그인 절차 수행 (대화형) */
  establishSession(): Promise<boolean>;
}
