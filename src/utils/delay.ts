/**
 * 대기 유틸리티
 *
 * 테스트에서 대기를 제거할 수 있도록 Sleep 함수를 주입 가능한 타입으로 분리
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
};
