/**
 * 타임스탬프 유틸리티
 *
 * SOLID 원칙:
 * - SRP: 타임스탬프 생성/포맷만 담당
 * - OCP: 새로운 포맷 추가 가능
 */

const pad = (value: number, length: number = 2): string =>
  String(value).padStart(length, "0");

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+09:00)
 *
 * 특징:
 * - 시스템의 로컬 타임존 자동 감지 (TZ 환경 변수 사용)
 * - 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * 파일명용 타임스탬프 (YYYYMMDD_HHMMSS, 로컬 타임존)
 */
export function getFileTimestamp(now: Date = new Date()): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 반환 (로컬 타임존 기준)
 */
export function getLocalDateString(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * 관측 날짜 → 리포트 표시용 문자열
 *
 * - 숫자 형태(epoch 초)면 MM/DD/YYYY (UTC)
 * - 그 외 형식은 원본 그대로 (부분/깨진 값도 보존)
 */
export function formatObservedDate(observedAt: string): string {
  const trimmed = observedAt.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    return trimmed;
  }

  const date = new Date(Number(trimmed) * 1000);
  if (Number.isNaN(date.getTime())) {
    return trimmed;
  }

  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()}`;
}
