/**
 * 파일명 유틸리티
 */

/**
 * Target 이름 → 안전한 파일명
 * 영문/숫자/-/_/공백 외 문자는 "_" 로 치환, 결과가 비면 "unnamed"
 */
export function toSafeFileName(name: string): string {
  const safe = name.replace(/[^A-Za-z0-9\-_ ]/g, "_").trim();
  return safe || "unnamed";
}
