/**
 * Export Error Type Enum
 *
 * 목적:
 * - 실패 원인 세분화 (사용자 조치가 필요한 에러 vs 일시적 에러)
 * - 에러별 로깅 전략 차별화
 * - 재시도 로직 결정
 */

/**
 * Export 에러 타입
 */
export enum ExportErrorType {
  /** 로그인 안 됨 (사용자 조치 필요) */
  NOT_AUTHENTICATED = "NOT_AUTHENTICATED",

  /** 페이지 이동 실패 (타임아웃, 연결 실패) */
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  /** 클릭 등 UI 액션 실패 (selector 없음, 클릭 실패) */
  ACTION_FAILED = "ACTION_FAILED",

  /** 데이터 추출 실패 (모든 전략/페이지 소진) */
  EXTRACTION_FAILED = "EXTRACTION_FAILED",

  /** 체크포인트 저장 실패 */
  CHECKPOINT_FAILED = "CHECKPOINT_FAILED",

  /** 설정/CLI 인자 오류 */
  CONFIG_INVALID = "CONFIG_INVALID",

  /** 알 수 없는 에러 */
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Export Error 클래스
 */
export class ExportError extends Error {
  public readonly type: ExportErrorType;
  public readonly targetName?: string;
  public readonly retryable: boolean;
  public readonly errorCause?: Error;

  constructor(
    type: ExportErrorType,
    message: string,
    options?: {
      targetName?: string;
      retryable?: boolean;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = "ExportError";
    this.type = type;
    this.targetName = options?.targetName;
    this.retryable = options?.retryable ?? ExportError.isRetryable(type);
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      targetName: this.targetName,
      retryable: this.retryable,
      cause: this.errorCause?.message,
    };
  }

  /**
   * 에러 메시지로부터 타입 추론 (Helper)
   */
  static inferTypeFromMessage(message: string): ExportErrorType {
    const lowerMessage = message.toLowerCase();

    if (
      lowerMessage.includes("login") ||
      lowerMessage.includes("unauthorized") ||
      lowerMessage.includes("not logged in")
    ) {
      return ExportErrorType.NOT_AUTHENTICATED;
    }

    if (
      lowerMessage.includes("timeout") ||
      lowerMessage.includes("net::") ||
      lowerMessage.includes("navigation")
    ) {
      return ExportErrorType.NAVIGATION_FAILED;
    }

    if (
      lowerMessage.includes("click") ||
      lowerMessage.includes("not visible") ||
      lowerMessage.includes("detached")
    ) {
      return ExportErrorType.ACTION_FAILED;
    }

    if (lowerMessage.includes("parse") || lowerMessage.includes("extract")) {
      return ExportErrorType.EXTRACTION_FAILED;
    }

    return ExportErrorType.UNKNOWN_ERROR;
  }

  /**
   * 재시도 가능 여부 판단 (Helper)
   */
  static isRetryable(type: ExportErrorType): boolean {
    switch (type) {
      case ExportErrorType.NAVIGATION_FAILED:
      case ExportErrorType.ACTION_FAILED:
        return true;

      case ExportErrorType.NOT_AUTHENTICATED:
      case ExportErrorType.EXTRACTION_FAILED:
      case ExportErrorType.CHECKPOINT_FAILED:
      case ExportErrorType.CONFIG_INVALID:
      case ExportErrorType.UNKNOWN_ERROR:
        return false;
    }
  }

  /**
   * unknown 에러 → ExportError 변환
   */
  static from(error: unknown, targetName?: string): ExportError {
    if (error instanceof ExportError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ExportError(ExportError.inferTypeFromMessage(message), message, {
      targetName,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
