/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 콘솔 출력:
 * - LOG_LEVEL 이상 모두 출력 (stderr, stdout은 CLI 결과용)
 * - LOG_PRETTY=true: 색상 한 줄 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (LOG_TO_FILE=true 일 때만):
 * - logs/YYYY-MM-DD/exporter.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 * - 일일 로테이션, 30일 보관
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getLocalDateString, getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string) {
  return createStream(
    () => {
      const dateDir = getLocalDateString();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "50M",
    },
  );
}

/**
 * 파일 라우팅 스트림
 * 에러 레벨은 error.log에도 기록
 */
class FileRoutingStream implements DestinationStream {
  private readonly mainStream = createRotatingStream("exporter");
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): boolean {
    this.mainStream.write(chunk);

    try {
      const parsed: unknown = JSON.parse(chunk);
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "level" in parsed &&
        parsed.level === "error"
      ) {
        this.errorStream.write(chunk);
      }
    } catch {
      // JSON이 아닌 라인은 메인 파일에만 기록
      return true;
    }
    return true;
  }
}

/**
 * 파일 출력을 끈 경우의 pino 목적지 (콘솔 Hook만 사용)
 */
class DiscardStream implements DestinationStream {
  write(): boolean {
    return true;
  }
}

/**
 * 로그 레벨 필터: LOG_LEVEL 이상만 콘솔 출력
 */
const levelThreshold = (): number => {
  switch (LOG_LEVEL) {
    case "trace":
      return LOG_LEVELS.TRACE;
    case "debug":
      return LOG_LEVELS.DEBUG;
    case "info":
      return LOG_LEVELS.INFO;
    case "warn":
      return LOG_LEVELS.WARN;
    case "error":
      return LOG_LEVELS.ERROR;
    case "fatal":
      return LOG_LEVELS.FATAL;
    default:
      return Number.POSITIVE_INFINITY;
  }
};

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const important = Boolean(logObj.important);
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const star = important ? " ⭐" : "";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important"];
  for (const [field, value] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const rendered =
      typeof value === "object" && value !== null
        ? JSON.stringify(value, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * JSON 콘솔 포맷터
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.error(
    JSON.stringify({ time: getTimestampWithTimezone(), level, ...logObj }),
  );
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (level < levelThreshold()) {
        return;
      }

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = { ...this.bindings() };

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "memory_exporter",
    env: NODE_ENV,
  },
  hooks: createConsoleHook(
    LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
  ),
};

/**
 * 메인 로거 인스턴스
 * 파일 출력이 꺼져 있으면 pino 자체 출력은 버리고 콘솔 Hook만 사용
 */
const logger: pino.Logger = LOG_TO_FILE
  ? pino(baseConfig, pino.multistream([{ level: "debug", stream: new FileRoutingStream() }]))
  : pino(baseConfig, new DiscardStream());

export { logger };

export type Logger = pino.Logger;
