/**
 * CLI 인자 파싱
 *
 * 사용법:
 *   memory-export export --url <url> [--url <url> ...] [--name <name> ...]
 *                        [--output <dir>] [--max-pages <n>] [--checkpoint-interval <n>]
 *                        [--large-threshold <n>] [--min-length <n>] [--login-timeout <s>]
 *                        [--site <id>] [--resume] [--debug] [--headless]
 *   memory-export convert <file.json>
 *
 * --name 은 --url 과 순서대로 짝지어짐 (없으면 URL 첫 경로 조각)
 */

import { z } from "zod";
import { EXPORT_DEFAULTS, TIMING_CONFIG } from "@/config/constants";
import {
  ExportOptions,
  ExportOptionsSchema,
  ExportTarget,
  ExportTargetSchema,
} from "@/core/domain/ExportOptions";
import { ExportError, ExportErrorType } from "@/core/interfaces";

export type CliCommand =
  | {
      command: "export";
      targets: ExportTarget[];
      options: ExportOptions;
      headless: boolean;
      loginTimeoutSec: number;
      site: string;
    }
  | { command: "convert"; file: string }
  | { command: "help" };

export const USAGE = `사용법:
  memory-export export --url <url> [--url <url> ...] [options]
  memory-export convert <file.json>

export 옵션:
  --name <name>               Target 이름 (--url 순서대로)
  --output <dir>              출력 디렉토리 (기본: ${EXPORT_DEFAULTS.OUTPUT_DIR})
  --max-pages <n>             최대 페이지 수
  --checkpoint-interval <n>   체크포인트 주기 (기본: ${EXPORT_DEFAULTS.CHECKPOINT_INTERVAL})
  --large-threshold <n>       체크포인트 기준 전체 페이지 수 (기본: ${EXPORT_DEFAULTS.LARGE_EXPORT_THRESHOLD})
  --min-length <n>            최소 content 길이 (기본: ${EXPORT_DEFAULTS.MIN_CONTENT_LENGTH})
  --login-timeout <s>         로그인 대기 시간 초 (기본: ${TIMING_CONFIG.LOGIN_TIMEOUT_SEC})
  --site <id>                 사이트 설정 ID (기본: ${EXPORT_DEFAULTS.SITE_ID})
  --resume                    기존 체크포인트에서 이어받기
  --debug                     진단 정보 출력 + 결과 없을 때 HTML 저장
  --headless                  브라우저 창 없이 실행 (이미 로그인된 경우)`;

const VALUE_FLAGS = new Set([
  "url",
  "name",
  "output",
  "max-pages",
  "checkpoint-interval",
  "large-threshold",
  "min-length",
  "login-timeout",
  "site",
]);

const BOOLEAN_FLAGS = new Set(["resume", "debug", "headless"]);

const intArg = z
  .string()
  .regex(/^\d+$/, "정수가 필요합니다")
  .transform((value) => Number.parseInt(value, 10));

const ExportArgsSchema = z.object({
  url: z.array(z.string()).min(1, "--url 이 최소 1개 필요합니다"),
  name: z.array(z.string().min(1)).default([]),
  output: z.string().min(1).optional(),
  maxPages: intArg.optional(),
  checkpointInterval: intArg.optional(),
  largeThreshold: intArg.optional(),
  minLength: intArg.optional(),
  loginTimeout: intArg.optional(),
  site: z.string().min(1).default(EXPORT_DEFAULTS.SITE_ID),
  resume: z.boolean().default(false),
  debug: z.boolean().default(false),
  headless: z.boolean().default(false),
});

interface TokenizedArgs {
  values: Map<string, string[]>;
  booleans: Set<string>;
  positionals: string[];
}

function invalid(message: string): ExportError {
  return new ExportError(ExportErrorType.CONFIG_INVALID, message);
}

/**
 * "--flag value", "--flag=value", "--switch" 분해
 */
function tokenize(args: readonly string[]): TokenizedArgs {
  const values = new Map<string, string[]>();
  const booleans = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const [rawName, inlineValue] = splitOnce(arg.slice(2), "=");

    if (BOOLEAN_FLAGS.has(rawName)) {
      if (inlineValue !== undefined) {
        throw invalid(`--${rawName} 에는 값을 지정할 수 없습니다`);
      }
      booleans.add(rawName);
      continue;
    }

    if (!VALUE_FLAGS.has(rawName)) {
      throw invalid(`알 수 없는 옵션: --${rawName}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw invalid(`--${rawName} 에 값이 필요합니다`);
      }
      value = next;
      i++;
    }

    const existing = values.get(rawName) ?? [];
    existing.push(value);
    values.set(rawName, existing);
  }

  return { values, booleans, positionals };
}

function splitOnce(value: string, separator: string): [string, string | undefined] {
  const index = value.indexOf(separator);
  return index === -1
    ? [value, undefined]
    : [value.slice(0, index), value.slice(index + 1)];
}

/**
 * URL → 기본 Target 이름 (첫 경로 조각)
 */
export function defaultTargetName(url: string): string {
  try {
    const [firstSegment] = new URL(url).pathname.split("/").filter(Boolean);
    return firstSegment ? decodeURIComponent(firstSegment) : "unknown_target";
  } catch {
    return "unknown_target";
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<args>"}: ${issue.message}`)
    .join("; ");
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }

  if (command === "convert") {
    const [file, ...extra] = rest;
    if (!file || file.startsWith("--") || extra.length > 0) {
      throw invalid("convert 에는 JSON 파일 경로 1개가 필요합니다");
    }
    return { command: "convert", file };
  }

  if (command !== "export") {
    throw invalid(`알 수 없는 명령: ${command}`);
  }

  const tokens = tokenize(rest);
  if (tokens.positionals.length > 0) {
    throw invalid(`예상하지 못한 인자: ${tokens.positionals.join(" ")}`);
  }

  const single = (name: string): string | undefined => {
    const list = tokens.values.get(name);
    return list ? list[list.length - 1] : undefined;
  };

  const parsed = ExportArgsSchema.safeParse({
    url: tokens.values.get("url") ?? [],
    name: tokens.values.get("name"),
    output: single("output"),
    maxPages: single("max-pages"),
    checkpointInterval: single("checkpoint-interval"),
    largeThreshold: single("large-threshold"),
    minLength: single("min-length"),
    loginTimeout: single("login-timeout"),
    site: single("site"),
    resume: tokens.booleans.has("resume"),
    debug: tokens.booleans.has("debug"),
    headless: tokens.booleans.has("headless"),
  });
  if (!parsed.success) {
    throw invalid(`잘못된 인자: ${formatIssues(parsed.error)}`);
  }

  const args = parsed.data;
  if (args.name.length > args.url.length) {
    throw invalid("--name 이 --url 보다 많습니다");
  }

  const targets: ExportTarget[] = [];
  for (const [index, url] of args.url.entries()) {
    const target = ExportTargetSchema.safeParse({
      name: args.name[index] ?? defaultTargetName(url),
      url,
    });
    if (!target.success) {
      throw invalid(`잘못된 Target (${url}): ${formatIssues(target.error)}`);
    }
    targets.push(target.data);
  }

  const options = ExportOptionsSchema.safeParse({
    outputDirectory: args.output,
    pageCap: args.maxPages,
    checkpointInterval: args.checkpointInterval,
    largeExportThreshold: args.largeThreshold,
    minContentLength: args.minLength,
    debug: args.debug,
    resume: args.resume,
  });
  if (!options.success) {
    throw invalid(`잘못된 옵션: ${formatIssues(options.error)}`);
  }

  return {
    command: "export",
    targets,
    options: options.data,
    headless: args.headless,
    loginTimeoutSec: args.loginTimeout ?? TIMING_CONFIG.LOGIN_TIMEOUT_SEC,
    site: args.site,
  };
}
