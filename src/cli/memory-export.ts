#!/usr/bin/env node
/**
 * Memory Export CLI
 *
 * 사용법:
 *   npx tsx src/cli/memory-export.ts export --url https://shapes.inc/my-bot/user/memory
 *   npx tsx src/cli/memory-export.ts convert exports/my-bot_20250101_120000.json
 *
 * 종료 코드: 하나 이상의 Target에서 메모리를 저장하면 0, 아니면 1
 */

import "dotenv/config";
import { v7 as uuidv7 } from "uuid";

import { ConfigLoader } from "@/config/ConfigLoader";
import { logger, Logger } from "@/config/logger";
import { ExportOutcome, hasExportedRecords } from "@/core/domain/ExportDocument";
import { ExportError } from "@/core/interfaces";
import { BrowserSessionLauncher } from "@/scrapers/controllers/BrowserSessionLauncher";
import { ExportService } from "@/services/ExportService";
import { FileCheckpointStore } from "@/services/FileCheckpointStore";
import { FileReportSerializer } from "@/services/FileReportSerializer";
import { InteractiveSessionProvider } from "@/services/InteractiveSessionProvider";
import { convertJsonFile } from "@/services/ReportConverter";
import { DebugSnapshotWriter } from "@/utils/DebugSnapshotWriter";
import { createRunLogger } from "@/utils/LoggerContext";
import { CliCommand, USAGE, parseCliArgs } from "@/cli/parseCliArgs";

type ExportCommand = Extract<CliCommand, { command: "export" }>;

const STATUS_ICONS: Record<ExportOutcome["status"], string> = {
  completed: "✅",
  partial: "⚠️",
  empty: "📭",
  not_authenticated: "🔒",
  failed: "❌",
};

function printSummary(outcomes: readonly ExportOutcome[]): void {
  console.log("\n" + "=".repeat(50));
  console.log("  Export 결과");
  console.log("=".repeat(50));
  for (const outcome of outcomes) {
    const icon = STATUS_ICONS[outcome.status];
    console.log(`${icon} ${outcome.targetName}: ${outcome.status} (${outcome.count}건)`);
    if (outcome.outputPaths) {
      console.log(`   JSON: ${outcome.outputPaths.jsonPath}`);
      console.log(`   TXT : ${outcome.outputPaths.textPath}`);
    }
    if (outcome.message) {
      console.log(`   ${outcome.message}`);
    }
    if (outcome.checkpointPath) {
      console.log(`   체크포인트: ${outcome.checkpointPath}`);
    }
    if (outcome.diagnostics) {
      console.log(`   진단: ${JSON.stringify(outcome.diagnostics)}`);
    }
  }
}

async function runExport(command: ExportCommand, log: Logger): Promise<number> {
  const site = ConfigLoader.getInstance().loadConfig(command.site);
  const { options } = command;

  const abortController = new AbortController();
  const onSigint = (): void => {
    log.warn("SIGINT 수신 - 현재 페이지 처리 후 중단");
    abortController.abort();
  };
  process.on("SIGINT", onSigint);

  const launcher = new BrowserSessionLauncher();
  try {
    const { driver } = await launcher.launch({ headless: command.headless });

    const service = new ExportService(
      {
        driver,
        site,
        session: new InteractiveSessionProvider(driver, site.session, {
          baseUrl: site.baseUrl,
          loginTimeoutSec: command.loginTimeoutSec,
        }),
        serializer: new FileReportSerializer(options.outputDirectory),
        checkpointStore: new FileCheckpointStore(options.outputDirectory),
        snapshotWriter: new DebugSnapshotWriter(options.outputDirectory),
        log,
      },
      options,
      { signal: abortController.signal },
    );

    const outcomes = await service.exportAll(command.targets);
    printSummary(outcomes);

    return outcomes.some(hasExportedRecords) ? 0 : 1;
  } finally {
    process.off("SIGINT", onSigint);
    await launcher.close();
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}\n`);
    console.error(USAGE);
    return 1;
  }

  if (command.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const log = createRunLogger(uuidv7());

  try {
    if (command.command === "convert") {
      const result = await convertJsonFile(command.file);
      console.log(`✅ ${result.count}건 → ${result.outputPath}`);
      return 0;
    }
    return await runExport(command, log);
  } catch (error) {
    const exportError = ExportError.from(error);
    log.error(exportError.toLogObject(), "실행 실패");
    console.error(`❌ ${exportError.message}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error }, "예상하지 못한 에러");
      process.exitCode = 1;
    });
}
