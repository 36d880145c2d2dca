#!/usr/bin/env node
/**
 * Market Data CLI
 *
 * Rebuilds an experiment from a wide extract (and optionally its chat log),
 * prints a summary with the build report, and can export a flattened table.
 *
 * Usage:
 *   npx tsx src/cli/market-data.ts --csv all_apps_wide.csv --chat chat.csv --summary
 *   npx tsx src/cli/market-data.ts --csv all_apps_wide.csv --export rounds.csv --level round
 *   npx tsx src/cli/market-data.ts --csv all_apps_wide.csv --export periods.jsonl --format jsonl
 *
 * Input paths default to MARKET_DATA_CSV / MARKET_CHAT_CSV.
 */

import { writeFileSync } from "fs";
import { loadEnv, type Env } from "../config/env.ts";
import { errorMessage, isMarketDataError, toError } from "../lib/errors.ts";
import type { BuildReport } from "../services/build-report.ts";
import { loadExperiment, type BuildResult } from "../services/experiment-builder.ts";
import {
  serializeRows,
  type ExportFormat,
  type FlattenLevel,
} from "../services/experiment-flatten.ts";
import { configureLogger, logger } from "../services/structured-logger.ts";

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export interface CliOptions {
  csvPath: string;
  chatPath: string | null;
  exportPath: string | null;
  format: ExportFormat;
  level: FlattenLevel;
  summary: boolean;
}

const USAGE = [
  "Usage: market-data --csv <wide.csv> [--chat <chat.csv>] [--summary]",
  "                   [--export <file>] [--format csv|jsonl] [--level period|round]",
].join("\n");

/**
 * Parse CLI flags. Both `--flag value` and `--flag=value` are accepted.
 * Throws with a usage message on unknown flags or bad values.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Pick<Env, "MARKET_DATA_CSV" | "MARKET_CHAT_CSV"> = {},
): CliOptions {
  const values = new Map<string, string>();
  let summary = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--summary") {
      summary = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw new Error(`Unexpected argument: ${arg}\n${USAGE}`);
    }

    const eqIdx = arg.indexOf("=");
    const name = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);
    if (!["csv", "chat", "export", "format", "level"].includes(name)) {
      throw new Error(`Unknown option: --${name}\n${USAGE}`);
    }

    const value = eqIdx === -1 ? argv[++i] : arg.slice(eqIdx + 1);
    if (value === undefined || value === "") {
      throw new Error(`Option --${name} needs a value\n${USAGE}`);
    }
    values.set(name, value);
  }

  const csvPath = values.get("csv") ?? env.MARKET_DATA_CSV;
  if (!csvPath) {
    throw new Error(`No wide CSV given (use --csv or MARKET_DATA_CSV)\n${USAGE}`);
  }

  const format = values.get("format") ?? "csv";
  if (format !== "csv" && format !== "jsonl") {
    throw new Error(`--format must be csv or jsonl, got ${format}`);
  }
  const level = values.get("level") ?? "period";
  if (level !== "period" && level !== "round") {
    throw new Error(`--level must be period or round, got ${level}`);
  }

  const exportPath = values.get("export") ?? null;
  return {
    csvPath,
    chatPath: values.get("chat") ?? env.MARKET_CHAT_CSV ?? null,
    exportPath,
    format,
    level,
    // Without an export there is nothing else to show
    summary: summary || exportPath === null,
  };
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/**
 * Render a human-readable summary of a build.
 */
export function formatSummary(result: BuildResult): string {
  const { experiment, failures, report, status } = result;
  const lines: string[] = [
    `${experiment.name}: ${experiment.sessionCount} session(s), ${experiment.totalParticipants} participant(s) [${status}]`,
  ];

  for (const session of experiment.sessions) {
    lines.push(`  Session ${session.sessionCode} (${session.participantCount} participants)`);
    for (const segment of session.segments.values()) {
      let periods = 0;
      let chat = 0;
      for (const round of segment.rounds.values()) {
        periods += round.periodCount;
        chat += round.chatCount;
      }
      lines.push(
        `    ${segment.name}: ${segment.roundCount} round(s), ${periods} period(s), ${segment.groupCount} group(s), ${chat} chat message(s)`,
      );
    }
  }

  for (const failure of failures) {
    lines.push(`  FAILED ${failure.sessionCode}: ${failure.message}`);
  }

  lines.push(...formatReport(report));
  return lines.join("\n");
}

function formatReport(report: BuildReport): string[] {
  const lines = [
    `Observations: ${report.observations} (${report.fallbackObservations} with fallback round/period numbers)`,
  ];
  const warnings = Object.entries(report.counts).filter(([, count]) => count > 0);
  if (warnings.length === 0) {
    lines.push("Warnings: none");
    return lines;
  }
  lines.push(`Warnings: ${report.totalWarnings}`);
  for (const [kind, count] of warnings) {
    lines.push(`  ${kind}: ${count}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): number {
  let options: CliOptions;
  let env: Env;
  try {
    env = loadEnv();
    options = parseCliArgs(process.argv.slice(2), env);
  } catch (err) {
    console.error(errorMessage(err));
    return 1;
  }

  if (env.LOG_LEVEL) configureLogger({ minLevel: env.LOG_LEVEL });

  try {
    const result = loadExperiment(
      { csvPath: options.csvPath, chatPath: options.chatPath },
      {
        channelsPerRound: env.CHANNELS_PER_ROUND,
        fallbackAlarmRatio: env.FALLBACK_ALARM_RATIO,
      },
    );

    if (options.summary) console.log(formatSummary(result));

    if (options.exportPath) {
      const rows = result.experiment.flatten(options.level);
      writeFileSync(options.exportPath, serializeRows(rows, options.level, options.format) + "\n");
      console.log(`Wrote ${rows.length} ${options.level} row(s) to ${options.exportPath}`);
    }

    return result.status === "failed" ? 1 : 0;
  } catch (err) {
    logger.fatal("market-data-cli", "Build aborted", toError(err), {
      code: isMarketDataError(err) ? err.code : undefined,
    });
    return 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  process.exitCode = main();
}
