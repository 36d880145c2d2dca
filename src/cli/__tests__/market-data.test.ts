/**
 * Market Data CLI Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildExperiment } from "../../services/experiment-builder.ts";
import { configureLogger } from "../../services/structured-logger.ts";
import {
  participantRow,
  periodCells,
  wideTable,
} from "../../services/__tests__/fixtures/wide-table.ts";
import { formatSummary, parseCliArgs } from "../market-data.ts";

beforeEach(() => {
  configureLogger({ minLevel: "FATAL" });
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Market Data CLI", () => {
  describe("parseCliArgs", () => {
    it("should read flags in both spellings", () => {
      const options = parseCliArgs([
        "--csv",
        "wide.csv",
        "--chat=chat.csv",
        "--export",
        "out.jsonl",
        "--format=jsonl",
        "--level",
        "round",
      ]);

      expect(options).toEqual({
        csvPath: "wide.csv",
        chatPath: "chat.csv",
        exportPath: "out.jsonl",
        format: "jsonl",
        level: "round",
        summary: false,
      });
    });

    it("should default to a period-level CSV and a summary", () => {
      const options = parseCliArgs(["--csv", "wide.csv"]);

      expect(options).toMatchObject({ format: "csv", level: "period", summary: true, chatPath: null });
    });

    it("should fall back to the environment for input paths", () => {
      const options = parseCliArgs(["--summary"], {
        MARKET_DATA_CSV: "env-wide.csv",
        MARKET_CHAT_CSV: "env-chat.csv",
      });

      expect(options.csvPath).toBe("env-wide.csv");
      expect(options.chatPath).toBe("env-chat.csv");
    });

    it("should reject missing input and bad values", () => {
      expect(() => parseCliArgs([])).toThrow(/No wide CSV given/);
      expect(() => parseCliArgs(["--csv"])).toThrow("Option --csv needs a value");
      expect(() => parseCliArgs(["--csv", "a.csv", "--format", "xlsx"])).toThrow(
        "--format must be csv or jsonl, got xlsx",
      );
      expect(() => parseCliArgs(["--csv", "a.csv", "--level", "segment"])).toThrow(
        "--level must be period or round, got segment",
      );
      expect(() => parseCliArgs(["--verbose"])).toThrow(/Unknown option: --verbose/);
      expect(() => parseCliArgs(["wide.csv"])).toThrow(/Unexpected argument: wide.csv/);
    });
  });

  describe("formatSummary", () => {
    it("should describe sessions, segments and the report", () => {
      const wide = wideTable([
        participantRow(
          "A",
          1,
          periodCells("market", 1, { round: 1, period: 1, sold: 1, roundPayoffs: { 1: 4 }, group: 1 }),
          periodCells("market", 2, { round: 1, period: 2, sold: 1, roundPayoffs: { 1: 4 }, group: 1 }),
        ),
        participantRow(
          "B",
          2,
          periodCells("market", 1, { round: 1, period: 1, idInGroup: 2, roundPayoffs: { 1: 2 }, group: 1 }),
          periodCells("market", 2, { round: 1, period: 2, idInGroup: 2, roundPayoffs: { 1: "" }, group: 1 }),
        ),
      ]);
      const summary = formatSummary(buildExperiment({ wide }, { name: "Pilot" }));

      expect(summary.split("\n")).toEqual([
        "Pilot: 1 session(s), 2 participant(s) [ok]",
        "  Session session (2 participants)",
        "    market: 1 round(s), 2 period(s), 1 group(s), 0 chat message(s)",
        "Observations: 4 (0 with fallback round/period numbers)",
        "Warnings: 1",
        "  missingRoundPayoff: 1",
      ]);
    });

    it("should list failed sessions", () => {
      const wide = wideTable([
        participantRow(
          "A",
          1,
          { "session.code": "s9" },
          periodCells("market", 1, { round: 1, period: 1, sold: 2 }),
        ),
      ]);
      const lines = formatSummary(buildExperiment({ wide })).split("\n");

      expect(lines[0]).toBe("Market Runs Experiment: 0 session(s), 0 participant(s) [failed]");
      expect(lines[1]).toBe(
        "  FAILED s9: invalid_cell: Column market.1.player.sold must be 0 or 1, got 2",
      );
    });
  });
});
