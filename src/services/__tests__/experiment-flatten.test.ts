/**
 * Flatten & Export Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseCsvText } from "../../lib/csv.ts";
import { buildExperiment } from "../experiment-builder.ts";
import { PERIOD_ROW_COLUMNS, ROUND_ROW_COLUMNS, serializeRows } from "../experiment-flatten.ts";
import { configureLogger, resetLoggerStats } from "../structured-logger.ts";
import { participantRow, periodCells, wideTable } from "./fixtures/wide-table.ts";

const SEG = "chat_noavg";

function build() {
  const wide = wideTable([
    participantRow(
      "A",
      1,
      periodCells(SEG, 1, { round: 1, period: 1, sold: 0, signal: 0.6, price: 8, state: 1, payoff: 0, roundPayoffs: { 1: 5 }, group: 3 }),
      periodCells(SEG, 2, { round: 1, period: 2, sold: 1, signal: 0.7, price: 6, state: 1, payoff: 6, roundPayoffs: { 1: 12 }, group: 3 }),
    ),
    participantRow(
      "B",
      2,
      periodCells(SEG, 1, { round: 1, period: 1, idInGroup: 2, sold: 0, signal: 0.4, price: 8, state: 1, roundPayoffs: { 1: 3 }, group: 3 }),
      periodCells(SEG, 2, { round: 1, period: 2, idInGroup: 2, sold: 0, signal: 0.3, price: 6, state: 1, roundPayoffs: { 1: 0 }, group: 3 }),
    ),
  ]);
  return buildExperiment({ wide }).experiment;
}

beforeEach(() => {
  resetLoggerStats();
  configureLogger({ minLevel: "WARN", jsonOutput: false });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Experiment Flatten", () => {
  describe("period level", () => {
    it("should produce one row per player and period", () => {
      const rows = build().flatten("period");

      expect(rows).toHaveLength(4);
      expect(rows.map((r) => `${r.round}.${r.period}.${r.label}`)).toEqual([
        "1.1.A",
        "1.1.B",
        "1.2.A",
        "1.2.B",
      ]);
    });

    it("should carry the round payoff and the group id on every row", () => {
      const rows = build().flatten();
      const aPeriod2 = rows.find((r) => r.label === "A" && r.period === 2);

      expect(aPeriod2).toEqual({
        sessionCode: "session",
        segment: SEG,
        round: 1,
        period: 2,
        label: "A",
        participantId: 1,
        idInGroup: 1,
        sold: 1,
        soldThisPeriod: true,
        signal: 0.7,
        price: 6,
        sellTimestamp: null,
        state: 1,
        payoff: 6,
        roundPayoff: 12,
        groupId: 3,
      });
      expect(rows.filter((r) => r.label === "B").map((r) => r.roundPayoff)).toEqual([0, 0]);
    });

    it("should return equal output on repeated calls", () => {
      const experiment = build();
      const first = serializeRows(experiment.flatten("period"), "period", "jsonl");
      const second = serializeRows(experiment.flatten("period"), "period", "jsonl");

      expect(second).toBe(first);
    });
  });

  describe("round level", () => {
    it("should summarize each player's round from the last observation", () => {
      const rows = build().flatten("round");

      expect(rows).toEqual([
        {
          sessionCode: "session",
          segment: SEG,
          round: 1,
          label: "A",
          participantId: 1,
          idInGroup: 1,
          finalSold: 1,
          soldPeriod: 2,
          roundPayoff: 12,
          totalSellersInRound: 1,
          periodCount: 2,
          chatMessageCount: 0,
          groupId: 3,
        },
        {
          sessionCode: "session",
          segment: SEG,
          round: 1,
          label: "B",
          participantId: 2,
          idInGroup: 2,
          finalSold: 0,
          soldPeriod: null,
          roundPayoff: 0,
          totalSellersInRound: 1,
          periodCount: 2,
          chatMessageCount: 0,
          groupId: 3,
        },
      ]);
    });
  });

  describe("serializeRows", () => {
    it("should write CSV in the level's column order", () => {
      const csv = serializeRows(build().flatten("round"), "round", "csv");
      const lines = csv.split("\n");

      expect(lines[0]).toBe(ROUND_ROW_COLUMNS.join(","));
      expect(lines[1]).toBe("session,chat_noavg,1,A,1,1,1,2,12,1,2,0,3");
      expect(lines[2]).toBe("session,chat_noavg,1,B,2,2,0,,0,1,2,0,3");
    });

    it("should read back the period CSV with the same header", () => {
      const csv = serializeRows(build().flatten("period"), "period", "csv");
      const table = parseCsvText(csv);

      expect(table.headers).toEqual([...PERIOD_ROW_COLUMNS]);
      expect(table.rows[2]).toMatchObject({ label: "A", soldThisPeriod: "true", sellTimestamp: "" });
    });

    it("should write one JSON object per line", () => {
      const jsonl = serializeRows(build().flatten("round"), "round", "jsonl");
      const lines = jsonl.split("\n");

      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[1])).toMatchObject({ label: "B", soldPeriod: null });
    });
  });
});
