/**
 * Build Report Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BuildReportCollector, logReportSummary } from "../build-report.ts";
import { configureLogger, getRecentLogs, resetLoggerStats } from "../structured-logger.ts";

beforeEach(() => {
  resetLoggerStats();
  configureLogger({ minLevel: "DEBUG", jsonOutput: false });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Build Report", () => {
  describe("BuildReportCollector", () => {
    it("should count warnings and keep the first five samples", () => {
      const collector = new BuildReportCollector();
      for (let i = 0; i < 7; i++) {
        collector.warn("unlabeledRow", { rowIndex: i });
      }
      collector.warn("chatSegmentUnknown", { segments: ["intro"] }, 3);
      const report = collector.toReport();

      expect(report.counts.unlabeledRow).toBe(7);
      expect(report.counts.chatSegmentUnknown).toBe(3);
      expect(report.totalWarnings).toBe(10);
      expect(report.samples.unlabeledRow?.map((s) => s.rowIndex)).toEqual([0, 1, 2, 3, 4]);
      expect(report.samples.channelGap).toBeUndefined();
    });

    it("should compute the fallback ratio over all observations", () => {
      const collector = new BuildReportCollector();
      collector.recordObservation(true);
      collector.recordObservation(false);
      collector.recordObservation(false);
      collector.recordObservation(false);

      const report = collector.toReport();
      expect(report.observations).toBe(4);
      expect(report.fallbackObservations).toBe(1);
      expect(report.fallbackRatio).toBe(0.25);
    });

    it("should report a zero ratio when nothing was observed", () => {
      expect(new BuildReportCollector().toReport().fallbackRatio).toBe(0);
    });

    it("should merge another collector", () => {
      const total = new BuildReportCollector();
      total.warn("missingRoundPayoff", { label: "A" });
      total.recordObservation(false);

      const session = new BuildReportCollector();
      session.warn("missingRoundPayoff", { label: "B" });
      session.recordObservation(true);
      session.recordDroppedMessages("unattributedChannel", 4);
      session.recordChatPartition({ sessionCode: "s", segment: "m", total: 10, attached: 6, dropped: 4 });
      total.merge(session);

      const report = total.toReport();
      expect(report.counts.missingRoundPayoff).toBe(2);
      expect(report.samples.missingRoundPayoff).toEqual([{ label: "A" }, { label: "B" }]);
      expect(report.observations).toBe(2);
      expect(report.fallbackObservations).toBe(1);
      expect(report.droppedChatMessages).toEqual({
        malformed: 0,
        chatSessionUnknown: 0,
        chatSegmentUnknown: 0,
        unattributedChannel: 4,
        chatRoundMissing: 0,
      });
      expect(report.chatPartitions).toHaveLength(1);
    });

    it("should hand out copies that later warnings do not change", () => {
      const collector = new BuildReportCollector();
      const before = collector.toReport();
      collector.warn("channelGap", { missingChannels: [7] });

      expect(before.counts.channelGap).toBe(0);
      expect(collector.count("channelGap")).toBe(1);
    });
  });

  describe("logReportSummary", () => {
    it("should log one info line for a clean build", () => {
      logReportSummary(new BuildReportCollector().toReport(), 0.1);

      const logs = getRecentLogs({ service: "build-report" });
      expect(logs.map((l) => [l.level, l.message])).toEqual([
        ["INFO", "Build finished without data-quality warnings"],
      ]);
    });

    it("should list only the non-zero warning counts", () => {
      const collector = new BuildReportCollector();
      collector.warn("unattributedChannel", { channel: 9 });
      logReportSummary(collector.toReport(), 0.1);

      const [entry] = getRecentLogs({ service: "build-report" });
      expect(entry.level).toBe("WARN");
      expect(entry.data?.counts).toEqual({ unattributedChannel: 1 });
    });

    it("should escalate fallback usage above the alarm ratio", () => {
      const collector = new BuildReportCollector();
      collector.recordObservation(true);
      collector.recordObservation(false);
      logReportSummary(collector.toReport(), 0.1);

      const errors = getRecentLogs({ level: "ERROR", service: "build-report" });
      expect(errors).toHaveLength(1);
      expect(errors[0].data).toMatchObject({ fallbackObservations: 1, fallbackRatio: 0.5 });
    });
  });
});
