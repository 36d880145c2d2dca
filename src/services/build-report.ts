/**
 * Build Report
 *
 * Aggregates the recoverable data-quality findings of one experiment build.
 * The builder never logs these per row; it counts them here and the summary
 * is logged once when the build finishes. Failed sessions are included.
 *
 * Warning kinds:
 * - unlabeledRow: participant row without a label (row skipped)
 * - participantWithoutSegmentData: labeled participant with no observation
 *   in a segment (skipped for that segment)
 * - sessionWithoutParticipants: session with zero labeled participants
 * - roundNumberFallback / periodInRoundFallback: empty round or period cell
 *   replaced by 1
 * - fallbackCollision: a defaulted round/period landing on a slot the player
 *   already has (first observation kept)
 * - missingRoundPayoff: no terminal payoff for a (player, round)
 * - malformedChatRow: chat row that fails validation or has an unreadable
 *   channel
 * - chatSessionUnknown: chat rows naming a session that was not built
 * - chatSegmentUnknown: chat rows naming a segment the session does not have
 * - unattributedChannel: chat channel whose senders belong to no group
 * - chatRoundMissing: channel mapped to a round the segment does not have
 * - channelGap: missing channel numbers inside a segment's range
 * - channelRoundCollision: one group owning two channels of the same round
 */

import { REPORT_SAMPLE_LIMIT } from "../config/constants.ts";
import { logger } from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const WARNING_KINDS = [
  "unlabeledRow",
  "participantWithoutSegmentData",
  "sessionWithoutParticipants",
  "roundNumberFallback",
  "periodInRoundFallback",
  "fallbackCollision",
  "missingRoundPayoff",
  "malformedChatRow",
  "chatSessionUnknown",
  "chatSegmentUnknown",
  "unattributedChannel",
  "chatRoundMissing",
  "channelGap",
  "channelRoundCollision",
] as const;

export type WarningKind = (typeof WARNING_KINDS)[number];

export const DROP_REASONS = [
  "malformed",
  "chatSessionUnknown",
  "chatSegmentUnknown",
  "unattributedChannel",
  "chatRoundMissing",
] as const;

export type DropReason = (typeof DROP_REASONS)[number];

/** Chat bookkeeping for one (session, segment) */
export interface ChatPartition {
  sessionCode: string;
  segment: string;
  /** Messages on this segment's channels, malformed rows included */
  total: number;
  attached: number;
  dropped: number;
}

export interface BuildReport {
  counts: Record<WarningKind, number>;
  /** First few details per warning kind */
  samples: Partial<Record<WarningKind, Record<string, unknown>[]>>;
  observations: number;
  /** Observations built with at least one fallback round/period number */
  fallbackObservations: number;
  fallbackRatio: number;
  droppedChatMessages: Record<DropReason, number>;
  chatPartitions: ChatPartition[];
  totalWarnings: number;
}

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

export class BuildReportCollector {
  private readonly counts: Record<WarningKind, number> = emptyCounts();
  private readonly samples = new Map<WarningKind, Record<string, unknown>[]>();
  private readonly partitions: ChatPartition[] = [];
  private readonly dropped: Record<DropReason, number> = emptyDrops();
  private observations = 0;
  private fallbackObservations = 0;

  /**
   * Count a warning. `count` lets one call stand for several rows.
   */
  warn(kind: WarningKind, details: Record<string, unknown>, count = 1): void {
    this.counts[kind] += count;
    const kept = this.samples.get(kind) ?? [];
    if (kept.length < REPORT_SAMPLE_LIMIT) {
      kept.push(details);
      this.samples.set(kind, kept);
    }
  }

  recordObservation(usedFallback: boolean): void {
    this.observations++;
    if (usedFallback) this.fallbackObservations++;
  }

  recordDroppedMessages(reason: DropReason, count: number): void {
    this.dropped[reason] += count;
  }

  recordChatPartition(partition: ChatPartition): void {
    this.partitions.push(partition);
  }

  count(kind: WarningKind): number {
    return this.counts[kind];
  }

  /**
   * Fold another collector (one session's findings) into this one.
   */
  merge(other: BuildReportCollector): void {
    for (const kind of WARNING_KINDS) {
      this.counts[kind] += other.counts[kind];
      for (const sample of other.samples.get(kind) ?? []) {
        const kept = this.samples.get(kind) ?? [];
        if (kept.length >= REPORT_SAMPLE_LIMIT) break;
        kept.push(sample);
        this.samples.set(kind, kept);
      }
    }
    for (const reason of DROP_REASONS) {
      this.dropped[reason] += other.dropped[reason];
    }
    this.partitions.push(...other.partitions);
    this.observations += other.observations;
    this.fallbackObservations += other.fallbackObservations;
  }

  toReport(): BuildReport {
    const samples: Partial<Record<WarningKind, Record<string, unknown>[]>> = {};
    for (const [kind, kept] of this.samples) {
      samples[kind] = kept.map((s) => ({ ...s }));
    }
    return {
      counts: { ...this.counts },
      samples,
      observations: this.observations,
      fallbackObservations: this.fallbackObservations,
      fallbackRatio:
        this.observations > 0 ? this.fallbackObservations / this.observations : 0,
      droppedChatMessages: { ...this.dropped },
      chatPartitions: this.partitions.map((p) => ({ ...p })),
      totalWarnings: WARNING_KINDS.reduce((sum, kind) => sum + this.counts[kind], 0),
    };
  }
}

function emptyCounts(): Record<WarningKind, number> {
  return {
    unlabeledRow: 0,
    participantWithoutSegmentData: 0,
    sessionWithoutParticipants: 0,
    roundNumberFallback: 0,
    periodInRoundFallback: 0,
    fallbackCollision: 0,
    missingRoundPayoff: 0,
    malformedChatRow: 0,
    chatSessionUnknown: 0,
    chatSegmentUnknown: 0,
    unattributedChannel: 0,
    chatRoundMissing: 0,
    channelGap: 0,
    channelRoundCollision: 0,
  };
}

function emptyDrops(): Record<DropReason, number> {
  return {
    malformed: 0,
    chatSessionUnknown: 0,
    chatSegmentUnknown: 0,
    unattributedChannel: 0,
    chatRoundMissing: 0,
  };
}

// ---------------------------------------------------------------------------
// Summary logging
// ---------------------------------------------------------------------------

/**
 * Log the report once. Fallback round/period numbers above the alarm ratio
 * are logged as an error: the extract is probably missing whole columns.
 */
export function logReportSummary(report: BuildReport, fallbackAlarmRatio: number): void {
  const nonZero = Object.fromEntries(
    WARNING_KINDS.filter((kind) => report.counts[kind] > 0).map((kind) => [
      kind,
      report.counts[kind],
    ]),
  );

  if (report.fallbackObservations > 0 && report.fallbackRatio > fallbackAlarmRatio) {
    logger.error(
      "build-report",
      "Round/period numbers defaulted for a large share of observations",
      undefined,
      {
        fallbackObservations: report.fallbackObservations,
        observations: report.observations,
        fallbackRatio: report.fallbackRatio,
        alarmRatio: fallbackAlarmRatio,
      },
    );
  }

  if (report.totalWarnings === 0) {
    logger.info("build-report", "Build finished without data-quality warnings", {
      observations: report.observations,
    });
    return;
  }

  logger.warn("build-report", "Build finished with data-quality warnings", {
    totalWarnings: report.totalWarnings,
    counts: nonZero,
    droppedChatMessages: report.droppedChatMessages,
    samples: report.samples,
  });
}
