/**
 * Chat-to-Round Aligner
 *
 * Folds the flat chat log into an already-built session. The log only tags
 * each message with a channel string "<const>-<segment>-<channel>"; group
 * and round are inferred:
 *
 * 1. A channel belongs to the group of the first sender (by time) on it who
 *    is a member of one of the segment's groups.
 * 2. Channels are opened `channelsPerRound` at a time (one room per group),
 *    numbered contiguously in round order, so
 *      round = floor((channel - minChannel) / channelsPerRound) + 1
 *    where minChannel is the lowest channel seen for the segment.
 *
 * Rule 2 silently shifts rounds when channel numbers have gaps. Gaps, and a
 * group landing on two channels of one derived round, are reported as
 * warnings rather than corrected.
 */

import { CHAT_CHANNEL_PATTERN } from "../config/constants.ts";
import { readCell, type CsvRow, type CsvTable } from "../lib/csv.ts";
import { findMissingIntegers, stableSortBy } from "../lib/math-utils.ts";
import { chatRowSchema } from "../schemas/chat-row.ts";
import type { BuildReportCollector } from "./build-report.ts";
import {
  createChatMessage,
  type ChatMessage,
  type Segment,
  type Session,
} from "./experiment-model.ts";
import { logger } from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One validated chat row with its channel decoded */
export interface ChatRecord {
  sessionCode: string;
  segment: string;
  channel: number;
  message: ChatMessage;
}

/**
 * A chat row that failed validation. Session and segment are kept when the
 * raw cells still name them, so the row counts against that segment.
 */
export interface MalformedChatRow {
  sequenceId: number;
  sessionCode: string | null;
  segment: string | null;
}

export interface ChatLog {
  records: ChatRecord[];
  malformed: MalformedChatRow[];
}

export interface SegmentChatAlignment {
  segment: string;
  /** Messages on the segment's channels, malformed rows included */
  total: number;
  attached: number;
  dropped: number;
  /** channel → owning group id */
  channelOwners: Map<number, number>;
  /** Null when the segment only had malformed rows */
  minChannel: number | null;
  missingChannels: number[];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate chat rows and decode channels. Rows that fail validation are
 * counted as malformed, dropped, and returned separately.
 */
export function parseChatTable(table: CsvTable, report: BuildReportCollector): ChatLog {
  const records: ChatRecord[] = [];
  const malformed: MalformedChatRow[] = [];

  table.rows.forEach((row, sequenceId) => {
    const parsed = chatRowSchema.safeParse(row);
    const channelMatch = parsed.success ? CHAT_CHANNEL_PATTERN.exec(parsed.data.channel) : null;

    if (!parsed.success || !channelMatch) {
      report.warn("malformedChatRow", {
        sequenceId,
        issues: parsed.success
          ? [`channel: Unreadable channel "${parsed.data.channel}"`]
          : parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      report.recordDroppedMessages("malformed", 1);
      malformed.push(locateMalformedRow(row, sequenceId));
      return;
    }

    records.push({
      sessionCode: parsed.data.session_code,
      segment: channelMatch[2],
      channel: Number(channelMatch[3]),
      message: createChatMessage({
        senderLabel: parsed.data.nickname,
        body: parsed.data.body,
        timestamp: parsed.data.timestamp,
        participantCode: parsed.data.participant_code,
        idInSession: parsed.data.id_in_session,
        sequenceId,
      }),
    });
  });

  return { records, malformed };
}

function locateMalformedRow(row: CsvRow, sequenceId: number): MalformedChatRow {
  const channel = readCell(row, "channel");
  const channelMatch = channel === null ? null : CHAT_CHANNEL_PATTERN.exec(channel);
  return {
    sequenceId,
    sessionCode: readCell(row, "session_code"),
    segment: channelMatch ? channelMatch[2] : null,
  };
}

// ---------------------------------------------------------------------------
// Alignment
// ---------------------------------------------------------------------------

export function channelToRound(
  channel: number,
  minChannel: number,
  channelsPerRound: number,
): number {
  return Math.floor((channel - minChannel) / channelsPerRound) + 1;
}

/**
 * Attach a session's chat records to its rounds. Records of other sessions
 * are left for `reportUnbuiltSessionChat`.
 */
export function alignSessionChat(
  session: Session,
  chatLog: ChatLog,
  channelsPerRound: number,
  report: BuildReportCollector,
): SegmentChatAlignment[] {
  const sessionRecords = chatLog.records.filter((r) => r.sessionCode === session.sessionCode);
  const sessionMalformed = chatLog.malformed.filter((m) => m.sessionCode === session.sessionCode);
  const alignments: SegmentChatAlignment[] = [];

  const unknownSegments = sessionRecords.filter((r) => !session.segments.has(r.segment));
  if (unknownSegments.length > 0) {
    report.warn(
      "chatSegmentUnknown",
      {
        sessionCode: session.sessionCode,
        segments: [...new Set(unknownSegments.map((r) => r.segment))].sort(),
      },
      unknownSegments.length,
    );
    report.recordDroppedMessages("chatSegmentUnknown", unknownSegments.length);
  }

  for (const segment of session.segments.values()) {
    const segmentRecords = sessionRecords.filter((r) => r.segment === segment.name);
    const malformedCount = sessionMalformed.filter((m) => m.segment === segment.name).length;
    if (segmentRecords.length === 0 && malformedCount === 0) continue;
    alignments.push(
      alignSegmentChat(session.sessionCode, segment, segmentRecords, malformedCount, channelsPerRound, report),
    );
  }

  return alignments;
}

/**
 * Count and report the records of sessions the build did not produce
 * (unknown codes, failed sessions, sessions without participants).
 */
export function reportUnbuiltSessionChat(
  builtSessionCodes: ReadonlySet<string>,
  chatLog: ChatLog,
  report: BuildReportCollector,
): number {
  const orphaned = chatLog.records.filter((r) => !builtSessionCodes.has(r.sessionCode));
  if (orphaned.length === 0) return 0;

  report.warn(
    "chatSessionUnknown",
    { sessionCodes: [...new Set(orphaned.map((r) => r.sessionCode))].sort() },
    orphaned.length,
  );
  report.recordDroppedMessages("chatSessionUnknown", orphaned.length);
  return orphaned.length;
}

function alignSegmentChat(
  sessionCode: string,
  segment: Segment,
  segmentRecords: readonly ChatRecord[],
  malformedCount: number,
  channelsPerRound: number,
  report: BuildReportCollector,
): SegmentChatAlignment {
  const ordered = stableSortBy(segmentRecords, (r) => r.message.timestamp);
  const channels = new Set(ordered.map((r) => r.channel));
  const minChannel = Math.min(...channels);

  const missingChannels = findMissingIntegers(channels);
  if (missingChannels.length > 0) {
    report.warn("channelGap", { sessionCode, segment: segment.name, missingChannels });
  }

  // First known sender on a channel decides its group
  const channelOwners = new Map<number, number>();
  for (const record of ordered) {
    if (channelOwners.has(record.channel)) continue;
    const group = segment.getGroupByPlayer(record.message.senderLabel);
    if (group) channelOwners.set(record.channel, group.groupId);
  }

  const channelByGroupRound = new Map<string, number>();
  for (const [channel, groupId] of channelOwners) {
    const round = channelToRound(channel, minChannel, channelsPerRound);
    const key = `${groupId}:${round}`;
    const previous = channelByGroupRound.get(key);
    if (previous !== undefined) {
      report.warn("channelRoundCollision", {
        sessionCode,
        segment: segment.name,
        groupId,
        round,
        channels: [previous, channel],
      });
    } else {
      channelByGroupRound.set(key, channel);
    }
  }

  const unattributed = new Map<number, number>();
  const roundless = new Map<number, number>();
  let attached = 0;

  for (const record of ordered) {
    const groupId = channelOwners.get(record.channel);
    if (groupId === undefined) {
      unattributed.set(record.channel, (unattributed.get(record.channel) ?? 0) + 1);
      continue;
    }
    const round = segment.getRound(channelToRound(record.channel, minChannel, channelsPerRound));
    if (!round) {
      roundless.set(record.channel, (roundless.get(record.channel) ?? 0) + 1);
      continue;
    }
    round.attachChatMessage(groupId, record.channel, record.message);
    attached++;
  }

  let droppedUnattributed = 0;
  for (const [channel, messages] of unattributed) {
    droppedUnattributed += messages;
    report.warn("unattributedChannel", { sessionCode, segment: segment.name, channel, messages });
  }
  let droppedRoundless = 0;
  for (const [channel, messages] of roundless) {
    droppedRoundless += messages;
    report.warn("chatRoundMissing", {
      sessionCode,
      segment: segment.name,
      channel,
      round: channelToRound(channel, minChannel, channelsPerRound),
      messages,
    });
  }
  report.recordDroppedMessages("unattributedChannel", droppedUnattributed);
  report.recordDroppedMessages("chatRoundMissing", droppedRoundless);

  const total = ordered.length + malformedCount;
  const dropped = droppedUnattributed + droppedRoundless + malformedCount;
  report.recordChatPartition({
    sessionCode,
    segment: segment.name,
    total,
    attached,
    dropped,
  });

  logger.debug("chat-aligner", "Segment chat aligned", {
    segment: segment.name,
    messages: total,
    attached,
    dropped,
    malformed: malformedCount,
    channels: channels.size,
  });

  return {
    segment: segment.name,
    total,
    attached,
    dropped,
    channelOwners,
    minChannel: channels.size > 0 ? minChannel : null,
    missingChannels,
  };
}
