/**
 * Experiment Builder
 *
 * Rebuilds the hierarchical experiment model from a wide extract where each
 * row is one participant and every period of every round of every segment
 * lives in its own column block.
 *
 * Per build:
 * 1. Resolve the column schema once (segments, column-periods, fields)
 * 2. Split rows by session code; build each session independently
 * 3. Scan each labeled participant's column-periods in ascending order,
 *    detecting the period of sale and the last column-period of each round
 * 4. Read each round's payoff from that last column-period
 * 5. Accumulate group rosters across the whole segment
 * 6. Finalize the scratch arena into immutable model entities
 * 7. Optionally fold in the chat log
 *
 * A fatal error in one session fails that session only; the rest of the
 * batch is still built (unless `failFast` is set). Recoverable findings are
 * counted in the build report and logged once at the end, failed sessions
 * included.
 */

import {
  DEFAULT_EXPERIMENT_NAME,
  DEFAULT_FALLBACK_ALARM_RATIO,
  DEFAULT_SESSION_CODE,
  CHANNELS_PER_ROUND,
  FALLBACK_INDEX,
} from "../config/constants.ts";
import { readCell, readCsvFile, type CsvRow, type CsvTable } from "../lib/csv.ts";
import {
  errorMessage,
  isMarketDataError,
  throwDataError,
  toError,
  type DataErrorKind,
} from "../lib/errors.ts";
import { BuildReportCollector, logReportSummary, type BuildReport } from "./build-report.ts";
import {
  alignSessionChat,
  parseChatTable,
  reportUnbuiltSessionChat,
  type ChatLog,
} from "./chat-aligner.ts";
import {
  readFlag,
  readInteger,
  readNumber,
  resolveWideSchema,
  type CellContext,
  type PeriodColumns,
  type SegmentSchema,
  type WideSchema,
} from "./column-schema.ts";
import {
  createObservation,
  Experiment,
  Group,
  Period,
  Round,
  Segment,
  Session,
  type PlayerPeriodData,
  type SessionMetadataValue,
} from "./experiment-model.ts";
import { clearContext, logBuildComplete, logBuildStart, logger, withContext } from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExperimentTables {
  wide: CsvTable;
  chat?: CsvTable | null;
}

export interface ExperimentPaths {
  csvPath: string;
  chatPath?: string | null;
}

export interface BuildOptions {
  /** Experiment name (default "Market Runs Experiment") */
  name?: string;
  /** Session code used when the extract has no session.code column */
  defaultSessionCode?: string;
  /** Chat rooms per round (default 4) */
  channelsPerRound?: number;
  /** Fallback share above which the summary logs an error (default 0.1) */
  fallbackAlarmRatio?: number;
  /** Rethrow the first session failure instead of continuing */
  failFast?: boolean;
}

export interface SessionFailure {
  sessionCode: string;
  code: string;
  kind: DataErrorKind | "unexpected";
  message: string;
  details: Record<string, unknown>;
}

/**
 * - ok: every session built
 * - empty: nothing failed, but no session had labeled participants
 * - partial: some sessions failed, others built
 * - failed: every session failed
 */
export type BuildStatus = "ok" | "empty" | "partial" | "failed";

export interface BuildResult {
  experiment: Experiment;
  report: BuildReport;
  failures: SessionFailure[];
  status: BuildStatus;
  traceId: string;
}

/** A labeled participant row of one session */
interface ParticipantRow {
  row: CsvRow;
  label: string;
  participantId: number;
}

// ---------------------------------------------------------------------------
// Scratch arena (never leaves this module)
// ---------------------------------------------------------------------------

interface PeriodScratch {
  /** First column-period this period appeared in */
  firstColumn: number;
  observations: Map<string, PlayerPeriodData>;
  /** Labels whose observation here was placed with a defaulted number */
  fallbackLabels: Set<string>;
}

interface RoundScratch {
  firstColumn: number;
  periods: Map<number, PeriodScratch>;
  payoffs: Map<string, number>;
}

interface SegmentScratch {
  rounds: Map<number, RoundScratch>;
  groupMembers: Map<number, Set<string>>;
  groupOfLabel: Map<string, number>;
}

/**
 * Per-build record of each player's cumulative sold status per round.
 * A period is the period of sale when a sell click is recorded or the
 * cumulative flag rises above every earlier value of the round.
 */
class SoldTransitionTracker {
  private readonly rounds = new Map<string, { max: 0 | 1; soldInColumn: number | null }>();

  observe(
    label: string,
    round: number,
    column: number,
    sold: 0 | 1,
    sellTimestamp: number | null,
    details: Record<string, unknown>,
  ): boolean {
    const key = `${label}\u0000${round}`;
    const entry = this.rounds.get(key) ?? { max: 0, soldInColumn: null };

    if (sold < entry.max) {
      throwDataError("SOLD_NOT_MONOTONIC", `Player ${label} sold status fell from 1 to 0 in round ${round}`, details);
    }
    if (sellTimestamp !== null && sold === 0) {
      throwDataError(
        "SOLD_TRANSITION_INVALID",
        `Player ${label} has a sell click in round ${round} without a cumulative sale`,
        details,
      );
    }

    const soldThisPeriod = sellTimestamp !== null || sold > entry.max;
    if (soldThisPeriod && entry.soldInColumn !== null) {
      throwDataError(
        "SOLD_TRANSITION_INVALID",
        `Player ${label} sells twice in round ${round} (column-periods ${entry.soldInColumn} and ${column})`,
        details,
      );
    }

    this.rounds.set(key, {
      max: sold > entry.max ? sold : entry.max,
      soldInColumn: soldThisPeriod ? column : entry.soldInColumn,
    });
    return soldThisPeriod;
  }

  /**
   * Column-period whose round number was defaulted: it cannot be placed in
   * the round's sale history, so only the sell click marks a sale.
   */
  observeUnplaced(
    label: string,
    sold: 0 | 1,
    sellTimestamp: number | null,
    details: Record<string, unknown>,
  ): boolean {
    if (sellTimestamp !== null && sold === 0) {
      throwDataError(
        "SOLD_TRANSITION_INVALID",
        `Player ${label} has a sell click without a cumulative sale`,
        details,
      );
    }
    return sellTimestamp !== null;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build an experiment from already-loaded tables.
 *
 * Header-level problems (missing participant columns, a column-period
 * without id_in_group) throw, since no session can be built. Session-level
 * problems are returned in `failures`.
 */
export function buildExperiment(
  tables: ExperimentTables,
  options: BuildOptions = {},
): BuildResult {
  const startedAt = Date.now();
  const traceId = `build_${startedAt.toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  const channelsPerRound = options.channelsPerRound ?? CHANNELS_PER_ROUND;
  const defaultSessionCode = options.defaultSessionCode ?? DEFAULT_SESSION_CODE;

  const schema = resolveWideSchema(tables.wide.headers);
  logBuildStart(traceId, tables.wide.source, tables.wide.rows.length);
  logger.debug("experiment-builder", "Column schema resolved", {
    segments: schema.segments.map((s) => `${s.name} (${s.periods.length} periods)`),
    sessionColumn: schema.sessionCodeColumn,
  });

  const report = new BuildReportCollector();
  const sessionRows = splitSessions(tables.wide.rows, schema, defaultSessionCode);
  const chatLog = tables.chat
    ? matchDefaultSession(parseChatTable(tables.chat, report), schema, defaultSessionCode)
    : null;

  const sessions: Session[] = [];
  const failures: SessionFailure[] = [];
  let chatMessagesAttached = 0;

  for (const [sessionCode, rows] of sessionRows) {
    const sessionReport = new BuildReportCollector();
    try {
      const session = withContext({ sessionCode }, () => {
        const built = buildSession(schema, sessionCode, rows, sessionReport);
        if (built && chatLog) {
          for (const alignment of alignSessionChat(built, chatLog, channelsPerRound, sessionReport)) {
            chatMessagesAttached += alignment.attached;
          }
        }
        return built;
      });
      if (session) sessions.push(session);
    } catch (err) {
      if (options.failFast) {
        clearContext();
        throw err;
      }
      const failure = toFailure(sessionCode, err);
      failures.push(failure);
      logger.error("experiment-builder", `Session ${sessionCode} failed: ${failure.message}`, toError(err), {
        sessionCode,
        code: failure.code,
      });
    } finally {
      report.merge(sessionReport);
    }
  }

  if (chatLog) {
    reportUnbuiltSessionChat(new Set(sessions.map((s) => s.sessionCode)), chatLog, report);
  }

  const experiment = new Experiment(options.name ?? DEFAULT_EXPERIMENT_NAME, sessions);
  const finalReport = report.toReport();
  logReportSummary(finalReport, options.fallbackAlarmRatio ?? DEFAULT_FALLBACK_ALARM_RATIO);

  const status = buildStatus(sessions.length, failures.length);
  if (status === "empty") {
    logger.warn("experiment-builder", "No session had labeled participants; experiment is empty", {
      rows: tables.wide.rows.length,
    });
  }

  logBuildComplete({
    traceId,
    durationMs: Date.now() - startedAt,
    sessionsBuilt: sessions.length,
    sessionsFailed: failures.length,
    observations: finalReport.observations,
    chatMessagesAttached,
    warnings: finalReport.totalWarnings,
  });

  return { experiment, report: finalReport, failures, status, traceId };
}

/**
 * Read the input files and build. A missing file throws MISSING_INPUT
 * before anything is built.
 */
export function loadExperiment(paths: ExperimentPaths, options: BuildOptions = {}): BuildResult {
  const wide = readCsvFile(paths.csvPath);
  const chat = paths.chatPath ? readCsvFile(paths.chatPath) : null;
  logger.info("experiment-builder", "Input loaded", {
    csvPath: paths.csvPath,
    rows: wide.rows.length,
    chatPath: paths.chatPath ?? null,
    chatRows: chat?.rows.length ?? 0,
  });
  return buildExperiment({ wide, chat }, options);
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

/**
 * An extract without a session.code column builds a single session under
 * the default code. A chat log naming exactly one session is taken to be
 * that session's log.
 */
function matchDefaultSession(
  chatLog: ChatLog,
  schema: WideSchema,
  defaultSessionCode: string,
): ChatLog {
  if (schema.sessionCodeColumn) return chatLog;
  const codes = new Set([
    ...chatLog.records.map((r) => r.sessionCode),
    ...chatLog.malformed.flatMap((m) => (m.sessionCode === null ? [] : [m.sessionCode])),
  ]);
  if (codes.size !== 1) return chatLog;

  const [chatSessionCode] = codes;
  logger.info("experiment-builder", "Chat log matched to the extract's single session", {
    chatSessionCode,
    sessionCode: defaultSessionCode,
  });
  return {
    records: chatLog.records.map((r) => ({ ...r, sessionCode: defaultSessionCode })),
    malformed: chatLog.malformed.map((m) =>
      m.sessionCode === null ? m : { ...m, sessionCode: defaultSessionCode },
    ),
  };
}

function splitSessions(
  rows: readonly CsvRow[],
  schema: WideSchema,
  defaultSessionCode: string,
): Map<string, CsvRow[]> {
  const bySession = new Map<string, CsvRow[]>();
  for (const row of rows) {
    const code =
      (schema.sessionCodeColumn ? readCell(row, schema.sessionCodeColumn) : null) ??
      defaultSessionCode;
    const sessionRows = bySession.get(code) ?? [];
    sessionRows.push(row);
    bySession.set(code, sessionRows);
  }
  return bySession;
}

/**
 * Build one session. Returns null (with a warning) when the session has no
 * labeled participants.
 */
export function buildSession(
  schema: WideSchema,
  sessionCode: string,
  rows: readonly CsvRow[],
  report: BuildReportCollector,
): Session | null {
  const participants = collectParticipants(schema, sessionCode, rows, report);
  if (participants.length === 0) {
    report.warn("sessionWithoutParticipants", { sessionCode, rows: rows.length });
    return null;
  }

  const segments = schema.segments.map((segmentSchema) =>
    withContext({ segment: segmentSchema.name }, () =>
      buildSegment(segmentSchema, sessionCode, participants, report),
    ),
  );

  const session = new Session(
    sessionCode,
    segments,
    new Map(participants.map((p) => [p.participantId, p.label])),
    readSessionMetadata(schema, rows[0]),
  );

  logger.debug("experiment-builder", "Session built", {
    participants: session.participantCount,
    segments: session.segmentNames,
  });
  return session;
}

function collectParticipants(
  schema: WideSchema,
  sessionCode: string,
  rows: readonly CsvRow[],
  report: BuildReportCollector,
): ParticipantRow[] {
  const participants: ParticipantRow[] = [];
  const idByLabel = new Map<string, number>();
  const labelById = new Map<number, string>();

  rows.forEach((row, rowIndex) => {
    const label = readCell(row, schema.labelColumn);
    if (label === null) {
      report.warn("unlabeledRow", { sessionCode, rowIndex });
      return;
    }

    const ctx: CellContext = { sessionCode, label };
    const participantId = readInteger(row, schema.participantIdColumn, ctx);
    if (participantId === null) {
      throwDataError("INVALID_CELL", `Participant ${label} has no ${schema.participantIdColumn}`, {
        ...ctx,
        rowIndex,
      });
    }

    const knownId = idByLabel.get(label);
    const knownLabel = labelById.get(participantId);
    if (knownId !== undefined || knownLabel !== undefined) {
      throwDataError(
        "DUPLICATE_LABEL",
        `Label ${label} / participant ${participantId} appears more than once in session ${sessionCode}`,
        { sessionCode, label, participantId, knownId, knownLabel },
      );
    }

    idByLabel.set(label, participantId);
    labelById.set(participantId, label);
    participants.push({ row, label, participantId });
  });

  return participants;
}

function readSessionMetadata(
  schema: WideSchema,
  firstRow: CsvRow | undefined,
): Record<string, SessionMetadataValue> {
  const metadata: Record<string, SessionMetadataValue> = {};
  if (!firstRow) return metadata;

  for (const [key, column] of Object.entries(schema.metadataColumns)) {
    metadata[key] = parseMetadataValue(key, readCell(firstRow, column));
  }
  return metadata;
}

function parseMetadataValue(key: string, text: string | null): SessionMetadataValue {
  if (text === null) return null;
  if (key === "isDemo") {
    return ["1", "1.0", "true", "True", "TRUE"].includes(text);
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : text;
}

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

function buildSegment(
  segmentSchema: SegmentSchema,
  sessionCode: string,
  participants: readonly ParticipantRow[],
  report: BuildReportCollector,
): Segment {
  const scratch: SegmentScratch = {
    rounds: new Map(),
    groupMembers: new Map(),
    groupOfLabel: new Map(),
  };
  const tracker = new SoldTransitionTracker();

  for (const participant of participants) {
    scanParticipant(segmentSchema, sessionCode, participant, scratch, tracker, report);
  }

  const segment = finalizeSegment(segmentSchema.name, sessionCode, scratch);
  logger.debug("experiment-builder", "Segment built", {
    rounds: segment.roundCount,
    groups: segment.groupCount,
  });
  return segment;
}

function scanParticipant(
  segmentSchema: SegmentSchema,
  sessionCode: string,
  participant: ParticipantRow,
  scratch: SegmentScratch,
  tracker: SoldTransitionTracker,
  report: BuildReportCollector,
): void {
  const { row, label, participantId } = participant;
  const ctx: CellContext = { sessionCode, label };
  const segment = segmentSchema.name;
  const lastColumnOfRound = new Map<number, PeriodColumns>();

  for (const cols of segmentSchema.periods) {
    const idInGroup = readInteger(row, cols.idInGroup, ctx);
    if (idInGroup === null) continue;

    const groupId = readInteger(row, cols.groupId, ctx);
    if (groupId !== null) recordGroupMember(scratch, groupId, label, sessionCode, segment);

    const roundCell = readInteger(row, cols.roundNumber, ctx);
    const periodCell = readInteger(row, cols.periodInRound, ctx);
    if (roundCell === null) {
      report.warn("roundNumberFallback", { sessionCode, segment, label, column: cols.periodIndex });
    }
    if (periodCell === null) {
      report.warn("periodInRoundFallback", { sessionCode, segment, label, column: cols.periodIndex });
    }
    const roundIndex = roundCell ?? FALLBACK_INDEX;
    const periodIndex = periodCell ?? FALLBACK_INDEX;

    const usedFallback = roundCell === null || periodCell === null;
    const details = { ...ctx, segment, round: roundIndex, period: periodIndex, column: cols.periodIndex };

    const sold = readFlag(row, cols.sold, ctx) ?? 0;
    const sellTimestamp = readNumber(row, cols.sellClickTime, ctx);
    const soldThisPeriod =
      roundCell === null
        ? tracker.observeUnplaced(label, sold, sellTimestamp, details)
        : tracker.observe(label, roundIndex, cols.periodIndex, sold, sellTimestamp, details);

    const observation = createObservation({
      participantId,
      label,
      idInGroup,
      soldCumulative: sold,
      soldThisPeriod,
      signal: readNumber(row, cols.signal, ctx),
      price: readNumber(row, cols.price, ctx),
      sellTimestamp,
      state: readFlag(row, cols.state, ctx) ?? 0,
      payoff: readNumber(row, cols.payoff, ctx),
    });

    const round = scratch.rounds.get(roundIndex) ?? {
      firstColumn: cols.periodIndex,
      periods: new Map<number, PeriodScratch>(),
      payoffs: new Map<string, number>(),
    };
    scratch.rounds.set(roundIndex, round);
    const period = round.periods.get(periodIndex) ?? {
      firstColumn: cols.periodIndex,
      observations: new Map<string, PlayerPeriodData>(),
      fallbackLabels: new Set<string>(),
    };
    round.periods.set(periodIndex, period);
    round.firstColumn = Math.min(round.firstColumn, cols.periodIndex);
    period.firstColumn = Math.min(period.firstColumn, cols.periodIndex);

    report.recordObservation(usedFallback);
    lastColumnOfRound.set(roundIndex, cols);

    if (!period.observations.has(label)) {
      period.observations.set(label, observation);
      if (usedFallback) period.fallbackLabels.add(label);
      continue;
    }
    // Only numbers read from the extract make a repeat an error; the first
    // observation wins otherwise
    if (!usedFallback && !period.fallbackLabels.has(label)) {
      throwDataError(
        "DUPLICATE_OBSERVATION",
        `Player ${label} has two observations for round ${roundIndex} period ${periodIndex} in ${segment}`,
        details,
      );
    }
    report.warn("fallbackCollision", details);
  }

  if (lastColumnOfRound.size === 0) {
    report.warn("participantWithoutSegmentData", { sessionCode, segment, label });
    return;
  }

  resolveRoundPayoffs(row, ctx, segment, lastColumnOfRound, scratch, report);
}

/**
 * The round_N_payoff slot is rewritten every period of round N; only the
 * copy in the round's last column-period holds the final value.
 */
function resolveRoundPayoffs(
  row: CsvRow,
  ctx: CellContext,
  segment: string,
  lastColumnOfRound: ReadonlyMap<number, PeriodColumns>,
  scratch: SegmentScratch,
  report: BuildReportCollector,
): void {
  for (const [roundIndex, cols] of lastColumnOfRound) {
    const column = cols.roundPayoffs.get(roundIndex);
    const payoff = readNumber(row, column, ctx);
    if (payoff === null) {
      report.warn("missingRoundPayoff", {
        ...ctx,
        segment,
        round: roundIndex,
        column: column ?? `round_${roundIndex}_payoff@${cols.periodIndex}`,
      });
      continue;
    }
    scratch.rounds.get(roundIndex)?.payoffs.set(ctx.label, payoff);
  }
}

function recordGroupMember(
  scratch: SegmentScratch,
  groupId: number,
  label: string,
  sessionCode: string,
  segment: string,
): void {
  const existing = scratch.groupOfLabel.get(label);
  if (existing !== undefined && existing !== groupId) {
    throwDataError(
      "GROUP_CONFLICT",
      `Player ${label} belongs to groups ${existing} and ${groupId} in segment ${segment}`,
      { sessionCode, segment, label, groupIds: [existing, groupId] },
    );
  }
  scratch.groupOfLabel.set(label, groupId);
  const members = scratch.groupMembers.get(groupId) ?? new Set<string>();
  members.add(label);
  scratch.groupMembers.set(groupId, members);
}

function finalizeSegment(name: string, sessionCode: string, scratch: SegmentScratch): Segment {
  const rounds = [...scratch.rounds.entries()]
    .sort(([, a], [, b]) => a.firstColumn - b.firstColumn)
    .map(([roundIndex, round]) => {
      const periods = [...round.periods.entries()]
        .sort(([, a], [, b]) => a.firstColumn - b.firstColumn)
        .map(([periodIndex, period]) => new Period(periodIndex, period.observations.values()));
      return new Round(roundIndex, periods, round.payoffs);
    });

  const groups = [...scratch.groupMembers.entries()].map(
    ([groupId, members]) => new Group(groupId, members, sessionCode, name),
  );

  return new Segment(name, sessionCode, rounds, groups);
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

function toFailure(sessionCode: string, err: unknown): SessionFailure {
  if (isMarketDataError(err)) {
    return {
      sessionCode,
      code: err.code,
      kind: err.kind,
      message: err.message,
      details: err.details,
    };
  }
  return {
    sessionCode,
    code: "unexpected",
    kind: "unexpected",
    message: errorMessage(err),
    details: {},
  };
}

function buildStatus(built: number, failed: number): BuildStatus {
  if (failed > 0) return built > 0 ? "partial" : "failed";
  return built > 0 ? "ok" : "empty";
}
